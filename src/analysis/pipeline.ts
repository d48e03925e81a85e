/**
 * Analysis Pipeline - seed topics in, ranked domain table out.
 *
 * Stages:
 * 1. discoverKeywords: cost gate, keyword sources, volume floor, merge + negatives
 * 2. analyzeMarket:    removals + top-N, cost gate, SERP fan-out, aggregation, summary
 *
 * Each stage checks its estimate against `maxSpend` before issuing any paid call.
 * runAnalysis additionally checks both stages together (SERP at its worst case)
 * before the first stage starts.
 */

import type {
  DomainContribution,
  DomainStat,
  Keyword,
  KeywordSourceKind,
  MarketSummary,
  MarketThresholds,
  NegativeFilter,
  SerpDepth,
  SerpResult,
} from '../types';
import {
  DEFAULT_MIN_SEARCH_VOLUME,
  applyMinimumVolume,
  indexKeywords,
  mergeKeywords,
  removeKeywords,
  selectTopKeywords,
} from '../keywords/aggregator';
import { DEFAULT_NEGATIVES, normalizeKeyword } from '../keywords/negatives';
import { aggregateDomains } from '../domains/aggregator';
import { DEFAULT_MARKET_THRESHOLDS, summarizeMarket } from '../domains/market';
import type { DomainResolver } from '../domains/resolver';
import {
  DEFAULT_PRICES,
  assertWithinBudget,
  buildUnitPrices,
  estimateCost,
  planKeywordFetch,
  planSerpFetch,
  type PriceList,
} from '../cost/estimator';
import type { KeywordSource, SerpSource } from '../dataforseo/sources';
import type { FetchErrorKind } from '../dataforseo/errors';
import {
  DEFAULT_SERP_CONCURRENCY,
  fetchSerpsConcurrently,
  type KeywordFailure,
  type SerpFanoutProgress,
} from '../serp/fanout';
import { createLogger } from '../utils/logger';

const logger = createLogger('pipeline');

// =============================================================================
// TYPES
// =============================================================================

export interface AnalysisSettings {
  location: number;
  language: string;
  keywordsPerSource: number;
  minSearchVolume: number;
  keywordsToAnalyze: number;
  serpDepth: SerpDepth;
  /** Spending ceiling in USD, applied to each stage */
  maxSpend: number;
  negatives: NegativeFilter;
  thresholds: MarketThresholds;
  prices: PriceList;
  concurrency: number;
}

export const DEFAULT_ANALYSIS_SETTINGS: Readonly<AnalysisSettings> = Object.freeze({
  location: 2840,
  language: 'en',
  keywordsPerSource: 700,
  minSearchVolume: DEFAULT_MIN_SEARCH_VOLUME,
  keywordsToAnalyze: 100,
  serpDepth: 10,
  maxSpend: 5,
  negatives: DEFAULT_NEGATIVES,
  thresholds: DEFAULT_MARKET_THRESHOLDS,
  prices: DEFAULT_PRICES,
  concurrency: DEFAULT_SERP_CONCURRENCY,
});

export interface SourceFailure {
  source: KeywordSourceKind;
  kind: FetchErrorKind;
  message: string;
}

export interface KeywordDiscovery {
  seeds: string[];
  keywords: Keyword[];
  estimatedCost: number;
  sourceFailures: SourceFailure[];
}

export interface MarketAnalysisOptions {
  /** Keywords the user deselected after discovery */
  removals?: Iterable<string>;
  signal?: AbortSignal;
  onProgress?: (progress: SerpFanoutProgress) => void;
  resolver?: DomainResolver;
}

export interface AnalysisReport {
  /** Keywords sent to the SERP stage */
  keywords: Keyword[];
  serpResults: SerpResult[];
  stats: DomainStat[];
  contributions: DomainContribution[];
  summary: MarketSummary;
  totalTraffic: number;
  parseFailures: number;
  excludedResults: number;
  keywordFailures: KeywordFailure[];
  sourceFailures: SourceFailure[];
  completedKeywords: number;
  cancelled: boolean;
  estimatedCost: { keywords: number; serp: number; total: number };
}

// =============================================================================
// COST
// =============================================================================

export function estimateKeywordStageCost(
  sources: readonly KeywordSourceKind[],
  seedCount: number,
  settings: Pick<AnalysisSettings, 'keywordsPerSource' | 'prices'>,
): number {
  return estimateCost(
    planKeywordFetch(sources, seedCount, settings.keywordsPerSource),
    buildUnitPrices(settings.prices),
  );
}

export function estimateSerpStageCost(
  keywordCount: number,
  settings: Pick<AnalysisSettings, 'serpDepth' | 'prices'>,
): number {
  return estimateCost(planSerpFetch(keywordCount, settings.serpDepth), buildUnitPrices(settings.prices));
}

/**
 * Normalized, de-duplicated seeds; the count every keyword-stage estimate is based on.
 */
export function uniqueSeeds(seeds: readonly string[]): string[] {
  return [...new Set(seeds.map(normalizeKeyword).filter((s) => s.length > 0))];
}

// =============================================================================
// STAGE 1: KEYWORD DISCOVERY
// =============================================================================

export async function discoverKeywords(
  seeds: readonly string[],
  sources: readonly KeywordSource[],
  settings: AnalysisSettings,
): Promise<KeywordDiscovery> {
  const uniqueSeedList = uniqueSeeds(seeds);
  const estimatedCost = estimateKeywordStageCost(
    sources.map((s) => s.kind),
    uniqueSeedList.length,
    settings,
  );

  if (uniqueSeedList.length === 0 || sources.length === 0) {
    return { seeds: uniqueSeedList, keywords: [], estimatedCost, sourceFailures: [] };
  }

  assertWithinBudget('keyword', estimatedCost, settings.maxSpend);

  logger.info(
    { seeds: uniqueSeedList.length, sources: sources.map((s) => s.kind), estimatedCost },
    'Fetching keywords',
  );

  const request = {
    seeds: uniqueSeedList,
    location: settings.location,
    language: settings.language,
    negatives: settings.negatives,
    limit: settings.keywordsPerSource,
  };

  const settled = await Promise.all(
    sources.map(async (source) => ({ source, result: await source.fetch(request) })),
  );

  const lists: Keyword[][] = [];
  const sourceFailures: SourceFailure[] = [];
  for (const { source, result } of settled) {
    if (!result.ok) {
      sourceFailures.push({ source: source.kind, kind: result.error.kind, message: result.error.message });
      continue;
    }
    // Autocomplete suggestions have no volume; keep them past the floor
    lists.push(applyMinimumVolume(result.value, settings.minSearchVolume, source.kind === 'autocomplete'));
  }

  const keywords = mergeKeywords(lists, settings.negatives);
  logger.info(
    { keywords: keywords.length, failedSources: sourceFailures.length },
    'Keyword discovery complete',
  );

  return { seeds: uniqueSeedList, keywords, estimatedCost, sourceFailures };
}

// =============================================================================
// STAGE 2: SERP + AGGREGATION
// =============================================================================

export async function analyzeMarket(
  keywords: readonly Keyword[],
  serpSource: SerpSource,
  settings: AnalysisSettings,
  options: MarketAnalysisOptions = {},
): Promise<AnalysisReport> {
  const selected = selectTopKeywords(
    removeKeywords(keywords, options.removals ?? []),
    settings.keywordsToAnalyze,
  );
  const serpCost = estimateSerpStageCost(selected.length, settings);
  assertWithinBudget('SERP', serpCost, settings.maxSpend);

  logger.info(
    { keywords: selected.length, depth: settings.serpDepth, estimatedCost: serpCost },
    'Fetching SERPs',
  );

  const fanout = await fetchSerpsConcurrently(
    serpSource,
    selected.map((k) => k.text),
    { location: settings.location, language: settings.language, depth: settings.serpDepth },
    { concurrency: settings.concurrency, signal: options.signal, onProgress: options.onProgress },
  );

  const aggregation = aggregateDomains(
    fanout.results,
    indexKeywords(selected),
    settings.negatives,
    options.resolver,
  );
  const summary = summarizeMarket(aggregation, settings.thresholds);

  logger.info(
    {
      domains: summary.totalDomains,
      marketType: summary.marketType,
      failed: fanout.failures.length,
      cancelled: fanout.cancelled,
    },
    'Market analysis complete',
  );

  return {
    keywords: selected,
    serpResults: fanout.results,
    stats: aggregation.stats,
    contributions: aggregation.contributions,
    summary,
    totalTraffic: aggregation.totalTraffic,
    parseFailures: aggregation.parseFailures,
    excludedResults: aggregation.excludedResults,
    keywordFailures: fanout.failures,
    sourceFailures: [],
    completedKeywords: fanout.completedKeywords,
    cancelled: fanout.cancelled,
    estimatedCost: { keywords: 0, serp: serpCost, total: serpCost },
  };
}

// =============================================================================
// END TO END
// =============================================================================

export interface AnalysisDeps {
  keywordSources: readonly KeywordSource[];
  serpSource: SerpSource;
}

export async function runAnalysis(
  seeds: readonly string[],
  deps: AnalysisDeps,
  settings: AnalysisSettings,
  options: MarketAnalysisOptions = {},
): Promise<AnalysisReport> {
  const worstCase =
    estimateKeywordStageCost(
      deps.keywordSources.map((s) => s.kind),
      uniqueSeeds(seeds).length,
      settings,
    ) + estimateSerpStageCost(settings.keywordsToAnalyze, settings);
  assertWithinBudget('analysis', worstCase, settings.maxSpend);

  const discovery = await discoverKeywords(seeds, deps.keywordSources, settings);
  const report = await analyzeMarket(discovery.keywords, deps.serpSource, settings, options);

  return {
    ...report,
    sourceFailures: discovery.sourceFailures,
    estimatedCost: {
      keywords: discovery.estimatedCost,
      serp: report.estimatedCost.serp,
      total: discovery.estimatedCost + report.estimatedCost.serp,
    },
  };
}
