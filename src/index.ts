/**
 * topic-share - keyword market traffic share on top of DataForSEO
 *
 * Library entry point. The CLI lives in ./cli.
 */

export * from './types';

// Keywords
export {
  DEFAULT_NEGATIVE_DOMAINS,
  DEFAULT_NEGATIVE_KEYWORDS,
  DEFAULT_NEGATIVES,
  EMPTY_NEGATIVES,
  createNegativeFilter,
  isDomainExcluded,
  isKeywordExcluded,
  normalizeDomainEntry,
  normalizeKeyword,
  parseListInput,
} from './keywords/negatives';
export {
  DEFAULT_MIN_SEARCH_VOLUME,
  applyMinimumVolume,
  compareKeywords,
  indexKeywords,
  mergeKeywords,
  removeKeywords,
  selectTopKeywords,
} from './keywords/aggregator';

// Traffic + domains
export { CTR_CURVE, MAX_SERP_RANK, estimateClicks, estimateTraffic, isSupportedRank } from './traffic/ctr';
export { createPublicSuffixResolver, publicSuffixResolver, type DomainResolver } from './domains/resolver';
export { aggregateDomains } from './domains/aggregator';
export { DEFAULT_MARKET_THRESHOLDS, classifyMarket, concentration, summarizeMarket } from './domains/market';

// Cost
export {
  BudgetExceededError,
  DEFAULT_PRICES,
  KEYWORDS_PER_REQUEST,
  assertWithinBudget,
  buildUnitPrices,
  estimateCost,
  planKeywordFetch,
  planSerpFetch,
  serpOperation,
  type OperationKind,
  type PriceList,
  type UnitCounts,
  type UnitPrices,
} from './cost/estimator';

// DataForSEO
export {
  createClientFromConfig,
  createDataForSeoClient,
  type DataForSeoClient,
  type DataForSeoClientOptions,
  type DataForSeoCredentials,
} from './dataforseo/client';
export { FetchError, type FetchErrorKind, type FetchResult } from './dataforseo/errors';
export {
  createAutocompleteSource,
  createKeywordSource,
  createRelatedTermsSource,
  createSerpSource,
  createTopicIdeasSource,
  type KeywordFetchRequest,
  type KeywordSource,
  type SerpFetchRequest,
  type SerpSource,
} from './dataforseo/sources';

// Pipeline
export { fetchSerpsConcurrently, type KeywordFailure, type SerpFanoutResult } from './serp/fanout';
export {
  DEFAULT_ANALYSIS_SETTINGS,
  analyzeMarket,
  discoverKeywords,
  runAnalysis,
  uniqueSeeds,
  type AnalysisReport,
  type AnalysisSettings,
  type KeywordDiscovery,
  type SourceFailure,
} from './analysis/pipeline';
export { resolveRunSettings, type RunOverrides } from './analysis/settings';

// Export + config
export { domainSummaryCsv, keywordListCsv, serpDetailCsv } from './export/reports';
export { generateCSV } from './export/formats';
export { ConfigError, loadConfig, type Config } from './utils/config';
