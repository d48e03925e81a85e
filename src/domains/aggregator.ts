/**
 * Domain Aggregator - CTR-weighted traffic share per registrable domain.
 *
 * Every SERP row contributes `searchVolume * CTR(rank)` to its domain. A domain
 * ranking several times for one keyword (sitelinks, multiple pages) collects
 * traffic for each rank but counts that keyword once in `keywordCount`.
 */

import { createLogger } from '../utils/logger';
import { EMPTY_NEGATIVES, isDomainExcluded, normalizeKeyword } from '../keywords/negatives';
import { estimateClicks } from '../traffic/ctr';
import { publicSuffixResolver, type DomainResolver } from './resolver';
import type {
  DomainAggregation,
  DomainContribution,
  DomainStat,
  Keyword,
  NegativeFilter,
  SerpResult,
} from '../types';

const logger = createLogger('domain-aggregator');

interface DomainAccumulator {
  traffic: number;
  keywords: Set<string>;
}

/**
 * Traffic descending, ties by domain ascending.
 */
function compareStats(a: DomainStat, b: DomainStat): number {
  if (a.totalTraffic !== b.totalTraffic) return b.totalTraffic - a.totalTraffic;
  if (a.domain < b.domain) return -1;
  if (a.domain > b.domain) return 1;
  return 0;
}

export function aggregateDomains(
  results: readonly SerpResult[],
  keywordsByText: ReadonlyMap<string, Keyword>,
  negatives: NegativeFilter = EMPTY_NEGATIVES,
  resolver: DomainResolver = publicSuffixResolver,
): DomainAggregation {
  const byDomain = new Map<string, DomainAccumulator>();
  const contributions: DomainContribution[] = [];
  let parseFailures = 0;
  let excludedResults = 0;

  for (const result of results) {
    const domain = resolver.resolve(result.url || result.domain);
    if (!domain) {
      parseFailures++;
      continue;
    }

    if (isDomainExcluded(domain, negatives) || isDomainExcluded(result.domain, negatives)) {
      excludedResults++;
      continue;
    }

    const keywordText = normalizeKeyword(result.keyword);
    const searchVolume = keywordsByText.get(keywordText)?.searchVolume ?? 0;
    const ctr = estimateClicks(result.rank);
    const estimatedTraffic = searchVolume * ctr;

    let acc = byDomain.get(domain);
    if (!acc) {
      acc = { traffic: 0, keywords: new Set() };
      byDomain.set(domain, acc);
    }
    acc.traffic += estimatedTraffic;
    acc.keywords.add(keywordText);

    contributions.push({
      keyword: keywordText,
      searchVolume,
      rank: result.rank,
      url: result.url,
      domain,
      title: result.title ?? '',
      ctr,
      estimatedTraffic,
    });
  }

  let totalTraffic = 0;
  for (const acc of byDomain.values()) totalTraffic += acc.traffic;

  const stats: DomainStat[] = [...byDomain.entries()]
    .map(([domain, acc]) => ({
      domain,
      totalTraffic: acc.traffic,
      keywordCount: acc.keywords.size,
      share: totalTraffic > 0 ? acc.traffic / totalTraffic : 0,
      rank: 0,
    }))
    .sort(compareStats);

  stats.forEach((stat, index) => {
    stat.rank = index + 1;
  });

  if (parseFailures > 0) {
    logger.warn({ parseFailures }, 'Skipped SERP rows without a registrable domain');
  }
  logger.debug(
    { domains: stats.length, totalTraffic, excludedResults },
    'Aggregated domain traffic',
  );

  return { stats, contributions, totalTraffic, parseFailures, excludedResults };
}
