/**
 * Market concentration and classification over a sorted DomainStat list.
 */

import type {
  DomainAggregation,
  DomainStat,
  MarketSummary,
  MarketThresholds,
  MarketType,
} from '../types';

/**
 * Policy defaults. Only the top-3 and top-10 cut-offs are active; the top-5
 * cut-off is disabled unless configured.
 */
export const DEFAULT_MARKET_THRESHOLDS: Readonly<MarketThresholds> = Object.freeze({
  monopolisticTop3: 0.75,
  concentratedTop3: 0.5,
  concentratedTop5: Number.POSITIVE_INFINITY,
  concentratedTop10: 0.8,
});

/**
 * Combined share of the first `topN` entries. `stats` must already be sorted.
 */
export function concentration(stats: readonly DomainStat[], topN: number): number {
  if (!Number.isFinite(topN) || topN <= 0) return 0;
  const n = Math.min(Math.floor(topN), stats.length);
  let sum = 0;
  for (let i = 0; i < n; i++) {
    sum += stats[i]?.share ?? 0;
  }
  // float accumulation can land a hair above 1
  return Math.min(1, sum);
}

export function classifyMarket(
  stats: readonly DomainStat[],
  thresholds: MarketThresholds = DEFAULT_MARKET_THRESHOLDS,
): MarketType {
  const total = stats.reduce((sum, stat) => sum + stat.totalTraffic, 0);
  if (!(total > 0)) return 'no_data';

  const top3 = concentration(stats, 3);
  const top5 = concentration(stats, 5);
  const top10 = concentration(stats, 10);

  if (top3 > thresholds.monopolisticTop3) return 'monopolistic';
  if (
    top3 > thresholds.concentratedTop3 ||
    top5 > thresholds.concentratedTop5 ||
    top10 > thresholds.concentratedTop10
  ) {
    return 'concentrated';
  }
  return 'fragmented';
}

export function summarizeMarket(
  aggregation: DomainAggregation,
  thresholds: MarketThresholds = DEFAULT_MARKET_THRESHOLDS,
): MarketSummary {
  const { stats, totalTraffic } = aggregation;
  const leader = totalTraffic > 0 ? stats[0] : undefined;

  return {
    leader: leader
      ? { domain: leader.domain, totalTraffic: leader.totalTraffic, share: leader.share }
      : null,
    totalDomains: stats.length,
    totalTraffic,
    top3Share: concentration(stats, 3),
    top5Share: concentration(stats, 5),
    top10Share: concentration(stats, 10),
    marketType: classifyMarket(stats, thresholds),
  };
}
