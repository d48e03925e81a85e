/**
 * CSV exports of an analysis run: keyword list, domain summary, SERP detail.
 */

import type { DomainContribution, DomainStat, Keyword } from '../types';
import { generateCSV, roundTo } from './formats';

export const KEYWORD_LIST_HEADERS = ['keyword', 'searchVolume', 'sources'] as const;

export const DOMAIN_SUMMARY_HEADERS = [
  'rank',
  'domain',
  'totalTraffic',
  'keywordCount',
  'share',
] as const;

export const SERP_DETAIL_HEADERS = [
  'keyword',
  'searchVolume',
  'rank',
  'url',
  'domain',
  'title',
  'ctr',
  'estimatedTraffic',
] as const;

/** Sources are joined with "|" so the column never needs quoting */
export function keywordListCsv(keywords: readonly Keyword[]): string {
  return generateCSV(
    KEYWORD_LIST_HEADERS,
    keywords.map((k) => [k.text, k.searchVolume, k.sources.join('|')]),
  );
}

export function domainSummaryCsv(stats: readonly DomainStat[]): string {
  return generateCSV(
    DOMAIN_SUMMARY_HEADERS,
    stats.map((s) => [s.rank, s.domain, roundTo(s.totalTraffic, 2), s.keywordCount, roundTo(s.share, 6)]),
  );
}

export function serpDetailCsv(contributions: readonly DomainContribution[]): string {
  return generateCSV(
    SERP_DETAIL_HEADERS,
    contributions.map((c) => [
      c.keyword,
      c.searchVolume,
      c.rank,
      c.url,
      c.domain,
      c.title,
      roundTo(c.ctr, 6),
      roundTo(c.estimatedTraffic, 2),
    ]),
  );
}
