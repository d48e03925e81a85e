/**
 * Shared domain types for keyword discovery, SERP analysis and traffic share.
 */

// =============================================================================
// KEYWORDS
// =============================================================================

export type KeywordSourceKind = 'related_terms' | 'topic_ideas' | 'autocomplete';

export const ALL_KEYWORD_SOURCES: readonly KeywordSourceKind[] = [
  'related_terms',
  'topic_ideas',
  'autocomplete',
];

export interface Keyword {
  /** Normalized text: trimmed, lower-cased, single-spaced */
  text: string;
  /** Monthly search volume; 0 when the provider reports none */
  searchVolume: number;
  /** Providers that produced this keyword, in first-seen order */
  sources: KeywordSourceKind[];
}

export interface NegativeFilter {
  readonly keywordSubstrings: readonly string[];
  /** Registrable-domain entries, e.g. "wikipedia.org" */
  readonly domains: readonly string[];
}

// =============================================================================
// SERP
// =============================================================================

export const SERP_DEPTHS = [10, 20, 50, 100] as const;

export type SerpDepth = (typeof SERP_DEPTHS)[number];

export interface SerpResult {
  keyword: string;
  /** 1-based organic position, unique within a keyword */
  rank: number;
  url: string;
  /** Host as reported upstream; the registrable domain is resolved from `url` */
  domain: string;
  title?: string;
}

// =============================================================================
// DOMAIN AGGREGATION
// =============================================================================

export interface DomainStat {
  domain: string;
  totalTraffic: number;
  /** Distinct keywords this domain ranks for */
  keywordCount: number;
  /** Fraction of total market traffic, 0..1 */
  share: number;
  /** 1-based position after sorting by traffic */
  rank: number;
}

/** One surviving SERP row with its resolved domain and traffic estimate */
export interface DomainContribution {
  keyword: string;
  searchVolume: number;
  rank: number;
  url: string;
  domain: string;
  title: string;
  ctr: number;
  estimatedTraffic: number;
}

export interface DomainAggregation {
  stats: DomainStat[];
  contributions: DomainContribution[];
  totalTraffic: number;
  /** Results skipped because no registrable domain could be resolved */
  parseFailures: number;
  /** Results dropped by the negative-domain filter */
  excludedResults: number;
}

export type MarketType = 'monopolistic' | 'concentrated' | 'fragmented' | 'no_data';

export interface MarketThresholds {
  /** Top-3 share above which the market is monopolistic */
  monopolisticTop3: number;
  /** Top-3 share above which the market is concentrated */
  concentratedTop3: number;
  /** Top-5 share above which the market is concentrated */
  concentratedTop5: number;
  /** Top-10 share above which the market is concentrated */
  concentratedTop10: number;
}

export interface MarketSummary {
  leader: { domain: string; totalTraffic: number; share: number } | null;
  totalDomains: number;
  totalTraffic: number;
  top3Share: number;
  top5Share: number;
  top10Share: number;
  marketType: MarketType;
}
