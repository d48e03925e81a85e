/**
 * Cost Estimator - pre-flight spend estimate for paid DataForSEO calls.
 *
 * Pure functions only. The pipeline compares the estimate against the
 * configured ceiling and refuses to issue any paid request above it.
 */

import { SERP_DEPTHS, type KeywordSourceKind, type SerpDepth } from '../types';

// =============================================================================
// TYPES
// =============================================================================

export type SerpOperationKind = `serp_fetch:${SerpDepth}`;

export type OperationKind = 'keyword_fetch' | 'autocomplete_request' | SerpOperationKind;

export type UnitCounts = Partial<Record<OperationKind, number>>;

export type UnitPrices = Partial<Record<OperationKind, number>>;

export interface PriceList {
  /** Price of one keyword request returning up to KEYWORDS_PER_REQUEST rows */
  keywordFetch: number;
  autocompleteRequest: number;
  /** SERP price per keyword at depth 10; deeper SERPs scale by depth / 10 */
  serpPerKeywordAtDepth10: number;
}

export const KEYWORDS_PER_REQUEST = 700;

export const DEFAULT_PRICES: Readonly<PriceList> = Object.freeze({
  keywordFetch: 0.01,
  autocompleteRequest: 0.0002,
  serpPerKeywordAtDepth10: 0.0006,
});

export const OPERATION_KINDS: readonly OperationKind[] = [
  'keyword_fetch',
  'autocomplete_request',
  ...SERP_DEPTHS.map(serpOperation),
];

// =============================================================================
// ERRORS
// =============================================================================

export class BudgetExceededError extends Error {
  readonly estimatedCost: number;
  readonly ceiling: number;
  readonly stage: string;

  constructor(stage: string, estimatedCost: number, ceiling: number) {
    super(
      `Estimated ${stage} cost $${estimatedCost.toFixed(4)} exceeds limit $${ceiling.toFixed(2)}`,
    );
    this.name = 'BudgetExceededError';
    this.stage = stage;
    this.estimatedCost = estimatedCost;
    this.ceiling = ceiling;
  }
}

// =============================================================================
// ESTIMATION
// =============================================================================

export function serpOperation(depth: SerpDepth): SerpOperationKind {
  return `serp_fetch:${depth}`;
}

function nonNegative(n: number | undefined): number {
  return n !== undefined && Number.isFinite(n) && n > 0 ? n : 0;
}

/**
 * Linear cost: sum of count * price over every operation kind.
 * Kinds without a price cost nothing; the result is never negative.
 */
export function estimateCost(unitCounts: UnitCounts, unitPrices: UnitPrices): number {
  let total = 0;
  for (const kind of OPERATION_KINDS) {
    total += nonNegative(unitCounts[kind]) * nonNegative(unitPrices[kind]);
  }
  return total;
}

export function buildUnitPrices(prices: PriceList = DEFAULT_PRICES): UnitPrices {
  const unitPrices: UnitPrices = {
    keyword_fetch: prices.keywordFetch,
    autocomplete_request: prices.autocompleteRequest,
  };
  for (const depth of SERP_DEPTHS) {
    unitPrices[serpOperation(depth)] = prices.serpPerKeywordAtDepth10 * (depth / 10);
  }
  return unitPrices;
}

/**
 * Unit counts for fetching `keywordsPerSource` keywords per seed from each source.
 * Volume providers bill per block of KEYWORDS_PER_REQUEST rows; autocomplete per request.
 */
export function planKeywordFetch(
  sources: readonly KeywordSourceKind[],
  seedCount: number,
  keywordsPerSource: number,
): UnitCounts {
  const seeds = Math.max(0, Math.floor(seedCount));
  const blocks = Math.ceil(Math.max(0, keywordsPerSource) / KEYWORDS_PER_REQUEST);
  const unique = new Set(sources);
  const volumeSources = [...unique].filter((s) => s !== 'autocomplete').length;

  return {
    keyword_fetch: volumeSources * seeds * blocks,
    autocomplete_request: unique.has('autocomplete') ? seeds : 0,
  };
}

export function planSerpFetch(keywordCount: number, depth: SerpDepth): UnitCounts {
  const counts: UnitCounts = {};
  counts[serpOperation(depth)] = Math.max(0, Math.floor(keywordCount));
  return counts;
}

/**
 * Hard gate: throws when the estimate is above the ceiling.
 */
export function assertWithinBudget(stage: string, estimatedCost: number, ceiling: number): void {
  if (estimatedCost > ceiling) {
    throw new BudgetExceededError(stage, estimatedCost, ceiling);
  }
}
