/**
 * Organic CTR curve - estimated click-through rate by SERP position.
 *
 * Positions 1-20 follow the published anchor values. Positions 21-100 decay
 * geometrically from the position-20 value so the curve stays non-increasing
 * and tends toward zero.
 */

export const MAX_SERP_RANK = 100;

const ANCHOR_CTR: readonly number[] = [
  0.3, 0.15, 0.1, 0.06, 0.04,
  0.03, 0.025, 0.02, 0.015, 0.01,
  0.009, 0.008, 0.007, 0.006, 0.005,
  0.004, 0.003, 0.002, 0.001, 0.001,
];

/** Per-position multiplier applied past the anchor table */
export const TAIL_DECAY = 0.9;

function buildCurve(): readonly number[] {
  const curve = [...ANCHOR_CTR];
  let last = ANCHOR_CTR[ANCHOR_CTR.length - 1] ?? 0;
  while (curve.length < MAX_SERP_RANK) {
    last *= TAIL_DECAY;
    curve.push(last);
  }
  return Object.freeze(curve);
}

/** CTR by position; index 0 is position 1 */
export const CTR_CURVE: readonly number[] = buildCurve();

/**
 * Estimated share of a keyword's searches that click the result at `rank`.
 * Ranks are validated where SERP rows enter the system; anything outside
 * 1..MAX_SERP_RANK reads as 0 here.
 */
export function estimateClicks(rank: number): number {
  if (!Number.isInteger(rank) || rank < 1 || rank > MAX_SERP_RANK) return 0;
  return CTR_CURVE[rank - 1] ?? 0;
}

export function estimateTraffic(searchVolume: number, rank: number): number {
  return searchVolume * estimateClicks(rank);
}

export function isSupportedRank(rank: number, depth: number = MAX_SERP_RANK): boolean {
  return Number.isInteger(rank) && rank >= 1 && rank <= Math.min(depth, MAX_SERP_RANK);
}
