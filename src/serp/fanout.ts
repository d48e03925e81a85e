/**
 * SERP Fan-out - fetch the organic SERP for many keywords with bounded concurrency.
 *
 * - At most `concurrency` requests in flight (default 5)
 * - A failed keyword contributes zero results and one KeywordFailure
 * - Aborting stops new requests; requests already in flight complete
 * - Results are returned in keyword order regardless of completion order
 */

import type { SerpDepth, SerpResult } from '../types';
import type { SerpSource } from '../dataforseo/sources';
import type { FetchErrorKind } from '../dataforseo/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('serp-fanout');

export const DEFAULT_SERP_CONCURRENCY = 5;

// =============================================================================
// TYPES
// =============================================================================

export interface SerpFanoutParams {
  location: number;
  language: string;
  depth: SerpDepth;
}

export interface SerpFanoutOptions {
  concurrency?: number;
  signal?: AbortSignal;
  /** Called after each keyword settles */
  onProgress?: (progress: SerpFanoutProgress) => void;
}

export interface SerpFanoutProgress {
  completed: number;
  failed: number;
  total: number;
  keyword: string;
}

export interface KeywordFailure {
  keyword: string;
  kind: FetchErrorKind;
  message: string;
  status?: number;
}

export interface SerpFanoutResult {
  results: SerpResult[];
  failures: KeywordFailure[];
  /** Keywords whose SERP was fetched successfully */
  completedKeywords: number;
  /** True when the signal aborted before every keyword was issued */
  cancelled: boolean;
}

// =============================================================================
// FAN-OUT
// =============================================================================

export async function fetchSerpsConcurrently(
  source: SerpSource,
  keywords: readonly string[],
  params: SerpFanoutParams,
  options: SerpFanoutOptions = {},
): Promise<SerpFanoutResult> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_SERP_CONCURRENCY));
  const { signal, onProgress } = options;

  const perKeyword: SerpResult[][] = keywords.map(() => []);
  const failures: KeywordFailure[] = [];
  let completed = 0;
  let nextIndex = 0;
  let cancelled = false;

  async function processOne(): Promise<void> {
    while (nextIndex < keywords.length) {
      if (signal?.aborted) {
        cancelled = true;
        return;
      }

      const idx = nextIndex++;
      const keyword = keywords[idx];
      if (keyword === undefined) continue;

      const result = await source.fetch({ keyword, ...params });
      if (result.ok) {
        perKeyword[idx] = result.value;
        completed++;
      } else {
        const { error } = result;
        failures.push({
          keyword,
          kind: error.kind,
          message: error.message,
          ...(error.status !== undefined ? { status: error.status } : {}),
        });
        logger.warn({ keyword, kind: error.kind, error: error.message }, 'SERP fetch failed');
      }

      onProgress?.({ completed, failed: failures.length, total: keywords.length, keyword });
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, keywords.length) }, () => processOne());
  await Promise.all(workers);

  if (cancelled) {
    logger.info(
      { completed, failed: failures.length, total: keywords.length },
      'SERP fan-out cancelled',
    );
  }

  return {
    results: perKeyword.flat(),
    failures,
    completedKeywords: completed,
    cancelled,
  };
}
