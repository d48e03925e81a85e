/**
 * Keyword and SERP sources backed by DataForSEO live endpoints.
 *
 * Sources never throw for upstream failures: a FetchError becomes
 * `{ ok: false, error }`. Anything else is a bug and propagates.
 */

import type {
  Keyword,
  KeywordSourceKind,
  NegativeFilter,
  SerpDepth,
  SerpResult,
} from '../types';
import { normalizeKeyword } from '../keywords/negatives';
import { isSupportedRank } from '../traffic/ctr';
import { createLogger } from '../utils/logger';
import type { DataForSeoClient } from './client';
import { FetchError, fail, ok, type FetchResult } from './errors';
import { buildNegativeKeywordFilter } from './filters';
import {
  autocompleteResultSchema,
  keywordIdeasResultSchema,
  relatedTermResultSchema,
  serpResultSchema,
} from './schemas';

const logger = createLogger('sources');

// =============================================================================
// TYPES
// =============================================================================

export interface KeywordFetchRequest {
  seeds: readonly string[];
  location: number;
  language: string;
  negatives: NegativeFilter;
  /** Upper bound on keywords requested per seed */
  limit: number;
}

export interface SerpFetchRequest {
  keyword: string;
  location: number;
  language: string;
  depth: SerpDepth;
}

export interface KeywordSource {
  readonly kind: KeywordSourceKind;
  fetch(request: KeywordFetchRequest): Promise<FetchResult<Keyword[]>>;
}

export interface SerpSource {
  fetch(request: SerpFetchRequest): Promise<FetchResult<SerpResult[]>>;
}

export const ENDPOINTS = {
  related_terms: '/keywords_data/google_ads/keywords_for_keywords/live',
  topic_ideas: '/dataforseo_labs/google/keyword_ideas/live',
  autocomplete: '/keywords_data/google/autocomplete/live',
  serp: '/serp/google/organic/live/advanced',
} as const;

// =============================================================================
// HELPERS
// =============================================================================

async function guard<T>(fn: () => Promise<T>): Promise<FetchResult<T>> {
  try {
    return ok(await fn());
  } catch (err) {
    if (err instanceof FetchError) {
      logger.warn({ operation: err.operation, kind: err.kind, status: err.status }, err.message);
      return fail(err);
    }
    throw err;
  }
}

function toKeyword(text: string, volume: number | null | undefined, source: KeywordSourceKind): Keyword {
  return {
    text: normalizeKeyword(text),
    searchVolume: volume !== null && volume !== undefined && volume > 0 ? Math.floor(volume) : 0,
    sources: [source],
  };
}

function seedTask(seed: string, request: KeywordFetchRequest): Record<string, unknown> {
  return {
    keywords: [seed],
    location_code: request.location,
    language_code: request.language,
  };
}

/**
 * Fetch seeds one at a time and concatenate. The first failed seed fails the source.
 */
async function fetchPerSeed(
  request: KeywordFetchRequest,
  fetchSeed: (seed: string) => Promise<Keyword[]>,
): Promise<Keyword[]> {
  const keywords: Keyword[] = [];
  for (const seed of request.seeds) {
    const trimmed = seed.trim();
    if (!trimmed) continue;
    keywords.push(...(await fetchSeed(trimmed)));
  }
  return keywords.filter((k) => k.text.length > 0);
}

// =============================================================================
// KEYWORD SOURCES
// =============================================================================

/** Google Ads "keywords for keywords" */
export function createRelatedTermsSource(client: DataForSeoClient): KeywordSource {
  const kind = 'related_terms';
  return {
    kind,
    fetch: (request) =>
      guard(() =>
        fetchPerSeed(request, async (seed) => {
          const filters = buildNegativeKeywordFilter(request.negatives.keywordSubstrings);
          const task = {
            ...seedTask(seed, request),
            sort_by: 'search_volume',
            limit: request.limit,
            ...(filters ? { filters } : {}),
          };
          const rows = await client.postTasks(kind, ENDPOINTS.related_terms, [task], relatedTermResultSchema);
          return rows.slice(0, request.limit).map((row) => toKeyword(row.keyword, row.search_volume, kind));
        }),
      ),
  };
}

/** DataForSEO Labs keyword ideas */
export function createTopicIdeasSource(client: DataForSeoClient): KeywordSource {
  const kind = 'topic_ideas';
  return {
    kind,
    fetch: (request) =>
      guard(() =>
        fetchPerSeed(request, async (seed) => {
          const filters = buildNegativeKeywordFilter(request.negatives.keywordSubstrings);
          const task = {
            ...seedTask(seed, request),
            include_seed_keyword: true,
            include_serp_info: false,
            limit: request.limit,
            ...(filters ? { filters } : {}),
          };
          const results = await client.postTasks(kind, ENDPOINTS.topic_ideas, [task], keywordIdeasResultSchema);
          return results
            .flatMap((result) => result.items ?? [])
            .map((item) => toKeyword(item.keyword, item.keyword_info?.search_volume, kind));
        }),
      ),
  };
}

/** Google autocomplete; suggestions carry no volume */
export function createAutocompleteSource(client: DataForSeoClient): KeywordSource {
  const kind = 'autocomplete';
  return {
    kind,
    fetch: (request) =>
      guard(() =>
        fetchPerSeed(request, async (seed) => {
          const task = {
            keyword: seed,
            location_code: request.location,
            language_code: request.language,
          };
          const results = await client.postTasks(kind, ENDPOINTS.autocomplete, [task], autocompleteResultSchema);
          const keywords: Keyword[] = [];
          for (const item of results.flatMap((result) => result.items ?? [])) {
            if (item.suggestion) keywords.push(toKeyword(item.suggestion, 0, kind));
          }
          return keywords;
        }),
      ),
  };
}

export function createKeywordSource(kind: KeywordSourceKind, client: DataForSeoClient): KeywordSource {
  switch (kind) {
    case 'related_terms':
      return createRelatedTermsSource(client);
    case 'topic_ideas':
      return createTopicIdeasSource(client);
    case 'autocomplete':
      return createAutocompleteSource(client);
  }
}

// =============================================================================
// SERP SOURCE
// =============================================================================

/**
 * Organic results only. Rank is `rank_group`; rows without a URL, ranks outside
 * 1..depth and repeated ranks are dropped. Output is rank-ascending.
 */
export function createSerpSource(client: DataForSeoClient): SerpSource {
  return {
    fetch: (request) =>
      guard(async () => {
        const keyword = normalizeKeyword(request.keyword);
        const task = {
          keyword,
          location_code: request.location,
          language_code: request.language,
          depth: request.depth,
        };
        const results = await client.postTasks('serp', ENDPOINTS.serp, [task], serpResultSchema);

        const byRank = new Map<number, SerpResult>();
        let dropped = 0;
        for (const item of results.flatMap((result) => result.items ?? [])) {
          if (item.type !== 'organic') continue;
          const rank = item.rank_group;
          if (
            rank === null ||
            rank === undefined ||
            !isSupportedRank(rank, request.depth) ||
            !item.url ||
            byRank.has(rank)
          ) {
            dropped++;
            continue;
          }
          byRank.set(rank, {
            keyword,
            rank,
            url: item.url,
            domain: item.domain ?? '',
            ...(item.title ? { title: item.title } : {}),
          });
        }

        if (dropped > 0) {
          logger.debug({ keyword, dropped }, 'Dropped invalid organic rows');
        }
        return [...byRank.values()].sort((a, b) => a.rank - b.rank);
      }),
  };
}
