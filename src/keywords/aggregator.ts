/**
 * Keyword Aggregator - merge, de-duplicate, filter and rank keyword lists
 * coming from several providers.
 */

import type { Keyword, KeywordSourceKind, NegativeFilter } from '../types';
import { EMPTY_NEGATIVES, isKeywordExcluded, normalizeKeyword } from './negatives';

/** Providers below this volume are treated as noise */
export const DEFAULT_MIN_SEARCH_VOLUME = 10;

function sanitizeVolume(volume: number | null | undefined): number {
  if (volume === null || volume === undefined || !Number.isFinite(volume) || volume <= 0) {
    return 0;
  }
  return Math.floor(volume);
}

/**
 * Volume descending, then text ascending so output is reproducible.
 */
export function compareKeywords(a: Keyword, b: Keyword): number {
  if (a.searchVolume !== b.searchVolume) return b.searchVolume - a.searchVolume;
  if (a.text < b.text) return -1;
  if (a.text > b.text) return 1;
  return 0;
}

/**
 * Merge keyword lists from several sources.
 *
 * - Groups by normalized text, keeping the highest observed volume
 *   (first seen wins a tie) and the union of sources.
 * - Drops keywords containing any negative substring.
 * - Sorts by volume descending, ties by text ascending.
 */
export function mergeKeywords(
  sourceLists: ReadonlyArray<ReadonlyArray<Keyword>>,
  negatives: NegativeFilter = EMPTY_NEGATIVES,
): Keyword[] {
  const merged = new Map<string, Keyword>();

  for (const list of sourceLists) {
    for (const keyword of list) {
      const text = normalizeKeyword(keyword.text);
      if (!text) continue;

      const volume = sanitizeVolume(keyword.searchVolume);
      const existing = merged.get(text);

      if (!existing) {
        merged.set(text, {
          text,
          searchVolume: volume,
          sources: [...new Set<KeywordSourceKind>(keyword.sources)],
        });
        continue;
      }

      if (volume > existing.searchVolume) {
        existing.searchVolume = volume;
      }
      for (const source of keyword.sources) {
        if (!existing.sources.includes(source)) existing.sources.push(source);
      }
    }
  }

  return [...merged.values()]
    .filter((keyword) => !isKeywordExcluded(keyword.text, negatives))
    .sort(compareKeywords);
}

/**
 * Drop keywords under the volume floor. Keywords with unknown (0) volume are kept
 * when `keepUnknown` is set, which is how autocomplete suggestions survive.
 */
export function applyMinimumVolume(
  keywords: readonly Keyword[],
  minVolume: number = DEFAULT_MIN_SEARCH_VOLUME,
  keepUnknown: boolean = false,
): Keyword[] {
  return keywords.filter(
    (keyword) =>
      keyword.searchVolume >= minVolume || (keepUnknown && keyword.searchVolume === 0),
  );
}

/**
 * Remove keywords the user explicitly deselected.
 */
export function removeKeywords(keywords: readonly Keyword[], texts: Iterable<string>): Keyword[] {
  const removed = new Set<string>();
  for (const text of texts) removed.add(normalizeKeyword(text));
  if (removed.size === 0) return [...keywords];
  return keywords.filter((keyword) => !removed.has(keyword.text));
}

/**
 * First N keywords of an already ranked list.
 */
export function selectTopKeywords(keywords: readonly Keyword[], count: number): Keyword[] {
  if (!Number.isFinite(count) || count <= 0) return [];
  return keywords.slice(0, Math.floor(count));
}

/**
 * Lookup by normalized text, used by the domain aggregator for volumes.
 */
export function indexKeywords(keywords: readonly Keyword[]): Map<string, Keyword> {
  const index = new Map<string, Keyword>();
  for (const keyword of keywords) {
    index.set(normalizeKeyword(keyword.text), keyword);
  }
  return index;
}
