/**
 * Negative keyword / domain filters.
 *
 * Filters are immutable values built once per run and passed explicitly to the
 * aggregators; nothing here holds process-wide mutable state.
 */

import type { NegativeFilter } from '../types';

export const DEFAULT_NEGATIVE_KEYWORDS: readonly string[] = [
  'google',
  'login',
  'sign up',
  'sign in',
  'free download',
  'crack',
  'torrent',
];

export const DEFAULT_NEGATIVE_DOMAINS: readonly string[] = [
  'wikipedia.org',
  'amazon.com',
  'youtube.com',
  'pinterest.com',
  'reddit.com',
];

export interface NegativeFilterInput {
  keywords?: Iterable<string>;
  domains?: Iterable<string>;
}

/**
 * Normalize keyword text: trim, lower-case, collapse internal whitespace.
 */
export function normalizeKeyword(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Reduce a user-entered domain ("https://www.Example.com/path") to "example.com".
 */
export function normalizeDomainEntry(input: string): string {
  const raw = input.trim().toLowerCase();
  const noScheme = raw.replace(/^[a-z][a-z0-9+.-]*:\/\//, '');
  const host = noScheme.split(/[/?#]/)[0] ?? '';
  return host.replace(/^www\./, '').replace(/\.$/, '');
}

function uniqueNonEmpty(values: Iterable<string>, normalize: (v: string) => string): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const normalized = normalize(value);
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}

export function createNegativeFilter(input: NegativeFilterInput = {}): NegativeFilter {
  return Object.freeze({
    keywordSubstrings: Object.freeze(uniqueNonEmpty(input.keywords ?? [], normalizeKeyword)),
    domains: Object.freeze(uniqueNonEmpty(input.domains ?? [], normalizeDomainEntry)),
  });
}

export const EMPTY_NEGATIVES: NegativeFilter = createNegativeFilter();

export const DEFAULT_NEGATIVES: NegativeFilter = createNegativeFilter({
  keywords: DEFAULT_NEGATIVE_KEYWORDS,
  domains: DEFAULT_NEGATIVE_DOMAINS,
});

/**
 * True when any negative substring occurs anywhere in the keyword (case-insensitive).
 */
export function isKeywordExcluded(text: string, negatives: NegativeFilter): boolean {
  if (negatives.keywordSubstrings.length === 0) return false;
  const normalized = normalizeKeyword(text);
  return negatives.keywordSubstrings.some((neg) => normalized.includes(neg));
}

/**
 * True when the domain equals, or is a subdomain of, any negative domain.
 */
export function isDomainExcluded(domain: string, negatives: NegativeFilter): boolean {
  if (negatives.domains.length === 0) return false;
  const normalized = normalizeDomainEntry(domain);
  if (!normalized) return false;
  return negatives.domains.some(
    (neg) => normalized === neg || normalized.endsWith(`.${neg}`),
  );
}

/**
 * Split comma / newline separated user input into trimmed, de-duplicated entries.
 * Order of first appearance is preserved.
 */
export function parseListInput(input: string): string[] {
  const seen = new Set<string>();
  const entries: string[] = [];
  for (const part of input.split(/[,\n]/)) {
    const trimmed = part.trim();
    const key = trimmed.toLowerCase();
    if (trimmed && !seen.has(key)) {
      seen.add(key);
      entries.push(trimmed);
    }
  }
  return entries;
}
