import { describe, it, expect } from 'vitest';
import type { Keyword } from '../types';
import { createNegativeFilter } from './negatives';
import {
  applyMinimumVolume,
  indexKeywords,
  mergeKeywords,
  removeKeywords,
  selectTopKeywords,
} from './aggregator';

function kw(text: string, searchVolume: number, sources: Keyword['sources'] = ['related_terms']): Keyword {
  return { text, searchVolume, sources };
}

describe('mergeKeywords', () => {
  it('returns an empty list for empty input', () => {
    expect(mergeKeywords([])).toEqual([]);
    expect(mergeKeywords([[], []])).toEqual([]);
  });

  it('groups by normalized text, keeps the max volume and unions sources', () => {
    const merged = mergeKeywords([
      [kw('SEO Tools', 500, ['related_terms'])],
      [kw('seo  tools ', 900, ['topic_ideas']), kw('rank tracker', 300, ['topic_ideas'])],
      [kw('seo tools', 0, ['autocomplete'])],
    ]);

    expect(merged).toEqual([
      { text: 'seo tools', searchVolume: 900, sources: ['related_terms', 'topic_ideas', 'autocomplete'] },
      { text: 'rank tracker', searchVolume: 300, sources: ['topic_ideas'] },
    ]);
  });

  it('sorts by volume descending, ties by text ascending', () => {
    const merged = mergeKeywords([[kw('b', 100), kw('c', 200), kw('a', 100)]]);
    expect(merged.map((k) => k.text)).toEqual(['c', 'a', 'b']);
  });

  it('drops keywords containing a negative substring', () => {
    const negatives = createNegativeFilter({ keywords: ['login'] });
    const merged = mergeKeywords([[kw('semrush login', 5000), kw('semrush pricing', 800)]], negatives);
    expect(merged.map((k) => k.text)).toEqual(['semrush pricing']);
  });

  it('treats invalid volumes as 0', () => {
    const merged = mergeKeywords([[kw('x', Number.NaN), kw('y', -5), kw('z', 12.7)]]);
    expect(merged).toEqual([
      { text: 'z', searchVolume: 12, sources: ['related_terms'] },
      { text: 'x', searchVolume: 0, sources: ['related_terms'] },
      { text: 'y', searchVolume: 0, sources: ['related_terms'] },
    ]);
  });

  it('is idempotent', () => {
    const once = mergeKeywords([
      [kw('Alpha', 10), kw('beta', 30)],
      [kw('alpha', 20, ['autocomplete'])],
    ]);
    expect(mergeKeywords([once])).toEqual(once);
  });

  it('does not mutate its input', () => {
    const input = kw('seo', 10, ['related_terms']);
    mergeKeywords([[input], [kw('seo', 20, ['topic_ideas'])]]);
    expect(input).toEqual({ text: 'seo', searchVolume: 10, sources: ['related_terms'] });
  });
});

describe('applyMinimumVolume', () => {
  const keywords = [kw('a', 50), kw('b', 10), kw('c', 9), kw('d', 0, ['autocomplete'])];

  it('drops keywords under the floor', () => {
    expect(applyMinimumVolume(keywords, 10).map((k) => k.text)).toEqual(['a', 'b']);
  });

  it('keeps unknown volumes when asked', () => {
    expect(applyMinimumVolume(keywords, 10, true).map((k) => k.text)).toEqual(['a', 'b', 'd']);
  });
});

describe('removeKeywords', () => {
  it('removes by normalized text', () => {
    const keywords = [kw('seo tools', 100), kw('rank tracker', 50)];
    expect(removeKeywords(keywords, ['  SEO Tools ']).map((k) => k.text)).toEqual(['rank tracker']);
  });

  it('returns a copy when nothing is removed', () => {
    const keywords = [kw('a', 1)];
    const result = removeKeywords(keywords, []);
    expect(result).toEqual(keywords);
    expect(result).not.toBe(keywords);
  });
});

describe('selectTopKeywords', () => {
  const keywords = [kw('a', 3), kw('b', 2), kw('c', 1)];

  it('takes the first N', () => {
    expect(selectTopKeywords(keywords, 2).map((k) => k.text)).toEqual(['a', 'b']);
    expect(selectTopKeywords(keywords, 10)).toHaveLength(3);
  });

  it('returns nothing for non-positive counts', () => {
    expect(selectTopKeywords(keywords, 0)).toEqual([]);
    expect(selectTopKeywords(keywords, -1)).toEqual([]);
  });
});

describe('indexKeywords', () => {
  it('indexes by normalized text', () => {
    const index = indexKeywords([kw('SEO Tools', 1000)]);
    expect(index.get('seo tools')?.searchVolume).toBe(1000);
  });
});
