import { describe, it, expect, vi } from 'vitest';
import type { SerpResult } from '../types';
import type { SerpFetchRequest, SerpSource } from '../dataforseo/sources';
import { FetchError, fail, ok } from '../dataforseo/errors';
import { fetchSerpsConcurrently } from './fanout';

const params = { location: 2840, language: 'en', depth: 10 } as const;

function row(keyword: string, rank: number): SerpResult {
  return { keyword, rank, url: `https://${keyword}.com/${rank}`, domain: `${keyword}.com` };
}

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('fetchSerpsConcurrently', () => {
  it('returns results in keyword order', async () => {
    // later keywords settle first
    const delays: Record<string, number> = { a: 3, b: 2, c: 1 };
    const source: SerpSource = {
      fetch: async ({ keyword }) => {
        for (let i = 0; i < (delays[keyword] ?? 0); i++) await tick();
        return ok([row(keyword, 1), row(keyword, 2)]);
      },
    };

    const outcome = await fetchSerpsConcurrently(source, ['a', 'b', 'c'], params, { concurrency: 3 });

    expect(outcome.results.map((r) => `${r.keyword}${r.rank}`)).toEqual(['a1', 'a2', 'b1', 'b2', 'c1', 'c2']);
    expect(outcome.completedKeywords).toBe(3);
    expect(outcome.failures).toEqual([]);
    expect(outcome.cancelled).toBe(false);
  });

  it('passes the request parameters to the source', async () => {
    const fetch = vi.fn<SerpSource['fetch']>().mockResolvedValue(ok([]));
    await fetchSerpsConcurrently({ fetch }, ['seo tools'], params);
    const expected: SerpFetchRequest = { keyword: 'seo tools', location: 2840, language: 'en', depth: 10 };
    expect(fetch).toHaveBeenCalledWith(expected);
  });

  it('never exceeds the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const source: SerpSource = {
      fetch: async ({ keyword }) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await tick();
        inFlight--;
        return ok([row(keyword, 1)]);
      },
    };
    const keywords = Array.from({ length: 12 }, (_, i) => `k${i}`);

    const outcome = await fetchSerpsConcurrently(source, keywords, params, { concurrency: 4 });

    expect(peak).toBe(4);
    expect(outcome.completedKeywords).toBe(12);
  });

  it('records failed keywords and keeps going', async () => {
    const source: SerpSource = {
      fetch: async ({ keyword }) =>
        keyword === 'bad'
          ? fail(new FetchError('serp', 'rate_limit', 'HTTP 429', { status: 429 }))
          : ok([row(keyword, 1)]),
    };

    const outcome = await fetchSerpsConcurrently(source, ['good', 'bad', 'fine'], params, { concurrency: 1 });

    expect(outcome.results.map((r) => r.keyword)).toEqual(['good', 'fine']);
    expect(outcome.completedKeywords).toBe(2);
    expect(outcome.failures).toEqual([
      { keyword: 'bad', kind: 'rate_limit', message: 'serp: HTTP 429', status: 429 },
    ]);
  });

  it('reports progress after each keyword', async () => {
    const source: SerpSource = {
      fetch: async ({ keyword }) =>
        keyword === 'b' ? fail(new FetchError('serp', 'network', 'fetch failed')) : ok([]),
    };
    const onProgress = vi.fn();

    await fetchSerpsConcurrently(source, ['a', 'b'], params, { concurrency: 1, onProgress });

    expect(onProgress.mock.calls.map((call) => call[0])).toEqual([
      { completed: 1, failed: 0, total: 2, keyword: 'a' },
      { completed: 1, failed: 1, total: 2, keyword: 'b' },
    ]);
  });

  it('stops issuing requests once aborted', async () => {
    const controller = new AbortController();
    const fetch = vi.fn<SerpSource['fetch']>().mockImplementation(async ({ keyword }) => {
      if (keyword === 'b') controller.abort();
      return ok([row(keyword, 1)]);
    });

    const outcome = await fetchSerpsConcurrently({ fetch }, ['a', 'b', 'c', 'd'], params, {
      concurrency: 1,
      signal: controller.signal,
    });

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(outcome.results.map((r) => r.keyword)).toEqual(['a', 'b']);
    expect(outcome.completedKeywords).toBe(2);
    expect(outcome.cancelled).toBe(true);
  });

  it('issues nothing when already aborted', async () => {
    const fetch = vi.fn<SerpSource['fetch']>();
    const outcome = await fetchSerpsConcurrently({ fetch }, ['a'], params, { signal: AbortSignal.abort() });
    expect(fetch).not.toHaveBeenCalled();
    expect(outcome).toEqual({ results: [], failures: [], completedKeywords: 0, cancelled: true });
  });

  it('handles an empty keyword list', async () => {
    const fetch = vi.fn<SerpSource['fetch']>();
    const outcome = await fetchSerpsConcurrently({ fetch }, [], params);
    expect(outcome).toEqual({ results: [], failures: [], completedKeywords: 0, cancelled: false });
  });
});
