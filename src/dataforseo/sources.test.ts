import { describe, it, expect, vi, type Mock } from 'vitest';
import { createNegativeFilter, EMPTY_NEGATIVES } from '../keywords/negatives';
import { createDataForSeoClient, type FetchLike } from './client';
import {
  ENDPOINTS,
  createAutocompleteSource,
  createKeywordSource,
  createRelatedTermsSource,
  createSerpSource,
  createTopicIdeasSource,
  type KeywordFetchRequest,
} from './sources';

const credentials = { login: 'test-login', password: 'test-secret' };

function envelope(result: unknown[]) {
  return { status_code: 20000, tasks: [{ status_code: 20000, result }] };
}

function stubFetch(...bodies: unknown[]) {
  const fetchImpl = vi.fn<FetchLike>();
  for (const body of bodies) {
    fetchImpl.mockResolvedValueOnce(new Response(JSON.stringify(body), { status: 200 }));
  }
  const client = createDataForSeoClient({
    credentials,
    fetchImpl,
    retry: { maxAttempts: 1, minDelay: 0, maxDelay: 0, jitter: 0 },
  });
  return { fetchImpl, client };
}

function sentTask(fetchImpl: Mock<FetchLike>, call = 0): unknown {
  const init = fetchImpl.mock.calls[call]?.[1];
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

function request(overrides: Partial<KeywordFetchRequest> = {}): KeywordFetchRequest {
  return {
    seeds: ['seo'],
    location: 2840,
    language: 'en',
    negatives: EMPTY_NEGATIVES,
    limit: 700,
    ...overrides,
  };
}

describe('createRelatedTermsSource', () => {
  it('normalizes keywords and sends negative filters upstream', async () => {
    const { fetchImpl, client } = stubFetch(
      envelope([
        { keyword: 'SEO  Tools', search_volume: 1000 },
        { keyword: 'seo audit', search_volume: null },
      ]),
    );
    const source = createRelatedTermsSource(client);

    const result = await source.fetch(request({ negatives: createNegativeFilter({ keywords: ['free'] }) }));

    expect(result).toEqual({
      ok: true,
      value: [
        { text: 'seo tools', searchVolume: 1000, sources: ['related_terms'] },
        { text: 'seo audit', searchVolume: 0, sources: ['related_terms'] },
      ],
    });
    expect(fetchImpl.mock.calls[0]?.[0]).toBe(`https://api.dataforseo.com/v3${ENDPOINTS.related_terms}`);
    expect(sentTask(fetchImpl)).toEqual([
      {
        keywords: ['seo'],
        location_code: 2840,
        language_code: 'en',
        sort_by: 'search_volume',
        limit: 700,
        filters: ['keyword', 'not_like', '%free%'],
      },
    ]);
  });

  it('issues one request per seed and truncates to the limit', async () => {
    const { fetchImpl, client } = stubFetch(
      envelope([
        { keyword: 'a', search_volume: 3 },
        { keyword: 'b', search_volume: 2 },
      ]),
      envelope([{ keyword: 'c', search_volume: 1 }]),
    );
    const result = await createRelatedTermsSource(client).fetch(request({ seeds: ['x', ' ', 'y'], limit: 1 }));

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(result.ok && result.value.map((k) => k.text)).toEqual(['a', 'c']);
  });

  it('returns a failure instead of throwing on upstream errors', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(new Response('{}', { status: 401 }));
    const client = createDataForSeoClient({ credentials, fetchImpl, retry: { maxAttempts: 1 } });

    const result = await createRelatedTermsSource(client).fetch(request());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('auth');
      expect(result.error.operation).toBe('related_terms');
    }
  });
});

describe('createTopicIdeasSource', () => {
  it('flattens items and reads keyword_info volume', async () => {
    const { fetchImpl, client } = stubFetch(
      envelope([
        {
          items: [
            { keyword: 'seo tools', keyword_info: { search_volume: 900 } },
            { keyword: 'seo course', keyword_info: null },
          ],
        },
      ]),
    );
    const result = await createTopicIdeasSource(client).fetch(request());

    expect(result).toEqual({
      ok: true,
      value: [
        { text: 'seo tools', searchVolume: 900, sources: ['topic_ideas'] },
        { text: 'seo course', searchVolume: 0, sources: ['topic_ideas'] },
      ],
    });
    expect(sentTask(fetchImpl)).toEqual([
      {
        keywords: ['seo'],
        location_code: 2840,
        language_code: 'en',
        include_seed_keyword: true,
        include_serp_info: false,
        limit: 700,
      },
    ]);
  });
});

describe('createAutocompleteSource', () => {
  it('turns suggestions into zero-volume keywords', async () => {
    const { fetchImpl, client } = stubFetch(
      envelope([{ items: [{ suggestion: 'SEO tools free' }, { suggestion: null }, { suggestion: 'seo agency' }] }]),
    );
    const result = await createAutocompleteSource(client).fetch(request());

    expect(result).toEqual({
      ok: true,
      value: [
        { text: 'seo tools free', searchVolume: 0, sources: ['autocomplete'] },
        { text: 'seo agency', searchVolume: 0, sources: ['autocomplete'] },
      ],
    });
    expect(sentTask(fetchImpl)).toEqual([{ keyword: 'seo', location_code: 2840, language_code: 'en' }]);
  });
});

describe('createKeywordSource', () => {
  it('builds the source for each kind', () => {
    const { client } = stubFetch();
    expect(createKeywordSource('related_terms', client).kind).toBe('related_terms');
    expect(createKeywordSource('topic_ideas', client).kind).toBe('topic_ideas');
    expect(createKeywordSource('autocomplete', client).kind).toBe('autocomplete');
  });
});

describe('createSerpSource', () => {
  it('keeps valid organic rows in rank order', async () => {
    const { fetchImpl, client } = stubFetch(
      envelope([
        {
          keyword: 'seo tools',
          items: [
            { type: 'featured_snippet', rank_group: 1, url: 'https://snippet.com/' },
            { type: 'organic', rank_group: 2, url: 'https://b.com/', domain: 'b.com', title: 'B' },
            { type: 'organic', rank_group: 1, url: 'https://a.com/', domain: 'a.com', title: 'A' },
            { type: 'organic', rank_group: 2, url: 'https://dup.com/', domain: 'dup.com' },
            { type: 'organic', rank_group: 3, url: null, domain: 'nourl.com' },
            { type: 'organic', rank_group: 11, url: 'https://deep.com/', domain: 'deep.com' },
            { type: 'organic', rank_group: 4, url: 'https://c.com/' },
          ],
        },
      ]),
    );

    const result = await createSerpSource(client).fetch({
      keyword: ' SEO Tools ',
      location: 2840,
      language: 'en',
      depth: 10,
    });

    expect(result).toEqual({
      ok: true,
      value: [
        { keyword: 'seo tools', rank: 1, url: 'https://a.com/', domain: 'a.com', title: 'A' },
        { keyword: 'seo tools', rank: 2, url: 'https://b.com/', domain: 'b.com', title: 'B' },
        { keyword: 'seo tools', rank: 4, url: 'https://c.com/', domain: '' },
      ],
    });
    expect(sentTask(fetchImpl)).toEqual([
      { keyword: 'seo tools', location_code: 2840, language_code: 'en', depth: 10 },
    ]);
  });

  it('returns an empty list when the SERP has no items', async () => {
    const { client } = stubFetch(envelope([{ keyword: 'x', items: null }]));
    const result = await createSerpSource(client).fetch({ keyword: 'x', location: 2840, language: 'en', depth: 10 });
    expect(result).toEqual({ ok: true, value: [] });
  });
});
