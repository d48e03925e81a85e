import { describe, it, expect } from 'vitest';
import type { Keyword, SerpResult } from '../types';
import { indexKeywords } from '../keywords/aggregator';
import { createNegativeFilter } from '../keywords/negatives';
import { aggregateDomains } from './aggregator';
import type { DomainResolver } from './resolver';

function serp(keyword: string, rank: number, url: string, domain = ''): SerpResult {
  return { keyword, rank, url, domain, title: `${keyword} #${rank}` };
}

const seoTools: Keyword = { text: 'seo tools', searchVolume: 1000, sources: ['related_terms'] };

const seoToolsSerp: SerpResult[] = [
  serp('seo tools', 1, 'https://a.com/x', 'a.com'),
  serp('seo tools', 2, 'https://b.com/', 'b.com'),
  serp('seo tools', 3, 'https://www.a.com/y', 'www.a.com'),
];

describe('aggregateDomains', () => {
  it('sums CTR-weighted traffic per registrable domain', () => {
    const { stats, totalTraffic, parseFailures, excludedResults } = aggregateDomains(
      seoToolsSerp,
      indexKeywords([seoTools]),
    );

    expect(stats.map((s) => s.domain)).toEqual(['a.com', 'b.com']);
    const [a, b] = stats;
    expect(a?.totalTraffic).toBeCloseTo(400, 9);
    expect(a?.keywordCount).toBe(1);
    expect(a?.rank).toBe(1);
    expect(b?.totalTraffic).toBeCloseTo(150, 9);
    expect(b?.rank).toBe(2);
    expect(totalTraffic).toBeCloseTo(550, 9);
    expect(a?.share).toBeCloseTo(400 / 550, 12);
    expect(parseFailures).toBe(0);
    expect(excludedResults).toBe(0);
  });

  it('gives the remaining domain the whole market when the other is excluded', () => {
    const negatives = createNegativeFilter({ domains: ['b.com'] });
    const { stats, excludedResults } = aggregateDomains(seoToolsSerp, indexKeywords([seoTools]), negatives);

    expect(stats).toHaveLength(1);
    expect(stats[0]?.domain).toBe('a.com');
    expect(stats[0]?.share).toBe(1);
    expect(excludedResults).toBe(1);
  });

  it('excludes subdomains of a negative domain', () => {
    const negatives = createNegativeFilter({ domains: ['wikipedia.org'] });
    const results = [
      serp('seo tools', 1, 'https://en.wikipedia.org/wiki/SEO', 'en.wikipedia.org'),
      serp('seo tools', 2, 'https://b.com/', 'b.com'),
    ];
    const { stats, excludedResults } = aggregateDomains(results, indexKeywords([seoTools]), negatives);
    expect(stats.map((s) => s.domain)).toEqual(['b.com']);
    expect(excludedResults).toBe(1);
  });

  it('counts distinct keywords per domain', () => {
    const keywords: Keyword[] = [
      seoTools,
      { text: 'rank tracker', searchVolume: 200, sources: ['topic_ideas'] },
    ];
    const results = [
      ...seoToolsSerp,
      serp('rank tracker', 1, 'https://blog.a.com/rank', 'blog.a.com'),
    ];
    const { stats } = aggregateDomains(results, indexKeywords(keywords));
    expect(stats[0]?.domain).toBe('a.com');
    expect(stats[0]?.keywordCount).toBe(2);
    expect(stats[0]?.totalTraffic).toBeCloseTo(460, 9);
  });

  it('uses volume 0 for keywords missing from the index', () => {
    const { stats, totalTraffic } = aggregateDomains(
      [serp('unknown keyword', 1, 'https://c.com/', 'c.com')],
      indexKeywords([seoTools]),
    );
    expect(stats).toEqual([{ domain: 'c.com', totalTraffic: 0, keywordCount: 1, share: 0, rank: 1 }]);
    expect(totalTraffic).toBe(0);
  });

  it('counts unresolvable URLs as parse failures', () => {
    const results = [
      serp('seo tools', 1, 'http://10.0.0.1/', ''),
      serp('seo tools', 2, 'https://b.com/', 'b.com'),
    ];
    const { stats, parseFailures } = aggregateDomains(results, indexKeywords([seoTools]));
    expect(parseFailures).toBe(1);
    expect(stats.map((s) => s.domain)).toEqual(['b.com']);
  });

  it('breaks traffic ties by domain name', () => {
    const keywords: Keyword[] = [
      { text: 'x', searchVolume: 100, sources: ['related_terms'] },
      { text: 'y', searchVolume: 100, sources: ['related_terms'] },
    ];
    const results = [serp('x', 1, 'https://zeta.com/', 'zeta.com'), serp('y', 1, 'https://alpha.com/', 'alpha.com')];
    const { stats } = aggregateDomains(results, indexKeywords(keywords));
    expect(stats.map((s) => s.domain)).toEqual(['alpha.com', 'zeta.com']);
  });

  it('keeps shares summing to 1', () => {
    const { stats } = aggregateDomains(seoToolsSerp, indexKeywords([seoTools]));
    const sum = stats.reduce((acc, s) => acc + s.share, 0);
    expect(Math.abs(sum - 1)).toBeLessThan(1e-9);
  });

  it('returns empty stats for empty input', () => {
    expect(aggregateDomains([], new Map())).toEqual({
      stats: [],
      contributions: [],
      totalTraffic: 0,
      parseFailures: 0,
      excludedResults: 0,
    });
  });

  it('builds one contribution per surviving row', () => {
    const { contributions } = aggregateDomains(seoToolsSerp.slice(0, 1), indexKeywords([seoTools]));
    expect(contributions).toHaveLength(1);
    expect(contributions[0]).toMatchObject({
      keyword: 'seo tools',
      searchVolume: 1000,
      rank: 1,
      url: 'https://a.com/x',
      domain: 'a.com',
      title: 'seo tools #1',
      ctr: 0.3,
    });
    expect(contributions[0]?.estimatedTraffic).toBeCloseTo(300, 9);
  });

  it('uses the injected resolver', () => {
    const resolver: DomainResolver = { resolve: () => 'a.com' };
    const { stats } = aggregateDomains(seoToolsSerp, indexKeywords([seoTools]), undefined, resolver);
    expect(stats).toHaveLength(1);
    expect(stats[0]?.totalTraffic).toBeCloseTo(550, 9);
  });
});
