/**
 * Per-run AnalysisSettings: config defaults plus caller overrides.
 */

import { z } from 'zod';
import { keywordSourceSchema, serpDepthSchema, type Config } from '../utils/config';
import { createNegativeFilter, parseListInput } from '../keywords/negatives';
import type { KeywordSourceKind } from '../types';
import type { AnalysisSettings } from './pipeline';

/** Comma/newline separated string or an array of strings */
export const listInputSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((v) => (typeof v === 'string' ? parseListInput(v) : v));

export const runOverridesSchema = z.object({
  location: z.number().int().positive().optional(),
  language: z.string().min(2).optional(),
  sources: z.array(keywordSourceSchema).min(1).optional(),
  keywordsPerSource: z.number().int().min(1).max(10_000).optional(),
  minSearchVolume: z.number().int().min(0).optional(),
  keywordsToAnalyze: z.number().int().min(1).max(10_000).optional(),
  serpDepth: serpDepthSchema.optional(),
  maxSpend: z.number().min(0).optional(),
  negativeKeywords: listInputSchema.optional(),
  negativeDomains: listInputSchema.optional(),
});

export type RunOverrides = z.output<typeof runOverridesSchema>;

export interface RunSettings {
  settings: AnalysisSettings;
  sources: KeywordSourceKind[];
}

/**
 * Resolve settings for one run. Negative lists replace the configured ones.
 */
export function resolveRunSettings(config: Config, overrides: RunOverrides = {}): RunSettings {
  const { analysis } = config;
  return {
    sources: [...new Set(overrides.sources ?? analysis.sources)],
    settings: {
      location: overrides.location ?? analysis.location,
      language: overrides.language ?? analysis.language,
      keywordsPerSource: overrides.keywordsPerSource ?? analysis.keywordsPerSource,
      minSearchVolume: overrides.minSearchVolume ?? analysis.minSearchVolume,
      keywordsToAnalyze: overrides.keywordsToAnalyze ?? analysis.keywordsToAnalyze,
      serpDepth: overrides.serpDepth ?? analysis.serpDepth,
      maxSpend: overrides.maxSpend ?? analysis.maxSpend,
      negatives: createNegativeFilter({
        keywords: overrides.negativeKeywords ?? config.negatives.keywords,
        domains: overrides.negativeDomains ?? config.negatives.domains,
      }),
      thresholds: { ...config.market },
      prices: { ...config.prices },
      concurrency: config.api.concurrency,
    },
  };
}
