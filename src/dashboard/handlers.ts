/**
 * Dashboard Handlers - request validation and orchestration for the JSON API.
 *
 * Handlers take the parsed body plus per-request credentials and return
 * `{ status, body }`; the express router only does transport. Credentials
 * come from request headers and are dropped when the request ends.
 */

import { z, ZodError } from 'zod';
import { keywordSourceSchema, type Config, type Credentials } from '../utils/config';
import { createLogger } from '../utils/logger';
import { createClientFromConfig, type DataForSeoClient } from '../dataforseo/client';
import { FetchError } from '../dataforseo/errors';
import { createKeywordSource, createSerpSource } from '../dataforseo/sources';
import { BudgetExceededError } from '../cost/estimator';
import { mergeKeywords } from '../keywords/aggregator';
import {
  analyzeMarket,
  discoverKeywords,
  estimateKeywordStageCost,
  estimateSerpStageCost,
  uniqueSeeds,
  type AnalysisReport,
} from '../analysis/pipeline';
import {
  listInputSchema,
  resolveRunSettings,
  runOverridesSchema,
} from '../analysis/settings';
import { domainSummaryCsv, keywordListCsv, serpDetailCsv } from '../export/reports';

const logger = createLogger('dashboard');

// =============================================================================
// TYPES
// =============================================================================

export interface HandlerResult {
  status: number;
  body: unknown;
  /** Defaults to JSON */
  contentType?: 'application/json' | 'text/csv';
  filename?: string;
}

export interface DashboardDeps {
  config: Config;
  /** Build an API client for one request's credentials */
  createClient?: (credentials: Credentials) => DataForSeoClient;
  /** Used when a request carries no credential headers */
  fallbackCredentials?: Credentials | null;
}

// =============================================================================
// REQUEST SCHEMAS
// =============================================================================

const keywordInputSchema = z.object({
  text: z.string().min(1),
  searchVolume: z.number().min(0).default(0),
  sources: z.array(keywordSourceSchema).default([]),
});

export const estimateRequestSchema = runOverridesSchema.extend({
  seeds: listInputSchema.default([]),
  /** Keywords planned for the SERP stage; defaults to keywordsToAnalyze */
  keywordCount: z.number().int().min(0).optional(),
});

export const keywordsRequestSchema = runOverridesSchema.extend({
  seeds: listInputSchema.refine((seeds) => seeds.length > 0, 'At least one seed keyword is required'),
});

export const analyzeRequestSchema = runOverridesSchema.extend({
  keywords: z.array(keywordInputSchema).min(1),
  removals: listInputSchema.optional(),
});

const domainStatSchema = z.object({
  rank: z.number().int().min(1),
  domain: z.string(),
  totalTraffic: z.number(),
  keywordCount: z.number().int().min(0),
  share: z.number(),
});

const contributionSchema = z.object({
  keyword: z.string(),
  searchVolume: z.number(),
  rank: z.number().int(),
  url: z.string(),
  domain: z.string(),
  title: z.string().default(''),
  ctr: z.number(),
  estimatedTraffic: z.number(),
});

export const exportKeywordsRequestSchema = z.object({ keywords: z.array(keywordInputSchema) });
export const exportDomainsRequestSchema = z.object({ stats: z.array(domainStatSchema) });
export const exportSerpRequestSchema = z.object({ contributions: z.array(contributionSchema) });

// =============================================================================
// ERROR MAPPING
// =============================================================================

/**
 * Map known failures to HTTP responses. Unknown errors are rethrown for the
 * server's error middleware.
 */
export function errorResponse(err: unknown): HandlerResult {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: 'Invalid request',
        issues: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      },
    };
  }
  if (err instanceof BudgetExceededError) {
    return {
      status: 402,
      body: {
        error: err.message,
        stage: err.stage,
        estimatedCost: err.estimatedCost,
        maxSpend: err.ceiling,
      },
    };
  }
  if (err instanceof FetchError) {
    return {
      status: err.kind === 'auth' ? 401 : 502,
      body: { error: err.message, kind: err.kind, operation: err.operation },
    };
  }
  throw err;
}

function missingCredentials(): HandlerResult {
  return {
    status: 401,
    body: { error: 'DataForSEO credentials required (X-DataForSEO-Login / X-DataForSEO-Password)' },
  };
}

function clientFor(deps: DashboardDeps, credentials: Credentials | null): DataForSeoClient | null {
  const resolved = credentials ?? deps.fallbackCredentials ?? null;
  if (!resolved) return null;
  const create = deps.createClient ?? ((c: Credentials) => createClientFromConfig(deps.config.api, c));
  return create(resolved);
}

// =============================================================================
// HANDLERS
// =============================================================================

export async function handleBalance(
  credentials: Credentials | null,
  deps: DashboardDeps,
): Promise<HandlerResult> {
  const client = clientFor(deps, credentials);
  if (!client) return missingCredentials();
  try {
    return { status: 200, body: { balance: await client.getBalance() } };
  } catch (err) {
    return errorResponse(err);
  }
}

export function handleEstimate(input: unknown, deps: DashboardDeps): HandlerResult {
  try {
    const request = estimateRequestSchema.parse(input);
    const { settings, sources } = resolveRunSettings(deps.config, request);
    const keywordStage = estimateKeywordStageCost(sources, uniqueSeeds(request.seeds).length, settings);
    const serpStage = estimateSerpStageCost(request.keywordCount ?? settings.keywordsToAnalyze, settings);

    return {
      status: 200,
      body: {
        keywordStage,
        serpStage,
        total: keywordStage + serpStage,
        maxSpend: settings.maxSpend,
        keywordStageAllowed: keywordStage <= settings.maxSpend,
        serpStageAllowed: serpStage <= settings.maxSpend,
      },
    };
  } catch (err) {
    return errorResponse(err);
  }
}

export async function handleKeywords(
  input: unknown,
  credentials: Credentials | null,
  deps: DashboardDeps,
): Promise<HandlerResult> {
  try {
    const request = keywordsRequestSchema.parse(input);
    const client = clientFor(deps, credentials);
    if (!client) return missingCredentials();

    const { settings, sources } = resolveRunSettings(deps.config, request);
    const discovery = await discoverKeywords(
      request.seeds,
      sources.map((kind) => createKeywordSource(kind, client)),
      settings,
    );

    // Every source failed: surface the first upstream error
    const [firstFailure] = discovery.sourceFailures;
    if (firstFailure && discovery.sourceFailures.length === sources.length) {
      return {
        status: firstFailure.kind === 'auth' ? 401 : 502,
        body: { error: firstFailure.message, kind: firstFailure.kind, sourceFailures: discovery.sourceFailures },
      };
    }

    return { status: 200, body: discovery };
  } catch (err) {
    return errorResponse(err);
  }
}

export interface AnalyzeHandlerOptions {
  signal?: AbortSignal;
}

export async function handleAnalyze(
  input: unknown,
  credentials: Credentials | null,
  deps: DashboardDeps,
  options: AnalyzeHandlerOptions = {},
): Promise<HandlerResult> {
  try {
    const request = analyzeRequestSchema.parse(input);
    const client = clientFor(deps, credentials);
    if (!client) return missingCredentials();

    const { settings } = resolveRunSettings(deps.config, request);
    const keywords = mergeKeywords([request.keywords], settings.negatives);
    const report: AnalysisReport = await analyzeMarket(keywords, createSerpSource(client), settings, {
      removals: request.removals,
      signal: options.signal,
    });

    logger.info(
      { keywords: report.keywords.length, domains: report.stats.length, failed: report.keywordFailures.length },
      'Dashboard analysis finished',
    );
    return { status: 200, body: report };
  } catch (err) {
    return errorResponse(err);
  }
}

export function handleExportKeywords(input: unknown): HandlerResult {
  try {
    const { keywords } = exportKeywordsRequestSchema.parse(input);
    return {
      status: 200,
      body: keywordListCsv(keywords),
      contentType: 'text/csv',
      filename: 'keywords.csv',
    };
  } catch (err) {
    return errorResponse(err);
  }
}

export function handleExportDomains(input: unknown): HandlerResult {
  try {
    const { stats } = exportDomainsRequestSchema.parse(input);
    return {
      status: 200,
      body: domainSummaryCsv(stats),
      contentType: 'text/csv',
      filename: 'domain-share.csv',
    };
  } catch (err) {
    return errorResponse(err);
  }
}

export function handleExportSerp(input: unknown): HandlerResult {
  try {
    const { contributions } = exportSerpRequestSchema.parse(input);
    return {
      status: 200,
      body: serpDetailCsv(contributions),
      contentType: 'text/csv',
      filename: 'serp-detail.csv',
    };
  } catch (err) {
    return errorResponse(err);
  }
}
