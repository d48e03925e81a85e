/**
 * Configuration loading and management for topic-share
 *
 * Loads config from ~/.topic-share/.env and ~/.topic-share/config.json,
 * deep-merged over defaults and validated with zod.
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { createLogger } from './logger';

const logger = createLogger('config');

// =============================================================================
// SCHEMA
// =============================================================================

export const retrySchema = z.object({
  maxAttempts: z.number().int().min(1).max(10),
  minDelay: z.number().int().min(0),
  maxDelay: z.number().int().min(0),
  jitter: z.number().min(0).max(1),
  backoffMultiplier: z.number().min(1),
});

export const serpDepthSchema = z.union([z.literal(10), z.literal(20), z.literal(50), z.literal(100)]);

export const keywordSourceSchema = z.enum(['related_terms', 'topic_ideas', 'autocomplete']);

/** JSON has no Infinity; null disables a threshold */
const thresholdSchema = z
  .number()
  .min(0)
  .nullable()
  .transform((v) => v ?? Number.POSITIVE_INFINITY);

export const configSchema = z.object({
  api: z.object({
    baseUrl: z.string().url(),
    timeoutMs: z.number().int().positive(),
    concurrency: z.number().int().min(1).max(50),
    retry: retrySchema,
  }),
  analysis: z.object({
    location: z.number().int().positive(),
    language: z.string().min(2),
    serpDepth: serpDepthSchema,
    keywordsPerSource: z.number().int().min(1).max(10_000),
    keywordsToAnalyze: z.number().int().min(1).max(10_000),
    minSearchVolume: z.number().int().min(0),
    maxSpend: z.number().min(0),
    sources: z.array(keywordSourceSchema).min(1),
  }),
  negatives: z.object({
    keywords: z.array(z.string()),
    domains: z.array(z.string()),
  }),
  market: z.object({
    monopolisticTop3: thresholdSchema,
    concentratedTop3: thresholdSchema,
    concentratedTop5: thresholdSchema,
    concentratedTop10: thresholdSchema,
  }),
  prices: z.object({
    keywordFetch: z.number().min(0),
    autocompleteRequest: z.number().min(0),
    serpPerKeywordAtDepth10: z.number().min(0),
  }),
  dashboard: z.object({
    port: z.number().int().min(0).max(65535),
  }),
});

export type Config = z.output<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

export class ConfigError extends Error {
  readonly path: string | undefined;

  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
    this.path = path;
  }
}

// =============================================================================
// PATHS
// =============================================================================

type Env = Record<string, string | undefined>;

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env: Env = process.env): string {
  const override = env.TOPIC_SHARE_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.topic-share');
}

export function resolveConfigPath(env: Env = process.env): string {
  const override = env.TOPIC_SHARE_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), 'config.json');
}

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_CONFIG: ConfigInput = {
  api: {
    baseUrl: 'https://api.dataforseo.com/v3',
    timeoutMs: 60_000,
    concurrency: 5,
    retry: {
      maxAttempts: 4,
      minDelay: 2000,
      maxDelay: 60_000,
      jitter: 0.2,
      backoffMultiplier: 2,
    },
  },
  analysis: {
    location: 2840,
    language: 'en',
    serpDepth: 10,
    keywordsPerSource: 700,
    keywordsToAnalyze: 100,
    minSearchVolume: 10,
    maxSpend: 5,
    sources: ['related_terms', 'topic_ideas'],
  },
  negatives: {
    keywords: ['google', 'login', 'sign up', 'sign in', 'free download', 'crack', 'torrent'],
    domains: ['wikipedia.org', 'amazon.com', 'youtube.com', 'pinterest.com', 'reddit.com'],
  },
  market: {
    monopolisticTop3: 0.75,
    concentratedTop3: 0.5,
    concentratedTop5: null,
    concentratedTop10: 0.8,
  },
  prices: {
    keywordFetch: 0.01,
    autocompleteRequest: 0.0002,
    serpPerKeywordAtDepth10: 0.0006,
  },
  dashboard: {
    port: 8787,
  },
};

// =============================================================================
// MERGING
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
export function substituteEnvVars(obj: unknown, env: Env = process.env): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => env[varName] ?? '');
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVars(item, env));
  }
  if (isPlainObject(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

/**
 * Deep merge two objects; arrays and scalars from `source` replace.
 * Protects against prototype pollution.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
  const result: Record<string, unknown> = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    if (DANGEROUS_KEYS.has(key)) continue;
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

// =============================================================================
// LOADING
// =============================================================================

export interface LoadConfigOptions {
  /** Explicit config file; defaults to TOPIC_SHARE_CONFIG_PATH or ~/.topic-share/config.json */
  path?: string;
  env?: Env;
  /** Load .env from the state dir, then CWD (default: true when env is process.env) */
  loadEnvFiles?: boolean;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse config file ${configPath}`, configPath, { cause: err });
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`, configPath);
  }
  return parsed;
}

/**
 * Load configuration from file and environment
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;

  if (options.loadEnvFiles ?? env === process.env) {
    // ~/.topic-share/.env first, then CWD fallback (neither overrides existing vars)
    dotenvConfig({ path: join(resolveStateDir(env), '.env') });
    dotenvConfig();
  }

  const configPath = options.path ? resolveUserPath(options.path) : resolveConfigPath(env);
  let fileConfig: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    fileConfig = readConfigFile(configPath);
    logger.debug({ configPath }, 'Loaded config file');
  } else if (options.path) {
    throw new ConfigError(`Config file not found: ${configPath}`, configPath);
  }

  const merged = deepMerge(DEFAULT_CONFIG, fileConfig);
  const result = configSchema.safeParse(substituteEnvVars(merged, env));
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, configPath, { cause: result.error });
  }
  return result.data;
}

// =============================================================================
// CREDENTIALS
// =============================================================================

export interface Credentials {
  login: string;
  password: string;
}

/**
 * DataForSEO credentials from DATAFORSEO_LOGIN / DATAFORSEO_PASSWORD.
 * Never persisted; returns null when either is missing.
 */
export function credentialsFromEnv(env: Env = process.env): Credentials | null {
  const login = env.DATAFORSEO_LOGIN?.trim();
  const password = env.DATAFORSEO_PASSWORD?.trim();
  if (!login || !password) return null;
  return { login, password };
}
