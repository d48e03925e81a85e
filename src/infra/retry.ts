/**
 * Retry Infrastructure - Exponential backoff with jitter
 *
 * Features:
 * - Exponential backoff with configurable min/max delays
 * - Jitter support to prevent thundering herd
 * - Custom retry predicates per error type
 * - Server-provided retry-after extraction
 * - onRetry callbacks for observability
 */

import { createLogger } from '../utils/logger';

const logger = createLogger('retry');

// =============================================================================
// TYPES
// =============================================================================

export interface RetryOptions {
  /** Maximum number of attempts including the first (default: 3) */
  maxAttempts?: number;
  /** Minimum delay in ms (default: 1000) */
  minDelay?: number;
  /** Maximum delay in ms (default: 30000) */
  maxDelay?: number;
  /** Jitter factor 0-1 (default: 0.1 = +/-10%) */
  jitter?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Custom predicate to determine if error is retryable */
  retryPredicate?: (error: Error, attempt: number) => boolean;
  /** Callback on each retry attempt */
  onRetry?: (info: RetryInfo) => void;
}

export interface RetryInfo {
  attempt: number;
  maxAttempts: number;
  delay: number;
  error: Error;
  willRetry: boolean;
}

// =============================================================================
// TRANSIENT ERROR DETECTION
// =============================================================================

/** Common transient error message patterns */
const TRANSIENT_PATTERNS = [
  'econnreset',
  'econnrefused',
  'etimedout',
  'econnaborted',
  'epipe',
  'enetunreach',
  'ehostunreach',
  'socket hang up',
  'network error',
  'fetch failed',
  'connection reset',
  'service unavailable',
  'bad gateway',
  'gateway timeout',
  'request timeout',
];

/**
 * Detect transient/network errors that are safe to retry.
 */
export function isTransientError(err: Error): boolean {
  // Explicitly marked
  if ('retryable' in err && typeof err.retryable === 'boolean') {
    return err.retryable;
  }

  if (err.name === 'TimeoutError' || err.name === 'AbortError') {
    return true;
  }

  const message = err.message.toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => message.includes(p))) {
    return true;
  }

  // Status code patterns embedded in message text
  return /\b(status\s*[:=]?\s*|http\s+)(429|50[0-4])\b/i.test(err.message);
}

// =============================================================================
// RETRY-AFTER PARSING
// =============================================================================

/**
 * Parse a Retry-After header value (seconds or HTTP date) into milliseconds.
 * Returns null if the value is missing or cannot be parsed.
 */
export function parseRetryAfter(header: string | null | undefined): number | null {
  if (!header) return null;

  const seconds = Number.parseInt(header, 10);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds) * 1000;
  }

  const dateMs = Date.parse(header);
  if (!Number.isNaN(dateMs)) {
    const delayMs = dateMs - Date.now();
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Extract retry-after (ms) from an error's `retryAfter` property.
 */
export function extractRetryAfterFromError(error: Error): number | null {
  if ('retryAfter' in error && typeof error.retryAfter === 'number') {
    return error.retryAfter;
  }
  return null;
}

// =============================================================================
// DELAY CALCULATION
// =============================================================================

/**
 * Calculate delay with exponential backoff and jitter.
 */
export function calculateDelay(
  attempt: number,
  config: Required<Pick<RetryOptions, 'minDelay' | 'maxDelay' | 'jitter' | 'backoffMultiplier'>>
): number {
  // Exponential backoff: minDelay * (multiplier ^ (attempt - 1))
  const exponentialDelay = config.minDelay * Math.pow(config.backoffMultiplier, attempt - 1);

  const cappedDelay = Math.min(exponentialDelay, config.maxDelay);

  // Apply jitter (+/- jitter%)
  const jitterRange = cappedDelay * config.jitter;
  const jitterValue = (Math.random() * 2 - 1) * jitterRange;

  return Math.round(Math.max(0, cappedDelay + jitterValue));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// withRetry - GENERIC RETRY WRAPPER
// =============================================================================

/**
 * Execute a function with automatic retry on transient errors.
 *
 * @example
 * ```ts
 * const data = await withRetry(() => client.get('/appendix/user_data'), {
 *   maxAttempts: 3,
 *   minDelay: 1000,
 * });
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    minDelay = 1000,
    maxDelay = 30000,
    jitter = 0.1,
    backoffMultiplier = 2,
    retryPredicate = isTransientError,
    onRetry,
  } = options;

  let lastError: Error = new Error('withRetry called with maxAttempts < 1');

  for (let attempt = 1; attempt <= Math.max(1, maxAttempts); attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const willRetry = attempt < maxAttempts && retryPredicate(lastError, attempt);

      const serverRetryAfter = extractRetryAfterFromError(lastError);
      const delay =
        serverRetryAfter !== null
          ? Math.min(serverRetryAfter, maxDelay)
          : calculateDelay(attempt, { minDelay, maxDelay, jitter, backoffMultiplier });

      onRetry?.({ attempt, maxAttempts, delay, error: lastError, willRetry });

      logger.debug(
        { attempt, maxAttempts, delay, willRetry, error: lastError.message },
        'Retry attempt'
      );

      if (!willRetry) {
        break;
      }

      await sleep(delay);
    }
  }

  throw lastError;
}

// =============================================================================
// PRE-BUILT RETRY POLICIES
// =============================================================================

export const RETRY_POLICIES = {
  /** DataForSEO live endpoints: rate limited per minute, slow under load */
  dataforseo: {
    maxAttempts: 4,
    minDelay: 2000,
    maxDelay: 60000,
    jitter: 0.2,
    backoffMultiplier: 2,
  },
} satisfies Record<string, RetryOptions>;
