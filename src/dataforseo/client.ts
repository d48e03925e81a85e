/**
 * DataForSEO API client
 *
 * Base URL: https://api.dataforseo.com/v3
 * Auth: HTTP Basic with the account login + API password
 *
 * Every call is a task envelope: `{ status_code, tasks: [{ status_code, result }] }`
 * with 20000 meaning success at either level. Responses are validated with zod;
 * anything that does not match becomes a `malformed_response` FetchError.
 *
 * Credentials live only in the client closure for the lifetime of a run.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { parseRetryAfter, withRetry, RETRY_POLICIES, type RetryOptions } from '../infra/retry';
import { FetchError, type FetchErrorKind } from './errors';
import type { Config } from '../utils/config';

const logger = createLogger('dataforseo');

export const DATAFORSEO_BASE_URL = 'https://api.dataforseo.com/v3';

const STATUS_OK = 20000;

/** Per-request timeout (60 seconds); live SERP tasks at depth 100 are slow */
const DEFAULT_TIMEOUT_MS = 60_000;

// =============================================================================
// TYPES
// =============================================================================

export interface DataForSeoCredentials {
  login: string;
  password: string;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface DataForSeoClientOptions {
  credentials: DataForSeoCredentials;
  baseUrl?: string;
  timeoutMs?: number;
  retry?: RetryOptions;
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: FetchLike;
}

export type ResultSchema<R> = z.ZodType<R, z.ZodTypeDef, unknown>;

export interface DataForSeoClient {
  /** POST one or more tasks and return the concatenated `result` arrays */
  postTasks<R>(
    operation: string,
    path: string,
    tasks: readonly Record<string, unknown>[],
    resultSchema: ResultSchema<R>,
  ): Promise<R[]>;
  /** GET an endpoint that returns a single task */
  getTasks<R>(operation: string, path: string, resultSchema: ResultSchema<R>): Promise<R[]>;
  /** Remaining account balance in USD */
  getBalance(): Promise<number>;
}

// =============================================================================
// HELPERS
// =============================================================================

const userDataSchema = z.object({
  money: z.object({ balance: z.number() }),
});

function envelopeSchema<R>(resultSchema: ResultSchema<R>) {
  return z.object({
    status_code: z.number(),
    status_message: z.string().nullish(),
    tasks: z
      .array(
        z.object({
          status_code: z.number(),
          status_message: z.string().nullish(),
          result: z.array(resultSchema).nullish(),
        }),
      )
      .nullish(),
  });
}

/**
 * Map a DataForSEO status_code (envelope or task level) to an error kind.
 */
export function kindForStatusCode(code: number): FetchErrorKind {
  if (code >= 40100 && code < 40200) return 'auth';
  if (code === 40202) return 'rate_limit';
  return 'api';
}

function kindForHttpStatus(status: number): FetchErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate_limit';
  return 'http';
}

function toTransportError(operation: string, err: unknown): FetchError {
  if (err instanceof FetchError) return err;
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return new FetchError(operation, 'timeout', 'Request timed out', { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new FetchError(operation, 'network', message, { cause: err });
}

function encodeBasicAuth({ login, password }: DataForSeoCredentials): string {
  return `Basic ${Buffer.from(`${login}:${password}`, 'utf-8').toString('base64')}`;
}

// =============================================================================
// CLIENT
// =============================================================================

export function createDataForSeoClient(options: DataForSeoClientOptions): DataForSeoClient {
  const baseUrl = (options.baseUrl ?? DATAFORSEO_BASE_URL).replace(/\/+$/, '');
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const retry: RetryOptions = options.retry ?? RETRY_POLICIES.dataforseo;
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const authorization = encodeBasicAuth(options.credentials);

  async function send(operation: string, method: 'GET' | 'POST', path: string, body?: unknown): Promise<unknown> {
    const url = `${baseUrl}${path.startsWith('/') ? path : `/${path}`}`;

    let response: Response;
    try {
      response = await fetchImpl(url, {
        method,
        headers: {
          Authorization: authorization,
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw toTransportError(operation, err);
    }

    if (!response.ok) {
      const retryAfter = parseRetryAfter(response.headers.get('retry-after'));
      // Release the connection; the body is not needed
      await response.body?.cancel().catch(() => undefined);
      throw new FetchError(operation, kindForHttpStatus(response.status), `HTTP ${response.status}`, {
        status: response.status,
        retryAfter: retryAfter ?? undefined,
      });
    }

    try {
      return await response.json();
    } catch (err) {
      throw new FetchError(operation, 'malformed_response', 'Response body is not valid JSON', {
        status: response.status,
        cause: err,
      });
    }
  }

  function unwrap<R>(operation: string, json: unknown, resultSchema: ResultSchema<R>): R[] {
    const parsed = envelopeSchema(resultSchema).safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape';
      throw new FetchError(operation, 'malformed_response', `Unexpected response (${where})`, {
        cause: parsed.error,
      });
    }

    const envelope = parsed.data;
    if (envelope.status_code !== STATUS_OK) {
      throw new FetchError(
        operation,
        kindForStatusCode(envelope.status_code),
        envelope.status_message ?? `status ${envelope.status_code}`,
        { status: envelope.status_code },
      );
    }

    const results: R[] = [];
    for (const task of envelope.tasks ?? []) {
      if (task.status_code !== STATUS_OK) {
        throw new FetchError(
          operation,
          kindForStatusCode(task.status_code),
          task.status_message ?? `task status ${task.status_code}`,
          { status: task.status_code },
        );
      }
      results.push(...(task.result ?? []));
    }
    return results;
  }

  async function call<R>(
    operation: string,
    method: 'GET' | 'POST',
    path: string,
    resultSchema: ResultSchema<R>,
    body?: unknown,
  ): Promise<R[]> {
    return withRetry(
      async () => unwrap(operation, await send(operation, method, path, body), resultSchema),
      {
        ...retry,
        onRetry: (info) => {
          if (info.willRetry) {
            logger.warn(
              { operation, attempt: info.attempt, delay: info.delay, error: info.error.message },
              'DataForSEO request failed; retrying',
            );
          }
          retry.onRetry?.(info);
        },
      },
    );
  }

  return {
    postTasks(operation, path, tasks, resultSchema) {
      logger.debug({ operation, path, tasks: tasks.length }, 'POST tasks');
      return call(operation, 'POST', path, resultSchema, tasks);
    },

    getTasks(operation, path, resultSchema) {
      logger.debug({ operation, path }, 'GET tasks');
      return call(operation, 'GET', path, resultSchema);
    },

    async getBalance(): Promise<number> {
      const [userData] = await call('user_data', 'GET', '/appendix/user_data', userDataSchema);
      if (!userData) {
        throw new FetchError('user_data', 'malformed_response', 'No account data returned');
      }
      return userData.money.balance;
    },
  };
}

/**
 * Client configured from the `api` section of the loaded config.
 */
export function createClientFromConfig(
  api: Pick<Config['api'], 'baseUrl' | 'timeoutMs' | 'retry'>,
  credentials: DataForSeoCredentials,
  fetchImpl?: FetchLike,
): DataForSeoClient {
  return createDataForSeoClient({
    credentials,
    baseUrl: api.baseUrl,
    timeoutMs: api.timeoutMs,
    retry: { ...api.retry },
    fetchImpl,
  });
}
