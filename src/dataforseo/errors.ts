/**
 * Typed failures from the DataForSEO API and the Result type sources return.
 */

export type FetchErrorKind =
  | 'auth'
  | 'rate_limit'
  | 'timeout'
  | 'network'
  | 'http'
  | 'malformed_response'
  | 'api';

export interface FetchErrorOptions {
  status?: number;
  retryAfter?: number;
  cause?: unknown;
}

export class FetchError extends Error {
  readonly operation: string;
  readonly kind: FetchErrorKind;
  /** HTTP status, or the DataForSEO status_code for task-level failures */
  readonly status?: number;
  /** Server hint in ms, read by the retry layer */
  readonly retryAfter?: number;
  readonly retryable: boolean;

  constructor(operation: string, kind: FetchErrorKind, message: string, options: FetchErrorOptions = {}) {
    super(`${operation}: ${message}`, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'FetchError';
    this.operation = operation;
    this.kind = kind;
    this.status = options.status;
    this.retryAfter = options.retryAfter;
    this.retryable = isRetryableKind(kind, options.status);
  }

  toJSON(): Record<string, unknown> {
    return {
      operation: this.operation,
      kind: this.kind,
      status: this.status,
      message: this.message,
    };
  }
}

function isRetryableKind(kind: FetchErrorKind, status?: number): boolean {
  switch (kind) {
    case 'rate_limit':
    case 'timeout':
    case 'network':
      return true;
    case 'http':
      return status !== undefined && status >= 500;
    case 'api':
      // DataForSEO internal errors are 50000-range task codes
      return status !== undefined && status >= 50000;
    default:
      return false;
  }
}

export type FetchResult<T> = { ok: true; value: T } | { ok: false; error: FetchError };

export function ok<T>(value: T): FetchResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: FetchError): FetchResult<T> {
  return { ok: false, error };
}
