/**
 * Retry with exponential backoff for calls that touch a network or an external process.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { SubprocessError, TransientBackendError, type TransientErrorKind } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('retry');

/**
 * Substrings of subprocess stderr that mark a network failure. Processes only
 * report failures as text, so this is the one place errors are classified by content.
 */
export const NETWORK_ERROR_PATTERNS = [
  'ConnectionError',
  'Timeout',
  'ServiceUnavailable',
  'InternalServerError',
] as const;

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
]);

const TIMEOUT_ERROR_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT']);

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay in milliseconds before the retry that follows zero-indexed attempt `attempt`. */
  backoff: (attempt: number) => number;
  isRetriable: (error: unknown) => boolean;
}

export const DEFAULT_MAX_ATTEMPTS = 5;

/** `2^attempt` seconds, no jitter and no cap. */
export function exponentialBackoff(attempt: number): number {
  return 2 ** attempt * 1000;
}

/**
 * Map an error to the transient kind it represents, or null if it must not be retried.
 */
export function classifyError(error: unknown): TransientErrorKind | null {
  if (error instanceof TransientBackendError) {
    return error.kind;
  }
  if (error instanceof SubprocessError) {
    return classifySubprocessOutput(error.stderr);
  }
  if (!(error instanceof Error)) {
    return null;
  }
  if ('code' in error && typeof error.code === 'string') {
    if (CONNECTION_ERROR_CODES.has(error.code)) return 'connection';
    if (TIMEOUT_ERROR_CODES.has(error.code)) return 'timeout';
  }
  if (error.name === 'TimeoutError') {
    return 'timeout';
  }
  if ('status' in error) {
    if (error.status === 503) return 'service-unavailable';
    if (error.status === 500) return 'internal-server-error';
  }
  return null;
}

/**
 * Legacy text classification for subprocess failures.
 */
export function classifySubprocessOutput(stderr: string): TransientErrorKind | null {
  const pattern = NETWORK_ERROR_PATTERNS.find((p) => stderr.includes(p));
  switch (pattern) {
    case 'ConnectionError':
      return 'connection';
    case 'Timeout':
      return 'timeout';
    case 'ServiceUnavailable':
      return 'service-unavailable';
    case 'InternalServerError':
      return 'internal-server-error';
    case undefined:
      return null;
  }
}

export function isTransientError(error: unknown): boolean {
  return classifyError(error) !== null;
}

export interface RetryExecutorOptions extends Partial<RetryPolicy> {
  /** Override how the executor waits between attempts. */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Runs zero-argument operations, retrying transient failures with backoff.
 * Stateless between calls, so one executor can be shared across a run.
 */
export class RetryExecutor {
  readonly policy: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts?: RetryExecutorOptions) {
    const maxAttempts = opts?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    this.policy = {
      maxAttempts,
      backoff: opts?.backoff ?? exponentialBackoff,
      isRetriable: opts?.isRetriable ?? isTransientError,
    };
    this.sleep = opts?.sleep ?? ((ms) => delay(ms));
  }

  async execute<T>(operation: () => T | Promise<T>): Promise<T> {
    const { maxAttempts, backoff, isRetriable } = this.policy;
    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (e) {
        if (!isRetriable(e) || attempt >= maxAttempts - 1) {
          throw e;
        }
        const timeout = backoff(attempt);
        logger.warn(`Attempt ${attempt + 1} failed: ${errorText(e)}`, {
          retryInMs: timeout,
        });
        await this.sleep(timeout);
      }
    }
  }
}

/**
 * Retry `operation` up to `maxAttempts` times with the default policy.
 */
export function retryRequest<T>(
  operation: () => T | Promise<T>,
  maxAttempts = DEFAULT_MAX_ATTEMPTS,
): Promise<T> {
  return new RetryExecutor({ maxAttempts }).execute(operation);
}

/**
 * Wrap an async function so that every call goes through `executor`.
 */
export function retrying<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => Promise<TResult>,
  executor: RetryExecutor,
): (...args: TArgs) => Promise<TResult> {
  return (...args) => executor.execute(() => fn(...args));
}

function errorText(e: unknown): string {
  if (e instanceof SubprocessError) return e.stderr;
  if (e instanceof Error) return `${e.name}: ${e.message}`;
  return String(e);
}
