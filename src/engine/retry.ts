/**
 * Retry policy — transient-error classification and full-jitter backoff.
 */

import { hasTypedError } from '../domain/errors';

export interface RetryPolicy {
  /** Total attempts per step, including the first. */
  maxAttempts: number;
  backoffBaseMs: number;
  backoffCapMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffBaseMs: 5000,
  backoffCapMs: 30000,
};

/** Message fragments that mark a failure as worth retrying. Matched case-insensitively. */
export const TRANSIENT_ERROR_PATTERNS: readonly string[] = [
  'rate limit',
  'too many requests',
  'timeout',
  'timed out',
  '429',
  '500',
  '502',
  '503',
  '504',
  'response does not contain',
  'no content',
  'empty response',
  'temporarily unavailable',
  'unavailable',
  'overloaded',
  'connection reset',
  'connection refused',
  'econnreset',
  'econnrefused',
  'etimedout',
  'socket hang up',
  'fetch failed',
  'network error',
];

/**
 * Error that handlers throw to fail a step immediately, without retries.
 *
 * Use it for failures that will never succeed unchanged: a missing
 * recipient, an unknown document, a rejected credential.
 */
export class NonRetryableStepError extends Error {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'NonRetryableStepError';
    this.statusCode = statusCode;
  }
}

/**
 * Classify a failure as transient.
 *
 * Errors carrying a TypedError decide for themselves through `retryable`.
 * Anything else is matched against TRANSIENT_ERROR_PATTERNS.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof NonRetryableStepError) return false;
  if (hasTypedError(err)) return err.typedError.retryable;

  const message = err instanceof Error ? `${err.name} ${err.message}` : String(err);
  const lower = message.toLowerCase();
  return TRANSIENT_ERROR_PATTERNS.some((pattern) => lower.includes(pattern));
}

/**
 * Full-jitter exponential backoff: a delay drawn uniformly from
 * [0, min(base * 2^(attempt-1), cap)].
 */
export function computeBackoff(
  attempt: number,
  baseMs: number,
  capMs: number,
  random: () => number = Math.random,
): number {
  const exponent = Math.max(0, attempt - 1);
  const ceiling = Math.min(baseMs * Math.pow(2, exponent), capMs);
  return Math.floor(random() * ceiling);
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}
