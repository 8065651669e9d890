/**
 * Step runner — runs one step attempt function under the retry policy.
 *
 * Transient failures are retried with full-jitter backoff until the
 * attempt budget is spent; anything else ends the step on the spot.
 */

import { computeBackoff, isTransientError, RetryPolicy, sleep as defaultSleep } from './retry';

export interface StepRunnerOptions {
  retry: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  /** Called before each retry with the upcoming attempt number and delay. */
  onRetry?: (nextAttempt: number, delayMs: number, err: unknown) => Promise<void>;
  /** Checked before each retry; a true result stops the loop. */
  isCancelled?: () => Promise<boolean>;
}

export type StepRunOutcome =
  | { ok: true; value: unknown; attempts: number }
  | { ok: false; error: unknown; attempts: number; cancelled: boolean };

export async function runWithRetry(
  attemptFn: (attempt: number) => Promise<unknown>,
  options: StepRunnerOptions,
): Promise<StepRunOutcome> {
  const { retry } = options;
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, retry.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await attemptFn(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      if (attempt >= maxAttempts || !isTransientError(err)) {
        return { ok: false, error: err, attempts: attempt, cancelled: false };
      }

      const delayMs = computeBackoff(attempt, retry.backoffBaseMs, retry.backoffCapMs, options.random);
      await options.onRetry?.(attempt + 1, delayMs, err);
      await sleep(delayMs);

      if (await options.isCancelled?.()) {
        return { ok: false, error: err, attempts: attempt, cancelled: true };
      }
    }
  }
}
