import { FatalAdapterError, isRetryable } from '../errors.js';
import { logger } from '../logger.js';

export type RetryPolicy = {
  maxAttempts: number; // total attempts, first call included
  baseMs: number;
  maxMs: number;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

// +/-20% around the exponential step
function jitter(ms: number): number {
  const j = ms * (0.2 * (Math.random() * 2 - 1));
  return Math.max(0, Math.floor(ms + j));
}

export function backoffMs(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.maxMs, policy.baseMs * Math.pow(2, attempt - 1));
}

/**
 * Retries rate-limit and transient failures with bounded exponential backoff.
 * Any other error is rethrown as is; running out of attempts escalates to
 * FatalAdapterError carrying the last failure as cause.
 */
export async function withBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  label: string
): Promise<T> {
  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      return await fn(attempt);
    } catch (err) {
      if (!isRetryable(err)) throw err;
      if (attempt >= policy.maxAttempts) {
        throw new FatalAdapterError(
          `${label}: giving up after ${attempt} attempts (${err.message})`,
          { cause: err }
        );
      }
      const waitMs = jitter(backoffMs(attempt, policy));
      logger.warn({ label, attempt, maxAttempts: policy.maxAttempts, waitMs, code: err.code }, '[retry] backing off');
      await sleep(waitMs);
    }
  }
}
