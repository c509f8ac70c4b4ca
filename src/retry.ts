/**
 * Retry policy for outbound source API calls
 *
 * The schedule and the predicate are plain values so they can be tested and
 * swapped on their own.
 */

import { SourceApiError } from './errors.js';
import { sleep as defaultSleep } from './utils.js';

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Delay in ms after the given failed attempt (1-indexed) */
  backoff: (attempt: number) => number;
  shouldRetry: (error: unknown) => boolean;
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/**
 * Exponential backoff: initialMs, 2·initialMs, ... capped at maxMs
 */
export function exponentialBackoff(initialMs: number, maxMs: number, multiplier: number = 2) {
  return (attempt: number): number => Math.min(initialMs * Math.pow(multiplier, attempt - 1), maxMs);
}

/**
 * Network failures, timeouts and 5xx responses are worth another try; 4xx
 * responses and anything unclassified are not.
 */
export function isRetryableSourceError(error: unknown): boolean {
  return error instanceof SourceApiError && error.retryable;
}

export const SOURCE_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  backoff: exponentialBackoff(1000, 4000),
  shouldRetry: isRetryableSourceError
});

/**
 * Run an operation under a retry policy. The last error is rethrown once
 * attempts are exhausted or the predicate rejects it.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<T> {
  const wait = hooks.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= policy.maxAttempts || !policy.shouldRetry(error)) {
        throw error;
      }
      const delayMs = policy.backoff(attempt);
      hooks.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs);
    }
  }
}
