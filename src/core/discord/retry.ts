/**
 * Exponential backoff with jitter, used around Discord sends.
 */

import { DEFAULT_POST_ATTEMPTS } from '../config/constants.js';
import { isRetryable } from '../errors.js';
import { logger } from '../logger.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  // Fraction of the computed delay added at random, 0 disables jitter
  jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: DEFAULT_POST_ATTEMPTS,
  baseDelayMs: 2000,
  maxDelayMs: 30000,
  jitter: 0.2,
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retry number `attempt` (1-based).
 */
export function computeDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(exponential, policy.maxDelayMs);
  return Math.round(capped + capped * policy.jitter * random());
}

export interface RetryOptions {
  policy?: RetryPolicy;
  sleep?: Sleep;
  random?: () => number;
  shouldRetry?: (error: unknown) => boolean;
  label?: string;
}

/**
 * Runs `operation` until it resolves or the attempts run out. Only errors
 * accepted by `shouldRetry` (retryable `LinkDigestError`s by default) are
 * retried; the last error is rethrown.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const wait = options.sleep ?? sleep;
  const shouldRetry = options.shouldRetry ?? isRetryable;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= policy.maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      const delay = computeDelay(policy, attempt, options.random);
      logger.warn(`${options.label ?? 'operation'} failed, retrying in ${delay}ms`, {
        attempt,
        maxAttempts: policy.maxAttempts,
        error: error instanceof Error ? error.message : String(error),
      });
      await wait(delay);
    }
  }
}
