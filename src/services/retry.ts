/**
 * Bounded retry with backoff.
 *
 * Only transient failures (timeout, server error, rate limit, network) are
 * retried. Everything else, including an open circuit, surfaces on the
 * first attempt.
 */

import { setTimeout as sleepFor } from "node:timers/promises";
import { backoffDelay, type BackoffPolicy } from "./backoff.js";
import type { CircuitBreaker } from "./circuit-breaker.js";
import { CancelledError, ExternalServiceError } from "./errors.js";

export interface RetryPolicy extends BackoffPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
}

export interface RetryOptions {
  /** Decides whether an error is worth another attempt */
  isRetryable?: (error: unknown) => boolean;
  /** Injected for tests; defaults to a timer that honours the signal */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export interface RetryOutcome<T> {
  value: T;
  /** Calls made, including the successful one */
  attempts: number;
  retries: number;
}

export function isTransientError(error: unknown): boolean {
  return error instanceof ExternalServiceError && error.transient;
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await sleepFor(ms, undefined, signal ? { signal } : {});
  } catch (err) {
    if (signal?.aborted) throw new CancelledError("Retry wait cancelled");
    throw err;
  }
}

/**
 * Run `fn` until it succeeds, fails with a non-retryable error, or the retry
 * budget is spent. The last error is rethrown with its attempt count set.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<RetryOutcome<T>> {
  const isRetryable = options.isRetryable ?? isTransientError;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    if (options.signal?.aborted) {
      throw new CancelledError();
    }
    try {
      const value = await fn(attempt);
      return { value, attempts: attempt + 1, retries: attempt };
    } catch (err) {
      if (err instanceof ExternalServiceError) {
        err.attempts = attempt + 1;
      }
      if (attempt >= policy.maxRetries || !isRetryable(err)) {
        throw err;
      }
      const delayMs = backoffDelay(attempt, policy);
      options.onRetry?.({ attempt: attempt + 1, delayMs, error: err });
      await sleep(delayMs, options.signal);
    }
  }
}

/**
 * Retry composed with a circuit breaker: every attempt goes through the
 * breaker, so an opened circuit stops the retry loop immediately.
 */
export async function callResilient<T>(
  breaker: CircuitBreaker,
  policy: RetryPolicy,
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryOutcome<T>> {
  return withRetry(() => breaker.execute(fn), policy, options);
}
