/**
 * Exponential backoff.
 *
 * Stateless: the delay depends only on the attempt number and the policy.
 */

export interface BackoffPolicy {
  /** Delay before the first retry */
  baseDelayMs: number;
  /** Growth factor per retry */
  multiplier: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
}

/**
 * Delay before retry number `attempt` (0 for the first retry):
 * `baseDelayMs * multiplier^attempt`, capped at `maxDelayMs`.
 */
export function backoffDelay(attempt: number, policy: BackoffPolicy): number {
  if (attempt < 0) return 0;
  const delay = policy.baseDelayMs * Math.pow(policy.multiplier, attempt);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * The full delay schedule for `retries` retries.
 */
export function backoffSchedule(retries: number, policy: BackoffPolicy): number[] {
  return Array.from({ length: Math.max(0, retries) }, (_, attempt) => backoffDelay(attempt, policy));
}
