export interface BackoffPolicy {
  delayMs: number;
  maxDelayMs: number;
  /** Fraction of the delay that may be shaved off at random, 0..1 */
  jitterRatio: number;
}

/**
 * Delay before the next cycle. With no failures this is the fixed poll delay.
 * The n-th consecutive failure waits delayMs * 2^(n-1), capped at maxDelayMs.
 */
export function computeBackoffDelay(
  policy: BackoffPolicy,
  consecutiveFailures: number,
  random: () => number = Math.random,
): number {
  const { delayMs, jitterRatio } = policy;
  const maxDelayMs = Math.max(policy.maxDelayMs, delayMs);

  if (consecutiveFailures <= 0) return delayMs;

  const exponential = Math.min(maxDelayMs, delayMs * 2 ** (consecutiveFailures - 1));
  const ratio = Math.min(Math.max(jitterRatio, 0), 1);
  return Math.round(exponential * (1 - ratio * random()));
}
