export type RetryPolicy = {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  initialDelayMs: 500,
  maxDelayMs: 8_000,
  multiplier: 2,
};

/** Delay before the attempt that follows `attempt` (1-based). */
export function computeBackoffDelayMs(policy: RetryPolicy, attempt: number): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = policy.initialDelayMs * Math.pow(policy.multiplier, exponent);
  return Math.min(Math.round(delay), policy.maxDelayMs);
}

export function assertRetryPolicy(policy: RetryPolicy): RetryPolicy {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new Error(`Invalid retry policy: maxAttempts must be an integer >= 1`);
  }
  if (policy.initialDelayMs < 0 || policy.maxDelayMs < policy.initialDelayMs) {
    throw new Error(`Invalid retry policy: expected 0 <= initialDelayMs <= maxDelayMs`);
  }
  if (policy.multiplier < 1) {
    throw new Error(`Invalid retry policy: multiplier must be >= 1`);
  }
  return policy;
}
