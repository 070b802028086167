export interface BackoffPolicy {
  baseMs: number;
  factor: number;
  capMs: number;
}

/**
 * Delay before retry number `retryCount` (1-based, the already incremented
 * count): base * factor^(retryCount - 1), capped. Non-decreasing in
 * retryCount.
 */
export function backoffDelayMs(retryCount: number, policy: BackoffPolicy): number {
  const exponent = Math.max(0, retryCount - 1);
  return Math.min(policy.capMs, policy.baseMs * policy.factor ** exponent);
}

export function nextRetryAt(
  now: Date,
  retryCount: number,
  policy: BackoffPolicy,
): string {
  return new Date(now.getTime() + backoffDelayMs(retryCount, policy)).toISOString();
}
