export interface BackoffPolicy {
  initialMs: number;
  multiplier: number;
  maxMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = { initialMs: 1000, multiplier: 4, maxMs: 60000 };

// Exponential backoff: base-4 gives 1s → 4s → 16s → 64s (capped at maxMs).
// attempt is 1-indexed; attempt=1 waits initialMs, attempt=2 waits multiplier x that, etc.
export function calculateBackOff(
  attempt: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF,
  random: () => number = Math.random,
): number {
  let delay = policy.initialMs * Math.pow(policy.multiplier, Math.max(attempt, 1) - 1);
  delay = Math.min(delay, policy.maxMs);
  // ±10% jitter to avoid thundering herd
  const jitter = delay * 0.1;
  const randomJitter = random() * jitter * 2 - jitter;
  return Math.floor(delay + randomJitter);
}
