export interface WebhookBackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the computed delay added at random, 0 disables jitter. */
  jitterRatio: number;
}

/** Delay before the attempt following failed attempt number `attempt` (1-based). */
export function nextAttemptDelayMs(
  attempt: number,
  policy: WebhookBackoffPolicy,
  random: () => number = Math.random,
): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
  return Math.round(delay + delay * policy.jitterRatio * random());
}
