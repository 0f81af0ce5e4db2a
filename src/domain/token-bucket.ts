import type { RateLimitDecision } from "../ports/rate-limiter.js";

export interface BucketPolicy {
  /** Burst size: a new bucket starts full and never holds more. */
  capacity: number;
  refillPerSecond: number;
}

export interface BucketState {
  tokens: number;
  updatedAtMs: number;
}

/** After this long without traffic a bucket is indistinguishable from a new one. */
export function fullRefillMs(policy: BucketPolicy): number {
  return Math.ceil((policy.capacity / policy.refillPerSecond) * 1000);
}

function wholeSecondsFor(missingTokens: number, policy: BucketPolicy): number {
  return missingTokens <= 0 ? 0 : Math.max(1, Math.ceil(missingTokens / policy.refillPerSecond));
}

/** Decision for a bucket left holding `tokens` after the take (or refusal). */
export function bucketDecision(tokens: number, allowed: boolean, policy: BucketPolicy): RateLimitDecision {
  return {
    allowed,
    limit: policy.capacity,
    remaining: Math.floor(tokens),
    resetSeconds: wholeSecondsFor(policy.capacity - tokens, policy),
    retryAfterSeconds: allowed ? 0 : wholeSecondsFor(1 - tokens, policy),
  };
}

export function takeToken(
  previous: BucketState | undefined,
  nowMs: number,
  policy: BucketPolicy,
): { state: BucketState; decision: RateLimitDecision } {
  let tokens = policy.capacity;
  if (previous) {
    const elapsedMs = Math.max(0, nowMs - previous.updatedAtMs);
    tokens = Math.min(policy.capacity, previous.tokens + (elapsedMs / 1000) * policy.refillPerSecond);
  }
  const allowed = tokens >= 1;
  if (allowed) {
    tokens -= 1;
  }
  return {
    state: { tokens, updatedAtMs: Math.max(nowMs, previous?.updatedAtMs ?? nowMs) },
    decision: bucketDecision(tokens, allowed, policy),
  };
}
