import { SystemClock, type ClockPort } from "../../infra/clock.js";
import { fullRefillMs, takeToken, type BucketPolicy, type BucketState } from "../../domain/token-bucket.js";
import type { RateLimitDecision, RateLimiterPort } from "../../ports/rate-limiter.js";

/** Single-process token buckets; idle buckets are pruned lazily. */
export class InMemoryRateLimiter implements RateLimiterPort {
  private readonly buckets = new Map<string, BucketState>();
  private readonly idleMs: number;
  private lastPruneMs: number;

  constructor(
    private readonly policy: BucketPolicy,
    private readonly clock: ClockPort = new SystemClock(),
  ) {
    this.idleMs = fullRefillMs(policy);
    this.lastPruneMs = clock.nowMs();
  }

  consume(credentialId: string): RateLimitDecision {
    const nowMs = this.clock.nowMs();
    const { state, decision } = takeToken(this.buckets.get(credentialId), nowMs, this.policy);
    this.buckets.set(credentialId, state);
    if (nowMs - this.lastPruneMs >= this.idleMs) {
      this.prune(nowMs);
    }
    return decision;
  }

  get trackedCredentials(): number {
    return this.buckets.size;
  }

  private prune(nowMs: number): void {
    this.lastPruneMs = nowMs;
    for (const [credentialId, bucket] of this.buckets) {
      if (nowMs - bucket.updatedAtMs >= this.idleMs) {
        this.buckets.delete(credentialId);
      }
    }
  }
}
