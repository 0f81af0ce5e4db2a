export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Whole seconds until the bucket is full again. */
  resetSeconds: number;
  /** 0 when allowed; otherwise whole seconds until one token is available. */
  retryAfterSeconds: number;
}

/** One bucket per API credential. Never waits for capacity. */
export interface RateLimiterPort {
  consume(credentialId: string): Promise<RateLimitDecision> | RateLimitDecision;
}
