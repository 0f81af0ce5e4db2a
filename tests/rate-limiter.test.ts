import { describe, expect, it } from "vitest";
import { InMemoryRateLimiter } from "../src/adapters/inmemory/rate-limiter.js";
import { takeToken } from "../src/domain/token-bucket.js";
import { ManualClock } from "./support/manual-clock.js";

describe("takeToken", () => {
  it("starts a missing bucket full", () => {
    const { state, decision } = takeToken(undefined, 1_000, { capacity: 3, refillPerSecond: 1 });

    expect(state).toEqual({ tokens: 2, updatedAtMs: 1_000 });
    expect(decision).toEqual({ allowed: true, limit: 3, remaining: 2, resetSeconds: 1, retryAfterSeconds: 0 });
  });

  it("refills by elapsed time but never beyond capacity", () => {
    const policy = { capacity: 3, refillPerSecond: 1 };

    expect(takeToken({ tokens: 0, updatedAtMs: 0 }, 1_500, policy).state).toEqual({ tokens: 0.5, updatedAtMs: 1_500 });
    expect(takeToken({ tokens: 2, updatedAtMs: 0 }, 60_000, policy).state.tokens).toBe(2);
  });

  it("does not refill when the clock steps backwards", () => {
    const { state, decision } = takeToken({ tokens: 0.5, updatedAtMs: 5_000 }, 4_000, { capacity: 1, refillPerSecond: 1 });

    expect(state).toEqual({ tokens: 0.5, updatedAtMs: 5_000 });
    expect(decision.allowed).toBe(false);
  });
});

describe("InMemoryRateLimiter", () => {
  it("serves a full bucket as a burst and then rejects", () => {
    const limiter = new InMemoryRateLimiter({ capacity: 2, refillPerSecond: 1 }, new ManualClock());

    expect(limiter.consume("cred_a")).toEqual({ allowed: true, limit: 2, remaining: 1, resetSeconds: 1, retryAfterSeconds: 0 });
    expect(limiter.consume("cred_a")).toEqual({ allowed: true, limit: 2, remaining: 0, resetSeconds: 2, retryAfterSeconds: 0 });
    expect(limiter.consume("cred_a")).toEqual({ allowed: false, limit: 2, remaining: 0, resetSeconds: 2, retryAfterSeconds: 1 });
  });

  it("rounds a partial refill up to the next whole second", () => {
    const clock = new ManualClock();
    const limiter = new InMemoryRateLimiter({ capacity: 1, refillPerSecond: 0.5 }, clock);

    expect(limiter.consume("cred_a").allowed).toBe(true);
    expect(limiter.consume("cred_a").retryAfterSeconds).toBe(2);

    clock.advanceSeconds(1);
    expect(limiter.consume("cred_a")).toMatchObject({ allowed: false, retryAfterSeconds: 1 });

    clock.advanceSeconds(1);
    expect(limiter.consume("cred_a")).toMatchObject({ allowed: true, remaining: 0 });
  });

  it("keeps independent buckets per credential", () => {
    const limiter = new InMemoryRateLimiter({ capacity: 1, refillPerSecond: 1 }, new ManualClock());

    expect(limiter.consume("cred_a").allowed).toBe(true);
    expect(limiter.consume("cred_b").allowed).toBe(true);
    expect(limiter.consume("cred_a").allowed).toBe(false);
  });

  it("forgets buckets that have been idle long enough to refill", () => {
    const clock = new ManualClock();
    const limiter = new InMemoryRateLimiter({ capacity: 2, refillPerSecond: 1 }, clock);

    limiter.consume("cred_a");
    clock.advanceSeconds(2);
    limiter.consume("cred_b");

    expect(limiter.trackedCredentials).toBe(1);
  });
});
