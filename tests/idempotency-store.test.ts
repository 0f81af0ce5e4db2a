import { describe, expect, it } from "vitest";
import { InMemoryIdempotencyStore } from "../src/adapters/inmemory/idempotency-store.js";
import type { IdempotencyScope, StoredResponse } from "../src/ports/idempotency-store.js";
import { ManualClock } from "./support/manual-clock.js";

const MERCHANT_A: IdempotencyScope = { operation: "create_payment_intent", credentialId: "cred_a" };
const MERCHANT_B: IdempotencyScope = { operation: "create_payment_intent", credentialId: "cred_b" };

function storedCreate(id: string, fingerprint: string, createdAt: string): StoredResponse<{ id: string }> {
  return { fingerprint, resourceId: id, statusCode: 201, body: { id }, createdAt };
}

describe("InMemoryIdempotencyStore", () => {
  it("replays the stored response when the fingerprint matches", async () => {
    const clock = new ManualClock("2026-10-01T10:00:00.000Z");
    const store = new InMemoryIdempotencyStore<{ id: string }>({ ttlSeconds: 60, clock });
    await store.remember(MERCHANT_A, "idem-1", storedCreate("pi_1", "fp_1", "2026-10-01T09:59:30.000Z"));

    const lookup = await store.lookup(MERCHANT_A, "idem-1", "fp_1");
    expect(lookup).toEqual({
      outcome: "replay",
      response: storedCreate("pi_1", "fp_1", "2026-10-01T09:59:30.000Z"),
    });
  });

  it("reports a mismatch with the resource the key already produced", async () => {
    const clock = new ManualClock("2026-10-01T10:00:00.000Z");
    const store = new InMemoryIdempotencyStore<{ id: string }>({ clock });
    await store.remember(MERCHANT_A, "idem-1", storedCreate("pi_1", "fp_1", clock.nowIso()));

    expect(await store.lookup(MERCHANT_A, "idem-1", "fp_other")).toEqual({
      outcome: "fingerprint_mismatch",
      resourceId: "pi_1",
    });
  });

  it("treats entries as absent once the ttl has elapsed", async () => {
    const clock = new ManualClock("2026-10-01T10:00:00.000Z");
    const store = new InMemoryIdempotencyStore<{ id: string }>({ ttlSeconds: 60, clock });
    await store.remember(MERCHANT_A, "idem-2", storedCreate("pi_2", "fp_2", "2026-10-01T09:59:30.000Z"));

    clock.advanceSeconds(30);
    expect(await store.lookup(MERCHANT_A, "idem-2", "fp_2")).toEqual({ outcome: "absent" });
  });

  it("keeps credentials and operations apart", async () => {
    const store = new InMemoryIdempotencyStore<{ id: string }>();
    await store.remember(MERCHANT_A, "shared", storedCreate("pi_a", "fp_a", new Date().toISOString()));

    expect(await store.lookup(MERCHANT_B, "shared", "fp_a")).toEqual({ outcome: "absent" });
    expect(
      await store.lookup({ operation: "create_payment_method", credentialId: "cred_a" }, "shared", "fp_a"),
    ).toEqual({ outcome: "absent" });
  });

  it("purges only expired entries", async () => {
    const clock = new ManualClock("2026-10-01T10:00:00.000Z");
    const store = new InMemoryIdempotencyStore<{ id: string }>({ ttlSeconds: 60, clock });
    await store.remember(MERCHANT_A, "old", storedCreate("pi_old", "fp_old", "2026-10-01T09:58:00.000Z"));
    await store.remember(MERCHANT_A, "new", storedCreate("pi_new", "fp_new", "2026-10-01T09:59:50.000Z"));

    expect(await store.purgeExpired()).toBe(1);
    expect(await store.lookup(MERCHANT_A, "new", "fp_new")).toMatchObject({ outcome: "replay" });
    expect(await store.purgeExpired()).toBe(0);
  });

  it("serializes concurrent work on the same key", async () => {
    const store = new InMemoryIdempotencyStore<string>();
    const timeline: string[] = [];

    const first = store.withKeyLock(MERCHANT_A, "idem-lock", async () => {
      timeline.push("first:start");
      await new Promise<void>((resolve) => setTimeout(resolve, 25));
      timeline.push("first:end");
      return "first";
    });
    const second = store.withKeyLock(MERCHANT_A, "idem-lock", async () => {
      timeline.push("second");
      return "second";
    });

    expect(await Promise.all([first, second])).toEqual(["first", "second"]);
    expect(timeline).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not block work on a different credential's key", async () => {
    const store = new InMemoryIdempotencyStore<string>();
    const timeline: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const held = store.withKeyLock(MERCHANT_A, "same-key", async () => {
      await gate;
      timeline.push("a");
    });
    await store.withKeyLock(MERCHANT_B, "same-key", async () => {
      timeline.push("b");
    });
    release();
    await held;

    expect(timeline).toEqual(["b", "a"]);
  });
});
