import { createHmac } from "node:crypto";
import { describe, expect, it } from "vitest";
import { nextAttemptDelayMs } from "../src/application/webhook-delivery-policy.js";
import { signWebhookPayload, verifyWebhookSignature } from "../src/application/webhook-signing.js";

const SECRET = "whsec_test-secret";
const BODY = '{"id":"evt_test_1"}';

describe("webhook signatures", () => {
  it("signs timestamp and body with HMAC-SHA256", () => {
    const expected = createHmac("sha256", SECRET).update(`1790000000.${BODY}`).digest("hex");

    expect(signWebhookPayload(SECRET, "1790000000", BODY)).toBe(expected);
  });

  it("accepts a signature inside the tolerance window", () => {
    const signature = signWebhookPayload(SECRET, "1790000000", BODY);

    expect(
      verifyWebhookSignature({ secret: SECRET, timestamp: "1790000000", body: BODY, signature, nowSeconds: 1790000300 }),
    ).toEqual({ valid: true });
    expect(
      verifyWebhookSignature({ secret: SECRET, timestamp: "1790000000", body: BODY, signature, nowSeconds: 1790000301 }),
    ).toEqual({ valid: false, reason: "timestamp_out_of_tolerance" });
  });

  it("rejects tampered bodies, other secrets and malformed timestamps", () => {
    const signature = signWebhookPayload(SECRET, "1790000000", BODY);
    const base = { secret: SECRET, timestamp: "1790000000", body: BODY, signature, nowSeconds: 1790000000 };

    expect(verifyWebhookSignature({ ...base, body: '{"id":"evt_test_2"}' })).toEqual({
      valid: false,
      reason: "signature_mismatch",
    });
    expect(verifyWebhookSignature({ ...base, secret: "whsec_other" })).toEqual({
      valid: false,
      reason: "signature_mismatch",
    });
    expect(verifyWebhookSignature({ ...base, signature: "abc" })).toEqual({
      valid: false,
      reason: "signature_mismatch",
    });
    expect(verifyWebhookSignature({ ...base, timestamp: "17e8" })).toEqual({
      valid: false,
      reason: "malformed_timestamp",
    });
  });
});

describe("webhook retry backoff", () => {
  const policy = { baseDelayMs: 1_000, maxDelayMs: 10_000, jitterRatio: 0.5 };

  it("doubles the delay per failed attempt up to the cap", () => {
    const noJitter = () => 0;

    expect([1, 2, 3, 4, 5, 6].map((attempt) => nextAttemptDelayMs(attempt, policy, noJitter))).toEqual([
      1_000, 2_000, 4_000, 8_000, 10_000, 10_000,
    ]);
  });

  it("adds jitter proportional to the delay", () => {
    expect(nextAttemptDelayMs(2, policy, () => 0.5)).toBe(2_500);
    expect(nextAttemptDelayMs(6, policy, () => 1)).toBe(15_000);
  });
});
