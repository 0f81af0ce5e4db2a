import { createHash, createHmac, timingSafeEqual } from "node:crypto";

export const WEBHOOK_HEADERS = {
  event: "X-PIE-Event",
  eventId: "X-PIE-Event-Id",
  timestamp: "X-PIE-Timestamp",
  signature: "X-PIE-Signature",
  signatureKeyId: "X-PIE-Signature-Key-Id",
} as const;

export function signWebhookPayload(secret: string, timestamp: string, body: string): string {
  const signedPayload = `${timestamp}.${body}`;
  return createHmac("sha256", secret).update(signedPayload).digest("hex");
}

export function webhookSignatureKeyId(secret: string): string {
  const digest = createHash("sha256").update(secret).digest("hex");
  return `whk_${digest.slice(0, 12)}`;
}

export interface VerifyWebhookSignatureInput {
  secret: string;
  /** Raw X-PIE-Timestamp header value (unix seconds). */
  timestamp: string;
  /** Raw request body, exactly as received. */
  body: string;
  signature: string;
  toleranceSeconds?: number;
  nowSeconds?: number;
}

export type WebhookVerificationResult =
  | { valid: true }
  | { valid: false; reason: "malformed_timestamp" | "timestamp_out_of_tolerance" | "signature_mismatch" };

/** For subscribers: checks the HMAC and rejects replays outside the tolerance window. */
export function verifyWebhookSignature(input: VerifyWebhookSignatureInput): WebhookVerificationResult {
  if (!/^\d+$/.test(input.timestamp)) {
    return { valid: false, reason: "malformed_timestamp" };
  }
  const toleranceSeconds = input.toleranceSeconds ?? 300;
  const nowSeconds = input.nowSeconds ?? Math.floor(Date.now() / 1000);
  if (Math.abs(nowSeconds - Number(input.timestamp)) > toleranceSeconds) {
    return { valid: false, reason: "timestamp_out_of_tolerance" };
  }

  const expected = Buffer.from(signWebhookPayload(input.secret, input.timestamp, input.body), "utf8");
  const provided = Buffer.from(input.signature, "utf8");
  if (expected.length !== provided.length || !timingSafeEqual(expected, provided)) {
    return { valid: false, reason: "signature_mismatch" };
  }
  return { valid: true };
}
