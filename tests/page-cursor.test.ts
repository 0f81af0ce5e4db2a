import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/infra/app-error.js";
import { PageCursorSigner } from "../src/infra/page-cursor.js";

function openError(signer: PageCursorSigner, cursor: string): ValidationError {
  try {
    signer.open("payment_intents", cursor);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected the cursor to be rejected");
}

describe("PageCursorSigner", () => {
  const signer = new PageCursorSigner("test-cursor-secret");

  it("opens a cursor on the listing that sealed it", () => {
    const cursor = signer.seal("payment_intents", "pi_123456");

    expect(cursor).toMatch(/^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/);
    expect(signer.open("payment_intents", cursor)).toBe("pi_123456");
  });

  it("refuses a cursor from another listing", () => {
    const cursor = signer.seal("webhook_deliveries", "wd_abc");

    expect(() => signer.open("events", cursor)).toThrowError("cursor was issued for webhook_deliveries, not events.");
  });

  it("rejects a tampered signature", () => {
    const [payload, signature] = signer.seal("payment_intents", "pi_1").split(".");
    const flipped = `${signature?.slice(0, -1)}${signature?.endsWith("A") ? "B" : "A"}`;

    expect(openError(signer, `${payload}.${flipped}`).code).toBe("invalid_cursor");
  });

  it("rejects tokens that are not sealed cursors", () => {
    expect(openError(signer, "forged.cursor").message).toBe("cursor token signature is invalid.");
    expect(openError(signer, "only-one-part").message).toBe("cursor token format is invalid.");
    expect(() => signer.seal("payment_intents", "pi with spaces")).toThrowError(ValidationError);
  });

  it("keeps cursors from a retired secret valid while it is listed for verification", () => {
    const retired = new PageCursorSigner("test-cursor-secret-old");
    const cursor = retired.seal("payment_intents", "pi_rotate");

    expect(new PageCursorSigner("test-cursor-secret-new", ["test-cursor-secret-old"]).open("payment_intents", cursor)).toBe(
      "pi_rotate",
    );
    expect(openError(new PageCursorSigner("test-cursor-secret-new"), cursor).code).toBe("invalid_cursor");
  });
});
