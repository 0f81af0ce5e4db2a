import { createHash, createHmac, timingSafeEqual } from "node:crypto";
import { ValidationError } from "./app-error.js";

/** Each paginated listing gets its own cursor namespace. */
export type CursorListing = "payment_intents" | "events" | "webhook_endpoints" | "webhook_deliveries";

const POSITION_PATTERN = /^[A-Za-z0-9._:-]+$/;

interface SealedCursor {
  /** listing */
  l: CursorListing;
  /** position: the id of the last record on the previous page */
  p: string;
  /** key id of the signing secret */
  k: string;
}

function keyId(secret: string): string {
  return createHash("sha256").update(secret).digest("base64url").slice(0, 8);
}

function readSealed(encoded: string): SealedCursor | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(encoded, "base64url").toString("utf8"));
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null) {
    return null;
  }
  const candidate: { l?: unknown; p?: unknown; k?: unknown } = parsed;
  const { l, p, k } = candidate;
  if (
    (l === "payment_intents" || l === "events" || l === "webhook_endpoints" || l === "webhook_deliveries")
    && typeof p === "string"
    && typeof k === "string"
  ) {
    return { l, p, k };
  }
  return null;
}

/**
 * Seals repository positions into opaque `payload.signature` cursors. A cursor
 * only opens on the listing that issued it; secrets listed for verification
 * keep older cursors valid through a rotation.
 */
export class PageCursorSigner {
  private readonly secretsByKeyId = new Map<string, string>();
  private readonly signingKeyId: string;

  constructor(
    private readonly signingSecret: string,
    verificationSecrets: readonly string[] = [],
  ) {
    this.signingKeyId = keyId(signingSecret);
    for (const secret of [signingSecret, ...verificationSecrets]) {
      this.secretsByKeyId.set(keyId(secret), secret);
    }
  }

  seal(listing: CursorListing, position: string): string {
    if (!POSITION_PATTERN.test(position)) {
      throw new ValidationError("invalid_cursor", "cursor position contains invalid characters.");
    }
    const sealed: SealedCursor = { l: listing, p: position, k: this.signingKeyId };
    const encoded = Buffer.from(JSON.stringify(sealed), "utf8").toString("base64url");
    return `${encoded}.${this.mac(encoded, this.signingSecret)}`;
  }

  open(listing: CursorListing, cursor: string): string {
    const [encoded, signature, ...extra] = cursor.split(".");
    if (!encoded || !signature || extra.length > 0) {
      throw new ValidationError("invalid_cursor", "cursor token format is invalid.");
    }
    const sealed = readSealed(encoded);
    const secret = sealed ? this.secretsByKeyId.get(sealed.k) : undefined;
    if (!sealed || !secret || !this.signatureMatches(encoded, signature, secret)) {
      throw new ValidationError("invalid_cursor", "cursor token signature is invalid.");
    }
    if (sealed.l !== listing) {
      throw new ValidationError("invalid_cursor", `cursor was issued for ${sealed.l}, not ${listing}.`);
    }
    if (!POSITION_PATTERN.test(sealed.p)) {
      throw new ValidationError("invalid_cursor", "cursor token payload is invalid.");
    }
    return sealed.p;
  }

  private signatureMatches(encoded: string, signature: string, secret: string): boolean {
    const expected = Buffer.from(this.mac(encoded, secret), "utf8");
    const provided = Buffer.from(signature, "utf8");
    return expected.length === provided.length && timingSafeEqual(expected, provided);
  }

  private mac(encoded: string, secret: string): string {
    return createHmac("sha256", secret).update(encoded).digest("base64url");
  }
}
