import { ValidationError } from "../infra/app-error.js";
import { METADATA_LIMITS } from "./currency.js";

export function assertAmount(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new ValidationError("invalid_amount", "amount must be a positive integer in minor units.", {
      field: "amount",
    });
  }
}

export function normalizeSupportedCurrency(currency: string, supported: ReadonlySet<string>): string {
  const normalized = currency.trim().toUpperCase();
  if (!supported.has(normalized)) {
    throw new ValidationError("unsupported_currency", `Currency '${currency}' is not supported.`, {
      field: "currency",
    });
  }
  return normalized;
}

/** Metadata is opaque to the engine; only its size is bounded. */
export function assertMetadata(metadata: Record<string, string>): void {
  const entries = Object.entries(metadata);
  if (entries.length > METADATA_LIMITS.maxKeys) {
    throw new ValidationError("invalid_metadata", `metadata supports at most ${METADATA_LIMITS.maxKeys} keys.`);
  }
  for (const [key, value] of entries) {
    if (key.length === 0 || key.length > METADATA_LIMITS.maxKeyLength) {
      throw new ValidationError(
        "invalid_metadata",
        `metadata keys must be 1-${METADATA_LIMITS.maxKeyLength} characters.`,
        { key },
      );
    }
    if (typeof value !== "string" || value.length > METADATA_LIMITS.maxValueLength) {
      throw new ValidationError(
        "invalid_metadata",
        `metadata values must be strings of at most ${METADATA_LIMITS.maxValueLength} characters.`,
        { key },
      );
    }
  }
}
