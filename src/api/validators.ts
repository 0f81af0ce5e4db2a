import type {
  ActionResultInput,
  BankReferenceDetails,
  CancelPaymentIntentInput,
  CardDetails,
  ConfirmPaymentIntentInput,
  CreatePaymentIntentInput,
  CreatePaymentMethodInput,
  LifecycleEventType,
  PaymentMethodType,
  PaymentStatus,
  ThreeDSecureSupport,
  WalletDetails,
  WebhookDeliveryStatus,
} from "../domain/types.js";
import { AppError, ValidationError } from "../infra/app-error.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function requireBody(payload: unknown): Record<string, unknown> {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  return payload;
}

function oneOf<TValue extends string>(allowed: readonly TValue[], value: unknown): TValue | undefined {
  return allowed.find((candidate) => candidate === value);
}

const PAYMENT_METHOD_TYPES: readonly PaymentMethodType[] = ["card", "bank_reference", "wallet"];
const THREE_DS_SUPPORT: readonly ThreeDSecureSupport[] = ["required", "optional", "not_supported"];
const PAYMENT_STATUSES: readonly PaymentStatus[] = [
  "created",
  "requires_action",
  "processing",
  "succeeded",
  "failed",
  "canceled",
];
export const LIFECYCLE_EVENT_TYPES: readonly LifecycleEventType[] = PAYMENT_STATUSES.map(
  (status): LifecycleEventType => `payment_intent.${status}`,
);
const DELIVERY_STATUSES: readonly WebhookDeliveryStatus[] = ["pending", "attempting", "delivered", "exhausted"];

// Raw instrument data belongs to the tokenizer, never to this service.
const RAW_CREDENTIAL_FIELDS = ["number", "card_number", "cvc", "cvv", "account_number", "iban"];

function findRawCredentialField(value: unknown, depth = 0): string | undefined {
  if (!isObject(value) || depth > 3) {
    return undefined;
  }
  for (const [key, nested] of Object.entries(value)) {
    if (RAW_CREDENTIAL_FIELDS.includes(key)) {
      return key;
    }
    const found = findRawCredentialField(nested, depth + 1);
    if (found) {
      return found;
    }
  }
  return undefined;
}

function countryCode(value: unknown, field: string): string {
  if (typeof value !== "string" || !/^[A-Za-z]{2}$/.test(value)) {
    throw new ValidationError("invalid_country", `${field} must be an ISO 3166-1 alpha-2 code.`, { field });
  }
  return value.toUpperCase();
}

function last4(value: unknown, field: string): string {
  if (typeof value !== "string" || !/^\d{4}$/.test(value)) {
    throw new ValidationError("invalid_last4", `${field} must be exactly four digits.`, { field });
  }
  return value;
}

function parseCard(value: unknown): CardDetails {
  if (!isObject(value)) {
    throw new ValidationError("invalid_payment_method", "card details are required for card payment methods.", {
      field: "card",
    });
  }
  const { brand, exp_month, exp_year } = value;
  if (!isString(brand) || brand.length > 32) {
    throw new ValidationError("invalid_payment_method", "card.brand must be a short non-empty string.", {
      field: "card.brand",
    });
  }
  if (typeof exp_month !== "number" || !Number.isInteger(exp_month) || exp_month < 1 || exp_month > 12) {
    throw new ValidationError("invalid_payment_method", "card.exp_month must be 1-12.", { field: "card.exp_month" });
  }
  if (typeof exp_year !== "number" || !Number.isInteger(exp_year) || exp_year < 2000 || exp_year > 2100) {
    throw new ValidationError("invalid_payment_method", "card.exp_year must be a four-digit year.", {
      field: "card.exp_year",
    });
  }
  const threeDSecure = value.three_d_secure === undefined ? "optional" : oneOf(THREE_DS_SUPPORT, value.three_d_secure);
  if (!threeDSecure) {
    throw new ValidationError(
      "invalid_payment_method",
      "card.three_d_secure must be one of: required, optional, not_supported.",
      { field: "card.three_d_secure" },
    );
  }
  return {
    brand,
    last4: last4(value.last4, "card.last4"),
    exp_month,
    exp_year,
    country: countryCode(value.country, "card.country"),
    three_d_secure: threeDSecure,
  };
}

function parseBankReference(value: unknown): BankReferenceDetails {
  if (!isObject(value) || !isString(value.bank_name)) {
    throw new ValidationError("invalid_payment_method", "bank_reference.bank_name is required.", {
      field: "bank_reference.bank_name",
    });
  }
  return {
    bank_name: value.bank_name,
    last4: last4(value.last4, "bank_reference.last4"),
    country: countryCode(value.country, "bank_reference.country"),
  };
}

function parseWallet(value: unknown): WalletDetails {
  if (!isObject(value) || !isString(value.provider)) {
    throw new ValidationError("invalid_payment_method", "wallet.provider is required.", { field: "wallet.provider" });
  }
  return { provider: value.provider, country: countryCode(value.country, "wallet.country") };
}

export function parseCreatePaymentMethodInput(payload: unknown): CreatePaymentMethodInput {
  const body = requireBody(payload);
  const rawField = findRawCredentialField(body);
  if (rawField) {
    throw new ValidationError(
      "raw_credentials_not_accepted",
      "Raw instrument data is not accepted; submit the tokenizer's token instead.",
      { field: rawField },
    );
  }

  const type = oneOf(PAYMENT_METHOD_TYPES, body.type);
  if (!type) {
    throw new ValidationError("invalid_payment_method", "type must be one of: card, bank_reference, wallet.", {
      field: "type",
    });
  }
  if (!isString(body.token) || body.token.length > 255) {
    throw new ValidationError("invalid_payment_method", "token must be a non-empty string up to 255 characters.", {
      field: "token",
    });
  }
  if (body.fingerprint !== undefined && (!isString(body.fingerprint) || body.fingerprint.length > 128)) {
    throw new ValidationError("invalid_payment_method", "fingerprint must be a non-empty string.", {
      field: "fingerprint",
    });
  }

  const input: CreatePaymentMethodInput = {
    type,
    token: body.token,
    ...(isString(body.fingerprint) ? { fingerprint: body.fingerprint } : {}),
  };
  switch (type) {
    case "card":
      return { ...input, card: parseCard(body.card) };
    case "bank_reference":
      return { ...input, bank_reference: parseBankReference(body.bank_reference) };
    case "wallet":
      return { ...input, wallet: parseWallet(body.wallet) };
  }
}

function parseMetadata(value: unknown): Record<string, string> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isObject(value)) {
    throw new ValidationError("invalid_metadata", "metadata must be an object of strings.", { field: "metadata" });
  }
  const metadata: Record<string, string> = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== "string") {
      throw new ValidationError("invalid_metadata", "metadata values must be strings.", { key });
    }
    metadata[key] = item;
  }
  return metadata;
}

export function parseCreatePaymentIntentInput(payload: unknown): CreatePaymentIntentInput {
  const body = requireBody(payload);
  const { amount, currency, payment_method } = body;

  if (typeof amount !== "number" || !Number.isInteger(amount) || amount <= 0) {
    throw new ValidationError("invalid_amount", "Amount must be an integer greater than zero.", { field: "amount" });
  }
  if (!isString(currency) || currency.length !== 3) {
    throw new ValidationError("invalid_currency", "Currency must be a 3-letter ISO code.", { field: "currency" });
  }
  if (payment_method !== undefined && payment_method !== null && !isString(payment_method)) {
    throw new ValidationError("invalid_payment_method", "payment_method must be a payment method id.", {
      field: "payment_method",
    });
  }
  const metadata = parseMetadata(body.metadata);
  return {
    amount,
    currency,
    ...(isString(payment_method) ? { payment_method } : {}),
    ...(metadata ? { metadata } : {}),
  };
}

function parseExpectedVersion(value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ValidationError("invalid_expected_version", "expected_version must be a positive integer.", {
      field: "expected_version",
    });
  }
  return value;
}

export function parseConfirmPaymentIntentInput(payload: unknown): ConfirmPaymentIntentInput {
  const body = requireBody(payload);
  if (body.payment_method !== undefined && !isString(body.payment_method)) {
    throw new ValidationError("invalid_payment_method", "payment_method must be a payment method id.", {
      field: "payment_method",
    });
  }
  return {
    expected_version: parseExpectedVersion(body.expected_version),
    ...(isString(body.payment_method) ? { payment_method: body.payment_method } : {}),
  };
}

export function parseCancelPaymentIntentInput(payload: unknown): CancelPaymentIntentInput {
  const body = requireBody(payload);
  return { expected_version: parseExpectedVersion(body.expected_version) };
}

export function parseActionResultInput(payload: unknown): ActionResultInput {
  const body = requireBody(payload);
  if (!isString(body.challenge_token) || body.challenge_token.length > 512) {
    throw new ValidationError("invalid_action_token", "challenge_token is required.", { field: "challenge_token" });
  }
  if (body.outcome !== "succeeded" && body.outcome !== "failed") {
    throw new ValidationError("invalid_action_outcome", "outcome must be succeeded or failed.", { field: "outcome" });
  }
  return { challenge_token: body.challenge_token, outcome: body.outcome };
}

function parseWebhookUrl(value: unknown): string {
  if (!isString(value)) {
    throw new ValidationError("invalid_webhook_url", "Webhook url is required.", { field: "url" });
  }
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ValidationError("invalid_webhook_url", "Webhook url must be an absolute URL.", { field: "url" });
  }
  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new ValidationError("invalid_webhook_url", "Webhook url must use http or https.", { field: "url" });
  }
  return parsed.toString();
}

function parseWebhookEvents(value: unknown): LifecycleEventType[] {
  if (!Array.isArray(value)) {
    throw new ValidationError("invalid_webhook_events", "Webhook events must be an array.", { field: "events" });
  }
  return value.map((eventType: unknown) => {
    const matched = oneOf(LIFECYCLE_EVENT_TYPES, eventType);
    if (!matched) {
      throw new ValidationError("invalid_webhook_events", `Unsupported webhook event '${String(eventType)}'.`, {
        field: "events",
      });
    }
    return matched;
  });
}

function parseSecret(value: unknown): string {
  if (!isString(value) || value.length < 16) {
    throw new ValidationError("invalid_webhook_secret", "Webhook secret must be at least 16 characters.", {
      field: "secret",
    });
  }
  return value;
}

export interface WebhookEndpointCreateBody {
  url: string;
  events?: LifecycleEventType[];
  secret?: string;
  enabled?: boolean;
}

export function parseCreateWebhookEndpointInput(payload: unknown): WebhookEndpointCreateBody {
  const body = requireBody(payload);
  if (body.enabled !== undefined && typeof body.enabled !== "boolean") {
    throw new ValidationError("invalid_webhook_enabled", "Webhook enabled must be boolean.", { field: "enabled" });
  }
  return {
    url: parseWebhookUrl(body.url),
    ...(body.events !== undefined ? { events: parseWebhookEvents(body.events) } : {}),
    ...(body.secret !== undefined ? { secret: parseSecret(body.secret) } : {}),
    ...(typeof body.enabled === "boolean" ? { enabled: body.enabled } : {}),
  };
}

export function parseUpdateWebhookEndpointInput(payload: unknown): {
  url?: string;
  events?: LifecycleEventType[];
  enabled?: boolean;
} {
  const body = requireBody(payload);
  if (body.url === undefined && body.events === undefined && body.enabled === undefined) {
    throw new ValidationError("invalid_webhook_update", "At least one of url, events, or enabled must be provided.");
  }
  if (body.enabled !== undefined && typeof body.enabled !== "boolean") {
    throw new ValidationError("invalid_webhook_enabled", "Webhook enabled must be boolean.", { field: "enabled" });
  }
  return {
    ...(body.url !== undefined ? { url: parseWebhookUrl(body.url) } : {}),
    ...(body.events !== undefined ? { events: parseWebhookEvents(body.events) } : {}),
    ...(typeof body.enabled === "boolean" ? { enabled: body.enabled } : {}),
  };
}

export function parseRotateWebhookSecretInput(payload: unknown): { secret?: string } {
  if (payload === undefined || payload === null) {
    return {};
  }
  const body = requireBody(payload);
  return body.secret !== undefined ? { secret: parseSecret(body.secret) } : {};
}

export function normalizeLimit(value: unknown, fallback: number, max: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ValidationError("invalid_limit", "limit must be a positive integer.", { field: "limit" });
  }
  return Math.min(parsed, max);
}

export function normalizeCursor(value: unknown): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ValidationError("invalid_cursor", "cursor must be a string.");
  }

  const cursor = value.trim();
  if (cursor.length === 0 || cursor.length > 512) {
    throw new ValidationError("invalid_cursor", "cursor length must be between 1 and 512 characters.");
  }
  if (!/^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/.test(cursor)) {
    throw new ValidationError("invalid_cursor", "cursor token format is invalid.");
  }

  return cursor;
}

function normalizeEnum<TValue extends string>(
  value: unknown,
  allowed: readonly TValue[],
  fieldName: string,
): TValue | undefined {
  if (value === undefined) {
    return undefined;
  }
  const matched = oneOf(allowed, typeof value === "string" ? value.trim() : value);
  if (!matched) {
    throw new ValidationError(`invalid_${fieldName}`, `${fieldName} must be one of: ${allowed.join(", ")}.`, {
      field: fieldName,
    });
  }
  return matched;
}

export function normalizePaymentStatus(value: unknown): PaymentStatus | undefined {
  return normalizeEnum(value, PAYMENT_STATUSES, "status");
}

export function normalizeEventType(value: unknown): LifecycleEventType | undefined {
  return normalizeEnum(value, LIFECYCLE_EVENT_TYPES, "type");
}

export function normalizeDeliveryStatus(value: unknown): WebhookDeliveryStatus | undefined {
  return normalizeEnum(value, DELIVERY_STATUSES, "status");
}

export function normalizeCurrencyCode(value: unknown): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" || !/^[A-Za-z]{3}$/.test(value.trim())) {
    throw new ValidationError("invalid_currency", "currency must be a 3-letter ISO code.", { field: "currency" });
  }
  return value.trim().toUpperCase();
}

export function normalizeIsoDateTime(value: unknown, fieldName: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ValidationError(`invalid_${fieldName}`, `${fieldName} must be a string.`);
  }
  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 64) {
    throw new ValidationError(`invalid_${fieldName}`, `${fieldName} length must be between 1 and 64 characters.`);
  }
  const timestamp = Date.parse(normalized);
  if (!Number.isFinite(timestamp)) {
    throw new ValidationError(`invalid_${fieldName}`, `${fieldName} must be a valid ISO-8601 date-time.`);
  }
  return new Date(timestamp).toISOString();
}

export function normalizeResourceId(value: unknown, fieldName: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ValidationError(`invalid_${fieldName}`, `${fieldName} must be a string.`);
  }

  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 255) {
    throw new ValidationError(`invalid_${fieldName}`, `${fieldName} length must be between 1 and 255 characters.`);
  }
  return normalized;
}
