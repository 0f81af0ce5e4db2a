import { DEFAULT_SUPPORTED_CURRENCIES } from "../domain/currency.js";
import type { RiskThresholds } from "../domain/types.js";
import { AppError } from "./app-error.js";

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseNumberEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(parsed)) {
    throw invalidConfig(name, "must be a number");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseStringListEnv(name: string, minItemLength: number, maxItems: number): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  if (items.length > maxItems) {
    throw invalidConfig(name, `must contain at most ${maxItems} values`);
  }
  for (const item of items) {
    if (item.length < minItemLength) {
      throw invalidConfig(name, `items must contain at least ${minItemLength} characters`);
    }
  }

  return [...new Set(items)];
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  const matched = allowedValues.find((value) => value === normalized);
  if (matched === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return matched;
}

function assertThresholds(name: string, thresholds: RiskThresholds): RiskThresholds {
  if (
    !(thresholds.challenge >= 0 && thresholds.challenge <= 1)
    || !(thresholds.block >= 0 && thresholds.block <= 1)
  ) {
    throw invalidConfig(name, "thresholds must be between 0 and 1");
  }
  if (thresholds.challenge > thresholds.block) {
    throw invalidConfig(name, "challenge threshold must be lower or equal to block threshold");
  }
  return thresholds;
}

// Format: "cred_abc:0.3:0.6,cred_def:0.7:0.95"
function parseThresholdOverridesEnv(name: string): Record<string, RiskThresholds> {
  const entries = parseStringListEnv(name, 5, 1000) ?? [];
  const overrides: Record<string, RiskThresholds> = {};
  for (const entry of entries) {
    const [credentialId, challenge, block, ...rest] = entry.split(":");
    if (!credentialId || challenge === undefined || block === undefined || rest.length > 0) {
      throw invalidConfig(name, "entries must look like '<credential_id>:<challenge>:<block>'");
    }
    overrides[credentialId] = assertThresholds(name, {
      challenge: Number(challenge),
      block: Number(block),
    });
  }
  return overrides;
}

export interface RuntimeConfig {
  host: string;
  port: number;
  apiKeys: string[];
  cursorSecret: string;
  cursorVerificationSecrets: string[];
  idempotencyKeyMaxLength: number;
  idempotencyTtlSeconds: number;
  listDefaultLimit: number;
  listMaxLimit: number;
  eventApiVersion: string;
  eventSource: string;
  eventSchemaVersion: string;
  supportedCurrencies: string[];
  riskThresholds: RiskThresholds;
  riskThresholdOverrides: Record<string, RiskThresholds>;
  riskRulesPath?: string;
  actionMaxDwellSeconds: number;
  actionRedirectBaseUrl: string;
  scaExemptionAmount: number;
  settlementTimeoutMs: number;
  maxProcessingSeconds: number;
  sweeperIntervalMs: number;
  webhookMaxAttempts: number;
  webhookTimeoutMs: number;
  webhookBaseDelayMs: number;
  webhookMaxDelayMs: number;
  webhookJitterRatio: number;
  webhookRetentionSeconds: number;
  webhookPollIntervalMs: number;
  webhookConcurrency: number;
  webhookSender: "http" | "memory";
  metricsEnabled: boolean;
  rateLimitEnabled: boolean;
  rateLimitCapacity: number;
  rateLimitRefillPerSecond: number;
  paymentBackend: "memory" | "postgres";
  idempotencyBackend: "memory" | "postgres";
  rateLimitBackend: "memory" | "redis";
  velocityBackend: "memory" | "redis";
  eventBusBackend: "memory" | "durable";
  postgresUrl?: string;
  redisUrl?: string;
  redisKeyPrefix: string;
  eventStreamKey: string;
  eventConsumerGroup: string;
  eventConsumerName: string;
  eventConsumerBlockMs: number;
  eventConsumerBatchSize: number;
  /** Pending stream entries idle this long are reclaimed and retried. */
  eventClaimIdleMs: number;
}

const DEFAULT_API_KEY = "dev_pie_key";
const DEFAULT_CURSOR_SECRET = "dev_cursor_secret_change_me";

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const apiKeys = parseStringListEnv("PIE_API_KEYS", 8, 100) ?? [DEFAULT_API_KEY];
  const configuredCursorSecrets = parseStringListEnv("PIE_CURSOR_SECRETS", 16, 10);
  const cursorSecret = configuredCursorSecrets?.[0] ?? DEFAULT_CURSOR_SECRET;
  const cursorVerificationSecrets = configuredCursorSecrets ?? [cursorSecret];
  const idempotencyKeyMaxLength = parseIntegerEnv("PIE_IDEMPOTENCY_KEY_MAX_LENGTH", 255, 16, 1024);
  const idempotencyTtlSeconds = parseIntegerEnv("PIE_IDEMPOTENCY_TTL_SECONDS", 86400, 1, 2_592_000);
  const listDefaultLimit = parseIntegerEnv("PIE_LIST_DEFAULT_LIMIT", 25, 1, 1000);
  const listMaxLimit = parseIntegerEnv("PIE_LIST_MAX_LIMIT", 100, 1, 5000);
  const eventApiVersion = parseStringEnv("PIE_EVENT_API_VERSION", "2026-10-01", 3);
  const eventSource = parseStringEnv("PIE_EVENT_SOURCE", "payment-intent-engine", 3);
  const eventSchemaVersion = parseStringEnv("PIE_EVENT_SCHEMA_VERSION", "1.0.0", 3);
  const supportedCurrencies = (
    parseStringListEnv("PIE_SUPPORTED_CURRENCIES", 3, 200) ?? [...DEFAULT_SUPPORTED_CURRENCIES]
  ).map((currency) => currency.toUpperCase());
  for (const currency of supportedCurrencies) {
    if (!/^[A-Z]{3}$/.test(currency)) {
      throw invalidConfig("PIE_SUPPORTED_CURRENCIES", "must contain three-letter ISO 4217 codes");
    }
  }
  const riskThresholds = assertThresholds("PIE_RISK_CHALLENGE_THRESHOLD", {
    challenge: parseNumberEnv("PIE_RISK_CHALLENGE_THRESHOLD", 0.5, 0, 1),
    block: parseNumberEnv("PIE_RISK_BLOCK_THRESHOLD", 0.8, 0, 1),
  });
  const riskThresholdOverrides = parseThresholdOverridesEnv("PIE_RISK_THRESHOLD_OVERRIDES");
  const riskRulesPath = parseOptionalStringEnv("PIE_RISK_RULES_PATH", 1);
  const actionMaxDwellSeconds = parseIntegerEnv("PIE_ACTION_MAX_DWELL_SECONDS", 900, 30, 86400);
  const actionRedirectBaseUrl = parseStringEnv(
    "PIE_ACTION_REDIRECT_BASE_URL",
    "https://authenticate.localhost/3ds",
    8,
  );
  const scaExemptionAmount = parseIntegerEnv("PIE_SCA_EXEMPTION_AMOUNT", 3000, 0, 1_000_000_000);
  const settlementTimeoutMs = parseIntegerEnv("PIE_SETTLEMENT_TIMEOUT_MS", 15000, 100, 300_000);
  const maxProcessingSeconds = parseIntegerEnv("PIE_MAX_PROCESSING_SECONDS", 120, 1, 86400);
  const sweeperIntervalMs = parseIntegerEnv("PIE_SWEEPER_INTERVAL_MS", 30000, 100, 3_600_000);
  const webhookMaxAttempts = parseIntegerEnv("PIE_WEBHOOK_MAX_ATTEMPTS", 6, 1, 20);
  const webhookTimeoutMs = parseIntegerEnv("PIE_WEBHOOK_TIMEOUT_MS", 10000, 100, 120000);
  const webhookBaseDelayMs = parseIntegerEnv("PIE_WEBHOOK_BASE_DELAY_MS", 30000, 10, 3_600_000);
  const webhookMaxDelayMs = parseIntegerEnv("PIE_WEBHOOK_MAX_DELAY_MS", 21_600_000, 10, 86_400_000);
  const webhookJitterRatio = parseNumberEnv("PIE_WEBHOOK_JITTER_RATIO", 0.2, 0, 1);
  const webhookRetentionSeconds = parseIntegerEnv("PIE_WEBHOOK_RETENTION_SECONDS", 2_592_000, 60, 31_536_000);
  const webhookPollIntervalMs = parseIntegerEnv("PIE_WEBHOOK_POLL_INTERVAL_MS", 1000, 10, 60000);
  const webhookConcurrency = parseIntegerEnv("PIE_WEBHOOK_CONCURRENCY", 16, 1, 512);
  const webhookSender = parseEnumEnv("PIE_WEBHOOK_SENDER", ["http", "memory"] as const, "http");
  const metricsEnabled = parseBooleanEnv("PIE_METRICS_ENABLED", true);
  const rateLimitEnabled = parseBooleanEnv("PIE_RATE_LIMIT_ENABLED", true);
  const rateLimitCapacity = parseIntegerEnv("PIE_RATE_LIMIT_CAPACITY", 100, 1, 1_000_000);
  const rateLimitRefillPerSecond = parseNumberEnv("PIE_RATE_LIMIT_REFILL_PER_SECOND", 25, 0.001, 1_000_000);
  const paymentBackend = parseEnumEnv("PIE_PAYMENT_BACKEND", ["memory", "postgres"] as const, "memory");
  const idempotencyBackend = parseEnumEnv(
    "PIE_IDEMPOTENCY_BACKEND",
    ["memory", "postgres"] as const,
    "memory",
  );
  const rateLimitBackend = parseEnumEnv("PIE_RATE_LIMIT_BACKEND", ["memory", "redis"] as const, "memory");
  const velocityBackend = parseEnumEnv("PIE_VELOCITY_BACKEND", ["memory", "redis"] as const, "memory");
  const eventBusBackend = parseEnumEnv("PIE_EVENT_BUS_BACKEND", ["memory", "durable"] as const, "memory");
  const postgresUrl = parseOptionalStringEnv("PIE_POSTGRES_URL", 12);
  const redisUrl = parseOptionalStringEnv("PIE_REDIS_URL", 8);
  const redisKeyPrefix = parseStringEnv("PIE_REDIS_KEY_PREFIX", "pie", 2);
  const eventStreamKey = parseStringEnv("PIE_EVENT_STREAM_KEY", "pie:events", 3);
  const eventConsumerGroup = parseStringEnv("PIE_EVENT_CONSUMER_GROUP", "pie:webhook", 3);
  const eventConsumerName = parseStringEnv("PIE_EVENT_CONSUMER_NAME", `pie-${process.pid}`, 3);
  const eventConsumerBlockMs = parseIntegerEnv("PIE_EVENT_CONSUMER_BLOCK_MS", 1000, 10, 60000);
  const eventConsumerBatchSize = parseIntegerEnv("PIE_EVENT_CONSUMER_BATCH_SIZE", 20, 1, 1000);
  const eventClaimIdleMs = parseIntegerEnv("PIE_EVENT_CLAIM_IDLE_MS", 30000, 1000, 3_600_000);

  if (process.env.NODE_ENV === "production" && apiKeys.includes(DEFAULT_API_KEY)) {
    throw invalidConfig("PIE_API_KEYS", "must not include default key value in production");
  }
  if (process.env.NODE_ENV === "production" && cursorSecret === DEFAULT_CURSOR_SECRET) {
    throw invalidConfig("PIE_CURSOR_SECRETS", "must not use default value in production");
  }
  if (listDefaultLimit > listMaxLimit) {
    throw invalidConfig("PIE_LIST_DEFAULT_LIMIT", "must be lower or equal to PIE_LIST_MAX_LIMIT");
  }
  if (webhookBaseDelayMs > webhookMaxDelayMs) {
    throw invalidConfig("PIE_WEBHOOK_BASE_DELAY_MS", "must be lower or equal to PIE_WEBHOOK_MAX_DELAY_MS");
  }
  // A processing intent must not be swept while its settlement call may still answer.
  if (maxProcessingSeconds * 1000 <= settlementTimeoutMs) {
    throw invalidConfig("PIE_MAX_PROCESSING_SECONDS", "must exceed PIE_SETTLEMENT_TIMEOUT_MS");
  }
  if (
    (paymentBackend === "postgres" || idempotencyBackend === "postgres" || eventBusBackend === "durable")
    && !postgresUrl
  ) {
    throw invalidConfig("PIE_POSTGRES_URL", "is required when postgres-backed runtime features are enabled");
  }
  if (
    (rateLimitBackend === "redis" || velocityBackend === "redis" || eventBusBackend === "durable")
    && !redisUrl
  ) {
    throw invalidConfig("PIE_REDIS_URL", "is required when redis-backed runtime features are enabled");
  }

  return {
    host,
    port,
    apiKeys,
    cursorSecret,
    cursorVerificationSecrets,
    idempotencyKeyMaxLength,
    idempotencyTtlSeconds,
    listDefaultLimit,
    listMaxLimit,
    eventApiVersion,
    eventSource,
    eventSchemaVersion,
    supportedCurrencies,
    riskThresholds,
    riskThresholdOverrides,
    actionMaxDwellSeconds,
    actionRedirectBaseUrl,
    scaExemptionAmount,
    settlementTimeoutMs,
    maxProcessingSeconds,
    sweeperIntervalMs,
    webhookMaxAttempts,
    webhookTimeoutMs,
    webhookBaseDelayMs,
    webhookMaxDelayMs,
    webhookJitterRatio,
    webhookRetentionSeconds,
    webhookPollIntervalMs,
    webhookConcurrency,
    webhookSender,
    metricsEnabled,
    rateLimitEnabled,
    rateLimitCapacity,
    rateLimitRefillPerSecond,
    paymentBackend,
    idempotencyBackend,
    rateLimitBackend,
    velocityBackend,
    eventBusBackend,
    redisKeyPrefix,
    eventStreamKey,
    eventConsumerGroup,
    eventConsumerName,
    eventConsumerBlockMs,
    eventConsumerBatchSize,
    eventClaimIdleMs,
    ...(riskRulesPath ? { riskRulesPath } : {}),
    ...(postgresUrl ? { postgresUrl } : {}),
    ...(redisUrl ? { redisUrl } : {}),
  };
}
