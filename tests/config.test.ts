import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AppError } from "../src/infra/app-error.js";
import { loadRuntimeConfig } from "../src/infra/config.js";

const originalEnv = { ...process.env };

function clearRuntimeEnv(): void {
  for (const name of Object.keys(process.env)) {
    if (name.startsWith("PIE_")) {
      delete process.env[name];
    }
  }
  delete process.env.HOST;
  delete process.env.PORT;
}

beforeEach(() => {
  clearRuntimeEnv();
});

afterEach(() => {
  process.env = { ...originalEnv };
});

describe("Runtime config", () => {
  it("loads defaults", () => {
    const config = loadRuntimeConfig();

    expect(config.host).toBe("0.0.0.0");
    expect(config.port).toBe(8080);
    expect(config.apiKeys).toEqual(["dev_pie_key"]);
    expect(config.cursorSecret).toBe("dev_cursor_secret_change_me");
    expect(config.cursorVerificationSecrets).toEqual(["dev_cursor_secret_change_me"]);
    expect(config.idempotencyKeyMaxLength).toBe(255);
    expect(config.idempotencyTtlSeconds).toBe(86400);
    expect(config.listDefaultLimit).toBe(25);
    expect(config.listMaxLimit).toBe(100);
    expect(config.eventSource).toBe("payment-intent-engine");
    expect(config.riskThresholds).toEqual({ challenge: 0.5, block: 0.8 });
    expect(config.riskThresholdOverrides).toEqual({});
    expect(config.riskRulesPath).toBeUndefined();
    expect(config.actionMaxDwellSeconds).toBe(900);
    expect(config.scaExemptionAmount).toBe(3000);
    expect(config.settlementTimeoutMs).toBe(15000);
    expect(config.maxProcessingSeconds).toBe(120);
    expect(config.webhookMaxAttempts).toBe(6);
    expect(config.webhookBaseDelayMs).toBe(30000);
    expect(config.webhookMaxDelayMs).toBe(21_600_000);
    expect(config.webhookJitterRatio).toBe(0.2);
    expect(config.webhookSender).toBe("http");
    expect(config.rateLimitCapacity).toBe(100);
    expect(config.rateLimitRefillPerSecond).toBe(25);
    expect(config.paymentBackend).toBe("memory");
    expect(config.idempotencyBackend).toBe("memory");
    expect(config.rateLimitBackend).toBe("memory");
    expect(config.velocityBackend).toBe("memory");
    expect(config.eventBusBackend).toBe("memory");
    expect(config.eventStreamKey).toBe("pie:events");
    expect(config.eventConsumerGroup).toBe("pie:webhook");
    expect(config.eventClaimIdleMs).toBe(30000);
  });

  it("rejects an out-of-range port", () => {
    process.env.PORT = "99999";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });

  it("rejects default secrets in production", () => {
    process.env.NODE_ENV = "production";
    expect(() => loadRuntimeConfig()).toThrowError(/PIE_API_KEYS/);

    process.env.PIE_API_KEYS = "prod_key_12345678";
    expect(() => loadRuntimeConfig()).toThrowError(/PIE_CURSOR_SECRETS/);

    process.env.PIE_CURSOR_SECRETS = "prod_cursor_secret_key_123";
    expect(loadRuntimeConfig().apiKeys).toEqual(["prod_key_12345678"]);
  });

  it("supports API key and cursor secret rotation lists", () => {
    process.env.PIE_API_KEYS = "new_key_12345678,old_key_12345678";
    process.env.PIE_CURSOR_SECRETS = "cursor_secret_new_123456,cursor_secret_old_123456";

    const config = loadRuntimeConfig();
    expect(config.apiKeys).toEqual(["new_key_12345678", "old_key_12345678"]);
    expect(config.cursorSecret).toBe("cursor_secret_new_123456");
    expect(config.cursorVerificationSecrets).toEqual(["cursor_secret_new_123456", "cursor_secret_old_123456"]);
  });

  it("rejects empty rotation lists", () => {
    process.env.PIE_API_KEYS = " , ";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });

  it("upper-cases supported currencies and rejects malformed codes", () => {
    process.env.PIE_SUPPORTED_CURRENCIES = "eur,usd";
    expect(loadRuntimeConfig().supportedCurrencies).toEqual(["EUR", "USD"]);

    process.env.PIE_SUPPORTED_CURRENCIES = "EURO";
    expect(() => loadRuntimeConfig()).toThrowError(/PIE_SUPPORTED_CURRENCIES/);
  });

  it("parses per-credential risk threshold overrides", () => {
    process.env.PIE_RISK_THRESHOLD_OVERRIDES = "cred_abc:0.3:0.6,cred_def:0.7:0.95";

    expect(loadRuntimeConfig().riskThresholdOverrides).toEqual({
      cred_abc: { challenge: 0.3, block: 0.6 },
      cred_def: { challenge: 0.7, block: 0.95 },
    });
  });

  it("rejects a challenge threshold above the block threshold", () => {
    process.env.PIE_RISK_CHALLENGE_THRESHOLD = "0.9";
    process.env.PIE_RISK_BLOCK_THRESHOLD = "0.6";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });

  it("rejects malformed threshold overrides", () => {
    process.env.PIE_RISK_THRESHOLD_OVERRIDES = "cred_abc:0.3";
    expect(() => loadRuntimeConfig()).toThrowError(/PIE_RISK_THRESHOLD_OVERRIDES/);
  });

  it("requires the processing budget to outlast the settlement timeout", () => {
    process.env.PIE_SETTLEMENT_TIMEOUT_MS = "20000";
    process.env.PIE_MAX_PROCESSING_SECONDS = "20";
    expect(() => loadRuntimeConfig()).toThrowError(/PIE_MAX_PROCESSING_SECONDS/);
  });

  it("rejects a webhook base delay above the max delay", () => {
    process.env.PIE_WEBHOOK_BASE_DELAY_MS = "60000";
    process.env.PIE_WEBHOOK_MAX_DELAY_MS = "1000";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });

  it("rejects unknown backend names", () => {
    process.env.PIE_VELOCITY_BACKEND = "memcached";
    expect(() => loadRuntimeConfig()).toThrowError(/PIE_VELOCITY_BACKEND/);
  });

  it("requires connection URLs for the backends that need them", () => {
    process.env.PIE_PAYMENT_BACKEND = "postgres";
    expect(() => loadRuntimeConfig()).toThrowError(/PIE_POSTGRES_URL/);

    process.env.PIE_PAYMENT_BACKEND = "memory";
    process.env.PIE_VELOCITY_BACKEND = "redis";
    expect(() => loadRuntimeConfig()).toThrowError(/PIE_REDIS_URL/);

    process.env.PIE_REDIS_URL = "redis://localhost:6379";
    expect(loadRuntimeConfig().redisUrl).toBe("redis://localhost:6379");
  });

  it("parses booleans and the webhook sender", () => {
    process.env.PIE_METRICS_ENABLED = "0";
    process.env.PIE_RATE_LIMIT_ENABLED = "false";
    process.env.PIE_WEBHOOK_SENDER = "memory";

    const config = loadRuntimeConfig();
    expect(config.metricsEnabled).toBe(false);
    expect(config.rateLimitEnabled).toBe(false);
    expect(config.webhookSender).toBe("memory");

    process.env.PIE_METRICS_ENABLED = "yes";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });
});
