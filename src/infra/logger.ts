import { pino, type Logger } from "pino";

export type { Logger } from "pino";

const REDACT_PATHS = [
  "headers.authorization",
  "secret",
  "*.secret",
  "challenge_token",
  "*.challenge_token",
  "next_action.challenge_token",
];

/**
 * JSON logger on stdout. Silent under Vitest or NODE_ENV=test so test output
 * stays readable; pipe through pino-pretty locally if needed.
 */
export function makeLogger(bindings: Record<string, unknown> = {}): Logger {
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const isTestTooling = process.env.VITEST === "true" || nodeEnv === "test";

  return pino({
    level: process.env.PIE_LOG_LEVEL ?? "info",
    enabled: !isTestTooling,
    base: { ...bindings, service: process.env.PIE_SERVICE_NAME ?? "payment-intent-engine" },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  });
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
