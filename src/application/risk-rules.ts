import { readFileSync } from "node:fs";
import type { PaymentMethodType } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

export type RiskCondition =
  | { kind: "amount_at_least"; amount: number }
  | { kind: "velocity_at_least"; count: number; window_seconds: number }
  | { kind: "geo_mismatch" }
  | { kind: "method_reuse_at_least"; credentials: number; window_seconds: number }
  | { kind: "currency_in"; currencies: string[] }
  | { kind: "method_type_in"; types: PaymentMethodType[] };

export interface RiskRule {
  id: string;
  weight: number;
  condition: RiskCondition;
}

export const DEFAULT_RISK_RULES: readonly RiskRule[] = [
  { id: "high_amount", weight: 0.3, condition: { kind: "amount_at_least", amount: 500_000 } },
  { id: "very_high_amount", weight: 0.3, condition: { kind: "amount_at_least", amount: 2_000_000 } },
  {
    id: "instrument_velocity",
    weight: 0.5,
    condition: { kind: "velocity_at_least", count: 5, window_seconds: 600 },
  },
  { id: "geo_mismatch", weight: 0.3, condition: { kind: "geo_mismatch" } },
  {
    id: "instrument_shared_across_credentials",
    weight: 0.5,
    condition: { kind: "method_reuse_at_least", credentials: 3, window_seconds: 86_400 },
  },
];

const METHOD_TYPES: readonly PaymentMethodType[] = ["card", "bank_reference", "wallet"];

function invalidRules(message: string): AppError {
  return new AppError(500, "invalid_risk_rules", `Risk rules are invalid: ${message}.`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positiveInteger(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value <= 0) {
    throw invalidRules(`${field} must be a positive integer`);
  }
  return value;
}

function stringList(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw invalidRules(`${field} must be a non-empty array`);
  }
  return value.map((item) => {
    if (typeof item !== "string" || item.length === 0) {
      throw invalidRules(`${field} must contain non-empty strings`);
    }
    return item;
  });
}

function parseCondition(value: unknown, ruleId: string): RiskCondition {
  if (!isRecord(value)) {
    throw invalidRules(`rule '${ruleId}' condition must be an object`);
  }
  const field = (name: string): string => `rule '${ruleId}' ${name}`;
  switch (value.kind) {
    case "amount_at_least":
      return { kind: "amount_at_least", amount: positiveInteger(value.amount, field("amount")) };
    case "velocity_at_least":
      return {
        kind: "velocity_at_least",
        count: positiveInteger(value.count, field("count")),
        window_seconds: positiveInteger(value.window_seconds, field("window_seconds")),
      };
    case "geo_mismatch":
      return { kind: "geo_mismatch" };
    case "method_reuse_at_least":
      return {
        kind: "method_reuse_at_least",
        credentials: positiveInteger(value.credentials, field("credentials")),
        window_seconds: positiveInteger(value.window_seconds, field("window_seconds")),
      };
    case "currency_in":
      return {
        kind: "currency_in",
        currencies: stringList(value.currencies, field("currencies")).map((currency) => currency.toUpperCase()),
      };
    case "method_type_in":
      return {
        kind: "method_type_in",
        types: stringList(value.types, field("types")).map((type) => {
          const matched = METHOD_TYPES.find((candidate) => candidate === type);
          if (!matched) {
            throw invalidRules(`${field("types")} contains unknown type '${type}'`);
          }
          return matched;
        }),
      };
    default:
      throw invalidRules(`rule '${ruleId}' has unknown condition kind`);
  }
}

/** Validates a decoded rules document: `{ "rules": [{ id, weight, condition }] }`. */
export function parseRiskRules(document: unknown): RiskRule[] {
  if (!isRecord(document) || !Array.isArray(document.rules)) {
    throw invalidRules("document must be an object with a 'rules' array");
  }
  const seen = new Set<string>();
  return document.rules.map((entry: unknown, index) => {
    if (!isRecord(entry) || typeof entry.id !== "string" || entry.id.length === 0) {
      throw invalidRules(`rule #${index} must have a non-empty id`);
    }
    if (seen.has(entry.id)) {
      throw invalidRules(`rule id '${entry.id}' is duplicated`);
    }
    seen.add(entry.id);
    if (typeof entry.weight !== "number" || !(entry.weight >= 0 && entry.weight <= 1)) {
      throw invalidRules(`rule '${entry.id}' weight must be between 0 and 1`);
    }
    return { id: entry.id, weight: entry.weight, condition: parseCondition(entry.condition, entry.id) };
  });
}

export function loadRiskRulesFile(path: string): RiskRule[] {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw invalidRules(`cannot read '${path}' (${reason})`);
  }
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch {
    throw invalidRules(`'${path}' is not valid JSON`);
  }
  return parseRiskRules(document);
}
