import type {
  PaymentMethodRecord,
  RequestContext,
  RiskAssessmentSnapshot,
  RiskDecision,
  RiskThresholds,
} from "../domain/types.js";
import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type { MetricsRegistry } from "../infra/metrics.js";
import type { RiskDraft, RiskEnginePort } from "../ports/risk-engine.js";
import type { VelocityStorePort } from "../ports/velocity-store.js";
import type { RiskCondition, RiskRule } from "./risk-rules.js";

export interface RiskScorerOptions {
  thresholds: RiskThresholds;
  thresholdOverrides?: Record<string, RiskThresholds>;
}

export const SCORING_FAILURE_RULE = "scoring_failure";

function instrumentCountry(method: PaymentMethodRecord): string | null {
  return method.card?.country ?? method.bank_reference?.country ?? method.wallet?.country ?? null;
}

/** Observed signals a rule set is evaluated against. */
interface RiskSignals {
  velocityByWindow: Map<number, number>;
  reuseByWindow: Map<number, number>;
}

/**
 * Ordered rule evaluation: every triggered rule adds its weight, the sum is
 * clamped to [0, 1] and compared with the caller's thresholds. Velocity
 * counters are bumped once per assessment per distinct window.
 */
export class RiskScorer implements RiskEnginePort {
  constructor(
    private readonly rules: readonly RiskRule[],
    private readonly velocity: VelocityStorePort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly options: RiskScorerOptions,
    private readonly metrics?: MetricsRegistry,
  ) {}

  async assess(draft: RiskDraft, context: RequestContext): Promise<RiskAssessmentSnapshot> {
    const assessedAt = this.clock.nowIso();
    try {
      const signals = await this.collectSignals(draft, context);
      const triggered = this.rules.filter((rule) => this.matches(rule.condition, draft, context, signals));
      const rawScore = triggered.reduce((sum, rule) => sum + rule.weight, 0);
      const score = Math.round(Math.min(1, Math.max(0, rawScore)) * 10_000) / 10_000;
      const decision = this.decide(score, this.thresholdsFor(context.credentialId));
      this.metrics?.recordRiskDecision(decision);
      return {
        score,
        decision,
        triggered_rules: triggered.map((rule) => rule.id),
        assessed_at: assessedAt,
      };
    } catch (error) {
      this.logger.error(
        { err: error, credential_id: context.credentialId },
        "risk scoring failed, blocking the payment",
      );
      this.metrics?.recordRiskDecision("block");
      return { score: 1, decision: "block", triggered_rules: [SCORING_FAILURE_RULE], assessed_at: assessedAt };
    }
  }

  thresholdsFor(credentialId: string): RiskThresholds {
    return this.options.thresholdOverrides?.[credentialId] ?? this.options.thresholds;
  }

  private decide(score: number, thresholds: RiskThresholds): RiskDecision {
    if (score >= thresholds.block) {
      return "block";
    }
    if (score >= thresholds.challenge) {
      return "challenge";
    }
    return "allow";
  }

  private async collectSignals(draft: RiskDraft, context: RequestContext): Promise<RiskSignals> {
    const signals: RiskSignals = { velocityByWindow: new Map(), reuseByWindow: new Map() };
    const method = draft.paymentMethod;
    if (!method) {
      return signals;
    }

    const nowMs = this.clock.nowMs();
    for (const rule of this.rules) {
      const condition = rule.condition;
      if (condition.kind === "velocity_at_least" && !signals.velocityByWindow.has(condition.window_seconds)) {
        const windowMs = condition.window_seconds * 1000;
        const bucket = Math.floor(nowMs / windowMs);
        const count = await this.velocity.increment(
          `velocity:${method.fingerprint}:${condition.window_seconds}:${bucket}`,
          windowMs,
        );
        signals.velocityByWindow.set(condition.window_seconds, count);
      }
      if (condition.kind === "method_reuse_at_least" && !signals.reuseByWindow.has(condition.window_seconds)) {
        const windowMs = condition.window_seconds * 1000;
        const bucket = Math.floor(nowMs / windowMs);
        const distinct = await this.velocity.addDistinct(
          `reuse:${method.fingerprint}:${condition.window_seconds}:${bucket}`,
          context.credentialId,
          windowMs,
        );
        signals.reuseByWindow.set(condition.window_seconds, distinct);
      }
    }
    return signals;
  }

  private matches(condition: RiskCondition, draft: RiskDraft, context: RequestContext, signals: RiskSignals): boolean {
    const method = draft.paymentMethod;
    switch (condition.kind) {
      case "amount_at_least":
        return draft.amount >= condition.amount;
      case "currency_in":
        return condition.currencies.includes(draft.currency);
      case "velocity_at_least":
        return (signals.velocityByWindow.get(condition.window_seconds) ?? 0) >= condition.count;
      case "method_reuse_at_least":
        return (signals.reuseByWindow.get(condition.window_seconds) ?? 0) >= condition.credentials;
      case "method_type_in":
        return method !== null && condition.types.includes(method.type);
      case "geo_mismatch": {
        if (!method || !context.ipCountry) {
          return false;
        }
        const country = instrumentCountry(method);
        return country !== null && country.toUpperCase() !== context.ipCountry.toUpperCase();
      }
    }
  }
}
