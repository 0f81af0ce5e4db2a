import { randomBytes } from "node:crypto";
import { SCA_REGION_COUNTRIES } from "../domain/currency.js";
import type { ChallengeDescriptor, PaymentMethodRecord, RiskDecision } from "../domain/types.js";
import { addSeconds, type ClockPort } from "../infra/clock.js";

export interface ActionResolverOptions {
  /** Amounts (minor units) at or below this are exempt from region-mandated SCA. */
  exemptionAmount: number;
  maxDwellSeconds: number;
  redirectBaseUrl: string;
}

export interface ActionResolutionInput {
  paymentIntentId: string;
  paymentMethod: PaymentMethodRecord;
  amount: number;
  currency: string;
  riskDecision: RiskDecision;
}

export type ActionResolution =
  | { required: false }
  | { required: true; reason: ActionReason; challenge: ChallengeDescriptor };

export type ActionReason = "issuer_required" | "sca_region" | "risk_challenge";

/**
 * Decides whether a confirmation needs strong customer authentication and,
 * when it does, issues a fresh one-time challenge. Holds no state.
 */
export class ActionResolver {
  constructor(
    private readonly clock: ClockPort,
    private readonly options: ActionResolverOptions,
  ) {}

  resolve(input: ActionResolutionInput): ActionResolution {
    const reason = this.reasonFor(input);
    if (!reason) {
      return { required: false };
    }
    return { required: true, reason, challenge: this.issueChallenge(input.paymentIntentId) };
  }

  private reasonFor(input: ActionResolutionInput): ActionReason | null {
    const card = input.paymentMethod.card;
    // Bank references and wallets authenticate the payer outside this flow.
    if (input.paymentMethod.type !== "card" || !card) {
      return null;
    }
    if (card.three_d_secure === "required") {
      return "issuer_required";
    }
    if (card.three_d_secure === "not_supported") {
      return null;
    }
    if (SCA_REGION_COUNTRIES.has(card.country.toUpperCase()) && input.amount > this.options.exemptionAmount) {
      return "sca_region";
    }
    if (input.riskDecision === "challenge") {
      return "risk_challenge";
    }
    return null;
  }

  private issueChallenge(paymentIntentId: string): ChallengeDescriptor {
    const token = randomBytes(32).toString("base64url");
    const redirect = new URL(this.options.redirectBaseUrl);
    redirect.searchParams.set("payment_intent", paymentIntentId);
    redirect.searchParams.set("challenge_token", token);
    return {
      type: "three_d_secure_redirect",
      challenge_token: token,
      redirect_url: redirect.toString(),
      expires_at: addSeconds(this.clock.nowIso(), this.options.maxDwellSeconds),
    };
  }
}
