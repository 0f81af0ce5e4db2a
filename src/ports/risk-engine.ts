import type { PaymentMethodRecord, RequestContext, RiskAssessmentSnapshot } from "../domain/types.js";

export interface RiskDraft {
  amount: number;
  currency: string;
  paymentMethod: PaymentMethodRecord | null;
}

export interface RiskEnginePort {
  assess(draft: RiskDraft, context: RequestContext): Promise<RiskAssessmentSnapshot>;
}
