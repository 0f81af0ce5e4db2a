import type { PaymentMethodRecord } from "../domain/types.js";

export interface SettlementInput {
  paymentIntentId: string;
  amount: number;
  currency: string;
  paymentMethod: PaymentMethodRecord;
}

export interface SettlementResult {
  ok: boolean;
  reference: string;
  failureCode?: string;
}

/**
 * The external act of moving funds. Declines come back as `ok: false`;
 * transport problems are thrown as DownstreamUnavailableError. Once called,
 * a settlement cannot be retracted.
 */
export interface SettlementGatewayPort {
  readonly name: string;
  settle(input: SettlementInput, signal: AbortSignal): Promise<SettlementResult>;
}
