import type {
  CardDetails,
  LifecycleEvent,
  PaymentIntentResponse,
  PaymentMethodRecord,
} from "../../src/domain/types.js";

export function cardMethod(
  card: Partial<CardDetails> = {},
  overrides: Partial<PaymentMethodRecord> = {},
): PaymentMethodRecord {
  return {
    id: "pm_test_card",
    type: "card",
    token: "tok_test_visa",
    fingerprint: "fp_test_card",
    card: {
      brand: "visa",
      last4: "4242",
      exp_month: 12,
      exp_year: 2030,
      country: "DE",
      three_d_secure: "optional",
      ...card,
    },
    bank_reference: null,
    wallet: null,
    created_at: "2026-10-01T09:00:00.000Z",
    ...overrides,
  };
}

export function walletMethod(country = "US"): PaymentMethodRecord {
  return {
    id: "pm_test_wallet",
    type: "wallet",
    token: "tok_test_wallet",
    fingerprint: "fp_test_wallet",
    card: null,
    bank_reference: null,
    wallet: { provider: "examplepay", country },
    created_at: "2026-10-01T09:00:00.000Z",
  };
}

export function lifecycleEvent(overrides: Partial<LifecycleEvent> = {}): LifecycleEvent {
  const object: PaymentIntentResponse = {
    id: "pi_test_1",
    object: "payment_intent",
    amount: 1_000,
    currency: "EUR",
    status: "created",
    payment_method: null,
    risk_assessment: { score: 0, decision: "allow", triggered_rules: [], assessed_at: "2026-10-01T09:59:00.000Z" },
    metadata: {},
    version: 1,
    failure_reason: null,
    next_action: null,
    settlement_reference: null,
    created_at: "2026-10-01T09:59:00.000Z",
    updated_at: "2026-10-01T09:59:00.000Z",
  };
  return {
    id: "evt_test_1",
    type: "payment_intent.created",
    payment_intent_id: "pi_test_1",
    sequence: 1,
    status: "created",
    api_version: "2026-10-01",
    source: "payment-intent-engine-test",
    event_version: "1.0.0",
    occurred_at: "2026-10-01T09:59:00.000Z",
    data: { object, previous_status: null },
    ...overrides,
  };
}
