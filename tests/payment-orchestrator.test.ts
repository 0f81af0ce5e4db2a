import { describe, expect, it } from "vitest";
import { InMemoryEventBus } from "../src/adapters/inmemory/event-bus.js";
import { InMemoryIdempotencyStore } from "../src/adapters/inmemory/idempotency-store.js";
import { InMemoryPaymentRepository } from "../src/adapters/inmemory/payment-repository.js";
import { InMemoryVelocityStore } from "../src/adapters/inmemory/velocity-store.js";
import { MockSettlementGateway } from "../src/adapters/providers/mock-settlement.js";
import { ActionResolver } from "../src/application/action-resolver.js";
import { IntentSweeper } from "../src/application/intent-sweeper.js";
import { PaymentOrchestrator } from "../src/application/payment-orchestrator.js";
import { DEFAULT_RISK_RULES } from "../src/application/risk-rules.js";
import { RiskScorer } from "../src/application/risk-scorer.js";
import type { CardDetails, PaymentIntentResponse, RequestContext, RiskThresholds } from "../src/domain/types.js";
import { makeNoopLogger } from "../src/infra/logger.js";
import { MetricsRegistry } from "../src/infra/metrics.js";
import type { SettlementGatewayPort } from "../src/ports/settlement-gateway.js";
import { DeferredSettlement, HoldingSettlement } from "./support/deferred-settlement.js";
import { captureAppError } from "./support/errors.js";
import { ManualClock } from "./support/manual-clock.js";

const CONTEXT: RequestContext = { credentialId: "cred_merchant_a" };

interface HarnessOptions {
  settlement?: SettlementGatewayPort;
  settlementTimeoutMs?: number;
  thresholds?: RiskThresholds;
}

function buildHarness(options: HarnessOptions = {}) {
  const clock = new ManualClock();
  const logger = makeNoopLogger();
  const repository = new InMemoryPaymentRepository();
  const eventBus = new InMemoryEventBus(logger);
  const metrics = new MetricsRegistry();
  const idempotencyStore = new InMemoryIdempotencyStore<PaymentIntentResponse>({ clock });
  const orchestrator = new PaymentOrchestrator(
    {
      repository,
      idempotencyStore,
      eventBus,
      riskEngine: new RiskScorer(
        DEFAULT_RISK_RULES,
        new InMemoryVelocityStore(4, clock),
        clock,
        logger,
        { thresholds: options.thresholds ?? { challenge: 0.5, block: 0.85 } },
        metrics,
      ),
      actionResolver: new ActionResolver(clock, {
        exemptionAmount: 3_000,
        maxDwellSeconds: 900,
        redirectBaseUrl: "https://authenticate.localhost/3ds",
      }),
      settlement: options.settlement ?? new MockSettlementGateway(),
      clock,
      logger,
      metrics,
    },
    {
      eventApiVersion: "2026-10-01",
      eventSource: "payment-intent-engine-test",
      eventSchemaVersion: "1.0.0",
      supportedCurrencies: ["EUR", "USD"],
      settlementTimeoutMs: options.settlementTimeoutMs ?? 1_000,
      maxProcessingSeconds: 120,
    },
  );
  return { clock, repository, eventBus, metrics, idempotencyStore, orchestrator };
}

type Harness = ReturnType<typeof buildHarness>;

async function createCard(harness: Harness, card: Partial<CardDetails> = {}, token = "tok_test_visa") {
  return harness.orchestrator.createPaymentMethod({
    type: "card",
    token,
    card: {
      brand: "visa",
      last4: "4242",
      exp_month: 12,
      exp_year: 2030,
      country: "US",
      three_d_secure: "optional",
      ...card,
    },
  });
}

async function createIntent(harness: Harness, paymentMethod?: string, amount = 1_000) {
  const result = await harness.orchestrator.createPaymentIntent(
    { amount, currency: "usd", ...(paymentMethod ? { payment_method: paymentMethod } : {}) },
    CONTEXT,
  );
  return result.body;
}

async function parkForAction(harness: Harness) {
  const method = await createCard(harness, { country: "DE" });
  const intent = await createIntent(harness, method.id, 5_000);
  const parked = await harness.orchestrator.confirmPaymentIntent(intent.id, { expected_version: 1 }, CONTEXT);
  if (!parked.next_action) {
    throw new Error("expected the confirmation to require action");
  }
  return { intent: parked, token: parked.next_action.challenge_token };
}

describe("PaymentOrchestrator lifecycle", () => {
  it("creates, confirms and settles a payment intent with ordered events", async () => {
    const harness = buildHarness();
    const method = await createCard(harness);
    const created = await createIntent(harness, method.id);

    expect(created).toMatchObject({
      object: "payment_intent",
      status: "created",
      amount: 1_000,
      currency: "USD",
      payment_method: method.id,
      version: 1,
      failure_reason: null,
      metadata: {},
    });

    const confirmed = await harness.orchestrator.confirmPaymentIntent(created.id, { expected_version: 1 }, CONTEXT);
    expect(confirmed.status).toBe("succeeded");
    expect(confirmed.version).toBe(3);
    expect(confirmed.settlement_reference).toMatch(/^mock_settlement_/);

    const events = await harness.orchestrator.listIntentEvents(created.id);
    expect(events.map((event) => [event.sequence, event.type, event.data.previous_status])).toEqual([
      [1, "payment_intent.created", null],
      [2, "payment_intent.processing", "created"],
      [3, "payment_intent.succeeded", "processing"],
    ]);
    expect(events[0]).toMatchObject({
      api_version: "2026-10-01",
      source: "payment-intent-engine-test",
      event_version: "1.0.0",
      occurred_at: "2026-10-01T10:00:00.000Z",
    });
    expect(harness.eventBus.getPublishedEvents().map((event) => event.id)).toEqual(events.map((event) => event.id));
    expect(harness.metrics.renderPrometheus()).toContain(
      'pie_lifecycle_events_total{event_type="payment_intent.succeeded"} 1\n',
    );
  });

  it("validates amount and currency before touching state", async () => {
    const harness = buildHarness();

    const amountError = await captureAppError(
      harness.orchestrator.createPaymentIntent({ amount: 0, currency: "USD" }, CONTEXT),
    );
    const currencyError = await captureAppError(
      harness.orchestrator.createPaymentIntent({ amount: 100, currency: "XYZ" }, CONTEXT),
    );

    expect([amountError.statusCode, amountError.code]).toEqual([422, "invalid_amount"]);
    expect([currencyError.statusCode, currencyError.code]).toEqual([422, "unsupported_currency"]);
    expect(harness.eventBus.getPublishedEvents()).toEqual([]);
  });

  it("requires a payment method to confirm and reassesses risk for one attached at confirmation", async () => {
    const harness = buildHarness();
    const intent = await createIntent(harness);

    const missing = await captureAppError(
      harness.orchestrator.confirmPaymentIntent(intent.id, { expected_version: 1 }, CONTEXT),
    );
    expect(missing.code).toBe("payment_method_required");

    const method = await createCard(harness);
    const confirmed = await harness.orchestrator.confirmPaymentIntent(
      intent.id,
      { expected_version: 1, payment_method: method.id },
      CONTEXT,
    );
    expect(confirmed.status).toBe("succeeded");
    expect(confirmed.payment_method).toBe(method.id);

    const unknown = await captureAppError(
      harness.orchestrator.confirmPaymentIntent(
        (await createIntent(harness)).id,
        { expected_version: 1, payment_method: "pm_missing" },
        CONTEXT,
      ),
    );
    expect([unknown.statusCode, unknown.code]).toEqual([422, "unknown_payment_method"]);
  });

  it("rejects a confirmation carrying a stale version", async () => {
    const harness = buildHarness();
    const method = await createCard(harness);
    const intent = await createIntent(harness, method.id);

    const error = await captureAppError(
      harness.orchestrator.confirmPaymentIntent(intent.id, { expected_version: 5 }, CONTEXT),
    );

    expect(error.statusCode).toBe(409);
    expect(error.code).toBe("version_conflict");
    expect(error.details).toEqual({ expected_version: 5, current_version: 1 });
    expect((await harness.orchestrator.getPaymentIntent(intent.id)).version).toBe(1);
  });

  it("rejects transitions out of a terminal state", async () => {
    const harness = buildHarness();
    const method = await createCard(harness);
    const intent = await createIntent(harness, method.id);
    const settled = await harness.orchestrator.confirmPaymentIntent(intent.id, { expected_version: 1 }, CONTEXT);

    const again = await captureAppError(
      harness.orchestrator.confirmPaymentIntent(intent.id, { expected_version: settled.version }, CONTEXT),
    );
    const cancel = await captureAppError(
      harness.orchestrator.cancelPaymentIntent(intent.id, { expected_version: settled.version }),
    );

    expect(again.code).toBe("invalid_state_transition");
    expect(again.details).toEqual({ current_status: "succeeded", requested_status: "processing" });
    expect(cancel.code).toBe("invalid_state_transition");
  });

  it("reports unknown payment intents as not found", async () => {
    const harness = buildHarness();

    const error = await captureAppError(harness.orchestrator.getPaymentIntent("pi_missing"));

    expect([error.statusCode, error.code]).toEqual([404, "resource_not_found"]);
  });
});

describe("PaymentOrchestrator idempotency", () => {
  it("replays the stored response for the same key and payload", async () => {
    const harness = buildHarness();
    const input = { amount: 2_500, currency: "EUR", metadata: { order: "ord_1" } };

    const first = await harness.orchestrator.createPaymentIntent(input, CONTEXT, "order-1");
    const second = await harness.orchestrator.createPaymentIntent(
      { ...input, currency: "eur" },
      CONTEXT,
      "order-1",
    );

    expect(first.idempotencyReplayed).toBe(false);
    expect(first.statusCode).toBe(201);
    expect(second.idempotencyReplayed).toBe(true);
    expect(second.statusCode).toBe(201);
    expect(second.body).toEqual(first.body);
    expect(harness.eventBus.getPublishedEvents()).toHaveLength(1);
    expect(harness.metrics.renderPrometheus()).toContain(
      'pie_idempotency_replays_total{operation="create_payment_intent"} 1\n',
    );
  });

  it("rejects a reused key with a different payload", async () => {
    const harness = buildHarness();
    await harness.orchestrator.createPaymentIntent({ amount: 2_500, currency: "EUR" }, CONTEXT, "order-2");

    const error = await captureAppError(
      harness.orchestrator.createPaymentIntent({ amount: 2_600, currency: "EUR" }, CONTEXT, "order-2"),
    );

    expect([error.statusCode, error.code]).toEqual([409, "idempotency_conflict"]);
  });

  it("scopes keys per credential", async () => {
    const harness = buildHarness();
    const input = { amount: 2_500, currency: "EUR" };

    const first = await harness.orchestrator.createPaymentIntent(input, CONTEXT, "shared-key");
    const other = await harness.orchestrator.createPaymentIntent(input, { credentialId: "cred_b" }, "shared-key");

    expect(other.idempotencyReplayed).toBe(false);
    expect(other.body.id).not.toBe(first.body.id);
  });

  it("creates exactly one intent for concurrent requests with the same key", async () => {
    const harness = buildHarness();
    const input = { amount: 4_200, currency: "USD" };

    const results = await Promise.all(
      Array.from({ length: 5 }, () => harness.orchestrator.createPaymentIntent(input, CONTEXT, "burst-key")),
    );

    const ids = new Set(results.map((result) => result.body.id));
    expect(ids.size).toBe(1);
    expect(results.filter((result) => !result.idempotencyReplayed)).toHaveLength(1);
    const listed = await harness.orchestrator.listPaymentIntents({ limit: 10 });
    expect(listed.data).toHaveLength(1);
  });
});

describe("PaymentOrchestrator risk screening", () => {
  async function blockedIntent(harness: Harness) {
    const method = await createCard(harness, { country: "DE" });
    const result = await harness.orchestrator.createPaymentIntent(
      { amount: 2_500_000, currency: "EUR", payment_method: method.id },
      { credentialId: "cred_merchant_a", ipCountry: "US" },
    );
    return result.body;
  }

  it("fails a blocked intent at creation and refuses to confirm or cancel it", async () => {
    const harness = buildHarness();
    const blocked = await blockedIntent(harness);

    expect(blocked).toMatchObject({
      status: "failed",
      failure_reason: "risk_blocked",
      version: 1,
      risk_assessment: {
        score: 0.9,
        decision: "block",
        triggered_rules: ["high_amount", "very_high_amount", "geo_mismatch"],
      },
    });

    const confirm = await captureAppError(
      harness.orchestrator.confirmPaymentIntent(blocked.id, { expected_version: 1 }, CONTEXT),
    );
    const cancel = await captureAppError(harness.orchestrator.cancelPaymentIntent(blocked.id, { expected_version: 1 }));

    expect([confirm.statusCode, confirm.code]).toEqual([402, "risk_blocked"]);
    expect([cancel.statusCode, cancel.code]).toEqual([402, "risk_blocked"]);
    expect((await harness.orchestrator.listIntentEvents(blocked.id)).map((event) => event.type)).toEqual([
      "payment_intent.failed",
    ]);
  });

  it("blocks a large payment once the card's velocity trips under the default thresholds", async () => {
    const harness = buildHarness({ thresholds: { challenge: 0.5, block: 0.8 } });
    const method = await createCard(harness);

    const earlier = [];
    for (let attempt = 0; attempt < 4; attempt += 1) {
      earlier.push(await createIntent(harness, method.id, 500_000));
    }
    const blocked = await createIntent(harness, method.id, 500_000);

    expect(earlier.map((intent) => [intent.status, intent.risk_assessment.decision])).toEqual([
      ["created", "allow"],
      ["created", "allow"],
      ["created", "allow"],
      ["created", "allow"],
    ]);
    expect(blocked).toMatchObject({
      status: "failed",
      failure_reason: "risk_blocked",
      risk_assessment: { score: 0.8, decision: "block", triggered_rules: ["high_amount", "instrument_velocity"] },
    });
    expect((await harness.orchestrator.listIntentEvents(blocked.id)).map((event) => event.type)).toEqual([
      "payment_intent.failed",
    ]);
  });

  it("fails the intent when a method attached at confirmation is blocked", async () => {
    const harness = buildHarness();
    const intent = (
      await harness.orchestrator.createPaymentIntent({ amount: 2_500_000, currency: "EUR" }, CONTEXT)
    ).body;
    expect(intent.risk_assessment.decision).toBe("challenge");
    const method = await createCard(harness, { country: "DE" });

    const failed = await harness.orchestrator.confirmPaymentIntent(
      intent.id,
      { expected_version: 1, payment_method: method.id },
      { credentialId: "cred_merchant_a", ipCountry: "US" },
    );

    expect(failed).toMatchObject({ status: "failed", failure_reason: "risk_blocked", version: 2 });
  });
});

describe("PaymentOrchestrator customer authentication", () => {
  it("parks the intent with a challenge and settles after a successful action", async () => {
    const harness = buildHarness();
    const { intent, token } = await parkForAction(harness);

    expect(intent).toMatchObject({ status: "requires_action", version: 2 });
    expect(intent.next_action).toMatchObject({
      type: "three_d_secure_redirect",
      expires_at: "2026-10-01T10:15:00.000Z",
    });

    const resumed = await harness.orchestrator.resumeAfterAction(intent.id, {
      challenge_token: token,
      outcome: "succeeded",
    });

    expect(resumed).toMatchObject({ status: "succeeded", version: 4, next_action: null });
    expect((await harness.orchestrator.listIntentEvents(intent.id)).map((event) => event.type)).toEqual([
      "payment_intent.created",
      "payment_intent.requires_action",
      "payment_intent.processing",
      "payment_intent.succeeded",
    ]);
  });

  it("fails the intent when authentication fails", async () => {
    const harness = buildHarness();
    const { intent, token } = await parkForAction(harness);

    const failed = await harness.orchestrator.resumeAfterAction(intent.id, { challenge_token: token, outcome: "failed" });

    expect(failed).toMatchObject({ status: "failed", failure_reason: "action_failed", version: 3 });
  });

  it("accepts each challenge token once", async () => {
    const harness = buildHarness();
    const { intent, token } = await parkForAction(harness);
    await harness.orchestrator.resumeAfterAction(intent.id, { challenge_token: token, outcome: "succeeded" });

    const reused = await captureAppError(
      harness.orchestrator.resumeAfterAction(intent.id, { challenge_token: token, outcome: "succeeded" }),
    );

    expect([reused.statusCode, reused.code]).toEqual([409, "action_token_used"]);
    expect(reused.details).toEqual({ token_status: "consumed" });
  });

  it("rejects tokens issued for another intent", async () => {
    const harness = buildHarness();
    const first = await parkForAction(harness);
    const second = await parkForAction(harness);

    const error = await captureAppError(
      harness.orchestrator.resumeAfterAction(first.intent.id, {
        challenge_token: second.token,
        outcome: "succeeded",
      }),
    );

    expect([error.statusCode, error.code]).toEqual([422, "invalid_action_token"]);
  });

  it("supersedes the outstanding challenge when confirmation is repeated", async () => {
    const harness = buildHarness();
    const { intent, token } = await parkForAction(harness);

    const reissued = await harness.orchestrator.confirmPaymentIntent(intent.id, { expected_version: 2 }, CONTEXT);
    expect(reissued.status).toBe("requires_action");
    expect(reissued.version).toBe(3);
    expect(reissued.next_action?.challenge_token).not.toBe(token);

    const stale = await captureAppError(
      harness.orchestrator.resumeAfterAction(intent.id, { challenge_token: token, outcome: "succeeded" }),
    );
    expect(stale.details).toEqual({ token_status: "superseded" });
  });

  it("fails the intent when the challenge is answered after it expired", async () => {
    const harness = buildHarness();
    const { intent, token } = await parkForAction(harness);
    harness.clock.advanceSeconds(901);

    const expired = await harness.orchestrator.resumeAfterAction(intent.id, {
      challenge_token: token,
      outcome: "succeeded",
    });

    expect(expired).toMatchObject({ status: "failed", failure_reason: "action_timeout", version: 3 });
    const replay = await harness.orchestrator.resumeAfterAction(intent.id, {
      challenge_token: token,
      outcome: "succeeded",
    });
    expect(replay.version).toBe(3);
  });
});

describe("PaymentOrchestrator settlement", () => {
  it("records a declined settlement", async () => {
    const harness = buildHarness();
    const method = await createCard(harness, {}, "tok_test_decline");
    const intent = await createIntent(harness, method.id);

    const declined = await harness.orchestrator.confirmPaymentIntent(intent.id, { expected_version: 1 }, CONTEXT);

    expect(declined).toMatchObject({ status: "failed", failure_reason: "settlement_declined", version: 3 });
    expect(declined.settlement_reference).toMatch(/^mock_settlement_/);
  });

  it("fails the intent when the gateway is unavailable", async () => {
    const harness = buildHarness();
    const method = await createCard(harness, {}, "tok_test_unavailable");
    const intent = await createIntent(harness, method.id);

    const failed = await harness.orchestrator.confirmPaymentIntent(intent.id, { expected_version: 1 }, CONTEXT);

    expect(failed).toMatchObject({
      status: "failed",
      failure_reason: "settlement_unavailable",
      settlement_reference: null,
    });
  });

  it("fails the intent when the gateway does not answer in time", async () => {
    const harness = buildHarness({ settlementTimeoutMs: 20 });
    const method = await createCard(harness, {}, "tok_test_hang");
    const intent = await createIntent(harness, method.id);

    const failed = await harness.orchestrator.confirmPaymentIntent(intent.id, { expected_version: 1 }, CONTEXT);

    expect(failed).toMatchObject({ status: "failed", failure_reason: "settlement_timeout" });
  });

  it("refuses to cancel while settlement is in flight", async () => {
    const settlement = new DeferredSettlement();
    const harness = buildHarness({ settlement, settlementTimeoutMs: 60_000 });
    const method = await createCard(harness);
    const intent = await createIntent(harness, method.id);

    const confirming = harness.orchestrator.confirmPaymentIntent(intent.id, { expected_version: 1 }, CONTEXT);
    await settlement.started;

    const cancel = await captureAppError(harness.orchestrator.cancelPaymentIntent(intent.id, { expected_version: 2 }));
    expect([cancel.statusCode, cancel.code]).toEqual([409, "settlement_in_flight"]);

    settlement.answer({ ok: true, reference: "stl_1" });
    const settled = await confirming;
    expect(settled).toMatchObject({ status: "succeeded", settlement_reference: "stl_1", version: 3 });
    expect(settlement.calls).toHaveLength(1);
  });

  it("lets exactly one of two concurrent confirmations with the same version win", async () => {
    const settlement = new DeferredSettlement();
    const harness = buildHarness({ settlement, settlementTimeoutMs: 60_000 });
    const method = await createCard(harness);
    const intent = await createIntent(harness, method.id);

    const winner = harness.orchestrator.confirmPaymentIntent(intent.id, { expected_version: 1 }, CONTEXT);
    const loser = captureAppError(
      harness.orchestrator.confirmPaymentIntent(intent.id, { expected_version: 1 }, CONTEXT),
    );

    const conflict = await loser;
    expect([conflict.statusCode, conflict.code]).toEqual([409, "version_conflict"]);
    expect(conflict.details).toEqual({ expected_version: 1, current_version: 2 });

    await settlement.started;
    settlement.answer({ ok: true, reference: "stl_once" });
    expect(await winner).toMatchObject({ status: "succeeded", settlement_reference: "stl_once", version: 3 });
    expect(settlement.calls).toHaveLength(1);
  });

  it("rejects a cancel on the version an in-flight confirmation already moved past", async () => {
    const settlement = new DeferredSettlement();
    const harness = buildHarness({ settlement, settlementTimeoutMs: 60_000 });
    const method = await createCard(harness);
    const intent = await createIntent(harness, method.id);

    const confirming = harness.orchestrator.confirmPaymentIntent(intent.id, { expected_version: 1 }, CONTEXT);
    const cancel = await captureAppError(harness.orchestrator.cancelPaymentIntent(intent.id, { expected_version: 1 }));

    expect([cancel.statusCode, cancel.code]).toEqual([409, "version_conflict"]);
    await settlement.started;
    settlement.answer({ ok: true, reference: "stl_kept" });
    expect(await confirming).toMatchObject({ status: "succeeded", version: 3 });
    expect((await harness.orchestrator.listIntentEvents(intent.id)).map((event) => event.type)).toEqual([
      "payment_intent.created",
      "payment_intent.processing",
      "payment_intent.succeeded",
    ]);
  });

  it("settles an unrelated intent while another one waits on the gateway", async () => {
    const settlement = new HoldingSettlement(new MockSettlementGateway());
    const harness = buildHarness({ settlement, settlementTimeoutMs: 60_000 });
    const method = await createCard(harness);
    const slow = await createIntent(harness, method.id);
    const fast = await createIntent(harness, method.id);
    settlement.heldIntentIds.add(slow.id);

    const slowConfirm = harness.orchestrator.confirmPaymentIntent(slow.id, { expected_version: 1 }, CONTEXT);
    await settlement.held.started;

    const settled = await harness.orchestrator.confirmPaymentIntent(fast.id, { expected_version: 1 }, CONTEXT);
    expect(settled).toMatchObject({ status: "succeeded", version: 3 });
    expect(settled.settlement_reference).toMatch(/^mock_settlement_/);
    expect(await harness.orchestrator.getPaymentIntent(slow.id)).toMatchObject({ status: "processing", version: 2 });

    settlement.held.answer({ ok: true, reference: "stl_slow" });
    expect(await slowConfirm).toMatchObject({ status: "succeeded", settlement_reference: "stl_slow" });
  });

  it("cancels a created intent", async () => {
    const harness = buildHarness();
    const intent = await createIntent(harness);

    const canceled = await harness.orchestrator.cancelPaymentIntent(intent.id, { expected_version: 1 });

    expect(canceled).toMatchObject({ status: "canceled", version: 2 });
  });

  it("cancels a parked intent and retires its challenge", async () => {
    const harness = buildHarness();
    const { intent, token } = await parkForAction(harness);

    const canceled = await harness.orchestrator.cancelPaymentIntent(intent.id, { expected_version: 2 });
    expect(canceled).toMatchObject({ status: "canceled", next_action: null });

    const resume = await captureAppError(
      harness.orchestrator.resumeAfterAction(intent.id, { challenge_token: token, outcome: "succeeded" }),
    );
    expect(resume.details).toEqual({ token_status: "superseded" });
  });
});

describe("Overdue intent sweeping", () => {
  it("fails intents whose challenge expired", async () => {
    const harness = buildHarness();
    const { intent } = await parkForAction(harness);
    const sweeper = new IntentSweeper(harness.orchestrator, makeNoopLogger(), 1_000);

    expect(await sweeper.runOnce()).toEqual({ processingTimedOut: 0, actionTimedOut: 0, idempotencyKeysPurged: 0 });
    harness.clock.advanceSeconds(900);
    expect(await sweeper.runOnce()).toEqual({ processingTimedOut: 0, actionTimedOut: 1, idempotencyKeysPurged: 0 });

    expect(await harness.orchestrator.getPaymentIntent(intent.id)).toMatchObject({
      status: "failed",
      failure_reason: "action_timeout",
    });
  });

  it("fails intents stuck in processing and ignores the late settlement answer", async () => {
    const settlement = new DeferredSettlement();
    const harness = buildHarness({ settlement, settlementTimeoutMs: 60_000 });
    const method = await createCard(harness);
    const intent = await createIntent(harness, method.id);

    const confirming = harness.orchestrator.confirmPaymentIntent(intent.id, { expected_version: 1 }, CONTEXT);
    await settlement.started;
    harness.clock.advanceSeconds(120);

    expect(await harness.orchestrator.expireOverdueIntents()).toEqual({ processingTimedOut: 1, actionTimedOut: 0 });

    settlement.answer({ ok: true, reference: "stl_late" });
    const result = await confirming;
    expect(result).toMatchObject({
      status: "failed",
      failure_reason: "processing_timeout",
      settlement_reference: null,
      version: 3,
    });
  });

  it("purges idempotency keys past their ttl so the key can be reused", async () => {
    const harness = buildHarness();
    const sweeper = new IntentSweeper(harness.orchestrator, makeNoopLogger(), 1_000, harness.idempotencyStore);
    const first = await harness.orchestrator.createPaymentIntent({ amount: 1500, currency: "eur" }, CONTEXT, "idem-sweep");

    harness.clock.advanceSeconds(86_400);
    expect(await sweeper.runOnce()).toEqual({ processingTimedOut: 0, actionTimedOut: 0, idempotencyKeysPurged: 1 });

    const second = await harness.orchestrator.createPaymentIntent({ amount: 1500, currency: "eur" }, CONTEXT, "idem-sweep");
    expect(second.idempotencyReplayed).toBe(false);
    expect(second.body.id).not.toBe(first.body.id);
  });
});
