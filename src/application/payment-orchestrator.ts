import { randomUUID } from "node:crypto";
import { assertAmount, assertMetadata, normalizeSupportedCurrency } from "../domain/intent-rules.js";
import { CONFIRMABLE_STATUSES, assertTransition } from "../domain/state-machine.js";
import type {
  ActionChallengeRecord,
  ActionResultInput,
  CancelPaymentIntentInput,
  ChallengeDescriptor,
  ConfirmPaymentIntentInput,
  CreatePaymentIntentInput,
  CreatePaymentMethodInput,
  FailureReason,
  LifecycleEvent,
  PaymentIntentRecord,
  PaymentIntentResponse,
  PaymentMethodRecord,
  PaymentMethodResponse,
  PaymentStatus,
  RequestContext,
} from "../domain/types.js";
import {
  ConflictError,
  DownstreamTimeoutError,
  DownstreamUnavailableError,
  NotFoundError,
  RiskBlockedError,
  ValidationError,
} from "../infra/app-error.js";
import { addSeconds, type ClockPort } from "../infra/clock.js";
import { fingerprintRequest, sha256Hex } from "../infra/fingerprint.js";
import { KeyedMutex } from "../infra/keyed-mutex.js";
import type { Logger } from "../infra/logger.js";
import type { MetricsRegistry } from "../infra/metrics.js";
import { withTimeout } from "../infra/timeout.js";
import type { EventBusPort } from "../ports/event-bus.js";
import type { IdempotencyScope, IdempotencyStorePort } from "../ports/idempotency-store.js";
import type {
  PaymentIntentListInput,
  PaymentRepositoryPort,
} from "../ports/payment-repository.js";
import type { RiskEnginePort } from "../ports/risk-engine.js";
import type { SettlementGatewayPort } from "../ports/settlement-gateway.js";
import type { ActionResolver } from "./action-resolver.js";

export interface IdempotentResult<TBody> {
  statusCode: number;
  body: TBody;
  idempotencyReplayed: boolean;
}

export interface PaymentOrchestratorDeps {
  repository: PaymentRepositoryPort;
  idempotencyStore: IdempotencyStorePort<PaymentIntentResponse>;
  eventBus: EventBusPort;
  riskEngine: RiskEnginePort;
  actionResolver: ActionResolver;
  settlement: SettlementGatewayPort;
  clock: ClockPort;
  logger: Logger;
  metrics?: MetricsRegistry;
}

export interface PaymentOrchestratorOptions {
  eventApiVersion: string;
  eventSource: string;
  eventSchemaVersion: string;
  supportedCurrencies: readonly string[];
  settlementTimeoutMs: number;
  maxProcessingSeconds: number;
  sweepBatchSize?: number;
}

export interface ExpireOverdueResult {
  processingTimedOut: number;
  actionTimedOut: number;
}

interface TransitionChanges {
  payment_method_id?: string | null;
  risk_assessment?: PaymentIntentRecord["risk_assessment"];
  failure_reason?: FailureReason | null;
  next_action?: ChallengeDescriptor | null;
  settlement_reference?: string | null;
}

type ConfirmStep =
  | { kind: "done"; intent: PaymentIntentRecord }
  | { kind: "settle"; intent: PaymentIntentRecord; method: PaymentMethodRecord };

type SettlementOutcome =
  | { status: "succeeded"; reference: string }
  | { status: "failed"; reason: FailureReason; reference: string | null };

/**
 * Drives payment intents through their lifecycle. Every transition on one
 * intent runs under that intent's lock and commits the new version together
 * with its lifecycle event; the settlement call itself runs outside the lock.
 */
export class PaymentOrchestrator {
  private readonly intentLocks = new KeyedMutex();
  private readonly supportedCurrencies: ReadonlySet<string>;

  constructor(
    private readonly deps: PaymentOrchestratorDeps,
    private readonly options: PaymentOrchestratorOptions,
  ) {
    this.supportedCurrencies = new Set(options.supportedCurrencies);
  }

  async createPaymentMethod(input: CreatePaymentMethodInput): Promise<PaymentMethodResponse> {
    const method: PaymentMethodRecord = {
      id: `pm_${randomUUID()}`,
      type: input.type,
      token: input.token,
      fingerprint: input.fingerprint ?? `fp_${sha256Hex(`${input.type}:${input.token}`).slice(0, 32)}`,
      card: input.type === "card" ? (input.card ?? null) : null,
      bank_reference: input.type === "bank_reference" ? (input.bank_reference ?? null) : null,
      wallet: input.type === "wallet" ? (input.wallet ?? null) : null,
      created_at: this.deps.clock.nowIso(),
    };
    await this.deps.repository.savePaymentMethod(method);
    return this.mapPaymentMethod(method);
  }

  async getPaymentMethod(id: string): Promise<PaymentMethodResponse> {
    const method = await this.deps.repository.getPaymentMethodById(id);
    if (!method) {
      throw new NotFoundError(`Payment method '${id}' not found.`);
    }
    return this.mapPaymentMethod(method);
  }

  async createPaymentIntent(
    input: CreatePaymentIntentInput,
    context: RequestContext,
    idempotencyKey?: string,
  ): Promise<IdempotentResult<PaymentIntentResponse>> {
    assertAmount(input.amount);
    const currency = normalizeSupportedCurrency(input.currency, this.supportedCurrencies);
    const metadata = input.metadata ?? {};
    assertMetadata(metadata);
    const normalized: CreatePaymentIntentInput = {
      amount: input.amount,
      currency,
      metadata,
      ...(input.payment_method ? { payment_method: input.payment_method } : {}),
    };

    if (!idempotencyKey) {
      const fresh = await this.createFresh(normalized, context, null);
      return { statusCode: fresh.statusCode, body: fresh.body, idempotencyReplayed: false };
    }

    const scope: IdempotencyScope = { operation: "create_payment_intent", credentialId: context.credentialId };
    return this.executeIdempotent(scope, idempotencyKey, fingerprintRequest(normalized), () =>
      this.createFresh(normalized, context, idempotencyKey),
    );
  }

  async getPaymentIntent(id: string): Promise<PaymentIntentResponse> {
    return this.mapPaymentIntent(await this.getIntentOrThrow(id));
  }

  async listPaymentIntents(input: PaymentIntentListInput): Promise<{
    data: PaymentIntentResponse[];
    hasMore: boolean;
    nextCursor?: string;
  }> {
    const page = await this.deps.repository.listPaymentIntents(input);
    return {
      data: page.data.map((intent) => this.mapPaymentIntent(intent)),
      hasMore: page.hasMore,
      ...(page.nextCursor ? { nextCursor: page.nextCursor } : {}),
    };
  }

  async listIntentEvents(id: string): Promise<LifecycleEvent[]> {
    await this.getIntentOrThrow(id);
    return this.deps.repository.listIntentEvents(id);
  }

  async confirmPaymentIntent(
    id: string,
    input: ConfirmPaymentIntentInput,
    context: RequestContext,
  ): Promise<PaymentIntentResponse> {
    const step = await this.intentLocks.runExclusive(id, () => this.confirmLocked(id, input, context));
    if (step.kind === "done") {
      return this.mapPaymentIntent(step.intent);
    }
    return this.mapPaymentIntent(await this.settle(step.intent, step.method));
  }

  async resumeAfterAction(id: string, input: ActionResultInput): Promise<PaymentIntentResponse> {
    const step = await this.intentLocks.runExclusive(id, () => this.resumeLocked(id, input));
    if (step.kind === "done") {
      return this.mapPaymentIntent(step.intent);
    }
    return this.mapPaymentIntent(await this.settle(step.intent, step.method));
  }

  async cancelPaymentIntent(id: string, input: CancelPaymentIntentInput): Promise<PaymentIntentResponse> {
    const canceled = await this.intentLocks.runExclusive(id, async () => {
      const intent = await this.getIntentOrThrow(id);
      this.assertNotRiskBlocked(intent);
      this.assertExpectedVersion(intent, input.expected_version);
      if (intent.status === "processing") {
        throw new ConflictError(
          "settlement_in_flight",
          "Payment intent is settling and can no longer be canceled.",
          { current_status: intent.status },
        );
      }
      assertTransition(intent.status, "canceled");
      const superseded = await this.retirePendingChallenge(intent, "superseded");
      return this.commitTransition(intent, "canceled", { next_action: null }, superseded);
    });
    return this.mapPaymentIntent(canceled);
  }

  /**
   * Fails intents stuck in `processing` past the processing budget and
   * intents whose authentication challenge expired.
   */
  async expireOverdueIntents(): Promise<ExpireOverdueResult> {
    const now = this.deps.clock.nowIso();
    const processingCutoff = addSeconds(now, -this.options.maxProcessingSeconds);
    const candidates = await this.deps.repository.listOverdueIntents({
      processingStartedBefore: processingCutoff,
      actionExpiresBefore: now,
      limit: this.options.sweepBatchSize ?? 100,
    });

    const result: ExpireOverdueResult = { processingTimedOut: 0, actionTimedOut: 0 };
    for (const candidate of candidates) {
      const outcome = await this.intentLocks.runExclusive(candidate.id, async () => {
        const intent = await this.getIntentOrThrow(candidate.id);
        if (intent.status === "processing" && intent.status_changed_at <= processingCutoff) {
          this.deps.logger.warn(
            { payment_intent_id: intent.id, status_changed_at: intent.status_changed_at },
            "payment intent exceeded processing time, failing it",
          );
          await this.commitTransition(intent, "failed", { failure_reason: "processing_timeout" });
          return "processing" as const;
        }
        if (intent.status === "requires_action" && intent.next_action && intent.next_action.expires_at <= now) {
          await this.failWithActionTimeout(intent);
          return "action" as const;
        }
        return null;
      });
      if (outcome === "processing") {
        result.processingTimedOut += 1;
      } else if (outcome === "action") {
        result.actionTimedOut += 1;
      }
    }
    return result;
  }

  private async createFresh(
    input: CreatePaymentIntentInput,
    context: RequestContext,
    idempotencyKey: string | null,
  ): Promise<{ statusCode: number; body: PaymentIntentResponse; resourceId: string }> {
    const method = input.payment_method ? await this.getPaymentMethodForInput(input.payment_method) : null;
    const risk = await this.deps.riskEngine.assess(
      { amount: input.amount, currency: input.currency, paymentMethod: method },
      context,
    );
    const blocked = risk.decision === "block";
    const now = this.deps.clock.nowIso();
    const intent: PaymentIntentRecord = {
      id: `pi_${randomUUID()}`,
      amount: input.amount,
      currency: input.currency,
      status: blocked ? "failed" : "created",
      payment_method_id: method?.id ?? null,
      risk_assessment: risk,
      idempotency_key: idempotencyKey,
      metadata: input.metadata ?? {},
      version: 1,
      failure_reason: blocked ? "risk_blocked" : null,
      next_action: null,
      settlement_reference: null,
      credential_id: context.credentialId,
      created_at: now,
      updated_at: now,
      status_changed_at: now,
    };
    if (blocked) {
      this.deps.logger.info(
        { payment_intent_id: intent.id, triggered_rules: risk.triggered_rules, score: risk.score },
        "payment intent blocked by risk screening",
      );
    }

    const event = this.buildEvent(intent, null);
    await this.deps.repository.commitIntent({ intent, expectedVersion: null, event });
    await this.publishEvent(event);
    return { statusCode: 201, body: this.mapPaymentIntent(intent), resourceId: intent.id };
  }

  private async confirmLocked(
    id: string,
    input: ConfirmPaymentIntentInput,
    context: RequestContext,
  ): Promise<ConfirmStep> {
    const intent = await this.getIntentOrThrow(id);
    this.assertNotRiskBlocked(intent);
    this.assertExpectedVersion(intent, input.expected_version);
    if (!CONFIRMABLE_STATUSES.has(intent.status)) {
      assertTransition(intent.status, "processing");
    }

    let risk = intent.risk_assessment;
    let method: PaymentMethodRecord;
    const superseded = await this.retirePendingChallenge(intent, "superseded");

    if (input.payment_method && input.payment_method !== intent.payment_method_id) {
      method = await this.getPaymentMethodForInput(input.payment_method);
      risk = await this.deps.riskEngine.assess(
        { amount: intent.amount, currency: intent.currency, paymentMethod: method },
        context,
      );
      if (risk.decision === "block") {
        this.deps.logger.info(
          { payment_intent_id: intent.id, triggered_rules: risk.triggered_rules, score: risk.score },
          "payment intent blocked by risk screening on confirmation",
        );
        const failed = await this.commitTransition(
          intent,
          "failed",
          { payment_method_id: method.id, risk_assessment: risk, failure_reason: "risk_blocked", next_action: null },
          superseded,
        );
        return { kind: "done", intent: failed };
      }
    } else if (intent.payment_method_id) {
      method = await this.getPaymentMethodForInput(intent.payment_method_id);
    } else {
      throw new ValidationError(
        "payment_method_required",
        "A payment method must be attached before the payment intent can be confirmed.",
        { field: "payment_method" },
      );
    }

    const resolution = this.deps.actionResolver.resolve({
      paymentIntentId: intent.id,
      paymentMethod: method,
      amount: intent.amount,
      currency: intent.currency,
      riskDecision: risk.decision,
    });

    if (resolution.required) {
      const now = this.deps.clock.nowIso();
      const issued: ActionChallengeRecord = {
        token_hash: sha256Hex(resolution.challenge.challenge_token),
        payment_intent_id: intent.id,
        status: "pending",
        issued_at: now,
        expires_at: resolution.challenge.expires_at,
        resolved_at: null,
      };
      const parked = await this.commitTransition(
        intent,
        "requires_action",
        { payment_method_id: method.id, risk_assessment: risk, next_action: resolution.challenge },
        [...superseded, issued],
      );
      return { kind: "done", intent: parked };
    }

    const processing = await this.commitTransition(
      intent,
      "processing",
      { payment_method_id: method.id, risk_assessment: risk, next_action: null },
      superseded,
    );
    return { kind: "settle", intent: processing, method };
  }

  private async resumeLocked(id: string, input: ActionResultInput): Promise<ConfirmStep> {
    const intent = await this.getIntentOrThrow(id);
    const challenge = await this.deps.repository.getActionChallenge(sha256Hex(input.challenge_token));
    if (!challenge || challenge.payment_intent_id !== intent.id) {
      throw new ValidationError("invalid_action_token", "challenge_token does not belong to this payment intent.", {
        field: "challenge_token",
      });
    }
    if (challenge.status === "consumed" || challenge.status === "superseded") {
      throw new ConflictError("action_token_used", `challenge_token was already ${challenge.status}.`, {
        token_status: challenge.status,
      });
    }
    if (challenge.status === "expired") {
      return { kind: "done", intent };
    }
    if (intent.status !== "requires_action") {
      assertTransition(intent.status, "processing");
    }

    const now = this.deps.clock.nowIso();
    if (challenge.expires_at <= now) {
      return { kind: "done", intent: await this.failWithActionTimeout(intent) };
    }

    const consumed: ActionChallengeRecord = { ...challenge, status: "consumed", resolved_at: now };
    if (input.outcome === "failed") {
      const failed = await this.commitTransition(
        intent,
        "failed",
        { failure_reason: "action_failed", next_action: null },
        [consumed],
      );
      return { kind: "done", intent: failed };
    }

    if (!intent.payment_method_id) {
      throw new ConflictError("payment_method_missing", "Payment intent has no payment method to settle.");
    }
    const method = await this.getPaymentMethodForInput(intent.payment_method_id);
    const processing = await this.commitTransition(intent, "processing", { next_action: null }, [consumed]);
    return { kind: "settle", intent: processing, method };
  }

  private async settle(intent: PaymentIntentRecord, method: PaymentMethodRecord): Promise<PaymentIntentRecord> {
    const outcome = await this.callSettlement(intent, method);

    return this.intentLocks.runExclusive(intent.id, async () => {
      const current = await this.getIntentOrThrow(intent.id);
      if (current.status !== "processing" || current.version !== intent.version) {
        // Already failed by the sweeper. An operator has to match the late answer by hand.
        this.deps.logger.error(
          {
            payment_intent_id: intent.id,
            settlement_outcome: outcome.status,
            settlement_reference: outcome.reference,
            current_status: current.status,
          },
          "settlement answered after the payment intent left processing",
        );
        return current;
      }
      if (outcome.status === "succeeded") {
        return this.commitTransition(current, "succeeded", { settlement_reference: outcome.reference });
      }
      return this.commitTransition(current, "failed", {
        failure_reason: outcome.reason,
        settlement_reference: outcome.reference,
      });
    });
  }

  private async callSettlement(intent: PaymentIntentRecord, method: PaymentMethodRecord): Promise<SettlementOutcome> {
    const startedMs = this.deps.clock.nowMs();
    const outcome = await this.invokeSettlement(intent, method);
    this.deps.metrics?.recordSettlement(
      outcome.status === "succeeded" ? "succeeded" : outcome.reason,
      (this.deps.clock.nowMs() - startedMs) / 1000,
    );
    return outcome;
  }

  private async invokeSettlement(intent: PaymentIntentRecord, method: PaymentMethodRecord): Promise<SettlementOutcome> {
    const gateway = this.deps.settlement;
    try {
      const result = await withTimeout(gateway.name, this.options.settlementTimeoutMs, (signal) =>
        gateway.settle(
          { paymentIntentId: intent.id, amount: intent.amount, currency: intent.currency, paymentMethod: method },
          signal,
        ),
      );
      if (result.ok) {
        return { status: "succeeded", reference: result.reference };
      }
      this.deps.logger.warn(
        { payment_intent_id: intent.id, failure_code: result.failureCode ?? null },
        "settlement declined",
      );
      return { status: "failed", reason: "settlement_declined", reference: result.reference };
    } catch (error) {
      if (error instanceof DownstreamTimeoutError) {
        this.deps.logger.error({ payment_intent_id: intent.id, err: error }, "settlement timed out");
        return { status: "failed", reason: "settlement_timeout", reference: null };
      }
      const message = error instanceof DownstreamUnavailableError
        ? "settlement gateway unavailable"
        : "settlement gateway raised an unexpected error";
      this.deps.logger.error({ payment_intent_id: intent.id, err: error }, message);
      return { status: "failed", reason: "settlement_unavailable", reference: null };
    }
  }

  private async failWithActionTimeout(intent: PaymentIntentRecord): Promise<PaymentIntentRecord> {
    const expired = await this.retirePendingChallenge(intent, "expired");
    return this.commitTransition(intent, "failed", { failure_reason: "action_timeout", next_action: null }, expired);
  }

  /** The pending challenge of a parked intent, closed with the given status. */
  private async retirePendingChallenge(
    intent: PaymentIntentRecord,
    status: "superseded" | "expired",
  ): Promise<ActionChallengeRecord[]> {
    if (intent.status !== "requires_action" || !intent.next_action) {
      return [];
    }
    const challenge = await this.deps.repository.getActionChallenge(sha256Hex(intent.next_action.challenge_token));
    if (!challenge || challenge.status !== "pending") {
      return [];
    }
    return [{ ...challenge, status, resolved_at: this.deps.clock.nowIso() }];
  }

  private async commitTransition(
    current: PaymentIntentRecord,
    next: PaymentStatus,
    changes: TransitionChanges,
    challenges: ActionChallengeRecord[] = [],
  ): Promise<PaymentIntentRecord> {
    assertTransition(current.status, next);
    const now = this.deps.clock.nowIso();
    const updated: PaymentIntentRecord = {
      ...current,
      ...changes,
      status: next,
      version: current.version + 1,
      updated_at: now,
      status_changed_at: now,
    };
    const event = this.buildEvent(updated, current.status);
    await this.deps.repository.commitIntent({
      intent: updated,
      expectedVersion: current.version,
      event,
      ...(challenges.length > 0 ? { challenges } : {}),
    });
    await this.publishEvent(event);
    return updated;
  }

  private async executeIdempotent(
    scope: IdempotencyScope,
    key: string,
    fingerprint: string,
    operation: () => Promise<{ statusCode: number; body: PaymentIntentResponse; resourceId: string }>,
  ): Promise<IdempotentResult<PaymentIntentResponse>> {
    const store = this.deps.idempotencyStore;
    return store.withKeyLock(scope, key, async () => {
      const lookup = await store.lookup(scope, key, fingerprint);
      switch (lookup.outcome) {
        case "fingerprint_mismatch":
          throw new ConflictError("idempotency_conflict", "Idempotency key already used with a different payload.", {
            resource_id: lookup.resourceId,
          });
        case "replay":
          this.deps.metrics?.recordIdempotencyReplay(scope.operation);
          return { statusCode: lookup.response.statusCode, body: lookup.response.body, idempotencyReplayed: true };
        case "absent":
          break;
      }

      const result = await operation();
      await store.remember(scope, key, {
        fingerprint,
        resourceId: result.resourceId,
        statusCode: result.statusCode,
        body: result.body,
        createdAt: this.deps.clock.nowIso(),
      });
      return { statusCode: result.statusCode, body: result.body, idempotencyReplayed: false };
    });
  }

  private buildEvent(intent: PaymentIntentRecord, previousStatus: PaymentStatus | null): LifecycleEvent {
    return {
      id: `evt_${randomUUID()}`,
      type: `payment_intent.${intent.status}`,
      payment_intent_id: intent.id,
      sequence: intent.version,
      status: intent.status,
      api_version: this.options.eventApiVersion,
      source: this.options.eventSource,
      event_version: this.options.eventSchemaVersion,
      occurred_at: intent.updated_at,
      data: {
        object: this.mapPaymentIntent(intent),
        previous_status: previousStatus,
      },
    };
  }

  private async publishEvent(event: LifecycleEvent): Promise<void> {
    await this.deps.eventBus.publish(event);
    this.deps.metrics?.recordLifecycleEvent(event.type);
  }

  private assertExpectedVersion(intent: PaymentIntentRecord, expectedVersion: number): void {
    if (intent.version !== expectedVersion) {
      throw new ConflictError("version_conflict", "Payment intent version does not match expected_version.", {
        expected_version: expectedVersion,
        current_version: intent.version,
      });
    }
  }

  private assertNotRiskBlocked(intent: PaymentIntentRecord): void {
    if (intent.failure_reason === "risk_blocked") {
      throw new RiskBlockedError(intent.id);
    }
  }

  private async getIntentOrThrow(id: string): Promise<PaymentIntentRecord> {
    const intent = await this.deps.repository.getPaymentIntentById(id);
    if (!intent) {
      throw new NotFoundError(`Payment intent '${id}' not found.`);
    }
    return intent;
  }

  private async getPaymentMethodForInput(id: string): Promise<PaymentMethodRecord> {
    const method = await this.deps.repository.getPaymentMethodById(id);
    if (!method) {
      throw new ValidationError("unknown_payment_method", `Payment method '${id}' does not exist.`, {
        field: "payment_method",
      });
    }
    return method;
  }

  private mapPaymentIntent(intent: PaymentIntentRecord): PaymentIntentResponse {
    return {
      id: intent.id,
      object: "payment_intent",
      amount: intent.amount,
      currency: intent.currency,
      status: intent.status,
      payment_method: intent.payment_method_id,
      risk_assessment: intent.risk_assessment,
      metadata: intent.metadata,
      version: intent.version,
      failure_reason: intent.failure_reason,
      next_action: intent.next_action,
      settlement_reference: intent.settlement_reference,
      created_at: intent.created_at,
      updated_at: intent.updated_at,
    };
  }

  private mapPaymentMethod(method: PaymentMethodRecord): PaymentMethodResponse {
    return {
      id: method.id,
      object: "payment_method",
      type: method.type,
      fingerprint: method.fingerprint,
      card: method.card,
      bank_reference: method.bank_reference,
      wallet: method.wallet,
      created_at: method.created_at,
    };
  }
}
