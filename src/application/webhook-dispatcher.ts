import { randomUUID } from "node:crypto";
import type {
  LifecycleEvent,
  WebhookAttemptRecord,
  WebhookDeliveryRecord,
  WebhookEndpointRecord,
} from "../domain/types.js";
import { ConflictError, NotFoundError } from "../infra/app-error.js";
import { addSeconds, type ClockPort } from "../infra/clock.js";
import { KeyedMutex } from "../infra/keyed-mutex.js";
import type { Logger } from "../infra/logger.js";
import type { MetricsRegistry } from "../infra/metrics.js";
import type { WebhookRepositoryPort } from "../ports/webhook-repository.js";
import type { WebhookSendResult, WebhookSenderPort } from "../ports/webhook-sender.js";
import { nextAttemptDelayMs, type WebhookBackoffPolicy } from "./webhook-delivery-policy.js";
import { WEBHOOK_HEADERS, signWebhookPayload, webhookSignatureKeyId } from "./webhook-signing.js";

export interface WebhookDispatcherOptions {
  maxAttempts: number;
  timeoutMs: number;
  retentionSeconds: number;
  backoff: WebhookBackoffPolicy;
  random?: () => number;
}

function attemptOutcome(
  result: WebhookSendResult,
): Pick<WebhookAttemptRecord, "outcome" | "status_code" | "error_code"> {
  switch (result.outcome) {
    case "accepted":
      return { outcome: "delivered", status_code: result.statusCode, error_code: null };
    case "rejected":
      return { outcome: "failed", status_code: result.statusCode, error_code: `http_${result.statusCode}` };
    case "unreachable":
      return { outcome: "failed", status_code: null, error_code: result.errorCode };
  }
}

/**
 * Turns lifecycle events into WebhookDelivery records and performs single
 * attempts on them. Scheduling of due attempts lives in WebhookDeliveryScheduler.
 */
export class WebhookDispatcher {
  private readonly deliveryLocks = new KeyedMutex();
  private readonly random: () => number;

  constructor(
    private readonly repository: WebhookRepositoryPort,
    private readonly sender: WebhookSenderPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly options: WebhookDispatcherOptions,
    private readonly metrics?: MetricsRegistry,
  ) {
    this.random = options.random ?? Math.random;
  }

  /** Event bus subscriber. Redelivered events do not create duplicate deliveries. */
  async enqueue(event: LifecycleEvent): Promise<WebhookDeliveryRecord[]> {
    const endpoints = await this.repository.listEnabledEndpointsByEvent(event.type);
    const created: WebhookDeliveryRecord[] = [];
    for (const endpoint of endpoints) {
      const delivery = this.newDelivery(event, endpoint);
      if (await this.repository.insertDelivery(delivery)) {
        created.push(delivery);
      }
    }
    return created;
  }

  /**
   * Performs one attempt if the delivery is pending. Attempts on the same
   * delivery never overlap; a caller that loses the race sees the settled
   * record and no request is sent.
   */
  async attemptDelivery(deliveryId: string): Promise<WebhookDeliveryRecord | null> {
    return this.deliveryLocks.runExclusive(deliveryId, async () => {
      const current = await this.repository.getDeliveryById(deliveryId);
      if (!current || current.status !== "pending") {
        return current;
      }

      const attempting: WebhookDeliveryRecord = {
        ...current,
        status: "attempting",
        updated_at: this.clock.nowIso(),
      };
      await this.repository.saveDelivery(attempting);

      const endpoint = await this.repository.getEndpointById(current.endpoint_id);
      const startedAt = this.clock.nowIso();
      const startedMs = this.clock.nowMs();
      const result = await this.send(attempting, endpoint);
      const finished = this.applyResult(attempting, result, startedAt, this.clock.nowMs() - startedMs);
      await this.repository.saveDelivery(finished);
      return finished;
    });
  }

  /**
   * Re-arms an exhausted delivery for exactly one more attempt. Runs under the
   * same lock as attempts so two operators cannot grant it twice.
   */
  async grantManualAttempt(deliveryId: string): Promise<WebhookDeliveryRecord> {
    return this.deliveryLocks.runExclusive(deliveryId, async () => {
      const delivery = await this.repository.getDeliveryById(deliveryId);
      if (!delivery) {
        throw new NotFoundError("Webhook delivery not found.");
      }
      if (delivery.status !== "exhausted") {
        throw new ConflictError(
          "delivery_not_exhausted",
          "Only exhausted webhook deliveries can be redelivered manually.",
          { status: delivery.status },
        );
      }
      const now = this.clock.nowIso();
      const rearmed: WebhookDeliveryRecord = {
        ...delivery,
        status: "pending",
        max_attempts: delivery.attempt_count + 1,
        next_attempt_at: now,
        exhausted_at: null,
        expires_at: null,
        updated_at: now,
      };
      await this.repository.saveDelivery(rearmed);
      return rearmed;
    });
  }

  private newDelivery(event: LifecycleEvent, endpoint: WebhookEndpointRecord): WebhookDeliveryRecord {
    const now = this.clock.nowIso();
    return {
      id: `wd_${randomUUID()}`,
      event_id: event.id,
      event_type: event.type,
      payment_intent_id: event.payment_intent_id,
      endpoint_id: endpoint.id,
      endpoint_url: endpoint.url,
      status: "pending",
      attempt_count: 0,
      max_attempts: this.options.maxAttempts,
      next_attempt_at: now,
      last_attempt_at: null,
      last_response_status: null,
      last_error_code: null,
      delivered_at: null,
      exhausted_at: null,
      expires_at: null,
      created_at: now,
      updated_at: now,
      attempts: [],
      event,
    };
  }

  private async send(delivery: WebhookDeliveryRecord, endpoint: WebhookEndpointRecord): Promise<WebhookSendResult> {
    const body = JSON.stringify(delivery.event);
    const timestamp = String(Math.floor(this.clock.nowMs() / 1000));
    try {
      return await this.sender.send({
        url: delivery.endpoint_url,
        headers: {
          "Content-Type": "application/json",
          [WEBHOOK_HEADERS.event]: delivery.event_type,
          [WEBHOOK_HEADERS.eventId]: delivery.event_id,
          [WEBHOOK_HEADERS.timestamp]: timestamp,
          [WEBHOOK_HEADERS.signature]: signWebhookPayload(endpoint.secret, timestamp, body),
          [WEBHOOK_HEADERS.signatureKeyId]: webhookSignatureKeyId(endpoint.secret),
        },
        body,
        timeoutMs: this.options.timeoutMs,
      });
    } catch (error) {
      this.logger.error({ err: error, delivery_id: delivery.id }, "webhook sender threw");
      return { outcome: "unreachable", errorCode: "sender_error" };
    }
  }

  private applyResult(
    delivery: WebhookDeliveryRecord,
    result: WebhookSendResult,
    startedAt: string,
    durationMs: number,
  ): WebhookDeliveryRecord {
    const now = this.clock.nowIso();
    const attempt = delivery.attempt_count + 1;
    const record: WebhookAttemptRecord = {
      attempt,
      ...attemptOutcome(result),
      started_at: startedAt,
      duration_ms: durationMs,
    };
    const base: WebhookDeliveryRecord = {
      ...delivery,
      attempt_count: attempt,
      last_attempt_at: startedAt,
      last_response_status: record.status_code,
      last_error_code: record.error_code,
      updated_at: now,
      attempts: [...delivery.attempts, record],
    };
    this.metrics?.recordWebhookAttempt(record.outcome, durationMs / 1000);

    if (record.outcome === "delivered") {
      return {
        ...base,
        status: "delivered",
        next_attempt_at: null,
        delivered_at: now,
        expires_at: addSeconds(now, this.options.retentionSeconds),
      };
    }

    if (attempt >= delivery.max_attempts) {
      this.metrics?.recordWebhookExhausted();
      this.logger.warn(
        {
          delivery_id: delivery.id,
          event_id: delivery.event_id,
          endpoint_id: delivery.endpoint_id,
          attempts: attempt,
          last_error_code: record.error_code,
        },
        "webhook delivery exhausted",
      );
      return {
        ...base,
        status: "exhausted",
        next_attempt_at: null,
        exhausted_at: now,
        expires_at: addSeconds(now, this.options.retentionSeconds),
      };
    }

    const delayMs = nextAttemptDelayMs(attempt, this.options.backoff, this.random);
    return {
      ...base,
      status: "pending",
      next_attempt_at: new Date(this.clock.nowMs() + delayMs).toISOString(),
    };
  }
}
