import { randomBytes } from "node:crypto";
import type {
  LifecycleEventType,
  WebhookDeliveryRecord,
  WebhookDeliveryResponse,
  WebhookEndpointRecord,
  WebhookEndpointResponse,
} from "../domain/types.js";
import { NotFoundError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import type { PageCursorSigner } from "../infra/page-cursor.js";
import type { Logger } from "../infra/logger.js";
import type { Page, PageRequest } from "../ports/pagination.js";
import type {
  WebhookDeliveryFilter,
  WebhookEndpointPatch,
  WebhookRepositoryPort,
} from "../ports/webhook-repository.js";
import type { WebhookDispatcher } from "./webhook-dispatcher.js";

interface CreateWebhookEndpointInput {
  url: string;
  events?: LifecycleEventType[];
  secret?: string;
  enabled?: boolean;
}

function generateSecret(): string {
  return `whsec_${randomBytes(24).toString("base64url")}`;
}

export function toEndpointResponse(endpoint: WebhookEndpointRecord): WebhookEndpointResponse {
  const { secret: _secret, ...rest } = endpoint;
  return rest;
}

export function toDeliveryResponse(delivery: WebhookDeliveryRecord): WebhookDeliveryResponse {
  const { event: _event, ...rest } = delivery;
  return rest;
}

/** Operator surface for endpoints and deliveries. */
export class WebhookService {
  constructor(
    private readonly repository: WebhookRepositoryPort,
    private readonly dispatcher: WebhookDispatcher,
    private readonly clock: ClockPort,
    private readonly cursors: PageCursorSigner,
    private readonly logger: Logger,
  ) {}

  async createEndpoint(input: CreateWebhookEndpointInput): Promise<WebhookEndpointRecord> {
    return this.repository.createEndpoint({
      url: input.url,
      events: input.events ?? [],
      secret: input.secret ?? generateSecret(),
      enabled: input.enabled ?? true,
      createdAt: this.clock.nowIso(),
    });
  }

  async getEndpointById(endpointId: string): Promise<WebhookEndpointRecord> {
    return this.repository.getEndpointById(endpointId);
  }

  async updateEndpoint(endpointId: string, input: WebhookEndpointPatch): Promise<WebhookEndpointRecord> {
    return this.repository.updateEndpoint(endpointId, input);
  }

  async rotateEndpointSecret(endpointId: string, secret?: string): Promise<WebhookEndpointRecord> {
    return this.repository.rotateEndpointSecret(endpointId, secret ?? generateSecret());
  }

  async listEndpoints(input: PageRequest): Promise<Page<WebhookEndpointRecord>> {
    const internalCursor = input.cursor ? this.cursors.open("webhook_endpoints", input.cursor) : undefined;
    const page = await this.repository.listEndpoints({
      limit: input.limit,
      ...(internalCursor ? { cursor: internalCursor } : {}),
    });
    return {
      data: page.data,
      hasMore: page.hasMore,
      ...(page.nextCursor ? { nextCursor: this.cursors.seal("webhook_endpoints", page.nextCursor) } : {}),
    };
  }

  async listDeliveries(input: WebhookDeliveryFilter): Promise<Page<WebhookDeliveryRecord>> {
    const internalCursor = input.cursor ? this.cursors.open("webhook_deliveries", input.cursor) : undefined;
    const page = await this.repository.listDeliveries({
      limit: input.limit,
      ...(input.status ? { status: input.status } : {}),
      ...(input.endpointId ? { endpointId: input.endpointId } : {}),
      ...(input.eventId ? { eventId: input.eventId } : {}),
      ...(internalCursor ? { cursor: internalCursor } : {}),
    });
    return {
      data: page.data,
      hasMore: page.hasMore,
      ...(page.nextCursor ? { nextCursor: this.cursors.seal("webhook_deliveries", page.nextCursor) } : {}),
    };
  }

  async getDeliveryById(deliveryId: string): Promise<WebhookDeliveryRecord> {
    const delivery = await this.repository.getDeliveryById(deliveryId);
    if (!delivery) {
      throw new NotFoundError("Webhook delivery not found.");
    }
    return delivery;
  }

  /**
   * Grants an exhausted delivery exactly one more attempt and performs it now.
   * If that attempt fails the delivery is exhausted again.
   */
  async retryDelivery(deliveryId: string): Promise<WebhookDeliveryRecord> {
    const rearmed = await this.dispatcher.grantManualAttempt(deliveryId);
    this.logger.info({ delivery_id: rearmed.id, attempt: rearmed.max_attempts }, "manual webhook redelivery");
    const attempted = await this.dispatcher.attemptDelivery(rearmed.id);
    return attempted ?? this.getDeliveryById(rearmed.id);
  }
}
