import { randomUUID } from "node:crypto";
import type {
  LifecycleEventType,
  WebhookDeliveryRecord,
  WebhookEndpointRecord,
} from "../../domain/types.js";
import { NotFoundError } from "../../infra/app-error.js";
import type { Page, PageRequest } from "../../ports/pagination.js";
import type {
  NewWebhookEndpoint,
  WebhookDeliveryFilter,
  WebhookEndpointPatch,
  WebhookRepositoryPort,
} from "../../ports/webhook-repository.js";
import { newestFirst, paginateById } from "./paginate.js";

export class InMemoryWebhookRepository implements WebhookRepositoryPort {
  private readonly endpoints = new Map<string, WebhookEndpointRecord>();
  private readonly deliveries = new Map<string, WebhookDeliveryRecord>();
  private readonly deliveryIdsByPair = new Map<string, string>();

  async createEndpoint(input: NewWebhookEndpoint): Promise<WebhookEndpointRecord> {
    const endpoint: WebhookEndpointRecord = {
      id: `we_${randomUUID()}`,
      url: input.url,
      events: input.events,
      secret: input.secret,
      enabled: input.enabled,
      created_at: input.createdAt,
    };

    this.endpoints.set(endpoint.id, endpoint);
    return endpoint;
  }

  async getEndpointById(endpointId: string): Promise<WebhookEndpointRecord> {
    const endpoint = this.endpoints.get(endpointId);
    if (!endpoint) {
      throw new NotFoundError("Webhook endpoint not found.");
    }
    return endpoint;
  }

  async updateEndpoint(endpointId: string, patch: WebhookEndpointPatch): Promise<WebhookEndpointRecord> {
    const current = await this.getEndpointById(endpointId);
    const updated: WebhookEndpointRecord = {
      ...current,
      ...(patch.url !== undefined ? { url: patch.url } : {}),
      ...(patch.events !== undefined ? { events: patch.events } : {}),
      ...(patch.enabled !== undefined ? { enabled: patch.enabled } : {}),
    };
    this.endpoints.set(endpointId, updated);
    return updated;
  }

  async rotateEndpointSecret(endpointId: string, secret: string): Promise<WebhookEndpointRecord> {
    const current = await this.getEndpointById(endpointId);
    const updated: WebhookEndpointRecord = { ...current, secret };
    this.endpoints.set(endpointId, updated);
    return updated;
  }

  async listEndpoints(input: PageRequest): Promise<Page<WebhookEndpointRecord>> {
    return paginateById([...this.endpoints.values()].sort(newestFirst), input);
  }

  async listEnabledEndpointsByEvent(eventType: LifecycleEventType): Promise<WebhookEndpointRecord[]> {
    return [...this.endpoints.values()].filter(
      (endpoint) => endpoint.enabled && (endpoint.events.length === 0 || endpoint.events.includes(eventType)),
    );
  }

  async insertDelivery(delivery: WebhookDeliveryRecord): Promise<boolean> {
    const pairKey = `${delivery.event_id}:${delivery.endpoint_id}`;
    if (this.deliveryIdsByPair.has(pairKey)) {
      return false;
    }
    this.deliveryIdsByPair.set(pairKey, delivery.id);
    this.deliveries.set(delivery.id, delivery);
    return true;
  }

  async saveDelivery(delivery: WebhookDeliveryRecord): Promise<void> {
    if (!this.deliveries.has(delivery.id)) {
      throw new NotFoundError("Webhook delivery not found.");
    }
    this.deliveries.set(delivery.id, delivery);
  }

  async getDeliveryById(deliveryId: string): Promise<WebhookDeliveryRecord | null> {
    return this.deliveries.get(deliveryId) ?? null;
  }

  async listDeliveries(input: WebhookDeliveryFilter): Promise<Page<WebhookDeliveryRecord>> {
    const items = [...this.deliveries.values()]
      .filter((delivery) => {
        if (input.status && delivery.status !== input.status) {
          return false;
        }
        if (input.endpointId && delivery.endpoint_id !== input.endpointId) {
          return false;
        }
        if (input.eventId && delivery.event_id !== input.eventId) {
          return false;
        }
        return true;
      })
      .sort(newestFirst);
    return paginateById(items, input);
  }

  async listDueDeliveries(nowIso: string, limit: number): Promise<WebhookDeliveryRecord[]> {
    return [...this.deliveries.values()]
      .filter(
        (delivery) =>
          delivery.status === "pending" && delivery.next_attempt_at !== null && delivery.next_attempt_at <= nowIso,
      )
      .sort((a, b) => (a.next_attempt_at ?? "").localeCompare(b.next_attempt_at ?? ""))
      .slice(0, limit);
  }

  async purgeExpiredDeliveries(nowIso: string): Promise<number> {
    let purged = 0;
    for (const delivery of [...this.deliveries.values()]) {
      const finished = delivery.status === "delivered" || delivery.status === "exhausted";
      if (finished && delivery.expires_at !== null && delivery.expires_at <= nowIso) {
        this.deliveries.delete(delivery.id);
        this.deliveryIdsByPair.delete(`${delivery.event_id}:${delivery.endpoint_id}`);
        purged += 1;
      }
    }
    return purged;
  }
}
