import type {
  LifecycleEventType,
  WebhookDeliveryRecord,
  WebhookDeliveryStatus,
  WebhookEndpointRecord,
} from "../domain/types.js";
import type { Page, PageRequest } from "./pagination.js";

export interface NewWebhookEndpoint {
  url: string;
  events: LifecycleEventType[];
  secret: string;
  enabled: boolean;
  createdAt: string;
}

export type WebhookEndpointPatch = Partial<Pick<WebhookEndpointRecord, "url" | "events" | "enabled">>;

export interface WebhookDeliveryFilter extends PageRequest {
  status?: WebhookDeliveryStatus;
  endpointId?: string;
  eventId?: string;
}

/** Subscriber registrations. Unknown ids raise NotFoundError. */
export interface WebhookEndpointStore {
  createEndpoint(input: NewWebhookEndpoint): Promise<WebhookEndpointRecord>;
  getEndpointById(endpointId: string): Promise<WebhookEndpointRecord>;
  updateEndpoint(endpointId: string, patch: WebhookEndpointPatch): Promise<WebhookEndpointRecord>;
  rotateEndpointSecret(endpointId: string, secret: string): Promise<WebhookEndpointRecord>;
  listEndpoints(input: PageRequest): Promise<Page<WebhookEndpointRecord>>;
  listEnabledEndpointsByEvent(eventType: LifecycleEventType): Promise<WebhookEndpointRecord[]>;
}

/** One record per (event, endpoint) pair, carrying its whole attempt history. */
export interface WebhookDeliveryStore {
  /** False when the pair already has a delivery: event redelivery is a no-op. */
  insertDelivery(delivery: WebhookDeliveryRecord): Promise<boolean>;
  saveDelivery(delivery: WebhookDeliveryRecord): Promise<void>;
  getDeliveryById(deliveryId: string): Promise<WebhookDeliveryRecord | null>;
  listDeliveries(filter: WebhookDeliveryFilter): Promise<Page<WebhookDeliveryRecord>>;
  /** Pending deliveries whose next_attempt_at is not after `nowIso`, oldest first. */
  listDueDeliveries(nowIso: string, limit: number): Promise<WebhookDeliveryRecord[]>;
  /** Drops delivered or exhausted deliveries past their retention; returns the count. */
  purgeExpiredDeliveries(nowIso: string): Promise<number>;
}

export interface WebhookRepositoryPort extends WebhookEndpointStore, WebhookDeliveryStore {}
