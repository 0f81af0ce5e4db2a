import type { LifecycleEvent } from "../domain/types.js";
import type { Page, PageRequest } from "./pagination.js";

export interface LifecycleEventListInput extends PageRequest {
  paymentIntentId?: string;
  eventType?: LifecycleEvent["type"];
}

export type LifecycleEventHandler = (event: LifecycleEvent) => Promise<void>;

export interface EventBusPort {
  publish(event: LifecycleEvent): Promise<void>;
  listPublishedEvents(input: LifecycleEventListInput): Promise<Page<LifecycleEvent>>;
  subscribe(handler: LifecycleEventHandler): void;
  close?(): Promise<void>;
}
