import type { LifecycleEvent } from "../../domain/types.js";
import type {
  EventBusPort,
  LifecycleEventHandler,
  LifecycleEventListInput,
} from "../../ports/event-bus.js";
import type { Page } from "../../ports/pagination.js";
import { makeNoopLogger, type Logger } from "../../infra/logger.js";
import { paginateById } from "./paginate.js";

/**
 * Single-process bus. Subscribers run in publish order, so per-intent
 * ordering holds as long as publishers serialize per intent.
 */
export class InMemoryEventBus implements EventBusPort {
  private readonly published: LifecycleEvent[] = [];
  private readonly subscribers: LifecycleEventHandler[] = [];

  constructor(private readonly logger: Logger = makeNoopLogger()) {}

  async publish(event: LifecycleEvent): Promise<void> {
    this.published.push(event);
    for (const subscriber of this.subscribers) {
      try {
        await subscriber(event);
      } catch (error) {
        // The event is already committed; a failing consumer must not undo the transition.
        this.logger.error({ err: error, event_id: event.id, event_type: event.type }, "event subscriber failed");
      }
    }
  }

  getPublishedEvents(): LifecycleEvent[] {
    return [...this.published];
  }

  async listPublishedEvents(input: LifecycleEventListInput): Promise<Page<LifecycleEvent>> {
    const items = this.published
      .filter((event) => {
        if (input.paymentIntentId && event.payment_intent_id !== input.paymentIntentId) {
          return false;
        }
        if (input.eventType && event.type !== input.eventType) {
          return false;
        }
        return true;
      })
      .reverse();
    return paginateById(items, input);
  }

  subscribe(handler: LifecycleEventHandler): void {
    this.subscribers.push(handler);
  }
}
