import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type { WebhookRepositoryPort } from "../ports/webhook-repository.js";
import type { WebhookDispatcher } from "./webhook-dispatcher.js";

export interface WebhookSchedulerOptions {
  pollIntervalMs: number;
  concurrency: number;
  /** Retention purge runs every this many ticks. */
  purgeEveryTicks?: number;
}

export interface WebhookSchedulerRunResult {
  attempted: number;
  delivered: number;
  failed: number;
  exhausted: number;
}

/** Polls for due deliveries and attempts them with bounded concurrency. */
export class WebhookDeliveryScheduler {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private ticks = 0;

  constructor(
    private readonly repository: WebhookRepositoryPort,
    private readonly dispatcher: WebhookDispatcher,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly options: WebhookSchedulerOptions,
  ) {}

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      if (this.inFlight) {
        return;
      }
      this.inFlight = this.tick()
        .catch((error: unknown) => {
          this.logger.error({ err: error }, "webhook scheduler tick failed");
        })
        .finally(() => {
          this.inFlight = null;
        });
    }, this.options.pollIntervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  async runDue(): Promise<WebhookSchedulerRunResult> {
    const due = await this.repository.listDueDeliveries(this.clock.nowIso(), this.options.concurrency * 4);
    const result: WebhookSchedulerRunResult = { attempted: 0, delivered: 0, failed: 0, exhausted: 0 };
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < due.length) {
        const delivery = due[next];
        next += 1;
        if (!delivery) {
          continue;
        }
        let updated;
        try {
          updated = await this.dispatcher.attemptDelivery(delivery.id);
        } catch (error) {
          this.logger.error({ err: error, delivery_id: delivery.id }, "webhook delivery attempt failed");
          continue;
        }
        if (!updated || updated.attempt_count === delivery.attempt_count) {
          continue;
        }
        result.attempted += 1;
        if (updated.status === "delivered") {
          result.delivered += 1;
        } else if (updated.status === "exhausted") {
          result.exhausted += 1;
        } else {
          result.failed += 1;
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.options.concurrency, due.length) }, () => worker());
    await Promise.all(workers);
    return result;
  }

  async purge(): Promise<number> {
    const purged = await this.repository.purgeExpiredDeliveries(this.clock.nowIso());
    if (purged > 0) {
      this.logger.info({ purged }, "purged expired webhook deliveries");
    }
    return purged;
  }

  private async tick(): Promise<void> {
    this.ticks += 1;
    await this.runDue();
    if (this.ticks % (this.options.purgeEveryTicks ?? 60) === 0) {
      await this.purge();
    }
  }
}
