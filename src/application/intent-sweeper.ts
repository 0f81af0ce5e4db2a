import type { Logger } from "../infra/logger.js";
import type { IdempotencyStorePort } from "../ports/idempotency-store.js";
import type { ExpireOverdueResult, PaymentOrchestrator } from "./payment-orchestrator.js";

export interface SweepResult extends ExpireOverdueResult {
  idempotencyKeysPurged: number;
}

/**
 * Periodically fails intents stuck in processing or waiting on an expired
 * challenge, and drops idempotency keys past their TTL.
 */
export class IntentSweeper {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly orchestrator: PaymentOrchestrator,
    private readonly logger: Logger,
    private readonly intervalMs: number,
    private readonly idempotencyStore?: Pick<IdempotencyStorePort<unknown>, "purgeExpired">,
  ) {}

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      if (this.inFlight) {
        return;
      }
      this.inFlight = this.runOnce()
        .then(() => undefined)
        .catch((error: unknown) => {
          this.logger.error({ err: error }, "intent sweep failed");
        })
        .finally(() => {
          this.inFlight = null;
        });
    }, this.intervalMs);
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

  async runOnce(): Promise<SweepResult> {
    const expired = await this.orchestrator.expireOverdueIntents();
    const idempotencyKeysPurged = this.idempotencyStore ? await this.idempotencyStore.purgeExpired() : 0;
    if (expired.processingTimedOut > 0 || expired.actionTimedOut > 0) {
      this.logger.info(
        { processing_timed_out: expired.processingTimedOut, action_timed_out: expired.actionTimedOut },
        "expired overdue payment intents",
      );
    }
    if (idempotencyKeysPurged > 0) {
      this.logger.debug({ purged: idempotencyKeysPurged }, "purged expired idempotency keys");
    }
    return { ...expired, idempotencyKeysPurged };
  }
}
