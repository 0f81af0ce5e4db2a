import type { Redis } from "ioredis";
import type { Pool } from "pg";
import type { LifecycleEvent } from "../../domain/types.js";
import { ValidationError } from "../../infra/app-error.js";
import type { Logger } from "../../infra/logger.js";
import type { EventBusPort, LifecycleEventHandler, LifecycleEventListInput } from "../../ports/event-bus.js";
import type { Page } from "../../ports/pagination.js";

export interface DurableEventBusOptions {
  streamKey: string;
  consumerGroup: string;
  consumerName: string;
  blockMs: number;
  batchSize: number;
  claimIdleMs: number;
}

interface StreamMessage {
  streamId: string;
  event: LifecycleEvent | null;
}

function isLifecycleEvent(value: unknown): value is LifecycleEvent {
  return (
    typeof value === "object"
    && value !== null
    && "id" in value
    && typeof value.id === "string"
    && "type" in value
    && typeof value.type === "string"
    && value.type.startsWith("payment_intent.")
    && "payment_intent_id" in value
    && typeof value.payment_intent_id === "string"
    && "sequence" in value
    && typeof value.sequence === "number"
  );
}

/** `[id, [field, value, ...]]` as returned inside XREADGROUP and XAUTOCLAIM replies. */
function toMessage(raw: unknown): StreamMessage | null {
  if (!Array.isArray(raw) || typeof raw[0] !== "string" || !Array.isArray(raw[1])) {
    return null;
  }
  const fields: unknown[] = raw[1];
  let payload: unknown;
  for (let index = 0; index + 1 < fields.length; index += 2) {
    if (fields[index] === "event") {
      payload = fields[index + 1];
    }
  }
  let event: LifecycleEvent | null = null;
  if (typeof payload === "string") {
    try {
      const parsed: unknown = JSON.parse(payload);
      event = isLifecycleEvent(parsed) ? parsed : null;
    } catch {
      event = null;
    }
  }
  return { streamId: raw[0], event };
}

function messagesOf(entries: unknown): StreamMessage[] {
  if (!Array.isArray(entries)) {
    return [];
  }
  return entries.map(toMessage).filter((message): message is StreamMessage => message !== null);
}

/**
 * Outbox in Postgres, fanned out through a Redis stream consumer group. The
 * outbox row is written after the intent commit, in its own statement. Rows
 * whose stream append failed are relayed later; entries a
 * subscriber failed on are reclaimed once idle. The inbox table turns every
 * redelivery into a no-op, so delivery is at-least-once with idempotent handling.
 */
export class PgRedisDurableEventBus implements EventBusPort {
  private readonly handlers: LifecycleEventHandler[] = [];
  private readonly reader: Redis;
  private running = false;
  private loop: Promise<void> | null = null;
  private lastMaintenanceMs = 0;

  constructor(
    private readonly pool: Pool,
    private readonly redis: Redis,
    private readonly logger: Logger,
    private readonly options: DurableEventBusOptions,
  ) {
    // BLOCKing reads get their own connection so appends never queue behind them.
    this.reader = redis.duplicate();
  }

  async publish(event: LifecycleEvent): Promise<void> {
    await this.pool.query(
      `INSERT INTO pie_outbox_events (event_id, event_type, payment_intent_id, sequence, occurred_at, payload)
       VALUES ($1, $2, $3, $4, $5::timestamptz, $6::jsonb)
       ON CONFLICT (event_id) DO NOTHING`,
      [event.id, event.type, event.payment_intent_id, event.sequence, event.occurred_at, JSON.stringify(event)],
    );
    try {
      await this.appendToStream(event);
    } catch (error) {
      this.logger.warn({ err: error, event_id: event.id }, "stream append failed; event stays in the outbox for relay");
    }
  }

  subscribe(handler: LifecycleEventHandler): void {
    this.handlers.push(handler);
    if (this.running) {
      return;
    }
    this.running = true;
    this.loop = this.consume().catch((error: unknown) => {
      this.running = false;
      this.logger.error({ err: error, stream: this.options.streamKey }, "event consumer stopped");
    });
  }

  /** Appends outbox rows that never reached the stream; returns how many were relayed. */
  async relayUnpublished(): Promise<number> {
    const { rows } = await this.pool.query<{ payload: LifecycleEvent }>(
      `SELECT payload FROM pie_outbox_events
        WHERE published_at IS NULL
        ORDER BY occurred_at, sequence
        LIMIT $1`,
      [this.options.batchSize],
    );
    for (const { payload } of rows) {
      await this.appendToStream(payload);
    }
    if (rows.length > 0) {
      this.logger.info({ relayed: rows.length }, "relayed unpublished outbox events");
    }
    return rows.length;
  }

  async listPublishedEvents(input: LifecycleEventListInput): Promise<Page<LifecycleEvent>> {
    const values: unknown[] = [];
    const where = ["published_at IS NOT NULL"];
    const bind = (value: unknown): string => {
      values.push(value);
      return `$${values.length}`;
    };

    if (input.paymentIntentId) {
      where.push(`payment_intent_id = ${bind(input.paymentIntentId)}`);
    }
    if (input.eventType) {
      where.push(`event_type = ${bind(input.eventType)}`);
    }
    if (input.cursor) {
      const anchor = await this.pool.query<{ occurred_at: Date }>(
        "SELECT occurred_at FROM pie_outbox_events WHERE event_id = $1 AND published_at IS NOT NULL",
        [input.cursor],
      );
      const anchorRow = anchor.rows[0];
      if (!anchorRow) {
        throw new ValidationError("invalid_cursor", "cursor not found for current collection.");
      }
      where.push(`(occurred_at, event_id) < (${bind(anchorRow.occurred_at)}::timestamptz, ${bind(input.cursor)})`);
    }

    const limit = Math.max(1, input.limit);
    const { rows } = await this.pool.query<{ payload: LifecycleEvent }>(
      `SELECT payload FROM pie_outbox_events
        WHERE ${where.join(" AND ")}
        ORDER BY occurred_at DESC, event_id DESC
        LIMIT ${bind(limit + 1)}`,
      values,
    );
    const data = rows.slice(0, limit).map((row) => row.payload);
    const last = data.at(-1);
    const hasMore = rows.length > limit;
    return { data, hasMore, ...(hasMore && last ? { nextCursor: last.id } : {}) };
  }

  async close(): Promise<void> {
    this.running = false;
    await this.loop;
    this.loop = null;
    await this.reader.quit();
  }

  private async appendToStream(event: LifecycleEvent): Promise<void> {
    const streamId = await this.redis.xadd(this.options.streamKey, "*", "event_id", event.id, "event", JSON.stringify(event));
    await this.pool.query(
      "UPDATE pie_outbox_events SET published_at = NOW(), stream_id = $2 WHERE event_id = $1",
      [event.id, streamId],
    );
  }

  private async consume(): Promise<void> {
    await this.createGroupIfMissing();
    while (this.running) {
      try {
        if (Date.now() - this.lastMaintenanceMs >= this.options.claimIdleMs) {
          this.lastMaintenanceMs = Date.now();
          await this.relayUnpublished();
          await this.handleAll(await this.claimIdle());
        }
        await this.handleAll(await this.readNew());
      } catch (error) {
        this.logger.error({ err: error, stream: this.options.streamKey }, "event consumer iteration failed");
        await new Promise<void>((resolve) => setTimeout(resolve, 200));
      }
    }
  }

  private async readNew(): Promise<StreamMessage[]> {
    const reply: unknown = await this.reader.xreadgroup(
      "GROUP",
      this.options.consumerGroup,
      this.options.consumerName,
      "COUNT",
      this.options.batchSize,
      "BLOCK",
      this.options.blockMs,
      "STREAMS",
      this.options.streamKey,
      ">",
    );
    // [[streamKey, entries]] or null on timeout
    return Array.isArray(reply) ? reply.flatMap((stream: unknown) => (Array.isArray(stream) ? messagesOf(stream[1]) : [])) : [];
  }

  /** Takes over entries left pending by a failed handler or a crashed consumer. */
  private async claimIdle(): Promise<StreamMessage[]> {
    const reply: unknown = await this.redis.xautoclaim(
      this.options.streamKey,
      this.options.consumerGroup,
      this.options.consumerName,
      this.options.claimIdleMs,
      "0-0",
      "COUNT",
      this.options.batchSize,
    );
    return Array.isArray(reply) ? messagesOf(reply[1]) : [];
  }

  private async handleAll(messages: StreamMessage[]): Promise<void> {
    for (const { streamId, event } of messages) {
      if (!event) {
        this.logger.warn({ stream_entry_id: streamId }, "discarding malformed stream entry");
        await this.acknowledge(streamId);
        continue;
      }
      if (await this.handleOnce(event)) {
        await this.acknowledge(streamId);
      }
    }
  }

  private async acknowledge(streamId: string): Promise<void> {
    await this.redis.xack(this.options.streamKey, this.options.consumerGroup, streamId);
  }

  /** False leaves the entry pending so a later claim retries it. */
  private async handleOnce(event: LifecycleEvent): Promise<boolean> {
    const claimed = await this.pool.query(
      `INSERT INTO pie_inbox_events (consumer_group, event_id, processed_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (consumer_group, event_id) DO NOTHING`,
      [this.options.consumerGroup, event.id],
    );
    if (claimed.rowCount === 0) {
      return true;
    }
    try {
      for (const handler of this.handlers) {
        await handler(event);
      }
      return true;
    } catch (error) {
      this.logger.error({ err: error, event_id: event.id }, "event subscriber failed; entry left pending");
      await this.pool.query("DELETE FROM pie_inbox_events WHERE consumer_group = $1 AND event_id = $2", [
        this.options.consumerGroup,
        event.id,
      ]);
      return false;
    }
  }

  private async createGroupIfMissing(): Promise<void> {
    try {
      await this.redis.xgroup("CREATE", this.options.streamKey, this.options.consumerGroup, "$", "MKSTREAM");
    } catch (error) {
      if (!(error instanceof Error && error.message.includes("BUSYGROUP"))) {
        throw error;
      }
    }
  }
}
