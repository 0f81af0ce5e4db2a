import {
  classifyStoredResponse,
  type IdempotencyLookup,
  type IdempotencyScope,
  type IdempotencyStorePort,
  type StoredResponse,
} from "../../ports/idempotency-store.js";
import { SystemClock, type ClockPort } from "../../infra/clock.js";
import { KeyedMutex } from "../../infra/keyed-mutex.js";

interface Entry<TBody> {
  response: StoredResponse<TBody>;
  expiresAtMs: number;
}

function entryKey(scope: IdempotencyScope, key: string): string {
  return JSON.stringify([scope.operation, scope.credentialId, key]);
}

export class InMemoryIdempotencyStore<TBody> implements IdempotencyStorePort<TBody> {
  private readonly entries = new Map<string, Entry<TBody>>();
  private readonly locks = new KeyedMutex();
  private readonly ttlMs: number;
  private readonly clock: ClockPort;

  constructor(options: { ttlSeconds?: number; clock?: ClockPort } = {}) {
    this.ttlMs = (options.ttlSeconds ?? 86400) * 1000;
    this.clock = options.clock ?? new SystemClock();
  }

  async lookup(scope: IdempotencyScope, key: string, fingerprint: string): Promise<IdempotencyLookup<TBody>> {
    const id = entryKey(scope, key);
    const entry = this.entries.get(id);
    if (entry && entry.expiresAtMs <= this.clock.nowMs()) {
      this.entries.delete(id);
      return { outcome: "absent" };
    }
    return classifyStoredResponse(entry?.response, fingerprint);
  }

  async remember(scope: IdempotencyScope, key: string, response: StoredResponse<TBody>): Promise<void> {
    const createdAtMs = Date.parse(response.createdAt);
    this.entries.set(entryKey(scope, key), {
      response,
      // Unparseable timestamps expire at once.
      expiresAtMs: Number.isFinite(createdAtMs) ? createdAtMs + this.ttlMs : 0,
    });
  }

  withKeyLock<TOutput>(scope: IdempotencyScope, key: string, operation: () => Promise<TOutput>): Promise<TOutput> {
    return this.locks.runExclusive(entryKey(scope, key), operation);
  }

  async purgeExpired(): Promise<number> {
    const nowMs = this.clock.nowMs();
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (entry.expiresAtMs <= nowMs) {
        this.entries.delete(id);
        removed += 1;
      }
    }
    return removed;
  }
}
