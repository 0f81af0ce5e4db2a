import type { VelocityStorePort } from "../../ports/velocity-store.js";
import { SystemClock, type ClockPort } from "../../infra/clock.js";

interface CounterEntry {
  count: number;
  expiresAtMs: number;
}

interface DistinctEntry {
  members: Set<string>;
  expiresAtMs: number;
}

interface Shard {
  counters: Map<string, CounterEntry>;
  sets: Map<string, DistinctEntry>;
  writes: number;
}

function shardIndex(key: string, shardCount: number): number {
  // FNV-1a
  let hash = 0x811c9dc5;
  for (let index = 0; index < key.length; index += 1) {
    hash ^= key.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0) % shardCount;
}

/**
 * Counters spread over independent maps so expiry sweeps touch one shard at a
 * time. Each call is synchronous between awaits, so increments are atomic.
 */
export class InMemoryVelocityStore implements VelocityStorePort {
  private readonly shards: Shard[];

  constructor(
    shardCount = 16,
    private readonly clock: ClockPort = new SystemClock(),
  ) {
    this.shards = Array.from({ length: Math.max(1, shardCount) }, () => ({
      counters: new Map<string, CounterEntry>(),
      sets: new Map<string, DistinctEntry>(),
      writes: 0,
    }));
  }

  async increment(key: string, ttlMs: number): Promise<number> {
    const nowMs = this.clock.nowMs();
    const shard = this.shardFor(key, nowMs);
    const current = shard.counters.get(key);
    if (!current || current.expiresAtMs <= nowMs) {
      shard.counters.set(key, { count: 1, expiresAtMs: nowMs + ttlMs });
      return 1;
    }
    current.count += 1;
    return current.count;
  }

  async addDistinct(key: string, member: string, ttlMs: number): Promise<number> {
    const nowMs = this.clock.nowMs();
    const shard = this.shardFor(key, nowMs);
    const current = shard.sets.get(key);
    if (!current || current.expiresAtMs <= nowMs) {
      shard.sets.set(key, { members: new Set([member]), expiresAtMs: nowMs + ttlMs });
      return 1;
    }
    current.members.add(member);
    return current.members.size;
  }

  private shardFor(key: string, nowMs: number): Shard {
    const shard = this.shards[shardIndex(key, this.shards.length)] ?? this.shards[0];
    if (!shard) {
      throw new Error("velocity store has no shards");
    }
    shard.writes += 1;
    if (shard.writes % 500 === 0) {
      this.evictExpired(shard, nowMs);
    }
    return shard;
  }

  private evictExpired(shard: Shard, nowMs: number): void {
    for (const [key, entry] of shard.counters) {
      if (entry.expiresAtMs <= nowMs) {
        shard.counters.delete(key);
      }
    }
    for (const [key, entry] of shard.sets) {
      if (entry.expiresAtMs <= nowMs) {
        shard.sets.delete(key);
      }
    }
  }
}
