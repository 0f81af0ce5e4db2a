import type { Redis } from "ioredis";
import type { VelocityStorePort } from "../../ports/velocity-store.js";

function replyValue(reply: [Error | null, unknown][] | null, index: number): number {
  const entry = reply?.[index];
  if (!entry) {
    throw new Error("velocity transaction returned no reply");
  }
  const [error, value] = entry;
  if (error) {
    throw error;
  }
  return Number(value);
}

/** Velocity counters shared by every instance; each call is one MULTI transaction. */
export class RedisVelocityStore implements VelocityStorePort {
  constructor(
    private readonly redis: Redis,
    private readonly keyPrefix: string,
  ) {}

  async increment(key: string, ttlMs: number): Promise<number> {
    const redisKey = `${this.keyPrefix}:risk:${key}`;
    const reply = await this.redis.multi().incr(redisKey).pexpire(redisKey, ttlMs).exec();
    return replyValue(reply, 0);
  }

  async addDistinct(key: string, member: string, ttlMs: number): Promise<number> {
    const redisKey = `${this.keyPrefix}:risk:${key}`;
    const reply = await this.redis.multi().sadd(redisKey, member).pexpire(redisKey, ttlMs).scard(redisKey).exec();
    return replyValue(reply, 2);
  }
}
