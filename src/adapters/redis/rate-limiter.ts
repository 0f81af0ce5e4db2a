import type { Redis } from "ioredis";
import { SystemClock, type ClockPort } from "../../infra/clock.js";
import { bucketDecision, fullRefillMs, type BucketPolicy } from "../../domain/token-bucket.js";
import type { RateLimitDecision, RateLimiterPort } from "../../ports/rate-limiter.js";

// Same arithmetic as takeToken(); runs atomically so every gateway replica
// draws from one bucket per credential.
const TAKE_TOKEN_LUA = `
local capacity = tonumber(ARGV[2])
local per_second = tonumber(ARGV[3])
local now_ms = tonumber(ARGV[1])
local state = redis.call('HMGET', KEYS[1], 'tokens', 'updated_at_ms')
local tokens = tonumber(state[1])
local updated_at_ms = tonumber(state[2])

if tokens == nil or updated_at_ms == nil then
  tokens = capacity
  updated_at_ms = now_ms
else
  local elapsed_ms = math.max(0, now_ms - updated_at_ms)
  tokens = math.min(capacity, tokens + elapsed_ms / 1000 * per_second)
  updated_at_ms = math.max(now_ms, updated_at_ms)
end

local allowed = 0
if tokens >= 1 then
  tokens = tokens - 1
  allowed = 1
end

redis.call('HSET', KEYS[1], 'tokens', tostring(tokens), 'updated_at_ms', updated_at_ms)
redis.call('PEXPIRE', KEYS[1], ARGV[4])
return { allowed, tostring(tokens) }
`;

export class RedisRateLimiter implements RateLimiterPort {
  private readonly clock: ClockPort;

  constructor(
    private readonly redis: Redis,
    private readonly policy: BucketPolicy,
    private readonly options: { keyPrefix: string; clock?: ClockPort },
  ) {
    this.clock = options.clock ?? new SystemClock();
  }

  async consume(credentialId: string): Promise<RateLimitDecision> {
    const reply: unknown = await this.redis.eval(
      TAKE_TOKEN_LUA,
      1,
      `${this.options.keyPrefix}:bucket:${credentialId}`,
      this.clock.nowMs(),
      this.policy.capacity,
      this.policy.refillPerSecond,
      // Expire once the bucket would be full again anyway.
      fullRefillMs(this.policy) + 1000,
    );
    if (!Array.isArray(reply) || reply.length !== 2) {
      throw new Error("Unexpected reply from the token bucket script.");
    }
    // Lua numbers come back truncated to integers, so the balance travels as a string.
    return bucketDecision(Number(reply[1]), Number(reply[0]) === 1, this.policy);
  }
}
