import { randomUUID } from 'node:crypto';

import type { RedisClientType } from 'redis';

import type { RateLimitRepository, SlidingWindowHit } from './rate-limit-repository.js';

const SLIDING_WINDOW_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])
redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local count = redis.call('ZCARD', key)
local allowed = 0
if count < limit then
  redis.call('ZADD', key, now, ARGV[4])
  redis.call('PEXPIRE', key, window)
  count = count + 1
  allowed = 1
end
local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
local oldestScore = -1
if oldest[2] then
  oldestScore = tonumber(oldest[2])
end
return {allowed, count, oldestScore}
`;

function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }

  if (typeof value === 'string') {
    return Number(value);
  }

  throw new Error('Unexpected reply from the rate-limit script.');
}

/** Sliding-window log kept as one sorted set per key, scored by call time. */
export class RedisRateLimitRepository implements RateLimitRepository {
  public constructor(
    private readonly client: RedisClientType,
    private readonly keyPrefix = 'rate:'
  ) {}

  public async hit(key: string, nowMs: number, windowMs: number, limit: number): Promise<SlidingWindowHit> {
    const reply = await this.client.eval(SLIDING_WINDOW_SCRIPT, {
      keys: [`${this.keyPrefix}${key}`],
      arguments: [String(nowMs), String(windowMs), String(limit), `${nowMs}:${randomUUID()}`]
    });

    if (!Array.isArray(reply) || reply.length !== 3) {
      throw new Error('Unexpected reply from the rate-limit script.');
    }

    const [allowed, count, oldest] = reply.map(toNumber);
    return {
      allowed: allowed === 1,
      count: count ?? 0,
      oldestAtMs: oldest === undefined || oldest < 0 ? null : oldest
    };
  }

  public async close(): Promise<void> {
    await this.client.quit();
  }
}
