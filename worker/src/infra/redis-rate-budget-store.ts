import Redis from 'ioredis';
import { randomUUID } from 'node:crypto';
import { RateBudgetKey, RateBudgetStore } from '../core/rate-limiter';
import { RateDecision, WindowName, WindowSpec } from '../core/sliding-window';

// KEYS: one sorted set per window. ARGV: now, cost, nonce, then (lengthMs, ceiling) per window.
// Returns {0} when consumed or {retryAfterMs, windowIndex} when denied.
const CONSUME_SCRIPT = `
local now = tonumber(ARGV[1])
local cost = tonumber(ARGV[2])
local nonce = ARGV[3]
local worst = 0
local worstIndex = 0
for i = 1, #KEYS do
  local length = tonumber(ARGV[2 + i * 2])
  local ceiling = tonumber(ARGV[3 + i * 2])
  redis.call('ZREMRANGEBYSCORE', KEYS[i], '-inf', now - length)
  local count = redis.call('ZCARD', KEYS[i])
  local excess = count + cost - ceiling
  if cost > ceiling then
    if length > worst then
      worst = length
      worstIndex = i
    end
  elseif excess > 0 then
    local oldest = redis.call('ZRANGE', KEYS[i], excess - 1, excess - 1, 'WITHSCORES')
    local wait = tonumber(oldest[2]) + length - now
    if wait > worst then
      worst = wait
      worstIndex = i
    end
  end
end
if worst > 0 then
  return {worst, worstIndex}
end
for i = 1, #KEYS do
  local length = tonumber(ARGV[2 + i * 2])
  for j = 1, cost do
    redis.call('ZADD', KEYS[i], now, nonce .. ':' .. j)
  end
  redis.call('PEXPIRE', KEYS[i], length)
end
return {0}
`;

export class RedisRateBudgetStore implements RateBudgetStore {
  private readonly redis: Redis;

  constructor(redisUrl: string, private readonly prefix = 'rate') {
    this.redis = new Redis(redisUrl, { maxRetriesPerRequest: 1, lazyConnect: true });
  }

  async consume(key: RateBudgetKey, windows: readonly WindowSpec[], cost: number, nowMs: number): Promise<RateDecision> {
    const keys = windows.map((spec) => `${this.prefix}:${key.accountId}:${key.provider}:${spec.name}`);
    const args: Array<string | number> = [nowMs, cost, randomUUID()];
    for (const spec of windows) {
      args.push(spec.lengthMs, spec.ceiling);
    }

    const reply: unknown = await this.redis.eval(CONSUME_SCRIPT, keys.length, ...keys, ...args);
    return this.toDecision(reply, windows);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  private toDecision(reply: unknown, windows: readonly WindowSpec[]): RateDecision {
    if (!Array.isArray(reply)) {
      throw new Error('rate_budget_unexpected_reply');
    }

    const retryAfterMs = Number(reply[0]);
    if (retryAfterMs <= 0) {
      return { allowed: true };
    }

    const window: WindowName = windows[Number(reply[1]) - 1]?.name ?? 'hour';
    return { allowed: false, retryAfterMs, window };
  }
}
