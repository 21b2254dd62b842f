import { Redis } from 'ioredis'
import { z } from 'zod'
import type { GatewayLogger } from '../types/gateway.js'
import type { ConsumeResult, RateLimitStore, WindowRule } from '../services/rateLimitStore.js'

/**
 * The slice of the ioredis client the rate limit store needs.
 */
export interface RedisScriptClient {
  eval(script: string, numkeys: number, ...args: Array<string | number>): Promise<unknown>
  del(...keys: string[]): Promise<number>
  quit(): Promise<unknown>
}

// KEYS[i] is one window counter, ARGV[2i-1] its limit and ARGV[2i] its length
// in ms. Returns {0, blockedIndex, retryMs} or {1, count1, ttl1, count2, ttl2, ...}.
export const CONSUME_SCRIPT = `
local blocked = 0
local retry = -1
for i = 1, #KEYS do
  local limit = tonumber(ARGV[2 * i - 1])
  local window = tonumber(ARGV[2 * i])
  local count = tonumber(redis.call('GET', KEYS[i]) or '0')
  if count >= limit then
    local ttl = redis.call('PTTL', KEYS[i])
    if ttl < 0 then ttl = window end
    if ttl > retry then
      retry = ttl
      blocked = i
    end
  end
end
if blocked > 0 then
  return {0, blocked, retry}
end
local out = {1}
for i = 1, #KEYS do
  local window = tonumber(ARGV[2 * i])
  local count = redis.call('INCR', KEYS[i])
  if count == 1 then
    redis.call('PEXPIRE', KEYS[i], window)
  end
  local ttl = redis.call('PTTL', KEYS[i])
  if ttl < 0 then ttl = window end
  table.insert(out, count)
  table.insert(out, ttl)
end
return out
`

const scriptReply = z.array(z.number().int())

/**
 * Window counters kept in Redis so several gateway processes share one
 * quota per identity. Keys expire with their window, so `sweep` has
 * nothing to do.
 */
export class RedisRateLimitStore implements RateLimitStore {
  readonly kind = 'redis'

  constructor(
    private readonly client: RedisScriptClient,
    private readonly keyPrefix = 'ratelimit',
  ) {}

  async consume(identity: string, rules: readonly WindowRule[], _now: number): Promise<ConsumeResult> {
    const keys = rules.map((rule) => this.keyFor(identity, rule.name))
    const args = rules.flatMap((rule) => [rule.limit, rule.windowMs])

    const reply = scriptReply.parse(await this.client.eval(CONSUME_SCRIPT, keys.length, ...keys, ...args))

    if (reply[0] === 0) {
      const rule = rules[reply[1] - 1]
      if (!rule) {
        throw new Error(`Rate limit script blocked on unknown window ${reply[1]}`)
      }
      return { allowed: false, blockedBy: rule.name, retryAfterMs: reply[2] ?? rule.windowMs }
    }

    return {
      allowed: true,
      windows: rules.map((rule, index) => {
        const count = reply[1 + index * 2] ?? 0
        const ttl = reply[2 + index * 2] ?? rule.windowMs
        return {
          name: rule.name,
          limit: rule.limit,
          remaining: Math.max(0, rule.limit - count),
          resetMs: ttl,
        }
      }),
    }
  }

  async reset(identity: string): Promise<void> {
    await this.client.del(
      this.keyFor(identity, 'burst'),
      this.keyFor(identity, 'minute'),
      this.keyFor(identity, 'hour'),
    )
  }

  async sweep(): Promise<number> {
    return 0
  }

  async close(): Promise<void> {
    await this.client.quit()
  }

  private keyFor(identity: string, window: string): string {
    return `${this.keyPrefix}:${identity}:${window}`
  }
}

export function createRedisClient(url: string, logger: GatewayLogger = console): Redis {
  const client = new Redis(url, {
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
  })

  client.on('error', (err: Error) => {
    logger.error('[RateLimitStore] Redis connection error', err)
  })

  return client
}
