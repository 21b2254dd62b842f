import { describe, it, expect, vi, beforeEach } from 'vitest'
import { CONSUME_SCRIPT, RedisRateLimitStore, type RedisScriptClient } from './redis.js'
import type { WindowRule } from '../services/rateLimitStore.js'

const rules: WindowRule[] = [
  { name: 'burst', limit: 5, windowMs: 1000 },
  { name: 'minute', limit: 20, windowMs: 60_000 },
  { name: 'hour', limit: 100, windowMs: 3_600_000 },
]

describe('RedisRateLimitStore', () => {
  let client: { eval: ReturnType<typeof vi.fn>; del: ReturnType<typeof vi.fn>; quit: ReturnType<typeof vi.fn> }
  let store: RedisRateLimitStore

  beforeEach(() => {
    client = {
      eval: vi.fn(),
      del: vi.fn().mockResolvedValue(3),
      quit: vi.fn().mockResolvedValue('OK'),
    }
    const scriptClient: RedisScriptClient = client
    store = new RedisRateLimitStore(scriptClient)
  })

  it('runs the consume script with one key and limit pair per window', async () => {
    client.eval.mockResolvedValue([1, 1, 1000, 1, 60_000, 1, 3_600_000])

    await store.consume('key:abc', rules, 0)

    expect(client.eval).toHaveBeenCalledWith(
      CONSUME_SCRIPT,
      3,
      'ratelimit:key:abc:burst',
      'ratelimit:key:abc:minute',
      'ratelimit:key:abc:hour',
      5, 1000,
      20, 60_000,
      100, 3_600_000,
    )
  })

  it('maps an admitted reply to window states', async () => {
    client.eval.mockResolvedValue([1, 2, 800, 7, 41_000, 30, 1_200_000])

    expect(await store.consume('key:abc', rules, 0)).toEqual({
      allowed: true,
      windows: [
        { name: 'burst', limit: 5, remaining: 3, resetMs: 800 },
        { name: 'minute', limit: 20, remaining: 13, resetMs: 41_000 },
        { name: 'hour', limit: 100, remaining: 70, resetMs: 1_200_000 },
      ],
    })
  })

  it('maps a rejected reply to the blocking window', async () => {
    client.eval.mockResolvedValue([0, 2, 30_000])

    expect(await store.consume('key:abc', rules, 0)).toEqual({
      allowed: false,
      blockedBy: 'minute',
      retryAfterMs: 30_000,
    })
  })

  it('rejects replies it does not understand', async () => {
    client.eval.mockResolvedValue('OK')
    await expect(store.consume('key:abc', rules, 0)).rejects.toThrow()

    client.eval.mockResolvedValue([0, 9, 100])
    await expect(store.consume('key:abc', rules, 0)).rejects.toThrow('unknown window 9')
  })

  it('uses a custom key prefix', async () => {
    const prefixed = new RedisRateLimitStore(client, 'gw:rl')
    client.eval.mockResolvedValue([1, 1, 1000])

    await prefixed.consume('ip:1.2.3.4', [rules[0]], 0)

    expect(client.eval).toHaveBeenCalledWith(CONSUME_SCRIPT, 1, 'gw:rl:ip:1.2.3.4:burst', 5, 1000)
  })

  it('deletes every window on reset', async () => {
    await store.reset('key:abc')

    expect(client.del).toHaveBeenCalledWith(
      'ratelimit:key:abc:burst',
      'ratelimit:key:abc:minute',
      'ratelimit:key:abc:hour',
    )
  })

  it('leaves eviction to key expiry', async () => {
    expect(await store.sweep()).toBe(0)
  })

  it('quits the connection on close', async () => {
    await store.close()
    expect(client.quit).toHaveBeenCalledTimes(1)
  })
})
