export type WindowName = 'burst' | 'minute' | 'hour'

export interface WindowRule {
  name: WindowName
  limit: number
  windowMs: number
}

export interface WindowState {
  name: WindowName
  limit: number
  remaining: number
  resetMs: number
}

export type ConsumeResult =
  | { allowed: true; windows: WindowState[] }
  | { allowed: false; blockedBy: WindowName; retryAfterMs: number }

/**
 * Backing store for per-identity window counters. `consume` checks every
 * rule and only counts the request when all of them have room; the check
 * and the increment happen as one step.
 */
export interface RateLimitStore {
  readonly kind: 'memory' | 'redis'
  consume(identity: string, rules: readonly WindowRule[], now: number): Promise<ConsumeResult>
  reset(identity: string): Promise<void>
  /** Drops idle state. Returns the number of identities removed. */
  sweep(now: number, idleTtlMs: number): Promise<number>
  close(): Promise<void>
}

interface WindowCounter {
  count: number
  startMs: number
}

interface IdentityEntry {
  windows: Map<WindowName, WindowCounter>
  lastSeenMs: number
  longestWindowMs: number
}

export class MemoryRateLimitStore implements RateLimitStore {
  readonly kind = 'memory'
  private entries = new Map<string, IdentityEntry>()

  async consume(identity: string, rules: readonly WindowRule[], now: number): Promise<ConsumeResult> {
    return this.consumeSync(identity, rules, now)
  }

  /**
   * Runs without yielding, so no other request can touch the entry between
   * the check and the increment.
   */
  consumeSync(identity: string, rules: readonly WindowRule[], now: number): ConsumeResult {
    let entry = this.entries.get(identity)
    if (!entry) {
      entry = { windows: new Map(), lastSeenMs: now, longestWindowMs: 0 }
      this.entries.set(identity, entry)
    }
    entry.lastSeenMs = now

    const current: Array<{ rule: WindowRule; counter: WindowCounter }> = []
    let blocked: { name: WindowName; retryAfterMs: number } | undefined

    for (const rule of rules) {
      entry.longestWindowMs = Math.max(entry.longestWindowMs, rule.windowMs)

      let counter = entry.windows.get(rule.name)
      if (!counter || now - counter.startMs >= rule.windowMs) {
        counter = { count: 0, startMs: now }
        entry.windows.set(rule.name, counter)
      }
      current.push({ rule, counter })

      if (counter.count >= rule.limit) {
        const retryAfterMs = counter.startMs + rule.windowMs - now
        if (!blocked || retryAfterMs > blocked.retryAfterMs) {
          blocked = { name: rule.name, retryAfterMs }
        }
      }
    }

    if (blocked) {
      return { allowed: false, blockedBy: blocked.name, retryAfterMs: blocked.retryAfterMs }
    }

    return {
      allowed: true,
      windows: current.map(({ rule, counter }) => {
        counter.count += 1
        return {
          name: rule.name,
          limit: rule.limit,
          remaining: rule.limit - counter.count,
          resetMs: counter.startMs + rule.windowMs - now,
        }
      }),
    }
  }

  async reset(identity: string): Promise<void> {
    this.entries.delete(identity)
  }

  /**
   * An identity is removed only once it has been idle for `idleTtlMs` and
   * its longest window has rolled over, so eviction never loosens a limit.
   */
  async sweep(now: number, idleTtlMs: number): Promise<number> {
    let removed = 0
    for (const [identity, entry] of this.entries) {
      const idleFor = now - entry.lastSeenMs
      if (idleFor >= idleTtlMs && idleFor >= entry.longestWindowMs) {
        this.entries.delete(identity)
        removed++
      }
    }
    return removed
  }

  size(): number {
    return this.entries.size
  }

  async close(): Promise<void> {
    this.entries.clear()
  }
}
