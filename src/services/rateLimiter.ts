import type { RateLimitPolicy, Tier } from '../types/gateway.js'
import { limitsFor, TIER_POLICIES, type TierPolicies } from './tiers.js'
import type { ConsumeResult, RateLimitStore, WindowName, WindowRule } from './rateLimitStore.js'

export type RejectReason = WindowName | 'concurrency'

/**
 * Holds one in-flight slot for an identity. `release` may be called any
 * number of times; only the first call frees the slot.
 */
export interface Lease {
  release(): void
  readonly released: boolean
}

export type RateLimitDecision =
  | {
      admitted: true
      limit: number
      remaining: number
      resetSeconds: number
      lease: Lease
    }
  | {
      admitted: false
      reason: RejectReason
      limit: number
      retryAfterSeconds: number
    }

export interface RateLimiterOptions {
  policies?: TierPolicies
  idleTtlMs?: number
  sweepIntervalMs?: number
  clock?: () => number
}

const SECOND_MS = 1000
const MINUTE_MS = 60 * SECOND_MS
const HOUR_MS = 60 * MINUTE_MS

export function windowRules(policy: RateLimitPolicy): WindowRule[] {
  return [
    { name: 'burst', limit: policy.burstLimit, windowMs: SECOND_MS },
    { name: 'minute', limit: policy.requestsPerMinute, windowMs: MINUTE_MS },
    { name: 'hour', limit: policy.requestsPerHour, windowMs: HOUR_MS },
  ]
}

const toRetryAfterSeconds = (ms: number): number => Math.max(1, Math.ceil(ms / SECOND_MS))

/**
 * Admits or rejects requests per caller identity against the policy of the
 * caller's tier. Window counters live in the store; in-flight counts are
 * per process.
 */
export class RateLimiter {
  private readonly inFlight = new Map<string, number>()
  private readonly policies: TierPolicies
  private readonly idleTtlMs: number
  private readonly sweepIntervalMs: number
  private readonly clock: () => number
  private sweepTimer: NodeJS.Timeout | null = null

  constructor(
    private readonly store: RateLimitStore,
    options: RateLimiterOptions = {},
  ) {
    this.policies = options.policies ?? TIER_POLICIES
    this.idleTtlMs = options.idleTtlMs ?? 15 * MINUTE_MS
    this.sweepIntervalMs = options.sweepIntervalMs ?? MINUTE_MS
    this.clock = options.clock ?? Date.now
  }

  get storeKind(): RateLimitStore['kind'] {
    return this.store.kind
  }

  policyFor(tier: Tier): RateLimitPolicy {
    return limitsFor(tier, this.policies)
  }

  async admit(identity: string, tier: Tier, now: number = this.clock()): Promise<RateLimitDecision> {
    const policy = this.policyFor(tier)

    // The slot is taken before the first await so concurrent requests from
    // the same identity cannot all pass the check.
    const current = this.inFlight.get(identity) ?? 0
    if (current >= policy.maxConcurrentRequests) {
      return {
        admitted: false,
        reason: 'concurrency',
        limit: policy.maxConcurrentRequests,
        retryAfterSeconds: 1,
      }
    }
    this.inFlight.set(identity, current + 1)
    const lease = this.createLease(identity)

    let result: ConsumeResult
    try {
      result = await this.store.consume(identity, windowRules(policy), now)
    } catch (err) {
      lease.release()
      throw err
    }

    if (!result.allowed) {
      lease.release()
      return {
        admitted: false,
        reason: result.blockedBy,
        limit: policy.requestsPerMinute,
        retryAfterSeconds: toRetryAfterSeconds(result.retryAfterMs),
      }
    }

    const minute = result.windows.find((window) => window.name === 'minute')
    return {
      admitted: true,
      limit: policy.requestsPerMinute,
      remaining: minute?.remaining ?? 0,
      resetSeconds: toRetryAfterSeconds(minute?.resetMs ?? MINUTE_MS),
      lease,
    }
  }

  inFlightCount(identity: string): number {
    return this.inFlight.get(identity) ?? 0
  }

  /** Number of identities holding at least one in-flight slot. */
  activeIdentities(): number {
    return this.inFlight.size
  }

  async reset(identity: string): Promise<void> {
    await this.store.reset(identity)
  }

  async sweep(now: number = this.clock()): Promise<number> {
    return this.store.sweep(now, this.idleTtlMs)
  }

  start(onError: (err: unknown) => void): void {
    if (this.sweepTimer) {
      return
    }
    this.sweepTimer = setInterval(() => {
      this.sweep().catch(onError)
    }, this.sweepIntervalMs)
    this.sweepTimer.unref()
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = null
    }
  }

  private createLease(identity: string): Lease {
    let released = false
    return {
      get released() {
        return released
      },
      release: () => {
        if (released) {
          return
        }
        released = true
        const remaining = (this.inFlight.get(identity) ?? 1) - 1
        if (remaining <= 0) {
          this.inFlight.delete(identity)
        } else {
          this.inFlight.set(identity, remaining)
        }
      },
    }
  }
}
