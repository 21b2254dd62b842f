import { Tier, type RateLimitPolicy, type RateLimitPolicyView } from '../types/gateway.js'

export type TierPolicies = Readonly<Record<Tier, RateLimitPolicy>>

export const TIER_POLICIES: TierPolicies = {
  [Tier.FREE]: {
    requestsPerMinute: 20,
    requestsPerHour: 100,
    maxConcurrentRequests: 2,
    burstLimit: 5,
  },
  [Tier.PRO]: {
    requestsPerMinute: 1000,
    requestsPerHour: 10000,
    maxConcurrentRequests: 10,
    burstLimit: 50,
  },
  [Tier.ENTERPRISE]: {
    requestsPerMinute: 10000,
    requestsPerHour: 100000,
    maxConcurrentRequests: 100,
    burstLimit: 500,
  },
}

const TIER_RANK: Record<Tier, number> = {
  [Tier.FREE]: 1,
  [Tier.PRO]: 2,
  [Tier.ENTERPRISE]: 3,
}

export const TIERS: readonly Tier[] = [Tier.FREE, Tier.PRO, Tier.ENTERPRISE]

export function limitsFor(tier: Tier, policies: TierPolicies = TIER_POLICIES): RateLimitPolicy {
  return policies[tier]
}

/**
 * Narrows untrusted input (request bodies, config) to a tier.
 */
export function parseTier(value: unknown): Tier | undefined {
  return TIERS.find((tier) => tier === value)
}

export function tierAtLeast(tier: Tier, required: Tier): boolean {
  return TIER_RANK[tier] >= TIER_RANK[required]
}

export function toLimitsView(policy: RateLimitPolicy): RateLimitPolicyView {
  return {
    requests_per_minute: policy.requestsPerMinute,
    requests_per_hour: policy.requestsPerHour,
    concurrent_requests: policy.maxConcurrentRequests,
    burst_limit: policy.burstLimit,
  }
}
