import express, { Router } from 'express'
import type { KeyRegistry } from '../services/keyRegistry.js'
import type { RateLimiter } from '../services/rateLimiter.js'
import { toLimitsView } from '../services/tiers.js'
import { requireTier } from '../middleware/auth.js'
import { UnauthenticatedError } from '../errors.js'
import { generateKeyBodySchema, parseRequestBody } from '../schemas/index.js'
import { Tier } from '../types/gateway.js'

const KEY_USAGE_NOTE = 'Use this key in the Authorization header: Bearer <key>'

/**
 * POST /generate-key. Demo issuance: anyone may ask for a key of any tier.
 * Mounted before authentication.
 */
export function createKeyIssuanceRouter(registry: KeyRegistry, limiter: RateLimiter): Router {
  const router = Router()

  router.post('/generate-key', express.json({ limit: '16kb' }), (req, res) => {
    const { tier } = parseRequestBody(generateKeyBodySchema, req.body)
    const record = registry.issueKey(tier)

    res.status(201).json({
      success: true,
      api_key: record.key,
      tier: record.tier,
      limits: toLimitsView(limiter.policyFor(record.tier)),
      note: KEY_USAGE_NOTE,
    })
  })

  return router
}

/**
 * Key introspection for authenticated callers. Mounted after
 * authentication and rate limiting.
 */
export function createKeyIntrospectionRouter(registry: KeyRegistry, limiter: RateLimiter): Router {
  const router = Router()

  router.get('/key-info', (req, res, next) => {
    const record = req.gateway?.apiKey
    if (!record) {
      next(new UnauthenticatedError())
      return
    }

    res.json({
      key: record.key,
      tier: record.tier,
      limits: toLimitsView(limiter.policyFor(record.tier)),
      valid: true,
    })
  })

  router.get('/api-keys', requireTier(Tier.ENTERPRISE), (_req, res) => {
    res.json({
      api_keys: registry.listKeys(),
      note: KEY_USAGE_NOTE,
    })
  })

  return router
}
