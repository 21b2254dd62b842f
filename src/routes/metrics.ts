import { Router } from 'express'
import type { MetricsCollector } from '../services/metrics.js'
import { requireTier } from '../middleware/auth.js'
import { asyncHandler } from '../middleware/asyncHandler.js'
import { Tier } from '../types/gateway.js'

/**
 * GET /metrics: Prometheus text exposition, enterprise callers only.
 */
export function createMetricsRouter(metrics: MetricsCollector): Router {
  const router = Router()

  router.get(
    '/metrics',
    requireTier(Tier.ENTERPRISE),
    asyncHandler(async (_req, res) => {
      const body = await metrics.dump()
      res.setHeader('Content-Type', metrics.contentType)
      res.send(body)
    }),
  )

  return router
}
