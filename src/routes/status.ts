import { Router } from 'express'
import type { BackendClient } from '../services/backendClient.js'
import { asyncHandler } from '../middleware/asyncHandler.js'
import { callerSignal } from '../middleware/callerSignal.js'
import { backendReadinessSchema, backendStatusSchema, parseBackendDocument } from '../schemas/index.js'

export const GATEWAY_VERSION = '2.5.0'

/**
 * GET /status and GET /readiness: fetched from the backend and wrapped with
 * gateway data and the caller's tier.
 */
export function createStatusRouter(backend: Pick<BackendClient, 'getJson'>, version: string = GATEWAY_VERSION): Router {
  const router = Router()

  router.get(
    '/status',
    asyncHandler(async (req, res) => {
      const document = await backend.getJson('/status', callerSignal(res))
      const status = parseBackendDocument(backendStatusSchema, document, '/status')

      res.json({
        success: true,
        data: {
          server_status: 'operational',
          gateway_version: version,
          backend_status: status.status,
          uptime: status.uptime,
          chains: status.chains,
          sla_assessment: status.sla_assessment,
          system_health: status.system_health,
          timestamp: new Date().toISOString(),
        },
        tier: req.gateway?.tier ?? 'unknown',
      })
    }),
  )

  router.get(
    '/readiness',
    asyncHandler(async (req, res) => {
      const document = await backend.getJson('/readiness', callerSignal(res))
      const readiness = parseBackendDocument(backendReadinessSchema, document, '/readiness')

      res.json({
        success: true,
        data: readiness,
        tier: req.gateway?.tier ?? 'unknown',
      })
    }),
  )

  return router
}
