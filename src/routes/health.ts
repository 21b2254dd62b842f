import { Router } from 'express'

/**
 * Liveness endpoint. Needs no credentials and is never rate limited.
 */
export function createHealthRouter(): Router {
  const router = Router()

  router.get('/', (_req, res) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() })
  })

  return router
}
