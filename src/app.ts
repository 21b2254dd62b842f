import express, { type Express, Router } from 'express'
import cors from 'cors'
import type { KeyRegistry } from './services/keyRegistry.js'
import type { RateLimiter } from './services/rateLimiter.js'
import type { MetricsCollector } from './services/metrics.js'
import type { BackendClient } from './services/backendClient.js'
import { requireApiKey } from './middleware/auth.js'
import { enforceRateLimit } from './middleware/rateLimit.js'
import { trackRequests } from './middleware/requestMetrics.js'
import { errorHandler } from './middleware/errorHandler.js'
import { createHealthRouter } from './routes/health.js'
import { createKeyIntrospectionRouter, createKeyIssuanceRouter } from './routes/keys.js'
import { createStatusRouter } from './routes/status.js'
import { createMetricsRouter } from './routes/metrics.js'
import { createProxyHandler } from './routes/proxy.js'
import { Tier, type GatewayLogger } from './types/gateway.js'

export interface GatewayDependencies {
  registry: KeyRegistry
  limiter: RateLimiter
  metrics: MetricsCollector
  backend: Pick<BackendClient, 'forward' | 'getJson'>
  logger?: GatewayLogger
  corsOrigin?: string
  version?: string
  trustProxy?: boolean
}

/**
 * Builds the request pipeline. Stages run in this order for every request:
 *
 *   trackRequests    one metrics record and log line per request
 *   cors
 *   /health          public, unthrottled
 *   /generate-key    public, throttled per source address on the free policy
 *   requireApiKey    401 unless a known bearer key is presented
 *   enforceRateLimit 429 with Retry-After when the tier policy is exhausted
 *   local routes     /status, /readiness, /metrics, /api-keys, /key-info
 *   proxy            everything else goes to the backend
 *   errorHandler     renders GatewayError as JSON
 */
export function createApp(deps: GatewayDependencies): Express {
  const logger = deps.logger ?? console
  const app = express()

  app.disable('x-powered-by')
  app.set('trust proxy', deps.trustProxy ?? false)

  app.use(trackRequests(deps.metrics, logger, { publicPaths: ['/health', '/generate-key'] }))
  app.use(cors({ origin: deps.corsOrigin ?? '*' }))

  // ── Public ──────────────────────────────────────────────────────────────────
  app.use('/health', createHealthRouter())
  app.post('/generate-key', enforceRateLimit(deps.limiter, deps.metrics, { anonymousTier: Tier.FREE }))
  app.use(createKeyIssuanceRouter(deps.registry, deps.limiter))

  // ── Authenticated ───────────────────────────────────────────────────────────
  const authenticated = Router()
  authenticated.use(requireApiKey(deps.registry))
  authenticated.use(enforceRateLimit(deps.limiter, deps.metrics))
  authenticated.use(createStatusRouter(deps.backend, deps.version))
  authenticated.use(createMetricsRouter(deps.metrics))
  authenticated.use(createKeyIntrospectionRouter(deps.registry, deps.limiter))
  authenticated.use(createProxyHandler(deps.backend))
  app.use(authenticated)

  app.use(errorHandler(logger))

  return app
}
