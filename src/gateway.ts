import type { Express } from 'express'
import type { GatewayConfig } from './config/index.js'
import { createApp } from './app.js'
import { createRedisClient, RedisRateLimitStore } from './cache/redis.js'
import { BackendClient } from './services/backendClient.js'
import { KeyRegistry } from './services/keyRegistry.js'
import { MetricsCollector } from './services/metrics.js'
import { RateLimiter } from './services/rateLimiter.js'
import { MemoryRateLimitStore, type RateLimitStore } from './services/rateLimitStore.js'
import type { GatewayLogger } from './types/gateway.js'

export interface Gateway {
  app: Express
  registry: KeyRegistry
  limiter: RateLimiter
  metrics: MetricsCollector
  backend: BackendClient
  /** Starts background maintenance (idle rate limit state eviction). */
  start(): void
  close(): Promise<void>
}

function createStore(config: GatewayConfig, logger: GatewayLogger): RateLimitStore {
  if (config.rateLimit.redisUrl) {
    logger.log('[RateLimitStore] Using Redis-backed rate limit counters')
    return new RedisRateLimitStore(createRedisClient(config.rateLimit.redisUrl, logger))
  }
  logger.warn('[RateLimitStore] REDIS_URL not set; rate limit counters are kept in memory for this process only')
  return new MemoryRateLimitStore()
}

/**
 * Wires every collaborator from configuration. Each gateway owns its own
 * registry, limiter, metrics and backend pool.
 */
export function createGateway(config: GatewayConfig, logger: GatewayLogger = console): Gateway {
  const registry = new KeyRegistry({ prefix: config.apiKeyPrefix, maxIssuedKeys: config.maxIssuedKeys })
  const store = createStore(config, logger)
  const limiter = new RateLimiter(store, {
    idleTtlMs: config.rateLimit.idleTtlMs,
    sweepIntervalMs: config.rateLimit.sweepIntervalMs,
  })
  const metrics = new MetricsCollector({ collectDefaultMetrics: config.collectDefaultMetrics })
  const backend = new BackendClient({
    baseUrl: config.backend.url,
    timeoutMs: config.backend.timeoutMs,
  })

  const app = createApp({
    registry,
    limiter,
    metrics,
    backend,
    logger,
    corsOrigin: config.corsOrigin,
  })

  return {
    app,
    registry,
    limiter,
    metrics,
    backend,
    start() {
      limiter.start((err) => {
        logger.error('[RateLimiter] Failed to sweep idle rate limit state', err)
      })
    },
    async close() {
      limiter.stop()
      backend.close()
      await store.close()
    },
  }
}
