import type { NextFunction, Request, RequestHandler, Response } from 'express'
import type { MetricsCollector } from '../services/metrics.js'
import type { GatewayLogger } from '../types/gateway.js'

/** Recorded when the caller disconnects before a response was sent. */
export const CLIENT_CLOSED_REQUEST = 499

/** Endpoint label for requests with no resolved tier outside the public routes. */
export const UNMATCHED_ENDPOINT = 'unmatched'

export interface TrackRequestsOptions {
  /** Paths recorded under their own label even when no tier was resolved. */
  publicPaths?: readonly string[]
}

/**
 * First stage of the pipeline. Every request that enters leaves exactly one
 * metrics record and one log line, whichever way it ends.
 */
export function trackRequests(
  metrics: MetricsCollector,
  logger: GatewayLogger = console,
  options: TrackRequestsOptions = {},
): RequestHandler {
  const publicPaths = new Set(options.publicPaths ?? [])
  let active = 0

  return (req: Request, res: Response, next: NextFunction): void => {
    const startedAt = process.hrtime.bigint()
    const method = req.method
    const path = req.path
    let recorded = false

    active++
    metrics.setActiveConnections(active)

    const complete = (): void => {
      if (recorded) {
        return
      }
      recorded = true
      active--
      metrics.setActiveConnections(active)

      const status = res.writableFinished ? res.statusCode : CLIENT_CLOSED_REQUEST
      const tier = req.gateway?.tier ?? 'anonymous'
      const durationSeconds = Number(process.hrtime.bigint() - startedAt) / 1e9

      const endpoint = req.gateway || publicPaths.has(path) ? path : UNMATCHED_ENDPOINT

      metrics.recordRequest(method, endpoint, tier, status, durationSeconds)

      const line = `[Gateway] ${method} ${path} ${status} tier=${tier} ${(durationSeconds * 1000).toFixed(1)}ms`
      if (status >= 500) {
        logger.error(line)
      } else if (status >= 400) {
        logger.warn(line)
      } else {
        logger.log(line)
      }
    }

    res.once('finish', complete)
    res.once('close', complete)
    next()
  }
}
