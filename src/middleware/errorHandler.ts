import { STATUS_CODES } from 'node:http'
import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express'
import { BadRequestError, GatewayError, RateLimitedError, RequestCancelledError, UnauthenticatedError } from '../errors.js'
import type { GatewayLogger } from '../types/gateway.js'

export interface ErrorBody {
  success: false
  error: string
  message: string
  code: number
  timestamp: string
  tier?: string
}

// body-parser errors carry an HTTP status and an `expose` flag.
function isClientHttpError(err: unknown): err is { status: number; message: string } {
  return (
    typeof err === 'object' &&
    err !== null &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500 &&
    'expose' in err &&
    err.expose === true
  )
}

function toGatewayError(err: unknown): GatewayError | undefined {
  if (err instanceof GatewayError) {
    return err
  }
  if (isClientHttpError(err)) {
    return err.status === 400
      ? new BadRequestError(`Invalid request: ${err.message}`)
      : new GatewayError(err.status, STATUS_CODES[err.status] ?? 'Bad Request', err.message)
  }
  return undefined
}

/**
 * Terminal stage: renders every error as a JSON body with the matching
 * status. Unknown errors become a 500 without leaking their message.
 */
export function errorHandler(logger: GatewayLogger = console): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err)
      return
    }

    // Nobody is left to answer.
    if (err instanceof RequestCancelledError) {
      return
    }

    let gatewayError = toGatewayError(err)
    if (!gatewayError) {
      logger.error(`[Gateway] Unhandled error on ${req.method} ${req.path}`, err)
      gatewayError = new GatewayError(500, 'Internal Server Error', 'An unexpected error occurred')
    }

    if (gatewayError instanceof RateLimitedError) {
      res.setHeader('Retry-After', String(gatewayError.retryAfterSeconds))
    }
    if (gatewayError instanceof UnauthenticatedError) {
      res.setHeader('WWW-Authenticate', 'Bearer')
    }

    const body: ErrorBody = {
      success: false,
      error: gatewayError.code,
      message: gatewayError.message,
      code: gatewayError.status,
      timestamp: new Date().toISOString(),
    }
    if (req.gateway?.tier) {
      body.tier = req.gateway.tier
    }

    res.status(gatewayError.status).json(body)
  }
}
