import express, { type Request, type RequestHandler } from 'express'
import type { BackendClient, HeaderMap } from '../services/backendClient.js'
import { asyncHandler } from '../middleware/asyncHandler.js'
import { callerSignal } from '../middleware/callerSignal.js'

export const MAX_PROXY_BODY = '10mb'

// The caller's credential is for the gateway, not the backend.
const GATEWAY_ONLY_HEADERS = new Set(['authorization'])

function forwardedHeaders(req: Request): HeaderMap {
  const headers: HeaderMap = {}
  for (const [name, value] of Object.entries(req.headers)) {
    if (value !== undefined && !GATEWAY_ONLY_HEADERS.has(name)) {
      headers[name] = value
    }
  }

  const clientAddress = req.socket.remoteAddress
  if (clientAddress) {
    const prior = req.headers['x-forwarded-for']
    headers['x-forwarded-for'] = prior ? `${prior}, ${clientAddress}` : clientAddress
  }
  return headers
}

function queryString(originalUrl: string): string | undefined {
  const index = originalUrl.indexOf('?')
  return index === -1 ? undefined : originalUrl.slice(index + 1)
}

/**
 * Catch-all: forwards the request to the backend and relays its status,
 * headers and body unchanged. Backend failures reach the error handler as
 * BackendUnavailableError; nothing is retried.
 */
export function createProxyHandler(backend: Pick<BackendClient, 'forward'>): RequestHandler[] {
  return [
    express.raw({ type: () => true, limit: MAX_PROXY_BODY }),
    asyncHandler(async (req, res) => {
      // A leading `//` would otherwise read as a protocol-relative URL.
      const path = req.path.replace(/^\/+/, '/')

      const response = await backend.forward({
        method: req.method,
        path,
        query: queryString(req.originalUrl),
        headers: forwardedHeaders(req),
        body: Buffer.isBuffer(req.body) ? req.body : undefined,
        signal: callerSignal(res),
      })

      res.status(response.status)
      for (const [name, value] of Object.entries(response.headers)) {
        res.setHeader(name, value)
      }
      res.end(response.body)
    }),
  ]
}
