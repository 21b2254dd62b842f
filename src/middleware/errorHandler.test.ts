import { describe, it, expect, vi, beforeEach } from 'vitest'
import type { NextFunction, Request, Response } from 'express'
import { errorHandler } from './errorHandler.js'
import {
  BackendUnavailableError,
  ForbiddenError,
  RateLimitedError,
  RequestCancelledError,
  UnauthenticatedError,
} from '../errors.js'
import { Tier } from '../types/gateway.js'

describe('errorHandler', () => {
  const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() }
  let req: Partial<Request>
  let res: Partial<Response>
  let next: NextFunction

  beforeEach(() => {
    vi.clearAllMocks()
    req = { method: 'GET', path: '/status' }
    res = {
      headersSent: false,
      status: vi.fn().mockReturnThis(),
      json: vi.fn().mockReturnThis(),
      setHeader: vi.fn().mockReturnThis(),
    }
    next = vi.fn()
  })

  const handle = (err: unknown): void => errorHandler(logger)(err, req as Request, res as Response, next)

  it('renders a gateway error as JSON with its status', () => {
    req.gateway = { identity: 'key:p', tier: Tier.PRO }
    handle(new ForbiddenError('Enterprise tier required'))

    expect(res.status).toHaveBeenCalledWith(403)
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      error: 'Forbidden',
      message: 'Enterprise tier required',
      code: 403,
      timestamp: expect.any(String),
      tier: 'pro',
    })
  })

  it('sets Retry-After on 429', () => {
    handle(new RateLimitedError(42, 'Rate limit exceeded: 20 requests per minute'))

    expect(res.setHeader).toHaveBeenCalledWith('Retry-After', '42')
    expect(res.status).toHaveBeenCalledWith(429)
  })

  it('sets WWW-Authenticate on 401', () => {
    handle(new UnauthenticatedError())

    expect(res.setHeader).toHaveBeenCalledWith('WWW-Authenticate', 'Bearer')
    expect(res.json).toHaveBeenCalledWith(expect.objectContaining({ message: 'Invalid API key', code: 401 }))
  })

  it('maps body parser failures to 400', () => {
    const parseError = Object.assign(new SyntaxError('Unexpected end of JSON input'), {
      status: 400,
      expose: true,
    })
    handle(parseError)

    expect(res.status).toHaveBeenCalledWith(400)
    expect(res.json).toHaveBeenCalledWith(
      expect.objectContaining({ error: 'Bad Request', message: 'Invalid request: Unexpected end of JSON input' }),
    )
  })

  it('keeps the status of other client errors from body parsing', () => {
    const tooLarge = Object.assign(new Error('request entity too large'), { status: 413, expose: true })
    handle(tooLarge)

    expect(res.status).toHaveBeenCalledWith(413)
    expect(res.json).toHaveBeenCalledWith(
      expect.objectContaining({ error: 'Payload Too Large', message: 'request entity too large', code: 413 }),
    )
  })

  it('hides the details of unexpected errors', () => {
    const boom = new Error('database password is test-secret')
    handle(boom)

    expect(res.status).toHaveBeenCalledWith(500)
    expect(res.json).toHaveBeenCalledWith(
      expect.objectContaining({ error: 'Internal Server Error', message: 'An unexpected error occurred' }),
    )
    expect(logger.error).toHaveBeenCalledWith('[Gateway] Unhandled error on GET /status', boom)
  })

  it('labels unsupported media type errors by their status', () => {
    handle(Object.assign(new Error('unsupported charset "UTF-7"'), { status: 415, expose: true }))

    expect(res.json).toHaveBeenCalledWith(expect.objectContaining({ error: 'Unsupported Media Type', code: 415 }))
  })

  it('renders backend failures as 503', () => {
    handle(new BackendUnavailableError('Backend unavailable: connect ECONNREFUSED'))

    expect(res.status).toHaveBeenCalledWith(503)
  })

  it('does not answer a caller that has gone away', () => {
    handle(new RequestCancelledError())

    expect(res.status).not.toHaveBeenCalled()
    expect(next).not.toHaveBeenCalled()
  })

  it('delegates once headers are sent', () => {
    res = { ...res, headersSent: true }
    const err = new Error('late failure')
    handle(err)

    expect(next).toHaveBeenCalledWith(err)
    expect(res.status).not.toHaveBeenCalled()
  })
})
