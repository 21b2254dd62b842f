/**
 * Errors that end a request with a specific HTTP status. The error handler
 * middleware renders every GatewayError; anything else becomes a 500.
 */
export class GatewayError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
  ) {
    super(message)
    this.name = new.target.name
  }
}

export class BadRequestError extends GatewayError {
  constructor(message: string) {
    super(400, 'Bad Request', message)
  }
}

export class UnauthenticatedError extends GatewayError {
  constructor(message = 'Invalid API key') {
    super(401, 'Unauthorized', message)
  }
}

export class ForbiddenError extends GatewayError {
  constructor(message: string) {
    super(403, 'Forbidden', message)
  }
}

export class RateLimitedError extends GatewayError {
  constructor(
    readonly retryAfterSeconds: number,
    message = 'Rate limit exceeded',
  ) {
    super(429, 'Too Many Requests', message)
  }
}

export class IssuanceLimitError extends GatewayError {
  constructor(readonly maxIssuedKeys: number) {
    super(503, 'Service Unavailable', `API key issuance limit reached (${maxIssuedKeys} keys)`)
  }
}

export class BackendUnavailableError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(503, 'Service Unavailable', message)
    if (options && 'cause' in options) {
      this.cause = options.cause
    }
  }
}

export class BackendTimeoutError extends BackendUnavailableError {
  constructor(readonly timeoutMs: number) {
    super(`Backend did not respond within ${timeoutMs}ms`)
  }
}

/** The caller went away before the backend answered. Never rendered. */
export class RequestCancelledError extends GatewayError {
  constructor() {
    super(499, 'Client Closed Request', 'Request cancelled by client')
  }
}
