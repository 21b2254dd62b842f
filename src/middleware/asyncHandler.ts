import type { NextFunction, Request, RequestHandler, Response } from 'express'

/**
 * Forwards rejections from an async route handler to the error handler.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next)
  }
}
