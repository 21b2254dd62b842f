import type { Response } from 'express'

/**
 * Signal that aborts when the caller disconnects before the response is
 * complete, so backend work on its behalf can be cancelled.
 */
export function callerSignal(res: Response): AbortSignal {
  const controller = new AbortController()
  res.once('close', () => {
    if (!res.writableFinished) {
      controller.abort()
    }
  })
  return controller.signal
}
