import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Adapt an async handler to Express 4, which ignores returned promises:
 * rejections are forwarded to next() so the error handler sees them.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
