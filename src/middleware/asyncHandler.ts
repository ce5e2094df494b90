import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Wrap an async Express handler so rejections reach `next()` and the
 * problem+json error middleware.
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
