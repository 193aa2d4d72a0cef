import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Forward rejections from an async route handler to the error middleware
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
