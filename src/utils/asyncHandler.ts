import { Request, Response, NextFunction, RequestHandler } from 'express';

export type AsyncRouteHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Forwards rejections from an async route handler to the Express error handler
 */
export const asyncHandler =
  (fn: AsyncRouteHandler): RequestHandler =>
  (req, res, next) => {
    void fn(req, res, next).catch(next);
  };

export default asyncHandler;
