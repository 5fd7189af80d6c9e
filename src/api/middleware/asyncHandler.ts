import { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRouteHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Async handler wrapper for express route handlers
 * Forwards rejected promises to the error handler
 * @param fn Express route handler function
 */
export const asyncHandler = (fn: AsyncRouteHandler): RequestHandler => (req, res, next) => {
    fn(req, res, next).catch(next);
};
