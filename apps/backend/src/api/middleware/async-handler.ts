import type { NextFunction, Request, Response } from 'express';

/**
 * Async handler wrapper for Express route handlers.
 *
 * Express 4 does not observe the promise returned by a handler. This wrapper
 * forwards rejections to the error middleware instead of leaving them
 * unhandled.
 *
 * @param fn - Async route handler function to wrap
 * @returns Wrapped function that catches errors and passes them to next()
 *
 * @example
 * router.get('/', asyncHandler(async (req, res) => {
 *   serveAsJSON(res, await provider.list(), logger);
 * }));
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}
