import type { Request, RequestHandler, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { ILogger } from '@clusterview/types';
import { respondWithError } from '../respond.js';

/**
 * Fallback for requests no route matched.
 */
export function createNotFoundHandler(logger: ILogger): RequestHandler {
    return (req: Request, res: Response) => {
        logger.error({ url: req.originalUrl, method: req.method }, 'api handler not found');
        respondWithError(res, StatusCodes.NOT_FOUND, 'not found', logger);
    };
}
