import { Router } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { IClusterInfoProvider, ILogger } from '@clusterview/types';
import { asyncHandler } from '../middleware/async-handler.js';
import { respondWithError, serveAsJSON } from '../respond.js';

/**
 * Create the cluster-info router. Answers every method.
 *
 * Routes:
 * - * /cluster-info - `{ "context": "...", "cluster": "...", "server": "...", "user": "..." }`
 */
export function clusterInfoRouter(provider: IClusterInfoProvider, logger: ILogger): Router {
    const router = Router();

    router.all('/', asyncHandler(async (_req, res) => {
        try {
            serveAsJSON(res, await provider.get(), logger);
        } catch (error) {
            logger.error({ error }, 'fetching cluster info');
            respondWithError(res, StatusCodes.INTERNAL_SERVER_ERROR, 'unable to get cluster info', logger);
        }
    }));

    return router;
}
