import { Router } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { ILogger, INamespaceProvider } from '@clusterview/types';
import { asyncHandler } from '../middleware/async-handler.js';
import { respondWithError, serveAsJSON } from '../respond.js';

/**
 * Create the namespace listing router.
 *
 * Routes:
 * - GET /namespaces - `{ "namespaces": ["default", "kube-system"] }`
 */
export function namespacesRouter(provider: INamespaceProvider, logger: ILogger): Router {
    const router = Router();

    router.get('/', asyncHandler(async (_req, res) => {
        try {
            const namespaces = await provider.list();
            serveAsJSON(res, { namespaces }, logger);
        } catch (error) {
            logger.error({ error }, 'listing namespaces');
            respondWithError(res, StatusCodes.INTERNAL_SERVER_ERROR, 'unable to list namespaces', logger);
        }
    }));

    return router;
}
