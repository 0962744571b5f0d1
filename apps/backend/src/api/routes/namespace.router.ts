import { Router } from 'express';
import { z } from 'zod';
import type { ILogger, INamespaceManager } from '@clusterview/types';
import { validateBody } from '../middleware/validate.js';
import { serveAsJSON } from '../respond.js';

/**
 * Zod schema for changing the current namespace.
 */
const updateNamespaceSchema = z.object({
    namespace: z.string().trim().min(1).max(253)
});

type UpdateNamespaceBody = z.infer<typeof updateNamespaceSchema>;

/**
 * Create the current-namespace router.
 *
 * Routes:
 * - GET  /namespace - `{ "namespace": "default" }`
 * - POST /namespace - body `{ "namespace": "kube-system" }`, echoes the new value
 *
 * An invalid body is rejected with 400 by the error middleware.
 */
export function namespaceRouter(manager: INamespaceManager, logger: ILogger): Router {
    const router = Router();

    router.get('/', (_req, res) => {
        serveAsJSON(res, { namespace: manager.getNamespace() }, logger);
    });

    router.post('/', validateBody(updateNamespaceSchema), (req, res) => {
        const { namespace }: UpdateNamespaceBody = req.body;
        manager.setNamespace(namespace);
        serveAsJSON(res, { namespace: manager.getNamespace() }, logger);
    });

    return router;
}
