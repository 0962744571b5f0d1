import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { IContentHandler, ILogger, INamespaceManager } from '@clusterview/types';
import { asyncHandler } from '../../api/middleware/async-handler.js';
import { createModuleContext } from '../../api/module-context.js';
import { respondWithError, serveAsJSON } from '../../api/respond.js';
import { CONTENT_ROOT, parseContentScope } from '../../lib/content-path.js';
import { ClusterviewError, errorMessage } from '../../lib/errors.js';
import type { ModuleRegistry } from '../registry/index.js';

/**
 * A module whose content handler could not be created.
 */
export interface IContentInstallFailure {
    module: string;
    contentPath: string;
    message: string;
}

/**
 * Dispatches `/content/...` requests to the module owning the path.
 *
 * ## Installation
 *
 * The constructor asks every registered module for its content handler once.
 * A module that throws is logged and recorded in {@link installErrors}; its
 * content becomes unreachable while every other module is still served.
 *
 * ## Dispatch
 *
 * The request path is resolved against the registry by longest prefix on
 * segment boundaries. Beneath the prefix an optional `namespace/{name}` pair
 * scopes the request; without it the current namespace applies:
 *
 * ```
 * /content/overview/namespace/kube-system/workloads  -> namespace 'kube-system', path 'workloads'
 * /content/overview/workloads                        -> current namespace,       path 'workloads'
 * ```
 *
 * Paths no installed module owns fall through to the next handler, which is
 * the not-found fallback.
 */
export class ContentRouter {
    readonly installErrors: IContentInstallFailure[] = [];

    private readonly handlers = new Map<string, IContentHandler>();

    constructor(
        private readonly registry: ModuleRegistry,
        private readonly namespaceManager: INamespaceManager,
        private readonly logger: ILogger
    ) {
        for (const entry of registry.entries) {
            try {
                this.handlers.set(entry.contentPath, entry.module.createContentHandler(entry.contentPath));
                this.logger.debug({ contentPath: entry.contentPath, module: entry.module.name }, 'installed content routes');
            } catch (error) {
                this.installErrors.push({
                    module: entry.module.name,
                    contentPath: entry.contentPath,
                    message: errorMessage(error)
                });
                this.logger.error({ error, contentPath: entry.contentPath, module: entry.module.name }, 'register routers');
            }
        }
    }

    /**
     * Content prefixes with an installed handler, in registration order.
     */
    get installedPaths(): string[] {
        return this.registry.entries
            .filter(entry => this.handlers.has(entry.contentPath))
            .map(entry => entry.contentPath);
    }

    /**
     * Express router to mount at `/content`.
     */
    getRouter(): Router {
        const router = Router();
        router.use(asyncHandler(this.dispatch));
        return router;
    }

    private readonly dispatch = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const resolved = this.registry.resolve(CONTENT_ROOT + req.path);
        const handler = resolved ? this.handlers.get(resolved.entry.contentPath) : undefined;

        if (!resolved || !handler) {
            next();
            return;
        }

        const { entry } = resolved;
        const scope = parseContentScope(resolved.remainder);
        const context = createModuleContext(req, res, this.logger.child({ module: entry.module.name }));

        try {
            const body = await handler(
                {
                    method: req.method,
                    prefix: entry.contentPath,
                    path: scope.path,
                    namespace: scope.namespace ?? this.namespaceManager.getNamespace(),
                    query: req.query,
                    body: req.body
                },
                context
            );
            serveAsJSON(res, body, context.logger);
        } catch (error) {
            if (context.signal.aborted) {
                context.logger.debug({ error, contentPath: entry.contentPath }, 'content request aborted by client');
                return;
            }

            if (error instanceof ClusterviewError && error.status < StatusCodes.INTERNAL_SERVER_ERROR) {
                respondWithError(res, error.status, error.message, context.logger);
                return;
            }

            context.logger.error({ error, contentPath: entry.contentPath, path: scope.path }, 'loading content');
            respondWithError(res, StatusCodes.INTERNAL_SERVER_ERROR, 'unable to load content', context.logger);
        }
    };
}
