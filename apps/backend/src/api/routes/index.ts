import { Router } from 'express';
import type {
    IClusterInfoProvider,
    ILogger,
    INamespaceManager,
    INamespaceProvider
} from '@clusterview/types';
import { ContentRouter } from '../../modules/content/index.js';
import { NavigationController, navigationRouter, type NavigationAggregator } from '../../modules/navigation/index.js';
import type { ModuleRegistry } from '../../modules/registry/index.js';
import { createNotFoundHandler } from '../middleware/not-found.js';
import { clusterInfoRouter } from './cluster-info.router.js';
import { namespaceRouter } from './namespace.router.js';
import { namespacesRouter } from './namespaces.router.js';

/**
 * Collaborators the API router is built from.
 */
export interface IApiRouterDependencies {
    registry: ModuleRegistry;
    aggregator: NavigationAggregator;
    namespaceProvider: INamespaceProvider;
    clusterInfoProvider: IClusterInfoProvider;
    namespaceManager: INamespaceManager;
    logger: ILogger;
}

/**
 * Create the dashboard API router, mounted by the Express loader beneath the
 * configured prefix.
 *
 * Static routes are registered here once; content routes are installed once
 * per registered module by {@link ContentRouter}. Anything left unmatched
 * answers 404 with the error envelope.
 *
 * @returns Express router with all API routes mounted
 */
export function createApiRouter(deps: IApiRouterDependencies): Router {
    const router = Router();
    const logger = deps.logger.child({ component: 'api' });

    router.use('/namespaces', namespacesRouter(deps.namespaceProvider, logger));

    // No namespace (current) or a namespace in the path
    const navigationController = new NavigationController(deps.aggregator, deps.namespaceManager, logger);
    router.use('/navigation', navigationRouter(navigationController));

    router.use('/namespace', namespaceRouter(deps.namespaceManager, logger));
    router.use('/cluster-info', clusterInfoRouter(deps.clusterInfoProvider, logger));

    const contentRouter = new ContentRouter(deps.registry, deps.namespaceManager, logger.child({ component: 'content' }));
    router.use('/content', contentRouter.getRouter());

    router.use(createNotFoundHandler(logger));

    return router;
}
