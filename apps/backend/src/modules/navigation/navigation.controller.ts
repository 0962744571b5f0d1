import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { ILogger, INamespaceManager } from '@clusterview/types';
import { createModuleContext } from '../../api/module-context.js';
import { respondWithError, serveAsJSON } from '../../api/respond.js';
import type { NavigationAggregator } from './navigation-aggregator.js';

/**
 * Controller serving the composed navigation tree.
 *
 * Endpoints:
 * - GET /navigation - navigation for the current namespace
 * - GET /navigation/namespace/:namespace - navigation scoped to `namespace`
 *
 * Success body:
 * ```json
 * { "sections": [ { "id": "...", "title": "Overview", "path": "...", "children": [] } ] }
 * ```
 *
 * A `failures` array is added when the degrade policy left modules out.
 */
export class NavigationController {
    constructor(
        private readonly aggregator: NavigationAggregator,
        private readonly namespaceManager: INamespaceManager,
        private readonly logger: ILogger
    ) {}

    getNavigation = async (req: Request, res: Response): Promise<void> => {
        const namespace = req.params.namespace ?? this.namespaceManager.getNamespace();
        const context = createModuleContext(req, res, this.logger);

        try {
            const { sections, failures } = await this.aggregator.compose(context, namespace);
            serveAsJSON(res, failures.length > 0 ? { sections, failures } : { sections }, context.logger);
        } catch (error) {
            context.logger.error({ error, namespace }, 'generating navigation');
            respondWithError(res, StatusCodes.INTERNAL_SERVER_ERROR, 'unable to generate navigation', context.logger);
        }
    };
}
