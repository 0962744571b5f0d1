/**
 * @fileoverview Application entry point with two-phase lifecycle.
 *
 * Init builds every collaborator and freezes the module registry; run starts
 * serving. All module registration happens in init, strictly before the HTTP
 * handler exists, so the registry is read-only for the life of the server.
 *
 * @module index
 */

import http from 'node:http';
import type { IDashboardModule } from '@clusterview/types';
import { env } from './config/env.js';
import { logger } from './lib/logger.js';
import { createExpressApp } from './loaders/express.js';
import { NavigationAggregator } from './modules/navigation/index.js';
import { OverviewModule } from './modules/overview/index.js';
import { ModuleRegistryBuilder, type ModuleRegistry } from './modules/registry/index.js';
import { NamespaceManager, StaticClusterClient } from './services/cluster/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Main application entry point.
 *
 * @throws Logs error and exits with code 1 if bootstrap fails
 */
async function bootstrap(): Promise<void> {
    try {
        const ctx = bootstrapInit();
        await bootstrapRun(ctx);
    } catch (error) {
        logger.error({ error }, 'Failed to bootstrap application');
        process.exit(1);
    }
}

void bootstrap();

// ─────────────────────────────────────────────────────────────────────────────
// Two-Phase Lifecycle
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Shared context passed from init phase to run phase.
 */
interface BootstrapContext {
    server: http.Server;
    registry: ModuleRegistry;
}

/**
 * Init Phase: build collaborators, register modules, freeze the registry.
 *
 * A registration failure (invalid or duplicate content path) is fatal here:
 * the server never starts with a registry that disagrees with its routes.
 *
 * @returns Context containing the unstarted server and the registry
 */
function bootstrapInit(): BootstrapContext {
    const clusterClient = new StaticClusterClient({
        namespaces: env.NAMESPACES,
        info: {
            context: env.CLUSTER_CONTEXT,
            cluster: env.CLUSTER_NAME,
            server: env.CLUSTER_SERVER,
            user: env.CLUSTER_USER
        }
    });
    const namespaceManager = new NamespaceManager(env.DEFAULT_NAMESPACE, logger.child({ component: 'namespace' }));

    const modules: IDashboardModule[] = [
        new OverviewModule(clusterClient)
    ];

    const builder = new ModuleRegistryBuilder(logger.child({ component: 'module-registry' }));
    for (const module of modules) {
        builder.register(module);
    }
    const registry = builder.build();

    const aggregator = new NavigationAggregator(registry, logger.child({ component: 'navigation' }), {
        policy: env.NAVIGATION_FAILURE_POLICY,
        concurrency: env.NAVIGATION_CONCURRENCY
    });

    const app = createExpressApp({
        prefix: env.API_PREFIX,
        acceptedHosts: env.ACCEPTED_HOSTS,
        accessLogFormat: env.NODE_ENV === 'production' ? 'combined' : 'dev',
        registry,
        aggregator,
        namespaceProvider: clusterClient,
        clusterInfoProvider: clusterClient,
        namespaceManager,
        logger
    });
    const server = http.createServer(app);

    return { server, registry };
}

/**
 * Run Phase: start listening and install shutdown handlers.
 */
async function bootstrapRun(ctx: BootstrapContext): Promise<void> {
    await new Promise<void>((resolve, reject) => {
        ctx.server.once('error', reject);
        ctx.server.listen(env.PORT, env.LISTENER_ADDR, () => {
            ctx.server.off('error', reject);
            resolve();
        });
    });

    logger.info(
        { address: env.LISTENER_ADDR, port: env.PORT, prefix: env.API_PREFIX, modules: ctx.registry.size },
        'Server listening'
    );

    const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, 'Received shutdown signal, closing server');
        ctx.server.close(error => {
            if (error) {
                logger.error({ error }, 'Failed to close server cleanly');
                process.exit(1);
            }
            process.exit(0);
        });
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}
