/**
 * Overview dashboard module.
 *
 * Built-in module owning `/content/overview`. It contributes the "Overview"
 * entry of the navigation tree, with one child per resource group, and serves
 * a summary document for the namespace root and for each group.
 *
 * Resource listings themselves come from cluster collaborators outside this
 * backend; the module only describes the structure a client renders.
 */

import type {
    IContentHandler,
    IContentRequest,
    IDashboardModule,
    IModuleContext,
    INamespaceProvider,
    INavigationSection
} from '@clusterview/types';
import { NotFoundError } from '../../lib/errors.js';
import { createNavigationSection } from '../navigation/navigation-section.js';

/**
 * Resource group shown beneath the overview entry.
 */
interface IResourceGroup {
    slug: string;
    title: string;
    kinds: readonly string[];
}

const RESOURCE_GROUPS: readonly IResourceGroup[] = [
    { slug: 'workloads', title: 'Workloads', kinds: ['CronJob', 'DaemonSet', 'Deployment', 'Job', 'Pod', 'ReplicaSet', 'StatefulSet'] },
    { slug: 'discovery-and-load-balancing', title: 'Discovery and Load Balancing', kinds: ['Ingress', 'Service'] },
    { slug: 'config-and-storage', title: 'Config and Storage', kinds: ['ConfigMap', 'PersistentVolumeClaim', 'Secret'] },
    { slug: 'rbac', title: 'RBAC', kinds: ['Role', 'RoleBinding', 'ServiceAccount'] },
    { slug: 'events', title: 'Events', kinds: ['Event'] }
];

/**
 * Content document served for the namespace root.
 */
export interface IOverviewSummary {
    title: string;
    namespace: string;
    groups: Array<{ title: string; path: string }>;
}

/**
 * Content document served for one resource group.
 */
export interface IResourceGroupContent {
    title: string;
    namespace: string;
    kinds: string[];
}

export class OverviewModule implements IDashboardModule {
    readonly name = 'Overview';

    constructor(private readonly namespaces: INamespaceProvider) {}

    contentPath(): string {
        return 'overview';
    }

    async navigation(context: IModuleContext, namespace: string, contentPath: string): Promise<INavigationSection> {
        context.signal.throwIfAborted();

        const base = `${contentPath}/namespace/${namespace}`;
        const children = RESOURCE_GROUPS.map(group => createNavigationSection(group.title, `${base}/${group.slug}`));

        return createNavigationSection(this.name, base, children);
    }

    createContentHandler(prefix: string): IContentHandler {
        return (request, context) => this.content(prefix, request, context);
    }

    private async content(
        prefix: string,
        request: IContentRequest,
        context: IModuleContext
    ): Promise<IOverviewSummary | IResourceGroupContent> {
        const known = await this.namespaces.list();
        context.signal.throwIfAborted();

        if (!known.includes(request.namespace)) {
            throw new NotFoundError('not found', { namespace: request.namespace });
        }

        const base = `${prefix}/namespace/${request.namespace}`;

        if (request.path === '') {
            return {
                title: this.name,
                namespace: request.namespace,
                groups: RESOURCE_GROUPS.map(group => ({ title: group.title, path: `${base}/${group.slug}` }))
            };
        }

        const group = RESOURCE_GROUPS.find(candidate => candidate.slug === request.path);
        if (!group) {
            throw new NotFoundError('not found', { path: request.path });
        }

        context.logger.debug({ group: group.slug, namespace: request.namespace }, 'serving resource group');

        return {
            title: group.title,
            namespace: request.namespace,
            kinds: [...group.kinds]
        };
    }
}
