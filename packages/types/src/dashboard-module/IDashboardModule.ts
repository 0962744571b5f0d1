import type { INavigationSection } from '../navigation/INavigationSection.js';
import type { IContentHandler } from './IContentHandler.js';
import type { IModuleContext } from './IModuleContext.js';

/**
 * Capability every pluggable dashboard content provider implements.
 *
 * A dashboard module owns one subtree of dashboard content and contributes one
 * top-level entry to the navigation tree. The backend depends only on this
 * interface; there is no base class and concrete modules are supplied by
 * independent collaborators.
 *
 * ## Registration
 *
 * Modules are registered once during startup through the registry builder,
 * which joins `/content` with {@link contentPath} to form the module's content
 * prefix. Registration order is significant: it is the order in which the
 * modules' sections appear in the composed navigation tree.
 *
 * ```typescript
 * const builder = new ModuleRegistryBuilder(logger);
 * builder.register(new OverviewModule(clusterClient));
 * const registry = builder.build();
 * ```
 *
 * ## Failure
 *
 * {@link navigation} and content handlers signal failure by rejecting. The
 * backend logs the original error and answers the client with a generic
 * message; nothing is retried.
 */
export interface IDashboardModule {
    /**
     * Human-readable module name, used for log attribution and navigation
     * failure annotations.
     */
    readonly name: string;

    /**
     * Path segment(s) beneath `/content` owned by this module.
     *
     * @example 'overview', 'workloads/apps'
     */
    contentPath(): string;

    /**
     * Build this module's navigation section for a namespace.
     *
     * @param context - Per-request context; honor `context.signal`
     * @param namespace - Namespace the navigation is generated for
     * @param contentPath - The module's registered content prefix, e.g. `/content/overview`
     */
    navigation(context: IModuleContext, namespace: string, contentPath: string): Promise<INavigationSection>;

    /**
     * Create the handler serving this module's content requests.
     *
     * Called once per module when the content routes are installed. Throwing
     * leaves this module's content unreachable while every other module keeps
     * being served.
     *
     * @param prefix - The module's registered content prefix
     */
    createContentHandler(prefix: string): IContentHandler;
}
