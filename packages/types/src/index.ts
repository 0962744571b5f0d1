/**
 * Shared contracts of the clusterview dashboard backend.
 *
 * Dashboard modules depend on this package only: the module capability, the
 * navigation tree, the cluster collaborators and the logger contract.
 */
export type { IDashboardModule, IContentHandler, IContentRequest, IModuleContext } from './dashboard-module/index.js';
export type {
    INavigationSection,
    INavigationFailure,
    INavigationResult,
    NavigationFailurePolicy
} from './navigation/index.js';
export type {
    INamespaceProvider,
    IClusterInfo,
    IClusterInfoProvider,
    INamespaceManager
} from './cluster/index.js';
export type { IErrorResponse } from './http/index.js';
export type { ILogger } from './logging/index.js';
