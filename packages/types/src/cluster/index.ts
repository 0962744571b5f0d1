/**
 * Cluster collaborators consumed by the backend. Implementations live outside
 * the routing core and are injected at bootstrap.
 */
export type { INamespaceProvider } from './INamespaceProvider.js';
export type { IClusterInfo, IClusterInfoProvider } from './IClusterInfo.js';
export type { INamespaceManager } from './INamespaceManager.js';
