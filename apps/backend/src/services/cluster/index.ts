export { NamespaceManager } from './namespace-manager.js';
export { StaticClusterClient } from './static-cluster-client.js';
export type { IStaticClusterClientOptions } from './static-cluster-client.js';
