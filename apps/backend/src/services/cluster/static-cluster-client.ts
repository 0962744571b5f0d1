import type { IClusterInfo, IClusterInfoProvider, INamespaceProvider } from '@clusterview/types';

export interface IStaticClusterClientOptions {
    namespaces: readonly string[];
    info: IClusterInfo;
}

/**
 * Cluster client answering from fixed configuration.
 *
 * Stands in for a live cluster connection: namespaces and connection details
 * come from the environment (`NAMESPACES`, `CLUSTER_*`). Callers always get
 * fresh copies.
 */
export class StaticClusterClient implements INamespaceProvider, IClusterInfoProvider {
    private readonly namespaces: readonly string[];
    private readonly info: Readonly<IClusterInfo>;

    constructor(options: IStaticClusterClientOptions) {
        this.namespaces = Object.freeze([...new Set(options.namespaces)]);
        this.info = Object.freeze({ ...options.info });
    }

    async list(): Promise<string[]> {
        return [...this.namespaces];
    }

    async get(): Promise<IClusterInfo> {
        return { ...this.info };
    }
}
