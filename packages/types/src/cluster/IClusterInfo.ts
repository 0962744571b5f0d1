/**
 * Connection details of the cluster the dashboard is pointed at.
 */
export interface IClusterInfo {
    /**
     * Name of the active kubeconfig context.
     */
    context: string;

    /**
     * Name of the cluster entry the context refers to.
     */
    cluster: string;

    /**
     * API server URL.
     */
    server: string;

    /**
     * User the context authenticates as.
     */
    user: string;
}

/**
 * Supplies cluster connection details for the cluster-info route.
 */
export interface IClusterInfoProvider {
    get(): Promise<IClusterInfo>;
}
