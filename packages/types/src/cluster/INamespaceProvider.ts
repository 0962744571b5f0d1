/**
 * Lists the namespaces available in the connected cluster.
 */
export interface INamespaceProvider {
    /**
     * @returns Namespace names in the order the cluster reports them
     */
    list(): Promise<string[]>;
}
