/**
 * One node of the composed dashboard navigation tree.
 *
 * Each dashboard module contributes exactly one top-level section per request.
 * Sections are built fresh for every navigation request and belong to the
 * caller once returned.
 */
export interface INavigationSection {
    /**
     * Stable identity for the node.
     *
     * Derived from `path`, so the same logical entry keeps the same id across
     * requests and clients can diff re-renders instead of rebuilding the tree.
     */
    id: string;

    /**
     * Display label shown in the sidebar.
     *
     * @example 'Overview', 'Workloads'
     */
    title: string;

    /**
     * Resolved client path for the entry, including the module's content prefix.
     *
     * @example '/content/overview/namespace/default/workloads'
     */
    path: string;

    /**
     * Ordered child entries. Empty for leaf nodes.
     */
    children: INavigationSection[];
}
