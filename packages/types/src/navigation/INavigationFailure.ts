/**
 * Annotation left in a navigation response for a module whose section could
 * not be produced under the degrade failure policy.
 */
export interface INavigationFailure {
    /**
     * Name of the module that failed.
     */
    module: string;

    /**
     * Content prefix the module is registered under.
     */
    contentPath: string;

    /**
     * Generic client-facing message; the cause of the failure is logged only.
     */
    message: string;
}
