import type { IModuleContext } from './IModuleContext.js';

/**
 * Content request delegated by the content router to a module's handler.
 */
export interface IContentRequest {
    /**
     * HTTP method of the inbound request, upper case.
     */
    method: string;

    /**
     * Registered content prefix of the module, e.g. `/content/overview`.
     */
    prefix: string;

    /**
     * Remainder of the request path beneath the prefix and the optional
     * namespace scope, without a leading slash. Empty for the module root.
     *
     * @example 'workloads/deployments'
     */
    path: string;

    /**
     * Namespace the request is scoped to. Taken from a leading
     * `namespace/{name}` pair in the remainder, otherwise the current namespace.
     */
    namespace: string;

    /**
     * Parsed query string.
     */
    query: Record<string, unknown>;

    /**
     * Parsed JSON body. Requests without a JSON body carry an empty object.
     */
    body: unknown;
}

/**
 * Serves the content of one dashboard module.
 *
 * Resolves with a JSON-serializable body written with status 200, or rejects
 * to have the backend answer with the error envelope.
 */
export type IContentHandler = (request: IContentRequest, context: IModuleContext) => Promise<unknown>;
