import type { ILogger } from '../logging/ILogger.js';

/**
 * Ambient per-request context threaded into every dashboard module call.
 *
 * The backend creates one context per inbound HTTP request and passes the same
 * instance to every module it calls while serving that request.
 */
export interface IModuleContext {
    /**
     * Identifier of the inbound request, echoed in the `x-request-id` header.
     */
    requestId: string;

    /**
     * Aborted when the client disconnects before the response is written.
     *
     * Modules doing slow work (cluster queries, remote calls) should pass this
     * signal on and return promptly once it fires. The backend imposes no
     * timeout of its own, so a module that ignores it holds the request open.
     */
    signal: AbortSignal;

    /**
     * Logger already bound to the request id and the module name.
     */
    logger: ILogger;
}
