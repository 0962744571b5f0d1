import type { Request, Response } from 'express';
import type { ILogger, IModuleContext } from '@clusterview/types';

/**
 * Build the context passed to dashboard modules while serving `req`.
 *
 * The context's signal aborts when the connection closes before the response
 * has been fully written, which is how a client disconnect reaches module code.
 */
export function createModuleContext(req: Request, res: Response, logger: ILogger): IModuleContext {
    const controller = new AbortController();

    res.on('close', () => {
        if (!res.writableFinished) {
            controller.abort();
        }
    });

    return {
        requestId: req.id,
        signal: controller.signal,
        logger: logger.child({ requestId: req.id })
    };
}
