import type { Response } from 'express';
import type { IErrorResponse, ILogger } from '@clusterview/types';

export const JSON_CONTENT_TYPE = 'application/json';

/**
 * Write `value` as a JSON response with the given status.
 *
 * An `undefined` value is written as `null` so the body is always JSON.
 * The status is applied before encoding. When encoding or writing fails the
 * failure is logged and the response is ended as-is; the status is not
 * changed after the fact.
 */
function writeJSON(res: Response, status: number, value: unknown, logger: ILogger): void {
    res.status(status);

    try {
        res.setHeader('Content-Type', JSON_CONTENT_TYPE);
        res.send(JSON.stringify(value ?? null));
    } catch (error) {
        logger.error({ error }, 'encoding JSON response');
        if (!res.writableEnded) {
            res.end();
        }
    }
}

/**
 * Serve a successful JSON response with status 200.
 */
export function serveAsJSON(res: Response, value: unknown, logger: ILogger): void {
    writeJSON(res, 200, value, logger);
}

/**
 * Respond with the error envelope.
 *
 * Always logs the code and message, then writes
 * `{"error":{"code":code,"message":message}}` with HTTP status `code`.
 *
 * @example
 * respondWithError(res, StatusCodes.NOT_FOUND, 'not found', logger);
 */
export function respondWithError(res: Response, code: number, message: string, logger: ILogger): void {
    const body: IErrorResponse = {
        error: {
            code,
            message
        }
    };

    logger.info({ code, message }, 'unable to serve');

    writeJSON(res, code, body, logger);
}
