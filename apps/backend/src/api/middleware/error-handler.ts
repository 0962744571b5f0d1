import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { ZodError } from 'zod';
import type { ILogger } from '@clusterview/types';
import { ClusterviewError } from '../../lib/errors.js';
import { respondWithError } from '../respond.js';

/**
 * Client errors raised by Express middleware (body-parser, http-errors)
 * carry their HTTP status on the error object.
 */
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }

  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/**
 * Final error middleware: converts anything thrown by a route into the error
 * envelope. The original error goes to the log; the client gets a generic
 * message.
 */
export function createErrorHandler(logger: ILogger): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, next: NextFunction) => {
    let status: number = StatusCodes.INTERNAL_SERVER_ERROR;
    let message = 'internal server error';

    if (error instanceof ClusterviewError) {
      status = error.status;
      if (status < StatusCodes.INTERNAL_SERVER_ERROR) {
        message = error.message;
      }
    } else if (error instanceof ZodError) {
      status = StatusCodes.BAD_REQUEST;
      message = 'invalid request';
    } else {
      const clientStatus = clientErrorStatus(error);
      if (clientStatus !== undefined) {
        status = clientStatus;
        message = 'invalid request';
      }
    }

    if (status >= StatusCodes.INTERNAL_SERVER_ERROR) {
      logger.error({ error, requestId: req.id }, 'Unhandled error');
    } else {
      logger.warn({ error, requestId: req.id }, 'Handled error');
    }

    if (res.headersSent) {
      next(error);
      return;
    }

    respondWithError(res, status, message, logger);
  };
}
