import compression from 'compression';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import type { Express } from 'express';
import { createHostRebindingGuard } from '../api/middleware/host-rebinding.js';
import { createErrorHandler } from '../api/middleware/error-handler.js';
import { createNotFoundHandler } from '../api/middleware/not-found.js';
import { requestContext } from '../api/middleware/request-context.js';
import { serveAsJSON } from '../api/respond.js';
import { createApiRouter, type IApiRouterDependencies } from '../api/routes/index.js';

export interface IExpressAppOptions extends IApiRouterDependencies {
  /**
   * Mount prefix of the API router, e.g. `/api/v1`.
   */
  prefix: string;

  /**
   * Hostnames the host-rebinding guard lets through.
   */
  acceptedHosts: readonly string[];

  /**
   * morgan format for access logs written through the logger. Omit to
   * disable access logging.
   */
  accessLogFormat?: string;
}

export function createExpressApp(options: IExpressAppOptions): Express {
  const { logger } = options;
  const app = express();

  // Runs before any router so a rejected host never reaches a handler
  app.use(createHostRebindingGuard(options.acceptedHosts, logger.child({ component: 'host-guard' })));

  app.use(requestContext);
  app.use(helmet());
  app.use(compression());
  app.use(express.json({ limit: '1mb' }));

  if (options.accessLogFormat) {
    app.use(morgan(options.accessLogFormat, {
      stream: { write: line => logger.info(line.trimEnd()) }
    }));
  }

  app.get('/healthz', (_req, res) => {
    serveAsJSON(res, { status: 'ok' }, logger);
  });

  app.use(options.prefix, createApiRouter(options));

  app.use(createNotFoundHandler(logger));
  app.use(createErrorHandler(logger));
  return app;
}
