import express from 'express';
import helmet from 'helmet';
import { pinoHttp } from 'pino-http';
import { config } from './config.js';
import { logger } from './logger.js';
import { errorHandler } from './middleware/error.js';
import { requestId } from './middleware/request-id.js';
import { apiRouter, type ApiDeps } from './routes/index.js';

export function buildApp(deps: ApiDeps) {
  const app = express();

  app.use(helmet());
  app.use(express.json({ limit: '100kb' }));
  app.use(requestId);

  if (config.env !== 'production') {
    // dev-friendly HTTP logs
    app.use(pinoHttp({ logger, autoLogging: true }));
  }

  app.use(config.apiPrefix, apiRouter(deps));

  app.use(errorHandler);

  return app;
}
