import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import { pinoHttp } from 'pino-http';

import { env } from './config/env.js';
import { errorHandler } from './core/middleware/error-handler.js';
import { notFoundHandler } from './core/middleware/not-found.js';
import { requestId } from './core/middleware/request-id.js';
import { logger } from './core/logger/index.js';
import { createMetricsModule, type MetricsModuleOptions } from './modules/metrics/metrics.module.js';
import { createRootRouter } from './routes/index.js';

export type AppOptions = MetricsModuleOptions;

export const createApp = (options: AppOptions = {}) => {
  const app = express();

  app.set('trust proxy', 1);

  app.use(
    cors({
      origin: true,
      methods: ['GET', 'HEAD', 'OPTIONS'],
    }),
  );
  app.use(helmet());
  app.use(requestId);
  app.use(
    pinoHttp({
      logger,
      quietReqLogger: env.NODE_ENV === 'test',
      customProps: (req) => ({ requestId: req.id }),
    }),
  );

  const metricsModule = createMetricsModule({ sampler: options.sampler });
  app.use(createRootRouter(metricsModule));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
