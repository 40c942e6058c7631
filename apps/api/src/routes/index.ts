import { Router } from 'express';
import type { MetricsModule } from '../modules/metrics/metrics.module.js';
import { createHealthRouter } from './health.js';
import { createHomeRouter } from './home.js';

export function createRootRouter(metricsModule: MetricsModule): Router {
  const router = Router();

  router.use('/health', createHealthRouter());
  router.use('/metrics', metricsModule.router);
  router.use('/', createHomeRouter());

  return router;
}
