import { Router } from 'express';
import type { MetricsService } from './metrics.service.js';
import type { SystemStatsSampler } from './system-stats.service.js';
import { createMetricsController } from './metrics.controller.js';

export const createMetricsRouter = (sampler: SystemStatsSampler, metricsService: MetricsService) => {
  const router = Router();
  const controller = createMetricsController(sampler, metricsService);

  router.get('/', controller.getMetrics);

  return router;
};
