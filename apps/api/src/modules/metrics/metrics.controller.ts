import { asyncHandler } from '../../shared/http/async-handler.js';
import type { MetricsService } from './metrics.service.js';
import type { SystemStatsSampler } from './system-stats.service.js';

export const createMetricsController = (sampler: SystemStatsSampler, metricsService: MetricsService) => ({
  getMetrics: asyncHandler(async (_req, res) => {
    const snapshot = await sampler.sample();
    const exposition = await metricsService.render(snapshot);

    res.set('Content-Type', exposition.contentType).send(exposition.body);
  }),
});
