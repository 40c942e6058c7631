import { env } from '../../config/env.js';
import { MetricsService } from './metrics.service.js';
import { createMetricsRouter } from './metrics.router.js';
import { SystemStatsService, type SystemStatsSampler } from './system-stats.service.js';

export interface MetricsModuleOptions {
  sampler?: SystemStatsSampler;
}

export function createMetricsModule(options: MetricsModuleOptions = {}) {
  const sampler = options.sampler ?? new SystemStatsService({ windowMs: env.CPU_SAMPLE_WINDOW_MS });
  const service = new MetricsService();
  const router = createMetricsRouter(sampler, service);

  return { router, service, sampler };
}

export type MetricsModule = ReturnType<typeof createMetricsModule>;
