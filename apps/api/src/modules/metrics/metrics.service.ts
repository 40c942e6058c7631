import { Gauge, Registry } from 'prom-client';

import type { SystemSnapshot } from './system-stats.service.js';

export interface MetricsExposition {
  contentType: string;
  body: string;
}

export class MetricsService {
  /**
   * Renders a snapshot as Prometheus text. A registry is built per call so
   * concurrent scrapes never see each other's values.
   */
  async render(snapshot: SystemSnapshot): Promise<MetricsExposition> {
    const registry = new Registry();

    new Gauge({
      name: 'cpu_usage_percent',
      help: 'Current CPU usage',
      registers: [registry],
    }).set(snapshot.cpuPercent);

    new Gauge({
      name: 'memory_usage_percent',
      help: 'Current memory usage',
      registers: [registry],
    }).set(snapshot.memoryPercent);

    new Gauge({
      name: 'app_up',
      help: 'Application is running',
      registers: [registry],
    }).set(1);

    return {
      contentType: registry.contentType,
      body: await registry.metrics(),
    };
  }
}
