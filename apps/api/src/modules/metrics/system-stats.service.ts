import os, { type CpuInfo } from 'os';
import { setTimeout as sleep } from 'timers/promises';

import { logger } from '../../core/logger/index.js';
import { SystemStatsUnavailableError } from '../../shared/errors.js';

export interface SystemSnapshot {
  /** Share of CPU time spent busy across all cores during the window (0-100) */
  cpuPercent: number;
  /** Share of physical memory in use at the end of the window (0-100) */
  memoryPercent: number;
}

export interface SystemStatsSampler {
  sample(): Promise<SystemSnapshot>;
}

/** The subset of the `os` module the sampler reads from. */
export interface HostCounters {
  cpus(): CpuInfo[];
  totalmem(): number;
  freemem(): number;
}

export interface SystemStatsServiceOptions {
  windowMs: number;
  counters?: HostCounters;
  wait?: (ms: number) => Promise<unknown>;
}

interface CpuTotals {
  total: number;
  idle: number;
}

const sumCpuTimes = (cpus: CpuInfo[]): CpuTotals =>
  cpus.reduce<CpuTotals>(
    (acc, { times }) => ({
      total: acc.total + times.user + times.nice + times.sys + times.idle + times.irq,
      idle: acc.idle + times.idle,
    }),
    { total: 0, idle: 0 },
  );

const toPercent = (value: number) => {
  const clamped = Math.min(100, Math.max(0, value));
  return Math.round(clamped * 10) / 10;
};

export const computeCpuBusyPercent = (before: CpuInfo[], after: CpuInfo[]): number => {
  const start = sumCpuTimes(before);
  const end = sumCpuTimes(after);
  const totalDelta = end.total - start.total;
  const idleDelta = end.idle - start.idle;

  if (totalDelta <= 0) {
    return 0;
  }

  return toPercent(((totalDelta - idleDelta) / totalDelta) * 100);
};

export const computeMemoryUsedPercent = (totalBytes: number, freeBytes: number): number => {
  if (!Number.isFinite(totalBytes) || totalBytes <= 0) {
    throw new SystemStatsUnavailableError('Unable to read memory counters', { totalBytes });
  }
  if (!Number.isFinite(freeBytes) || freeBytes < 0) {
    throw new SystemStatsUnavailableError('Unable to read memory counters', { freeBytes });
  }

  return toPercent(((totalBytes - freeBytes) / totalBytes) * 100);
};

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

export class SystemStatsService implements SystemStatsSampler {
  private readonly counters: HostCounters;
  private readonly wait: (ms: number) => Promise<unknown>;

  constructor(private readonly options: SystemStatsServiceOptions) {
    this.counters = options.counters ?? os;
    this.wait = options.wait ?? ((ms) => sleep(ms));
  }

  /**
   * Measures CPU busy time over the configured window, then reads memory use.
   * The window is an awaited timer, so other requests keep being served.
   */
  async sample(): Promise<SystemSnapshot> {
    const before = this.readCpus();
    await this.wait(this.options.windowMs);
    const after = this.readCpus();

    if (after.length !== before.length) {
      throw new SystemStatsUnavailableError('CPU count changed during sampling', {
        before: before.length,
        after: after.length,
      });
    }

    const snapshot: SystemSnapshot = {
      cpuPercent: computeCpuBusyPercent(before, after),
      memoryPercent: this.readMemoryPercent(),
    };

    logger.debug({ ...snapshot, windowMs: this.options.windowMs }, 'Sampled system stats');

    return snapshot;
  }

  private readCpus(): CpuInfo[] {
    let cpus: CpuInfo[];
    try {
      cpus = this.counters.cpus();
    } catch (error) {
      throw new SystemStatsUnavailableError('Unable to read CPU counters', { cause: errorMessage(error) });
    }

    if (cpus.length === 0) {
      throw new SystemStatsUnavailableError('Unable to read CPU counters', { cause: 'no CPUs reported' });
    }

    return cpus;
  }

  private readMemoryPercent(): number {
    let total: number;
    let free: number;
    try {
      total = this.counters.totalmem();
      free = this.counters.freemem();
    } catch (error) {
      throw new SystemStatsUnavailableError('Unable to read memory counters', { cause: errorMessage(error) });
    }

    return computeMemoryUsedPercent(total, free);
  }
}
