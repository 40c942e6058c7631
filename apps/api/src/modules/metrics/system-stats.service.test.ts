import type { CpuInfo } from 'os';
import { describe, expect, it, vi } from 'vitest';

import { SystemStatsUnavailableError } from '../../shared/errors.js';
import {
  computeCpuBusyPercent,
  computeMemoryUsedPercent,
  SystemStatsService,
  type HostCounters,
} from './system-stats.service.js';

const cpu = (user: number, sys: number, idle: number): CpuInfo => ({
  model: 'test-cpu',
  speed: 2000,
  times: { user, nice: 0, sys, idle, irq: 0 },
});

const fakeCounters = (readings: CpuInfo[][], totalmem = 16_000, freemem = 4_000): HostCounters => {
  const cpus = vi.fn<() => CpuInfo[]>();
  readings.forEach((reading) => cpus.mockReturnValueOnce(reading));
  return {
    cpus,
    totalmem: () => totalmem,
    freemem: () => freemem,
  };
};

describe('computeCpuBusyPercent', () => {
  it('aggregates busy time across cores', () => {
    const before = [cpu(100, 50, 850), cpu(100, 50, 850)];
    const after = [cpu(200, 100, 900), cpu(150, 50, 1000)];

    expect(computeCpuBusyPercent(before, after)).toBe(50);
  });

  it('rounds to one decimal place', () => {
    expect(computeCpuBusyPercent([cpu(0, 0, 0)], [cpu(1, 0, 2)])).toBe(33.3);
  });

  it('reports zero when no time elapsed on the counters', () => {
    expect(computeCpuBusyPercent([cpu(10, 10, 10)], [cpu(10, 10, 10)])).toBe(0);
  });

  it('caps at 100 when idle time went backwards while total time grew', () => {
    expect(computeCpuBusyPercent([cpu(0, 0, 100)], [cpu(200, 0, 50)])).toBe(100);
  });

  it('reports zero when the counters went backwards', () => {
    expect(computeCpuBusyPercent([cpu(500, 500, 500)], [cpu(10, 10, 10)])).toBe(0);
  });
});

describe('computeMemoryUsedPercent', () => {
  it('returns the used share of total memory', () => {
    expect(computeMemoryUsedPercent(8_000, 2_000)).toBe(75);
  });

  it('reports 100 when no memory is free', () => {
    expect(computeMemoryUsedPercent(4_096, 0)).toBe(100);
  });

  it('clamps to zero when free exceeds total', () => {
    expect(computeMemoryUsedPercent(1_000, 1_500)).toBe(0);
  });

  it('fails when total memory is not positive', () => {
    expect(() => computeMemoryUsedPercent(0, 0)).toThrow(SystemStatsUnavailableError);
  });
});

describe('SystemStatsService', () => {
  it('waits for the window between the two CPU readings', async () => {
    const counters = fakeCounters([
      [cpu(100, 50, 850), cpu(100, 50, 850)],
      [cpu(200, 100, 900), cpu(150, 50, 1000)],
    ]);
    const wait = vi.fn(async (_ms: number) => {
      expect(counters.cpus).toHaveBeenCalledTimes(1);
    });
    const service = new SystemStatsService({ windowMs: 1000, counters, wait });

    await expect(service.sample()).resolves.toEqual({ cpuPercent: 50, memoryPercent: 75 });
    expect(wait).toHaveBeenCalledWith(1000);
    expect(counters.cpus).toHaveBeenCalledTimes(2);
  });

  it('fails when the host reports no CPUs', async () => {
    const service = new SystemStatsService({
      windowMs: 1000,
      counters: fakeCounters([[]]),
      wait: vi.fn(async () => undefined),
    });

    const error = await service.sample().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SystemStatsUnavailableError);
    expect(error).toMatchObject({ status: 500, message: 'Unable to read CPU counters' });
  });

  it('fails when reading CPU counters throws', async () => {
    const counters: HostCounters = {
      cpus: () => {
        throw new Error('EACCES: /proc/stat');
      },
      totalmem: () => 1,
      freemem: () => 1,
    };
    const service = new SystemStatsService({ windowMs: 1000, counters, wait: vi.fn(async () => undefined) });

    await expect(service.sample()).rejects.toMatchObject({
      name: 'SystemStatsUnavailableError',
      details: { cause: 'EACCES: /proc/stat' },
    });
  });

  it('fails when the core count changes during the window', async () => {
    const service = new SystemStatsService({
      windowMs: 1000,
      counters: fakeCounters([[cpu(1, 1, 1)], [cpu(2, 2, 2), cpu(2, 2, 2)]]),
      wait: vi.fn(async () => undefined),
    });

    await expect(service.sample()).rejects.toMatchObject({
      message: 'CPU count changed during sampling',
      details: { before: 1, after: 2 },
    });
  });

  it('fails when memory counters are unusable', async () => {
    const service = new SystemStatsService({
      windowMs: 1000,
      counters: fakeCounters([[cpu(1, 1, 1)], [cpu(2, 2, 2)]], 0, 0),
      wait: vi.fn(async () => undefined),
    });

    await expect(service.sample()).rejects.toThrow('Unable to read memory counters');
  });
});
