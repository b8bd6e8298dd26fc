/**
 * HostSystemProbe -- CPU, memory and disk figures for the health report.
 *
 * CPU usage is the busy share of the time that passed between two samples,
 * summed over all cores. The very first sample has nothing to compare
 * against and measures since boot.
 */

import { cpus, freemem, totalmem, type CpuInfo } from 'node:os';
import { statfs } from 'node:fs/promises';
import { ProbeError, toError, type HostStatsSnapshot, type ISupervisorObserver } from '@botkeeper/core';
import type { SystemProbe, SystemProbeResult } from './health-report.js';

export interface DiskUsage {
  bsize: number;
  blocks: number;
  bfree: number;
  bavail: number;
}

/** Where the numbers come from. Replaced in tests. */
export interface SystemStatsSource {
  cpus(): CpuInfo[];
  totalmem(): number;
  freemem(): number;
  statfs(path: string): Promise<DiskUsage>;
}

export const nodeStatsSource: SystemStatsSource = {
  cpus,
  totalmem,
  freemem,
  statfs: (path) => statfs(path),
};

export interface HostSystemProbeOptions {
  /** Filesystem to report on. Default `/`. */
  diskPath?: string;
  source?: SystemStatsSource;
  observer?: ISupervisorObserver;
}

interface CpuTotals {
  busy: number;
  total: number;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function percent(part: number, whole: number): number {
  return whole > 0 ? round1((part / whole) * 100) : 0;
}

export class HostSystemProbe implements SystemProbe {
  private readonly diskPath: string;
  private readonly source: SystemStatsSource;
  private readonly observer?: ISupervisorObserver;
  private lastCpu: CpuTotals = { busy: 0, total: 0 };

  constructor(options: HostSystemProbeOptions = {}) {
    this.diskPath = options.diskPath ?? '/';
    this.source = options.source ?? nodeStatsSource;
    this.observer = options.observer;
  }

  async sample(): Promise<SystemProbeResult> {
    try {
      return { ok: true, stats: await this.collect() };
    } catch (err) {
      const error = toError(err);
      this.observer?.onError(
        new ProbeError(error.message, 'system', { diskPath: this.diskPath }),
        { probe: 'system' },
      );
      return { ok: false, error: error.message };
    }
  }

  /** Like `sample()`, but yields undefined instead of an error result. */
  async snapshot(): Promise<HostStatsSnapshot | undefined> {
    const result = await this.sample();
    return result.ok ? result.stats : undefined;
  }

  private async collect(): Promise<HostStatsSnapshot> {
    const cpu = this.cpuTotals();
    const cpuPercent = percent(cpu.busy - this.lastCpu.busy, cpu.total - this.lastCpu.total);
    this.lastCpu = cpu;

    const total = this.source.totalmem();
    const free = this.source.freemem();

    const disk = await this.source.statfs(this.diskPath);
    const used = (disk.blocks - disk.bfree) * disk.bsize;
    const available = disk.bavail * disk.bsize;

    return {
      cpuPercent,
      memoryPercent: percent(total - free, total),
      memoryAvailable: free,
      diskPercent: percent(used, used + available),
      diskFree: available,
    };
  }

  private cpuTotals(): CpuTotals {
    let busy = 0;
    let total = 0;
    for (const { times } of this.source.cpus()) {
      const all = times.user + times.nice + times.sys + times.idle + times.irq;
      total += all;
      busy += all - times.idle;
    }
    return { busy, total };
  }
}
