import { cpus, freemem, totalmem, type CpuInfo } from 'node:os';
import type { HostSample } from '../domain/metrics/metrics-record.js';
import type { Clock } from '../ports/clock.js';
import type { HostProbe } from '../ports/host-probe.js';

const BYTES_PER_MB = 1024 * 1024;

interface CpuTotals {
  idle: number;
  total: number;
}

function sumCpuTimes(infos: CpuInfo[]): CpuTotals {
  let idle = 0;
  let total = 0;
  for (const { times } of infos) {
    idle += times.idle;
    total += times.user + times.nice + times.sys + times.idle + times.irq;
  }
  return { idle, total };
}

export interface OsHostProbeOptions {
  clock: Clock;
  /** CPU utilisation is measured over this window. */
  windowMs: number;
  readCpus?: () => CpuInfo[];
  readMemory?: () => { total: number; free: number };
}

/**
 * Host CPU busy percentage across all cores and used memory in MiB.
 */
export class OsHostProbe implements HostProbe {
  private readonly readCpus: () => CpuInfo[];
  private readonly readMemory: () => { total: number; free: number };

  constructor(private readonly options: OsHostProbeOptions) {
    this.readCpus = options.readCpus ?? cpus;
    this.readMemory = options.readMemory ?? (() => ({ total: totalmem(), free: freemem() }));
  }

  async sample(): Promise<HostSample> {
    const before = sumCpuTimes(this.readCpus());
    await this.options.clock.sleep(this.options.windowMs);
    const after = sumCpuTimes(this.readCpus());

    const totalDelta = after.total - before.total;
    const idleDelta = after.idle - before.idle;
    const cpuPercent = totalDelta > 0 ? ((totalDelta - idleDelta) / totalDelta) * 100 : 0;

    const memory = this.readMemory();
    return {
      cpuPercent,
      memoryUsedMB: (memory.total - memory.free) / BYTES_PER_MB,
    };
  }
}
