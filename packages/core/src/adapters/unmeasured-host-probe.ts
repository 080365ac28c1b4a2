import type { HostSample } from '../domain/metrics/metrics-record.js';
import type { Clock } from '../ports/clock.js';
import type { HostProbe } from '../ports/host-probe.js';

/**
 * Stands in for the OS probe on virtual time, where a CPU window has no real
 * duration. Keeps the sampling cadence and reports zeros.
 */
export class UnmeasuredHostProbe implements HostProbe {
  constructor(
    private readonly clock: Clock,
    private readonly windowMs: number,
  ) {}

  async sample(): Promise<HostSample> {
    await this.clock.sleep(this.windowMs);
    return { cpuPercent: 0, memoryUsedMB: 0 };
  }
}
