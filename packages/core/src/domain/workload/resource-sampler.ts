import type { Clock } from '../../ports/clock.js';
import type { HostProbe } from '../../ports/host-probe.js';
import { describeError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import type { MetricsWriter } from '../metrics/metrics-collector.js';

const log = createLogger('resource-sampler');

export interface ResourceSamplerOptions {
  probe: HostProbe;
  clock: Clock;
  intervalSeconds: number;
}

export class ResourceSampler {
  constructor(private readonly options: ResourceSamplerOptions) {}

  async run(writer: MetricsWriter, durationSeconds: number): Promise<number> {
    const { probe, clock, intervalSeconds } = this.options;
    const deadline = clock.now() + durationSeconds * 1000;
    let samples = 0;

    while (clock.now() < deadline) {
      try {
        writer.recordHostSample(await probe.sample());
        samples++;
      } catch (err) {
        // Non-fatal: keep sampling on the same cadence.
        writer.recordError(`Resource sampling failed: ${describeError(err)}`);
      }
      await clock.sleep(intervalSeconds * 1000);
    }

    log.debug(`${writer.label}: ${samples} host samples`);
    return samples;
  }
}
