import type { LatencyRange } from '../domain/experiment/harness-profile.js';
import type { Clock } from '../ports/clock.js';
import type { QueryTarget } from '../ports/query-target.js';
import type { RandomSource } from '../ports/random-source.js';

export class SimulatedQueryTarget implements QueryTarget {
  readonly name = 'simulated-query';

  constructor(
    private readonly clock: Clock,
    private readonly random: RandomSource,
    private readonly latency: LatencyRange,
  ) {}

  async query(): Promise<void> {
    await this.clock.sleep(this.random.uniform(this.latency.minMs, this.latency.maxMs));
  }
}
