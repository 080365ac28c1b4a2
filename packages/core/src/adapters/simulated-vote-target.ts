import type { LatencyRange } from '../domain/experiment/harness-profile.js';
import type { Ballot } from '../domain/workload/ballot.js';
import type { Clock } from '../ports/clock.js';
import type { RandomSource } from '../ports/random-source.js';
import type { VoteTarget } from '../ports/vote-target.js';

/**
 * Accepts every ballot after a simulated processing delay; failures come from
 * the vote worker's configured failure probability.
 */
export class SimulatedVoteTarget implements VoteTarget {
  readonly name = 'simulated-vote';

  constructor(
    private readonly clock: Clock,
    private readonly random: RandomSource,
    private readonly latency: LatencyRange,
  ) {}

  async submit(_ballot: Ballot): Promise<boolean> {
    await this.clock.sleep(this.random.uniform(this.latency.minMs, this.latency.maxMs));
    return true;
  }
}
