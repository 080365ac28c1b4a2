import type { Clock } from '../../ports/clock.js';
import type { RandomSource } from '../../ports/random-source.js';
import type { VoteTarget } from '../../ports/vote-target.js';
import { describeError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import type { MetricsWriter } from '../metrics/metrics-collector.js';
import { buildBallot } from './ballot.js';

const log = createLogger('vote-worker');

export interface VoteWorkerOptions {
  target: VoteTarget;
  clock: Clock;
  random: RandomSource;
  failureProbability: number;
  candidateCount: number;
}

/**
 * Casts one ballot per iteration and sleeps `intervalSeconds` afterwards, which
 * paces issuance to the configured votes-per-minute. Exactly one of the
 * processed/failed counters moves per attempt.
 */
export class VoteWorker {
  constructor(private readonly options: VoteWorkerOptions) {}

  async run(writer: MetricsWriter, intervalSeconds: number, durationSeconds: number): Promise<number> {
    const { target, clock, random, failureProbability, candidateCount } = this.options;
    const deadline = clock.now() + durationSeconds * 1000;
    let sequence = 0;

    while (clock.now() < deadline) {
      const ballot = buildBallot(sequence, clock.now(), candidateCount);
      try {
        const startedAt = clock.now();
        const accepted = await target.submit(ballot);
        const latencyMs = clock.now() - startedAt;

        if (accepted && random.next() >= failureProbability) {
          writer.recordVote('processed', latencyMs);
        } else {
          writer.recordVote('failed');
        }
      } catch (err) {
        writer.recordVote('failed');
        writer.recordError(`Vote failed (${ballot.voteId}): ${describeError(err)}`);
      }

      sequence++;
      await clock.sleep(intervalSeconds * 1000);
    }

    log.debug(`${writer.label}: ${sequence} ballots attempted`);
    return sequence;
  }
}
