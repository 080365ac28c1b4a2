import type { Clock } from '../../ports/clock.js';
import type { QueryTarget } from '../../ports/query-target.js';
import { describeError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import type { MetricsWriter } from '../metrics/metrics-collector.js';

const log = createLogger('query-worker');

export interface QueryWorkerOptions {
  target: QueryTarget;
  clock: Clock;
  pauseMs: number;
}

/**
 * One stream of read operations. Records the wall time of each successful
 * query and pauses `pauseMs` between iterations until the deadline passes.
 */
export class QueryWorker {
  constructor(private readonly options: QueryWorkerOptions) {}

  async run(writer: MetricsWriter, durationSeconds: number): Promise<number> {
    const { target, clock, pauseMs } = this.options;
    const deadline = clock.now() + durationSeconds * 1000;
    let iterations = 0;

    while (clock.now() < deadline) {
      iterations++;
      const startedAt = clock.now();
      try {
        await target.query();
        writer.recordLatency(clock.now() - startedAt);
      } catch (err) {
        writer.recordError(`Query failed (${target.name}): ${describeError(err)}`);
      }
      await clock.sleep(pauseMs);
    }

    log.debug(`${writer.label}: ${iterations} queries issued`);
    return iterations;
  }
}
