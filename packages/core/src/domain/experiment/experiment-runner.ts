import { randomUUID } from 'node:crypto';
import type { Clock } from '../../ports/clock.js';
import type { HostProbe } from '../../ports/host-probe.js';
import type { QueryTarget } from '../../ports/query-target.js';
import type { RandomSource } from '../../ports/random-source.js';
import type { VoteTarget } from '../../ports/vote-target.js';
import { ExperimentError, describeError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import { MetricsCollector, type MetricsWriter } from '../metrics/metrics-collector.js';
import type { MetricsRecord } from '../metrics/metrics-record.js';
import { QueryWorker } from '../workload/query-worker.js';
import { ResourceSampler } from '../workload/resource-sampler.js';
import { VoteWorker } from '../workload/vote-worker.js';
import {
  durationSeconds,
  formatExperimentConfig,
  validateExperimentConfig,
  voteIntervalSeconds,
  type ExperimentConfig,
} from './experiment-config.js';
import type { HarnessProfile } from './harness-profile.js';

const log = createLogger('experiment-runner');

export interface ExperimentRunnerDeps {
  profile: HarnessProfile;
  clock: Clock;
  random: RandomSource;
  queryTarget: QueryTarget;
  voteTarget: VoteTarget;
  hostProbe: HostProbe;
  /** Defaults to random UUIDs. */
  createId?: () => string;
}

export interface RunHooks {
  onWorkersStarted?: (workerCount: number) => void;
}

export class ExperimentRunner {
  constructor(private readonly deps: ExperimentRunnerDeps) {}

  get profile(): HarnessProfile {
    return this.deps.profile;
  }

  async run(config: ExperimentConfig, hooks?: RunHooks): Promise<MetricsRecord> {
    validateExperimentConfig(config);

    const { profile, clock, random, queryTarget, voteTarget, hostProbe } = this.deps;
    const collector = new MetricsCollector(config, clock.now());
    const seconds = durationSeconds(config);

    log.info(`run: starting ${formatExperimentConfig(config)}`);

    const spawn = (label: string, task: (writer: MetricsWriter) => Promise<number>): Promise<number> => {
      const writer = collector.openWriter(label);
      return task(writer).finally(() => writer.close());
    };

    const sampler = new ResourceSampler({
      probe: hostProbe,
      clock,
      intervalSeconds: profile.samplingIntervalSeconds,
    });
    const voter = new VoteWorker({
      target: voteTarget,
      clock,
      random,
      failureProbability: profile.voteFailureProbability,
      candidateCount: profile.candidateCount,
    });

    const tasks: Promise<number>[] = [
      spawn('resource-sampler', (writer) => sampler.run(writer, seconds)),
    ];
    for (let i = 0; i < config.concurrentQueries; i++) {
      const worker = new QueryWorker({ target: queryTarget, clock, pauseMs: profile.queryPauseMs });
      tasks.push(spawn(`query-worker-${i + 1}`, (writer) => worker.run(writer, seconds)));
    }
    tasks.push(spawn('vote-worker', (writer) => voter.run(writer, voteIntervalSeconds(config), seconds)));

    hooks?.onWorkersStarted?.(tasks.length);
    log.debug(`run: ${tasks.length} tasks started for ${seconds}s`);

    // Join barrier: finalize only after every writer has closed.
    const settled = await Promise.allSettled(tasks);
    const crashed = settled.filter((s): s is PromiseRejectedResult => s.status === 'rejected');
    if (crashed.length > 0) {
      log.error(`run: ${crashed.length} task(s) crashed:`, crashed.map((c) => describeError(c.reason)));
      throw new ExperimentError(`${crashed.length} worker task(s) crashed: ${describeError(crashed[0].reason)}`);
    }

    const record = collector.finalize({
      id: this.deps.createId?.() ?? randomUUID(),
      profile: profile.name,
      percentilePolicy: profile.percentilePolicy,
      finishedAt: clock.now(),
    });

    log.info(
      `run: completed - ${record.votesProcessed} votes processed, ${record.votesFailed} failed, ` +
        `p95 ${record.latencyP95.toFixed(1)}ms`,
    );
    return record;
  }
}
