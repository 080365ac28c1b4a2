import { randomUUID } from 'node:crypto';
import { HttpQueryTarget } from '../adapters/http-query-target.js';
import { HttpVoteTarget } from '../adapters/http-vote-target.js';
import { OsHostProbe } from '../adapters/os-host-probe.js';
import { SeededRandom } from '../adapters/seeded-random.js';
import { SimulatedQueryTarget } from '../adapters/simulated-query-target.js';
import { SimulatedVoteTarget } from '../adapters/simulated-vote-target.js';
import { SystemClock } from '../adapters/system-clock.js';
import { UnmeasuredHostProbe } from '../adapters/unmeasured-host-probe.js';
import { VirtualClock } from '../adapters/virtual-clock.js';
import type { ExperimentConfig } from '../domain/experiment/experiment-config.js';
import { ExperimentRunner } from '../domain/experiment/experiment-runner.js';
import { ExperimentSuite } from '../domain/experiment/experiment-suite.js';
import type { SuiteRecord } from '../domain/suite/suite-record.js';
import type { BenchmarkEvents } from '../ports/benchmark-events.js';
import type { Clock } from '../ports/clock.js';
import type { ConfigStore } from '../ports/config-store.js';
import type { HostProbe } from '../ports/host-probe.js';
import type { QueryTarget } from '../ports/query-target.js';
import type { RandomSource } from '../ports/random-source.js';
import type { ResultRepository } from '../ports/result-repository.js';
import type { VoteTarget } from '../ports/vote-target.js';
import { ConfigError, describeError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { ConfigService, type HarnessSettings, type SettingsOverrides } from './config-service.js';

const log = createLogger('benchmark-service');

export interface BenchmarkInput {
  /** Defaults to the resolved profile's configuration list. */
  configs?: readonly ExperimentConfig[];
  overrides?: SettingsOverrides;
  /** Runs simulated targets on a virtual clock, far faster than real time. */
  dryRun?: boolean;
}

export interface BenchmarkDeps {
  configStore: ConfigStore;
  resultRepository: ResultRepository;
  events: BenchmarkEvents;
  clock?: Clock;
  hostProbe?: HostProbe;
  env?: NodeJS.ProcessEnv;
}

function buildTargets(
  settings: HarnessSettings,
  clock: Clock,
  random: RandomSource,
): { queryTarget: QueryTarget; voteTarget: VoteTarget } {
  const { profile } = settings;
  return {
    queryTarget: settings.queryMode === 'http'
      ? new HttpQueryTarget(settings.queryEndpoints, settings.requestTimeoutMs)
      : new SimulatedQueryTarget(clock, random, profile.queryLatency),
    voteTarget: settings.voteMode === 'http'
      ? new HttpVoteTarget(settings.voteEndpoint, settings.requestTimeoutMs)
      : new SimulatedVoteTarget(clock, random, profile.voteLatency),
  };
}

export class BenchmarkService {
  private readonly configService: ConfigService;

  constructor(private readonly deps: BenchmarkDeps) {
    this.configService = new ConfigService(deps.configStore, deps.env);
  }

  async run(input: BenchmarkInput = {}): Promise<SuiteRecord> {
    const suiteId = randomUUID();
    const { events } = this.deps;
    log.info(`run: starting suite ${suiteId}`);

    try {
      const settings = await this.configService.resolve(input.overrides);
      const configs = input.configs ?? settings.profile.configurations;
      const dryRun = input.dryRun ?? false;

      if (dryRun && (settings.queryMode === 'http' || settings.voteMode === 'http')) {
        throw new ConfigError('Dry runs only support simulated query and vote targets');
      }

      const clock = dryRun ? new VirtualClock(Date.now()) : (this.deps.clock ?? new SystemClock());
      const random = new SeededRandom(settings.seed);
      const windowMs = settings.profile.cpuWindowSeconds * 1000;
      const hostProbe = this.deps.hostProbe
        ?? (dryRun ? new UnmeasuredHostProbe(clock, windowMs) : new OsHostProbe({ clock, windowMs }));

      const runner = new ExperimentRunner({
        profile: settings.profile,
        clock,
        random,
        hostProbe,
        ...buildTargets(settings, clock, random),
      });
      const suite = new ExperimentSuite({
        runner,
        clock,
        callbacks: {
          onExperimentStart: (index, total, config) => events.onExperimentStart(index, total, config),
          onWorkersStarted: (index, count) => events.onWorkersStarted(index, count),
          onExperimentComplete: (index, record) => events.onExperimentComplete(index, record),
          onCooldown: (seconds) => events.onCooldown(seconds),
        },
      });

      const createdAt = new Date(clock.now()).toISOString();
      events.onSuiteStart(suiteId, settings.profile.name, configs.length);

      const execute = () => suite.run(configs);
      const results = clock instanceof VirtualClock ? await clock.run(execute) : await execute();

      const record: SuiteRecord = {
        id: suiteId,
        createdAt,
        finishedAt: new Date(clock.now()).toISOString(),
        profile: settings.profile.name,
        queryMode: settings.queryMode,
        voteMode: settings.voteMode,
        seed: settings.seed,
        dryRun,
        results,
      };

      await this.deps.resultRepository.save(record);
      log.info(`run: suite ${suiteId} saved with ${results.length} results`);
      events.onComplete(record);
      return record;
    } catch (err) {
      log.error(`run: suite ${suiteId} failed:`, err);
      events.onError(describeError(err));
      throw err;
    }
  }
}
