// Domain
export type { ExperimentConfig } from './domain/experiment/experiment-config.js';
export {
  createExperimentConfig,
  parseExperimentConfig,
  validateExperimentConfig,
  durationSeconds,
  voteIntervalSeconds,
  formatExperimentConfig,
} from './domain/experiment/experiment-config.js';
export type { HarnessProfile, HarnessProfileName, PercentilePolicy, LatencyRange } from './domain/experiment/harness-profile.js';
export { FAST_PROFILE, STANDARD_PROFILE, HARNESS_PROFILES, isHarnessProfileName } from './domain/experiment/harness-profile.js';
export { ExperimentRunner } from './domain/experiment/experiment-runner.js';
export type { ExperimentRunnerDeps, RunHooks } from './domain/experiment/experiment-runner.js';
export { ExperimentSuite } from './domain/experiment/experiment-suite.js';
export type { ExperimentSuiteOptions, SuiteProgressCallbacks } from './domain/experiment/experiment-suite.js';

export type { MetricsRecord, DerivedMetrics, HostSample, ExperimentResultSet } from './domain/metrics/metrics-record.js';
export { MetricsCollector } from './domain/metrics/metrics-collector.js';
export type { MetricsWriter, VoteOutcome, CollectorProgress, FinalizeOptions } from './domain/metrics/metrics-collector.js';
export { mean, max, min, indexPercentile, exclusiveQuantile, percentile95, ratePerMinute, errorRatePercent } from './domain/metrics/statistics.js';

export { QueryWorker } from './domain/workload/query-worker.js';
export { VoteWorker } from './domain/workload/vote-worker.js';
export { ResourceSampler } from './domain/workload/resource-sampler.js';
export type { Ballot } from './domain/workload/ballot.js';
export { buildBallot } from './domain/workload/ballot.js';

export type { SuiteRecord, TargetMode } from './domain/suite/suite-record.js';
export { isTargetMode } from './domain/suite/suite-record.js';

// Port interfaces
export type { Clock } from './ports/clock.js';
export type { RandomSource } from './ports/random-source.js';
export type { HostProbe } from './ports/host-probe.js';
export type { QueryTarget } from './ports/query-target.js';
export type { VoteTarget } from './ports/vote-target.js';
export type { ConfigStore, HarnessPrefs } from './ports/config-store.js';
export type { ResultRepository, SuiteSummary } from './ports/result-repository.js';
export type { BenchmarkEvents } from './ports/benchmark-events.js';

// Adapters
export { SystemClock } from './adapters/system-clock.js';
export { VirtualClock } from './adapters/virtual-clock.js';
export { SeededRandom } from './adapters/seeded-random.js';
export { OsHostProbe } from './adapters/os-host-probe.js';
export type { OsHostProbeOptions } from './adapters/os-host-probe.js';
export { UnmeasuredHostProbe } from './adapters/unmeasured-host-probe.js';
export { SimulatedQueryTarget } from './adapters/simulated-query-target.js';
export { SimulatedVoteTarget } from './adapters/simulated-vote-target.js';
export { HttpQueryTarget, DEFAULT_REQUEST_TIMEOUT_MS } from './adapters/http-query-target.js';
export type { Endpoint } from './adapters/http-query-target.js';
export { HttpVoteTarget } from './adapters/http-vote-target.js';
export { JsonResultRepository } from './adapters/json-result-repository.js';
export { JsonConfigStore } from './adapters/json-config-store.js';

// Application services
export { BenchmarkService } from './services/benchmark-service.js';
export type { BenchmarkInput, BenchmarkDeps } from './services/benchmark-service.js';
export {
  ConfigService,
  buildSettings,
  parseEndpoint,
  DEFAULT_QUERY_ENDPOINTS,
  DEFAULT_VOTE_ENDPOINT,
} from './services/config-service.js';
export type { HarnessSettings, SettingsOverrides } from './services/config-service.js';

// Shared
export { createLogger, setLogLevel, getLogLevel, isLogLevel } from './shared/logger.js';
export type { Logger, LogLevel } from './shared/logger.js';
export { BallotBenchError, ConfigError, ExperimentError, TargetError, describeError } from './shared/errors.js';
