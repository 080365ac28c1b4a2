import type { ExperimentConfig } from '../experiment/experiment-config.js';
import type { HarnessProfileName, PercentilePolicy } from '../experiment/harness-profile.js';

export interface HostSample {
  cpuPercent: number;
  memoryUsedMB: number;
}

export interface DerivedMetrics {
  readonly latencyMean: number;
  readonly latencyP95: number;
  readonly latencyMax: number;
  readonly durationActualSeconds: number;
  readonly throughputPerMinute: number;
  readonly errorRatePercent: number;
  readonly cpuMeanPercent: number;
  readonly memoryMeanMB: number;
}

/** Outcome of one experiment configuration, frozen once finalized. */
export interface MetricsRecord extends DerivedMetrics {
  readonly id: string;
  readonly profile: HarnessProfileName;
  readonly percentilePolicy: PercentilePolicy;
  readonly config: ExperimentConfig;
  readonly timestamp: string;
  readonly latenciesMs: readonly number[];
  readonly votesProcessed: number;
  readonly votesFailed: number;
  readonly cpuSamples: readonly number[];
  readonly memorySamples: readonly number[];
  readonly errors: readonly string[];
}

export type ExperimentResultSet = readonly MetricsRecord[];
