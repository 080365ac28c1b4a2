import type { ExperimentConfig } from './experiment-config.js';

export type HarnessProfileName = 'fast' | 'standard';

/**
 * `index-approx` takes `sorted[floor(n * 0.95)]`; `interpolated-quantile` is the
 * 19th of 20 exclusive-method cut points. Both are kept because they disagree
 * on the same data.
 */
export type PercentilePolicy = 'index-approx' | 'interpolated-quantile';

export interface LatencyRange {
  readonly minMs: number;
  readonly maxMs: number;
}

export interface HarnessProfile {
  readonly name: HarnessProfileName;
  readonly description: string;
  readonly cooldownSeconds: number;
  readonly samplingIntervalSeconds: number;
  readonly cpuWindowSeconds: number;
  readonly voteFailureProbability: number;
  readonly percentilePolicy: PercentilePolicy;
  readonly queryLatency: LatencyRange;
  readonly voteLatency: LatencyRange;
  readonly queryPauseMs: number;
  readonly candidateCount: number;
  readonly configurations: readonly ExperimentConfig[];
}

const triple = (concurrentQueries: number, votesPerMinute: number, durationMinutes: number): ExperimentConfig =>
  Object.freeze({ concurrentQueries, votesPerMinute, durationMinutes });

export const FAST_PROFILE: HarnessProfile = {
  name: 'fast',
  description: 'Short smoke run, 5-7 minutes end to end',
  cooldownSeconds: 10,
  samplingIntervalSeconds: 2,
  cpuWindowSeconds: 1,
  voteFailureProbability: 0.02,
  percentilePolicy: 'index-approx',
  queryLatency: { minMs: 10, maxMs: 50 },
  voteLatency: { minMs: 20, maxMs: 80 },
  queryPauseMs: 100,
  candidateCount: 5,
  configurations: [triple(5, 50, 1), triple(10, 100, 1), triple(20, 200, 2)],
};

export const STANDARD_PROFILE: HarnessProfile = {
  name: 'standard',
  description: 'Full performance sweep up to 500 concurrent queries',
  cooldownSeconds: 30,
  samplingIntervalSeconds: 5,
  cpuWindowSeconds: 1,
  voteFailureProbability: 0.05,
  percentilePolicy: 'interpolated-quantile',
  queryLatency: { minMs: 10, maxMs: 50 },
  voteLatency: { minMs: 50, maxMs: 50 },
  queryPauseMs: 100,
  candidateCount: 5,
  configurations: [
    triple(10, 100, 5),
    triple(10, 500, 5),
    triple(50, 100, 5),
    triple(50, 500, 5),
    triple(100, 1000, 10),
    triple(100, 2000, 10),
    triple(200, 2000, 15),
    triple(200, 5000, 15),
    triple(500, 5000, 30),
  ],
};

export const HARNESS_PROFILES: Record<HarnessProfileName, HarnessProfile> = {
  fast: FAST_PROFILE,
  standard: STANDARD_PROFILE,
};

export function isHarnessProfileName(value: unknown): value is HarnessProfileName {
  return value === 'fast' || value === 'standard';
}
