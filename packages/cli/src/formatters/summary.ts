import {
  formatExperimentConfig,
  max,
  mean,
  min,
  type ExperimentResultSet,
  type MetricsRecord,
  type SuiteRecord,
} from '@ballotbench/core';

/** A run whose vote error rate exceeds this is past the platform's capacity. */
export const SATURATION_THRESHOLD_PERCENT = 5;

export interface SaturatedRun {
  index: number;
  record: MetricsRecord;
}

export interface SuiteStats {
  experimentCount: number;
  maxThroughputPerMinute: number;
  meanThroughputPerMinute: number;
  minThroughputPerMinute: number;
  /** Over the runs that observed at least one query latency. */
  meanLatencyMs: number;
  minLatencyMs: number;
  maxLatencyMs: number;
  votesProcessed: number;
  votesFailed: number;
  successRatePercent: number;
  /** Over the runs whose sampler reported a non-zero reading. */
  cpuMeanPercent: number;
  cpuMaxPercent: number;
  memoryMeanMB: number;
  memoryMaxMB: number;
  /** First run above the threshold. */
  saturation: SaturatedRun | null;
  saturated: SaturatedRun[];
}

export interface SummaryOptions {
  /** False for dry runs, where host samples are taken on virtual time. */
  resourcesMeasured?: boolean;
}

export function reportOptions(suite: SuiteRecord): SummaryOptions {
  return { resourcesMeasured: !suite.dryRun };
}

export function summarizeResults(results: ExperimentResultSet): SuiteStats {
  const throughputs = results.map((r) => r.throughputPerMinute);
  const latencies = results.filter((r) => r.latencyMean > 0).map((r) => r.latencyMean);
  const cpu = results.filter((r) => r.cpuMeanPercent > 0).map((r) => r.cpuMeanPercent);
  const memory = results.filter((r) => r.memoryMeanMB > 0).map((r) => r.memoryMeanMB);
  const votesProcessed = results.reduce((sum, r) => sum + r.votesProcessed, 0);
  const votesFailed = results.reduce((sum, r) => sum + r.votesFailed, 0);
  const attempts = votesProcessed + votesFailed;
  const saturated = results
    .map((record, index) => ({ index, record }))
    .filter(({ record }) => record.errorRatePercent > SATURATION_THRESHOLD_PERCENT);

  return {
    experimentCount: results.length,
    maxThroughputPerMinute: max(throughputs),
    meanThroughputPerMinute: mean(throughputs),
    minThroughputPerMinute: min(throughputs),
    meanLatencyMs: mean(latencies),
    minLatencyMs: min(latencies),
    maxLatencyMs: max(latencies),
    votesProcessed,
    votesFailed,
    successRatePercent: attempts > 0 ? (votesProcessed / attempts) * 100 : 0,
    cpuMeanPercent: mean(cpu),
    cpuMaxPercent: max(cpu),
    memoryMeanMB: mean(memory),
    memoryMaxMB: max(memory),
    saturation: saturated[0] ?? null,
    saturated,
  };
}

export function describeSaturation(stats: SuiteStats): string {
  if (!stats.saturation) {
    return `none (every experiment at or below ${SATURATION_THRESHOLD_PERCENT}% errors)`;
  }
  const { index, record } = stats.saturation;
  return `#${index + 1} (${formatExperimentConfig(record.config)}) at ${record.errorRatePercent.toFixed(2)}% errors`;
}

export function describeSaturated(stats: SuiteStats): string {
  if (stats.saturated.length === 0) return 'none';
  return stats.saturated
    .map(({ index, record }) => `#${index + 1} (${record.errorRatePercent.toFixed(2)}%)`)
    .join(', ');
}

/** Label/value pairs shared by the plain and markdown reports. */
export function summaryEntries(stats: SuiteStats, options: SummaryOptions = {}): Array<[string, string]> {
  const measured = options.resourcesMeasured ?? true;
  const latency = stats.meanLatencyMs > 0
    ? `${stats.meanLatencyMs.toFixed(1)} ms (range ${stats.minLatencyMs.toFixed(1)} to ${stats.maxLatencyMs.toFixed(1)} ms)`
    : 'n/a';

  return [
    ['Experiments', String(stats.experimentCount)],
    ['Max throughput', `${stats.maxThroughputPerMinute.toFixed(1)} votes/min`],
    ['Mean throughput', `${stats.meanThroughputPerMinute.toFixed(1)} votes/min`],
    ['Min throughput', `${stats.minThroughputPerMinute.toFixed(1)} votes/min`],
    ['Mean latency', latency],
    ['Votes processed', String(stats.votesProcessed)],
    ['Votes failed', String(stats.votesFailed)],
    ['Success rate', `${stats.successRatePercent.toFixed(2)}%`],
    ['CPU', measured ? `mean ${stats.cpuMeanPercent.toFixed(1)}%, max ${stats.cpuMaxPercent.toFixed(1)}%` : 'not measured (dry run)'],
    ['Memory', measured ? `mean ${stats.memoryMeanMB.toFixed(0)} MB, max ${stats.memoryMaxMB.toFixed(0)} MB` : 'not measured (dry run)'],
    ['Saturation point', describeSaturation(stats)],
    ['Over threshold', describeSaturated(stats)],
  ];
}
