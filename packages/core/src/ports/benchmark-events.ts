import type { ExperimentConfig } from '../domain/experiment/experiment-config.js';
import type { HarnessProfileName } from '../domain/experiment/harness-profile.js';
import type { MetricsRecord } from '../domain/metrics/metrics-record.js';
import type { SuiteRecord } from '../domain/suite/suite-record.js';

export interface BenchmarkEvents {
  onSuiteStart(suiteId: string, profile: HarnessProfileName, total: number): void;
  onExperimentStart(index: number, total: number, config: ExperimentConfig): void;
  onWorkersStarted(index: number, workerCount: number): void;
  onExperimentComplete(index: number, record: MetricsRecord): void;
  onCooldown(seconds: number): void;
  onComplete(suite: SuiteRecord): void;
  onError(error: string): void;
}
