import type {
  BenchmarkEvents,
  ExperimentConfig,
  HarnessProfileName,
  MetricsRecord,
  SuiteRecord,
} from '@ballotbench/core';

export type EventHandler = {
  onSuiteStart?: (suiteId: string, profile: HarnessProfileName, total: number) => void;
  onExperimentStart?: (index: number, total: number, config: ExperimentConfig) => void;
  onWorkersStarted?: (index: number, workerCount: number) => void;
  onExperimentComplete?: (index: number, record: MetricsRecord) => void;
  onCooldown?: (seconds: number) => void;
  onComplete?: (suite: SuiteRecord) => void;
  onError?: (error: string) => void;
};

export function createCallbackEventBridge(handlers: EventHandler): BenchmarkEvents {
  return {
    onSuiteStart: (suiteId, profile, total) => handlers.onSuiteStart?.(suiteId, profile, total),
    onExperimentStart: (index, total, config) => handlers.onExperimentStart?.(index, total, config),
    onWorkersStarted: (index, workerCount) => handlers.onWorkersStarted?.(index, workerCount),
    onExperimentComplete: (index, record) => handlers.onExperimentComplete?.(index, record),
    onCooldown: (seconds) => handlers.onCooldown?.(seconds),
    onComplete: (suite) => handlers.onComplete?.(suite),
    onError: (error) => handlers.onError?.(error),
  };
}
