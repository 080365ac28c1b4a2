import {
  BenchmarkService,
  JsonConfigStore,
  JsonResultRepository,
  type ExperimentConfig,
  type SettingsOverrides,
  type SuiteRecord,
} from '@ballotbench/core';
import { createCallbackEventBridge, type EventHandler } from './adapters/callback-event-bridge.js';
import { DiscardingResultRepository } from './adapters/discarding-result-repository.js';
import { getConfigDir, getDataDir } from './adapters/xdg-paths.js';

export interface BallotbenchOptions extends SettingsOverrides {
  /** Defaults to the profile's configuration list. */
  configs?: ExperimentConfig[];
  dryRun?: boolean;
  onProgress?: EventHandler;
  save?: boolean;
}

/**
 * Runs one experiment suite with the stored configuration, overridden by
 * `options`. Suitable for use as a programmatic API.
 */
export async function benchmark(options: BallotbenchOptions = {}): Promise<SuiteRecord> {
  const { configs, dryRun, onProgress, save, ...overrides } = options;

  const service = new BenchmarkService({
    configStore: new JsonConfigStore(getConfigDir()),
    resultRepository: save !== false ? new JsonResultRepository(getDataDir()) : new DiscardingResultRepository(),
    events: createCallbackEventBridge(onProgress ?? {}),
  });

  return service.run({ configs, overrides, dryRun });
}

export type { EventHandler } from './adapters/callback-event-bridge.js';
export { summarizeResults, SATURATION_THRESHOLD_PERCENT, type SuiteStats } from './formatters/summary.js';
export { formatPlainReport } from './formatters/plain.js';
export { formatMarkdownReport } from './formatters/markdown.js';

// Re-export everything from core for advanced usage
export * from '@ballotbench/core';
