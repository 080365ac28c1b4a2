import type { HarnessProfileName } from '../experiment/harness-profile.js';
import type { ExperimentResultSet } from '../metrics/metrics-record.js';

export type TargetMode = 'simulated' | 'http';

export interface SuiteRecord {
  id: string;
  createdAt: string;
  finishedAt: string;
  profile: HarnessProfileName;
  queryMode: TargetMode;
  voteMode: TargetMode;
  seed?: number;
  dryRun: boolean;
  results: ExperimentResultSet;
}

export function isTargetMode(value: unknown): value is TargetMode {
  return value === 'simulated' || value === 'http';
}
