import type { HarnessProfileName } from '../domain/experiment/harness-profile.js';
import type { SuiteRecord } from '../domain/suite/suite-record.js';

export interface SuiteSummary {
  id: string;
  createdAt: string;
  profile: HarnessProfileName;
  experimentCount: number;
  maxErrorRatePercent: number;
}

export interface ResultRepository {
  save(suite: SuiteRecord): Promise<string>;
  load(id: string): Promise<SuiteRecord>;
  list(): Promise<SuiteSummary[]>;
}
