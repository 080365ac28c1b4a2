import { ConfigError, type ResultRepository, type SuiteRecord, type SuiteSummary } from '@ballotbench/core';

/** Used with `--no-save`: suites are reported but never written to disk. */
export class DiscardingResultRepository implements ResultRepository {
  async save(_suite: SuiteRecord): Promise<string> {
    return '';
  }

  async load(id: string): Promise<SuiteRecord> {
    throw new ConfigError(`Suite ${id} was not saved`);
  }

  async list(): Promise<SuiteSummary[]> {
    return [];
  }
}
