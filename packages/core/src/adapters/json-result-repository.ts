import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { SuiteRecord } from '../domain/suite/suite-record.js';
import type { ResultRepository, SuiteSummary } from '../ports/result-repository.js';
import { ConfigError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('json-result-repository');

const SUITE_ID_PATTERN = /^[A-Za-z0-9-]+$/;

function isSuiteRecord(value: unknown): value is SuiteRecord {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  return (
    typeof record.id === 'string' &&
    typeof record.createdAt === 'string' &&
    typeof record.profile === 'string' &&
    Array.isArray(record.results)
  );
}

export class JsonResultRepository implements ResultRepository {
  constructor(private readonly dataDir: string) {}

  private get suitesDir(): string {
    return join(this.dataDir, 'suites');
  }

  private async ensureSuitesDir(): Promise<string> {
    const dir = this.suitesDir;
    await mkdir(dir, { recursive: true });
    return dir;
  }

  private async readSuite(filePath: string): Promise<SuiteRecord> {
    const parsed: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    if (!isSuiteRecord(parsed)) {
      throw new Error(`Malformed suite file: ${filePath}`);
    }
    return parsed;
  }

  async save(suite: SuiteRecord): Promise<string> {
    const dir = await this.ensureSuitesDir();
    const filePath = join(dir, `${suite.id}.json`);
    await writeFile(filePath, JSON.stringify(suite, null, 2), 'utf-8');
    return filePath;
  }

  async load(id: string): Promise<SuiteRecord> {
    if (!SUITE_ID_PATTERN.test(id)) {
      throw new ConfigError(`Invalid suite id: ${id}`);
    }
    const dir = await this.ensureSuitesDir();
    return this.readSuite(join(dir, `${id}.json`));
  }

  async list(): Promise<SuiteSummary[]> {
    const dir = await this.ensureSuitesDir();
    const files = (await readdir(dir)).filter((f) => f.endsWith('.json')).sort();

    const summaries: SuiteSummary[] = [];
    for (const file of files) {
      try {
        const suite = await this.readSuite(join(dir, file));
        summaries.push({
          id: suite.id,
          createdAt: suite.createdAt,
          profile: suite.profile,
          experimentCount: suite.results.length,
          maxErrorRatePercent: suite.results.reduce((acc, r) => Math.max(acc, r.errorRatePercent), 0),
        });
      } catch (err) {
        log.warn(`list: skipping ${file}:`, err instanceof Error ? err.message : String(err));
      }
    }

    summaries.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return summaries;
  }
}
