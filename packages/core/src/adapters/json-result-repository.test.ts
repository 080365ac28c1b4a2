import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { MetricsRecord } from '../domain/metrics/metrics-record.js';
import type { SuiteRecord } from '../domain/suite/suite-record.js';
import { ConfigError } from '../shared/errors.js';
import { JsonResultRepository } from './json-result-repository.js';

function metrics(errorRatePercent: number): MetricsRecord {
  return {
    id: `exp-${errorRatePercent}`,
    profile: 'fast',
    percentilePolicy: 'index-approx',
    config: { concurrentQueries: 5, votesPerMinute: 50, durationMinutes: 1 },
    timestamp: '2026-03-01T10:00:00.000Z',
    latenciesMs: [12, 30],
    votesProcessed: 40,
    votesFailed: 2,
    cpuSamples: [20],
    memorySamples: [512],
    errors: [],
    latencyMean: 21,
    latencyP95: 30,
    latencyMax: 30,
    durationActualSeconds: 60,
    throughputPerMinute: 40,
    errorRatePercent,
    cpuMeanPercent: 20,
    memoryMeanMB: 512,
  };
}

function suite(id: string, createdAt: string, rates: number[]): SuiteRecord {
  return {
    id,
    createdAt,
    finishedAt: createdAt,
    profile: 'fast',
    queryMode: 'simulated',
    voteMode: 'simulated',
    seed: 7,
    dryRun: true,
    results: rates.map(metrics),
  };
}

describe('JsonResultRepository', () => {
  let dataDir: string;
  let repository: JsonResultRepository;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'ballotbench-results-'));
    repository = new JsonResultRepository(dataDir);
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should save a suite and load it back', async () => {
    const record = suite('suite-1', '2026-03-01T10:00:00.000Z', [4.5]);

    const filePath = await repository.save(record);

    expect(filePath).toBe(join(dataDir, 'suites', 'suite-1.json'));
    await expect(repository.load('suite-1')).resolves.toEqual(record);
  });

  it('should list summaries newest first', async () => {
    await repository.save(suite('older', '2026-03-01T10:00:00.000Z', [1, 7.5, 3]));
    await repository.save(suite('newer', '2026-03-02T10:00:00.000Z', []));

    const summaries = await repository.list();

    expect(summaries).toEqual([
      { id: 'newer', createdAt: '2026-03-02T10:00:00.000Z', profile: 'fast', experimentCount: 0, maxErrorRatePercent: 0 },
      { id: 'older', createdAt: '2026-03-01T10:00:00.000Z', profile: 'fast', experimentCount: 3, maxErrorRatePercent: 7.5 },
    ]);
  });

  it('should skip malformed files when listing', async () => {
    await repository.save(suite('good', '2026-03-01T10:00:00.000Z', [2]));
    await writeFile(join(dataDir, 'suites', 'broken.json'), '{ not json', 'utf-8');
    await writeFile(join(dataDir, 'suites', 'partial.json'), '{"id": "partial"}', 'utf-8');

    const summaries = await repository.list();

    expect(summaries.map((s) => s.id)).toEqual(['good']);
  });

  it('should return an empty list when nothing was saved', async () => {
    await expect(repository.list()).resolves.toEqual([]);
  });

  it('should reject ids that could escape the results directory', async () => {
    await expect(repository.load('../preferences')).rejects.toThrow(ConfigError);
  });

  it('should fail to load an unknown suite', async () => {
    await expect(repository.load('missing')).rejects.toThrow();
  });
});
