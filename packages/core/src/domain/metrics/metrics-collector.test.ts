import { describe, it, expect } from 'vitest';
import { ExperimentError } from '../../shared/errors.js';
import { MetricsCollector } from './metrics-collector.js';

const config = { concurrentQueries: 2, votesPerMinute: 60, durationMinutes: 1 };
const finalizeOptions = {
  id: 'run-1',
  profile: 'fast' as const,
  percentilePolicy: 'index-approx' as const,
  finishedAt: 60_000,
};

describe('MetricsCollector', () => {
  it('should refuse to finalize while a writer is open', () => {
    const collector = new MetricsCollector(config, 0);
    collector.openWriter('query-worker-1');
    expect(() => collector.finalize(finalizeOptions)).toThrow(ExperimentError);
    expect(collector.isFinalized).toBe(false);
  });

  it('should derive statistics from every writer once all are closed', () => {
    const collector = new MetricsCollector(config, 0);
    const query = collector.openWriter('query-worker-1');
    const vote = collector.openWriter('vote-worker');
    const sampler = collector.openWriter('resource-sampler');

    query.recordLatency(10);
    query.recordLatency(30);
    vote.recordVote('processed', 20);
    vote.recordVote('failed');
    sampler.recordHostSample({ cpuPercent: 50, memoryUsedMB: 1000 });
    sampler.recordHostSample({ cpuPercent: 70, memoryUsedMB: 3000 });
    sampler.recordError('boom');

    expect(collector.progress()).toEqual({
      latencyCount: 3,
      votesProcessed: 1,
      votesFailed: 1,
      errorCount: 1,
      openWriters: 3,
    });

    query.close();
    vote.close();
    sampler.close();
    const record = collector.finalize(finalizeOptions);

    expect(record.id).toBe('run-1');
    expect(record.timestamp).toBe('1970-01-01T00:00:00.000Z');
    expect(record.latenciesMs).toEqual([10, 30, 20]);
    expect(record.latencyMean).toBe(20);
    expect(record.latencyP95).toBe(30);
    expect(record.latencyMax).toBe(30);
    expect(record.votesProcessed).toBe(1);
    expect(record.votesFailed).toBe(1);
    expect(record.errorRatePercent).toBe(50);
    expect(record.durationActualSeconds).toBe(60);
    expect(record.throughputPerMinute).toBe(1);
    expect(record.cpuMeanPercent).toBe(60);
    expect(record.memoryMeanMB).toBe(2000);
    expect(record.errors).toEqual(['boom']);
    expect(record.config).toEqual(config);
  });

  it('should hand out a frozen record', () => {
    const collector = new MetricsCollector(config, 0);
    collector.openWriter('w').close();
    const record = collector.finalize(finalizeOptions);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.latenciesMs)).toBe(true);
    expect(Object.isFrozen(record.errors)).toBe(true);
  });

  it('should report zeros when nothing was recorded', () => {
    const collector = new MetricsCollector(config, 0);
    const record = collector.finalize({ ...finalizeOptions, finishedAt: 0 });
    expect(record.latencyMean).toBe(0);
    expect(record.latencyP95).toBe(0);
    expect(record.latencyMax).toBe(0);
    expect(record.throughputPerMinute).toBe(0);
    expect(record.errorRatePercent).toBe(0);
    expect(record.cpuMeanPercent).toBe(0);
    expect(record.memoryMeanMB).toBe(0);
  });

  it('should finalize exactly once', () => {
    const collector = new MetricsCollector(config, 0);
    collector.finalize(finalizeOptions);
    expect(() => collector.finalize(finalizeOptions)).toThrow('Metrics already finalized');
    expect(() => collector.openWriter('late')).toThrow(ExperimentError);
  });

  it('should reject writes through a closed writer', () => {
    const collector = new MetricsCollector(config, 0);
    const writer = collector.openWriter('query-worker-1');
    writer.close();
    writer.close();
    expect(() => writer.recordLatency(5)).toThrow('Writer "query-worker-1" used after close');
    expect(collector.progress().openWriters).toBe(0);
  });
});
