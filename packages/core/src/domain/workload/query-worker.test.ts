import { describe, it, expect } from 'vitest';
import { SimulatedQueryTarget } from '../../adapters/simulated-query-target.js';
import { VirtualClock } from '../../adapters/virtual-clock.js';
import type { RandomSource } from '../../ports/random-source.js';
import { MetricsCollector } from '../metrics/metrics-collector.js';
import { QueryWorker } from './query-worker.js';

const fixedRandom: RandomSource = { next: () => 0.5, uniform: (min) => min };
const config = { concurrentQueries: 100, votesPerMinute: 1, durationMinutes: 1 };
const finalizeOptions = {
  id: 'q',
  profile: 'fast' as const,
  percentilePolicy: 'index-approx' as const,
};

describe('QueryWorker', () => {
  it('should record one latency per query and pause between queries', async () => {
    const clock = new VirtualClock();
    const collector = new MetricsCollector(config, clock.now());
    const target = new SimulatedQueryTarget(clock, fixedRandom, { minMs: 30, maxMs: 30 });
    const worker = new QueryWorker({ target, clock, pauseMs: 100 });

    const writer = collector.openWriter('query-worker-1');
    // Iterations start every 130ms: 0, 130, ..., 910.
    const iterations = await clock.run(() => worker.run(writer, 1));
    writer.close();

    expect(iterations).toBe(8);
    expect(clock.now()).toBe(1040);
    const record = collector.finalize({ ...finalizeOptions, finishedAt: clock.now() });
    expect(record.latenciesMs).toEqual(Array<number>(8).fill(30));
  });

  it('should record failures as errors and keep going', async () => {
    const clock = new VirtualClock();
    const collector = new MetricsCollector(config, clock.now());
    const target = {
      name: 'broken',
      query: async () => {
        await clock.sleep(5);
        throw new Error('refused');
      },
    };
    const worker = new QueryWorker({ target, clock, pauseMs: 100 });

    const writer = collector.openWriter('query-worker-1');
    const iterations = await clock.run(() => worker.run(writer, 1));
    writer.close();

    expect(iterations).toBe(10);
    const record = collector.finalize({ ...finalizeOptions, finishedAt: clock.now() });
    expect(record.latenciesMs).toHaveLength(0);
    expect(record.errors).toHaveLength(10);
    expect(record.errors[0]).toBe('Query failed (broken): refused');
  });

  it('should lose no samples with 100 workers appending concurrently', async () => {
    const clock = new VirtualClock();
    const collector = new MetricsCollector(config, clock.now());
    const target = new SimulatedQueryTarget(clock, fixedRandom, { minMs: 30, maxMs: 30 });

    const writers = Array.from({ length: 100 }, (_, i) => collector.openWriter(`query-worker-${i + 1}`));
    const counts = await clock.run(() =>
      Promise.all(
        writers.map((writer) =>
          new QueryWorker({ target, clock, pauseMs: 100 }).run(writer, 1).finally(() => writer.close()),
        ),
      ),
    );

    const record = collector.finalize({ ...finalizeOptions, finishedAt: clock.now() });
    expect(counts.every((c) => c === 8)).toBe(true);
    expect(record.latenciesMs).toHaveLength(800);
  });
});
