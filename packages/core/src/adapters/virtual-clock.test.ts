import { describe, it, expect } from 'vitest';
import { ExperimentError } from '../shared/errors.js';
import { VirtualClock } from './virtual-clock.js';

describe('VirtualClock', () => {
  it('should start at its origin and only advance inside run', async () => {
    const clock = new VirtualClock(1_000);
    const pending = clock.sleep(500);

    expect(clock.now()).toBe(1_000);
    expect(clock.pendingSleeps).toBe(1);

    await clock.run(() => pending);
    expect(clock.now()).toBe(1_500);
  });

  it('should wake sleepers in due order, breaking ties by call order', async () => {
    const clock = new VirtualClock();
    const woken: string[] = [];
    const sleeper = async (label: string, ms: number) => {
      await clock.sleep(ms);
      woken.push(`${label}@${clock.now()}`);
    };

    await clock.run(() => Promise.all([sleeper('a', 300), sleeper('b', 100), sleeper('c', 300), sleeper('d', 0)]));

    expect(woken).toEqual(['d@0', 'b@100', 'a@300', 'c@300']);
  });

  it('should keep due order across many interleaved sleepers', async () => {
    const clock = new VirtualClock();
    const woken: number[] = [];
    const sleeper = async (id: number) => {
      await clock.sleep((id * 37) % 50);
      woken.push(id);
    };
    const ids = Array.from({ length: 200 }, (_, id) => id);

    await clock.run(() => Promise.all(ids.map(sleeper)));

    const expected = [...ids].sort((a, b) => (a * 37) % 50 - (b * 37) % 50 || a - b);
    expect(woken).toEqual(expected);
    expect(clock.now()).toBe(49);
  });

  it('should return the value of the driven work', async () => {
    const clock = new VirtualClock();
    const value = await clock.run(async () => {
      await clock.sleep(60_000);
      await clock.sleep(60_000);
      return clock.now();
    });

    expect(value).toBe(120_000);
  });

  it('should rethrow errors raised by the driven work', async () => {
    const clock = new VirtualClock();
    await expect(
      clock.run(async () => {
        await clock.sleep(10);
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
  });

  it('should fail when the work waits on something other than the clock', async () => {
    const clock = new VirtualClock();
    await expect(clock.run(() => new Promise<void>(() => undefined))).rejects.toThrow(ExperimentError);
  });
});
