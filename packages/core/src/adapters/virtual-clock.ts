import type { Clock } from '../ports/clock.js';
import { ExperimentError } from '../shared/errors.js';

interface PendingSleep {
  dueAt: number;
  sequence: number;
  wake: () => void;
}

function before(a: PendingSleep, b: PendingSleep): boolean {
  return a.dueAt < b.dueAt || (a.dueAt === b.dueAt && a.sequence < b.sequence);
}

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

function drainMicrotasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Discrete-event clock. Time only moves inside `run`, and only when every task
 * driven by it is suspended in `sleep`; the earliest sleeper (ties broken by
 * call order) is then woken at its due time. Work that waits on anything other
 * than this clock is not supported.
 */
export class VirtualClock implements Clock {
  private current: number;
  private sequence = 0;
  private readonly pending: PendingSleep[] = [];

  constructor(originMs = 0) {
    this.current = originMs;
  }

  now(): number {
    return this.current;
  }

  sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.push({ dueAt: this.current + Math.max(0, ms), sequence: this.sequence++, wake: resolve });
    });
  }

  get pendingSleeps(): number {
    return this.pending.length;
  }

  async run<T>(work: () => Promise<T>): Promise<T> {
    const state: { outcome?: Outcome<T> } = {};
    void work().then(
      (value) => {
        state.outcome = { ok: true, value };
      },
      (error: unknown) => {
        state.outcome = { ok: false, error };
      },
    );

    for (;;) {
      await drainMicrotasks();
      const outcome = state.outcome;
      if (outcome) {
        if (!outcome.ok) throw outcome.error;
        return outcome.value;
      }
      const next = this.takeEarliest();
      if (!next) {
        throw new ExperimentError('Virtual clock stalled: work is waiting on something other than the clock');
      }
      this.current = Math.max(this.current, next.dueAt);
      next.wake();
    }
  }

  // `pending` is a binary min-heap ordered by (dueAt, sequence).
  private push(entry: PendingSleep): void {
    const heap = this.pending;
    heap.push(entry);
    let i = heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(heap[i], heap[parent])) break;
      [heap[i], heap[parent]] = [heap[parent], heap[i]];
      i = parent;
    }
  }

  private takeEarliest(): PendingSleep | undefined {
    const heap = this.pending;
    const last = heap.pop();
    if (!last || heap.length === 0) return last;

    const earliest = heap[0];
    heap[0] = last;
    let i = 0;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < heap.length && before(heap[left], heap[smallest])) smallest = left;
      if (right < heap.length && before(heap[right], heap[smallest])) smallest = right;
      if (smallest === i) break;
      [heap[i], heap[smallest]] = [heap[smallest], heap[i]];
      i = smallest;
    }
    return earliest;
  }
}
