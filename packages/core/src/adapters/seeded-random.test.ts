import { describe, it, expect } from 'vitest';
import { SeededRandom } from './seeded-random.js';

describe('SeededRandom', () => {
  it('should repeat the same sequence for the same seed', () => {
    const a = new SeededRandom(1234);
    const b = new SeededRandom(1234);
    const first = Array.from({ length: 20 }, () => a.next());
    const second = Array.from({ length: 20 }, () => b.next());

    expect(second).toEqual(first);
  });

  it('should keep next within [0, 1)', () => {
    const random = new SeededRandom(99);
    for (let i = 0; i < 1_000; i++) {
      const value = random.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('should keep uniform within its inclusive range', () => {
    const random = new SeededRandom(5);
    for (let i = 0; i < 1_000; i++) {
      const value = random.uniform(10, 50);
      expect(value).toBeGreaterThanOrEqual(10);
      expect(value).toBeLessThanOrEqual(50);
    }
  });

  it('should return min for an empty range', () => {
    const random = new SeededRandom(5);
    expect(random.uniform(50, 50)).toBe(50);
    expect(random.uniform(80, 20)).toBe(80);
  });
});
