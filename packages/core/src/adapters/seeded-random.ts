import { MersenneTwister19937, Random } from 'random-js';
import type { RandomSource } from '../ports/random-source.js';

/**
 * Mersenne Twister backed source; reproducible when a seed is given.
 */
export class SeededRandom implements RandomSource {
  private readonly random: Random;

  constructor(seed?: number) {
    const engine = seed !== undefined ? MersenneTwister19937.seed(seed) : MersenneTwister19937.autoSeed();
    this.random = new Random(engine);
  }

  next(): number {
    return this.random.real(0, 1, false);
  }

  uniform(min: number, max: number): number {
    if (max <= min) return min;
    return this.random.real(min, max, true);
  }
}
