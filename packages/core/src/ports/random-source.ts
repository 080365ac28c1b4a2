export interface RandomSource {
  /** Uniform in [0, 1). */
  next(): number;
  /** Uniform in [min, max]; returns `min` when the range is empty. */
  uniform(min: number, max: number): number;
}
