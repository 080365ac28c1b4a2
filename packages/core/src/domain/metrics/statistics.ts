import type { PercentilePolicy } from '../experiment/harness-profile.js';

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function max(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let result = values[0];
  for (const v of values) {
    if (v > result) result = v;
  }
  return result;
}

export function min(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let result = values[0];
  for (const v of values) {
    if (v < result) result = v;
  }
  return result;
}

function sortedCopy(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * `sorted[floor(n * fraction)]`. Biased upwards at small n: for n <= 20 the
 * 95th percentile is the maximum.
 */
export function indexPercentile(values: readonly number[], fraction: number): number {
  if (values.length === 0) return 0;
  const sorted = sortedCopy(values);
  const index = Math.min(Math.floor(sorted.length * fraction), sorted.length - 1);
  return sorted[index];
}

/**
 * Cut point `i` of `n` equal-probability intervals using the exclusive method
 * (positions at `i * (len + 1) / n`), extrapolating at the edges.
 */
export function exclusiveQuantile(values: readonly number[], i: number, n: number): number {
  if (values.length === 0) return 0;
  if (values.length === 1) return values[0];
  const sorted = sortedCopy(values);
  const size = sorted.length;
  const m = size + 1;
  let j = Math.floor((i * m) / n);
  j = j < 1 ? 1 : j > size - 1 ? size - 1 : j;
  const delta = i * m - j * n;
  return (sorted[j - 1] * (n - delta) + sorted[j] * delta) / n;
}

export function percentile95(values: readonly number[], policy: PercentilePolicy): number {
  switch (policy) {
    case 'index-approx':
      return indexPercentile(values, 0.95);
    case 'interpolated-quantile':
      return exclusiveQuantile(values, 19, 20);
  }
}

export function ratePerMinute(count: number, elapsedSeconds: number): number {
  return elapsedSeconds > 0 ? count / (elapsedSeconds / 60) : 0;
}

export function errorRatePercent(failed: number, succeeded: number): number {
  const total = failed + succeeded;
  return total > 0 ? (failed / total) * 100 : 0;
}
