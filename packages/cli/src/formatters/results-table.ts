import type { ExperimentResultSet } from '@ballotbench/core';
import type { SummaryOptions } from './summary.js';

export const RESULT_HEADERS = [
  '#',
  'Queries',
  'Votes/min',
  'Minutes',
  'Throughput/min',
  'Mean ms',
  'P95 ms',
  'Max ms',
  'Error %',
  'CPU %',
  'Mem MB',
];

export function resultRows(results: ExperimentResultSet, options: SummaryOptions = {}): string[][] {
  const measured = options.resourcesMeasured ?? true;
  return results.map((r, i) => [
    String(i + 1),
    String(r.config.concurrentQueries),
    String(r.config.votesPerMinute),
    String(r.config.durationMinutes),
    r.throughputPerMinute.toFixed(1),
    r.latencyMean.toFixed(1),
    r.latencyP95.toFixed(1),
    r.latencyMax.toFixed(1),
    r.errorRatePercent.toFixed(2),
    measured ? r.cpuMeanPercent.toFixed(1) : '-',
    measured ? r.memoryMeanMB.toFixed(0) : '-',
  ]);
}

/** Right-aligns every column to its widest cell. */
export function alignTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, col) => Math.max(h.length, ...rows.map((row) => row[col].length)));
  const line = (cells: string[]) => cells.map((cell, col) => cell.padStart(widths[col])).join('  ');
  return [line(headers), widths.map((w) => '-'.repeat(w)).join('  '), ...rows.map(line)];
}
