import type { SuiteRecord } from '@ballotbench/core';
import type { OutputFormatter } from './formatter.js';
import { RESULT_HEADERS, alignTable, resultRows } from './results-table.js';
import { reportOptions, summarizeResults, summaryEntries } from './summary.js';

export function formatPlainReport(suite: SuiteRecord): string {
  const lines: string[] = [];
  const flags = [suite.profile, suite.dryRun ? 'dry run' : `query ${suite.queryMode}, vote ${suite.voteMode}`];
  if (suite.seed !== undefined) flags.push(`seed ${suite.seed}`);

  lines.push(`Suite ${suite.id} (${flags.join(', ')})`, '');
  lines.push(...alignTable(RESULT_HEADERS, resultRows(suite.results, reportOptions(suite))), '');

  for (const [label, value] of summaryEntries(summarizeResults(suite.results), reportOptions(suite))) {
    lines.push(`${`${label}:`.padEnd(18)}${value}`);
  }

  const withErrors = suite.results
    .map((record, i) => ({ record, position: i + 1 }))
    .filter(({ record }) => record.errors.length > 0);
  if (withErrors.length > 0) {
    lines.push('', 'Errors:');
    for (const { record, position } of withErrors) {
      lines.push(`  #${position}: ${record.errors.length} recorded, first: ${record.errors[0]}`);
    }
  }

  return lines.join('\n');
}

export class PlainFormatter implements OutputFormatter {
  renderComplete(suite: SuiteRecord): void {
    console.log(formatPlainReport(suite));
  }

  renderError(error: string): void {
    console.error(`Error: ${error}`);
  }
}
