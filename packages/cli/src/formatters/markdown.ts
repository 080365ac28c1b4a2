import { HARNESS_PROFILES, type SuiteRecord } from '@ballotbench/core';
import type { OutputFormatter } from './formatter.js';
import { RESULT_HEADERS, resultRows } from './results-table.js';
import { reportOptions, summarizeResults, summaryEntries } from './summary.js';

const tableRow = (cells: string[]) => `| ${cells.join(' | ')} |`;

export function formatMarkdownReport(suite: SuiteRecord): string {
  const profile = HARNESS_PROFILES[suite.profile];
  const lines = [
    '# Ballotbench Suite',
    '',
    `**Suite:** ${suite.id}`,
    `**Profile:** ${profile.name} (p95 via ${profile.percentilePolicy})`,
    `**Targets:** query ${suite.queryMode}, vote ${suite.voteMode}${suite.dryRun ? ' (dry run)' : ''}`,
    `**Started:** ${suite.createdAt}`,
    `**Finished:** ${suite.finishedAt}`,
    '',
    '## Results',
    '',
    tableRow(RESULT_HEADERS),
    tableRow(RESULT_HEADERS.map(() => '---')),
    ...resultRows(suite.results, reportOptions(suite)).map(tableRow),
    '',
    '## Summary',
    '',
    ...summaryEntries(summarizeResults(suite.results), reportOptions(suite)).map(([label, value]) => `- **${label}:** ${value}`),
  ];
  return lines.join('\n');
}

export class MarkdownFormatter implements OutputFormatter {
  renderComplete(suite: SuiteRecord): void {
    console.log(formatMarkdownReport(suite));
  }

  renderError(error: string): void {
    console.error(`## Error\n\n${error}`);
  }
}
