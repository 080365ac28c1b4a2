import React from 'react';
import { Text, Box } from 'ink';
import type { SuiteRecord } from '@ballotbench/core';
import { RESULT_HEADERS, alignTable, resultRows } from '../../formatters/results-table.js';
import { reportOptions, summarizeResults, summaryEntries } from '../../formatters/summary.js';

export function ResultsTable({ suite }: { suite: SuiteRecord }) {
  const [header, rule, ...rows] = alignTable(RESULT_HEADERS, resultRows(suite.results, reportOptions(suite)));

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text bold color="yellow">Results:</Text>
      <Text bold>{header}</Text>
      <Text color="gray">{rule}</Text>
      {rows.map((row, i) => (
        <Text key={i} color={suite.results[i].errorRatePercent > 5 ? 'yellow' : undefined}>{row}</Text>
      ))}
      <Box flexDirection="column" marginTop={1}>
        {summaryEntries(summarizeResults(suite.results), reportOptions(suite)).map(([label, value]) => (
          <Box key={label}>
            <Text color="gray">{`${label}:`.padEnd(18)}</Text>
            <Text>{value}</Text>
          </Box>
        ))}
      </Box>
    </Box>
  );
}
