import React from 'react';
import { Box, Text } from 'ink';
import type { SuiteProgressState } from './suite-progress.js';
import { ExperimentProgress } from './components/ExperimentProgress.js';
import { ResultsTable } from './components/ResultsTable.js';
import { Spinner } from './components/Spinner.js';

interface RunViewProps {
  state: SuiteProgressState;
}

export function RunView({ state }: RunViewProps) {
  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      {state.suiteId && (
        <Box marginBottom={1}>
          <Text color="gray">
            Suite {state.suiteId} · profile {state.profile} · {state.total} experiment(s)
          </Text>
        </Box>
      )}

      {state.experiments.map((experiment) => (
        <ExperimentProgress key={experiment.index} experiment={experiment} total={state.total} />
      ))}

      {state.cooldownSeconds !== null && !state.done && (
        <Spinner color="yellow" text={`Cooling down for ${state.cooldownSeconds}s`} />
      )}

      {state.suite && <ResultsTable suite={state.suite} />}

      {state.error && (
        <Box marginTop={1}>
          <Text color="red" bold>Error: {state.error}</Text>
        </Box>
      )}
    </Box>
  );
}
