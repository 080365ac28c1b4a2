import React from 'react';
import { Box, Text } from 'ink';
import type { SuiteProgressState } from './suite-progress.js';
import { RunView } from './RunView.js';

interface AppProps {
  state: SuiteProgressState;
}

export function App({ state }: AppProps) {
  return (
    <Box flexDirection="column">
      <Box paddingX={2}>
        <Text bold color="cyan">ballotbench</Text>
        <Text color="gray"> - voting platform load harness</Text>
      </Box>
      <RunView state={state} />
    </Box>
  );
}
