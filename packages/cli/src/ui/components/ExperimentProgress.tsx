import React from 'react';
import { Text, Box } from 'ink';
import { formatExperimentConfig } from '@ballotbench/core';
import type { ExperimentState } from '../suite-progress.js';
import { formatElapsed, formatLatency } from '../format.js';
import { Spinner } from './Spinner.js';

interface ExperimentProgressProps {
  experiment: ExperimentState;
  total: number;
}

export function ExperimentProgress({ experiment, total }: ExperimentProgressProps) {
  const label = `[${experiment.index + 1}/${total}] ${formatExperimentConfig(experiment.config)}`;
  const { record } = experiment;

  if (experiment.status === 'running') {
    const workers = experiment.workerCount ? `, ${experiment.workerCount} tasks` : '';
    const elapsed = experiment.startedAt ? ` ${formatElapsed(Date.now() - experiment.startedAt)}` : '';
    return <Spinner text={`${label}${workers}${elapsed}`} />;
  }

  if (!record) {
    return (
      <Box>
        <Text color="gray">○ {label}</Text>
      </Box>
    );
  }

  const color = record.errorRatePercent > 5 ? 'yellow' : 'green';
  return (
    <Box>
      <Text color={color}>✓ </Text>
      <Text>{label.padEnd(44)}</Text>
      <Text color="gray">
        {record.votesProcessed} ok / {record.votesFailed} failed, p95 {formatLatency(record.latencyP95)}
      </Text>
    </Box>
  );
}
