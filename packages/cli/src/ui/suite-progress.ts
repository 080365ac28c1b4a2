import type { ExperimentConfig, HarnessProfileName, MetricsRecord, SuiteRecord } from '@ballotbench/core';
import type { EventHandler } from '../adapters/callback-event-bridge.js';

export type ExperimentStatus = 'pending' | 'running' | 'complete';

export interface ExperimentState {
  index: number;
  config: ExperimentConfig;
  status: ExperimentStatus;
  workerCount?: number;
  startedAt?: number;
  record?: MetricsRecord;
}

export interface SuiteProgressState {
  suiteId: string | null;
  profile: HarnessProfileName | null;
  total: number;
  experiments: ExperimentState[];
  cooldownSeconds: number | null;
  suite: SuiteRecord | null;
  error: string | null;
  done: boolean;
}

export type Action =
  | { type: 'SUITE_START'; suiteId: string; profile: HarnessProfileName; total: number }
  | { type: 'EXPERIMENT_START'; index: number; config: ExperimentConfig; at: number }
  | { type: 'WORKERS_STARTED'; index: number; workerCount: number }
  | { type: 'EXPERIMENT_COMPLETE'; index: number; record: MetricsRecord }
  | { type: 'COOLDOWN'; seconds: number }
  | { type: 'COMPLETE'; suite: SuiteRecord }
  | { type: 'ERROR'; error: string };

function updateExperiment(
  state: SuiteProgressState,
  index: number,
  update: (existing: ExperimentState | undefined) => ExperimentState | undefined,
): SuiteProgressState {
  const experiments = [...state.experiments];
  const next = update(experiments[index]);
  if (!next) return state;
  experiments[index] = next;
  return { ...state, experiments };
}

export function suiteProgressReducer(state: SuiteProgressState, action: Action): SuiteProgressState {
  switch (action.type) {
    case 'SUITE_START':
      return { ...state, suiteId: action.suiteId, profile: action.profile, total: action.total };

    case 'EXPERIMENT_START':
      return updateExperiment({ ...state, cooldownSeconds: null }, action.index, () => ({
        index: action.index,
        config: action.config,
        status: 'running',
        startedAt: action.at,
      }));

    case 'WORKERS_STARTED':
      return updateExperiment(state, action.index, (existing) =>
        existing && { ...existing, workerCount: action.workerCount });

    case 'EXPERIMENT_COMPLETE':
      return updateExperiment(state, action.index, (existing) => ({
        index: action.index,
        config: action.record.config,
        status: 'complete',
        workerCount: existing?.workerCount,
        startedAt: existing?.startedAt,
        record: action.record,
      }));

    case 'COOLDOWN':
      return { ...state, cooldownSeconds: action.seconds };

    case 'COMPLETE':
      return { ...state, suite: action.suite, cooldownSeconds: null, done: true };

    case 'ERROR':
      return { ...state, error: action.error, done: true };

    default:
      return state;
  }
}

export const initialState: SuiteProgressState = {
  suiteId: null,
  profile: null,
  total: 0,
  experiments: [],
  cooldownSeconds: null,
  suite: null,
  error: null,
  done: false,
};

export function progressHandlers(dispatch: (action: Action) => void, now: () => number = Date.now): EventHandler {
  return {
    onSuiteStart: (suiteId, profile, total) => dispatch({ type: 'SUITE_START', suiteId, profile, total }),
    onExperimentStart: (index, _total, config) => dispatch({ type: 'EXPERIMENT_START', index, config, at: now() }),
    onWorkersStarted: (index, workerCount) => dispatch({ type: 'WORKERS_STARTED', index, workerCount }),
    onExperimentComplete: (index, record) => dispatch({ type: 'EXPERIMENT_COMPLETE', index, record }),
    onCooldown: (seconds) => dispatch({ type: 'COOLDOWN', seconds }),
    onComplete: (suite) => dispatch({ type: 'COMPLETE', suite }),
    onError: (error) => dispatch({ type: 'ERROR', error }),
  };
}
