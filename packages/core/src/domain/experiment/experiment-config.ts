import { ConfigError } from '../../shared/errors.js';

export interface ExperimentConfig {
  readonly concurrentQueries: number;
  readonly votesPerMinute: number;
  readonly durationMinutes: number;
}

const FIELDS = ['concurrentQueries', 'votesPerMinute', 'durationMinutes'] as const;

export function validateExperimentConfig(config: ExperimentConfig): void {
  for (const field of FIELDS) {
    const value = config[field];
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigError(`${field} must be a positive integer, got ${value}`);
    }
  }
}

export function createExperimentConfig(
  concurrentQueries: number,
  votesPerMinute: number,
  durationMinutes: number,
): ExperimentConfig {
  const config = { concurrentQueries, votesPerMinute, durationMinutes };
  validateExperimentConfig(config);
  return Object.freeze(config);
}

/**
 * Parses a `queries,votesPerMinute,minutes` triple such as `5,50,1`.
 */
export function parseExperimentConfig(input: string): ExperimentConfig {
  const parts = input.split(',').map((s) => s.trim());
  if (parts.length !== 3 || parts.some((p) => !/^\d+$/.test(p))) {
    throw new ConfigError(`Invalid configuration "${input}", expected <queries>,<votesPerMinute>,<minutes>`);
  }
  const [queries, votes, minutes] = parts.map(Number);
  return createExperimentConfig(queries, votes, minutes);
}

export function durationSeconds(config: ExperimentConfig): number {
  return config.durationMinutes * 60;
}

export function voteIntervalSeconds(config: ExperimentConfig): number {
  return 60 / config.votesPerMinute;
}

export function formatExperimentConfig(config: ExperimentConfig): string {
  return `${config.concurrentQueries} queries, ${config.votesPerMinute} votes/min, ${config.durationMinutes} min`;
}
