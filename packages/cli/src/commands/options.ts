import { InvalidArgumentError } from 'commander';
import { ConfigError, parseExperimentConfig, type ExperimentConfig } from '@ballotbench/core';

export type OutputFormat = 'interactive' | 'plain' | 'md' | 'json';

function asArgumentError(err: unknown): unknown {
  return err instanceof ConfigError ? new InvalidArgumentError(err.message) : err;
}

/** Commander option parser for repeated `-c q,v,m` flags. */
export function collectConfig(value: string, previous: ExperimentConfig[]): ExperimentConfig[] {
  try {
    return [...previous, parseExperimentConfig(value)];
  } catch (err) {
    throw asArgumentError(err);
  }
}

export function parseIntegerOption(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}"`);
  }
  return Number(value);
}

export function parseOutputFormat(value: string | undefined, json: boolean): OutputFormat {
  if (json) return 'json';
  switch (value) {
    case undefined:
    case 'interactive':
      return 'interactive';
    case 'plain':
    case 'md':
    case 'json':
      return value;
    default:
      throw new ConfigError(`Unknown format "${value}". Use interactive, plain, md or json`);
  }
}

export function splitList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}
