export class BallotBenchError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'BallotBenchError';
  }
}

export class ConfigError extends BallotBenchError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class ExperimentError extends BallotBenchError {
  constructor(message: string) {
    super(message, 'EXPERIMENT_ERROR');
    this.name = 'ExperimentError';
  }
}

export class TargetError extends BallotBenchError {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly status?: number,
  ) {
    super(message, 'TARGET_ERROR');
    this.name = 'TargetError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
