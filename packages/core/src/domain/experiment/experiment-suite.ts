import type { Clock } from '../../ports/clock.js';
import { ConfigError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import type { ExperimentResultSet, MetricsRecord } from '../metrics/metrics-record.js';
import { validateExperimentConfig, type ExperimentConfig } from './experiment-config.js';
import type { ExperimentRunner } from './experiment-runner.js';

const log = createLogger('experiment-suite');

export interface SuiteProgressCallbacks {
  onExperimentStart?: (index: number, total: number, config: ExperimentConfig) => void;
  onWorkersStarted?: (index: number, workerCount: number) => void;
  onExperimentComplete?: (index: number, record: MetricsRecord) => void;
  onCooldown?: (seconds: number) => void;
}

export interface ExperimentSuiteOptions {
  runner: ExperimentRunner;
  clock: Clock;
  /** Defaults to the runner profile's cooldown. */
  cooldownSeconds?: number;
  callbacks?: SuiteProgressCallbacks;
}

/**
 * Runs configurations strictly one after another, with a cooldown between
 * consecutive runs so host usage settles before the next one samples it.
 */
export class ExperimentSuite {
  constructor(private readonly options: ExperimentSuiteOptions) {}

  async run(configs: readonly ExperimentConfig[]): Promise<ExperimentResultSet> {
    if (configs.length === 0) {
      throw new ConfigError('At least one experiment configuration is required');
    }
    configs.forEach((config, i) => {
      try {
        validateExperimentConfig(config);
      } catch (err) {
        if (err instanceof ConfigError) {
          throw new ConfigError(`Configuration #${i + 1}: ${err.message}`);
        }
        throw err;
      }
    });

    const { runner, clock, callbacks } = this.options;
    const cooldownSeconds = this.options.cooldownSeconds ?? runner.profile.cooldownSeconds;
    const results: MetricsRecord[] = [];

    log.info(`run: ${configs.length} configurations, ${cooldownSeconds}s cooldown`);

    for (const [index, config] of configs.entries()) {
      if (index > 0) {
        callbacks?.onCooldown?.(cooldownSeconds);
        log.info(`run: cooling down for ${cooldownSeconds}s`);
        await clock.sleep(cooldownSeconds * 1000);
      }

      callbacks?.onExperimentStart?.(index, configs.length, config);
      const record = await runner.run(config, {
        onWorkersStarted: (count) => callbacks?.onWorkersStarted?.(index, count),
      });
      results.push(record);
      callbacks?.onExperimentComplete?.(index, record);
    }

    return Object.freeze(results);
  }
}
