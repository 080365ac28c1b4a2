import React from 'react';
import { render as inkRender } from 'ink';
import type { Command } from 'commander';
import {
  BenchmarkService,
  JsonConfigStore,
  JsonResultRepository,
  describeError,
  formatExperimentConfig,
  setLogLevel,
  type BenchmarkInput,
  type ExperimentConfig,
  type ResultRepository,
} from '@ballotbench/core';
import { createCallbackEventBridge } from '../adapters/callback-event-bridge.js';
import { DiscardingResultRepository } from '../adapters/discarding-result-repository.js';
import { getConfigDir, getDataDir } from '../adapters/xdg-paths.js';
import { createFormatter } from '../formatters/formatter.js';
import { App } from '../ui/App.js';
import { formatLatency } from '../ui/format.js';
import {
  initialState,
  progressHandlers,
  suiteProgressReducer,
  type Action,
  type SuiteProgressState,
} from '../ui/suite-progress.js';
import { collectConfig, parseIntegerOption, parseOutputFormat, type OutputFormat } from './options.js';

interface RunOptions {
  config: ExperimentConfig[];
  queryMode?: string;
  voteMode?: string;
  seed?: number;
  dryRun?: boolean;
  json?: boolean;
  format?: string;
  save: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

function buildInput(profile: string | undefined, opts: RunOptions): BenchmarkInput {
  return {
    configs: opts.config.length > 0 ? opts.config : undefined,
    overrides: {
      profile,
      queryMode: opts.queryMode,
      voteMode: opts.voteMode,
      seed: opts.seed,
    },
    dryRun: opts.dryRun ?? false,
  };
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run an experiment suite against the voting platform')
    .argument('[profile]', 'Harness profile: fast or standard')
    .option('-c, --config <q,v,m>', 'Experiment as queries,votesPerMinute,minutes (repeatable)', collectConfig, [])
    .option('--query-mode <mode>', 'Query target: simulated or http')
    .option('--vote-mode <mode>', 'Vote target: simulated or http')
    .option('--seed <n>', 'Seed the random source for reproducible runs', parseIntegerOption)
    .option('--dry-run', 'Simulated targets on a virtual clock, far faster than real time')
    .option('--json', 'Output as JSON to stdout')
    .option('--format <type>', 'Output format: interactive (default), plain, md')
    .option('--no-save', "Don't persist the suite to history")
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Minimal output')
    .action(async (profile: string | undefined, opts: RunOptions) => {
      let format: OutputFormat;
      try {
        format = parseOutputFormat(opts.format, opts.json ?? false);
      } catch (err) {
        console.error(`Error: ${describeError(err)}`);
        process.exit(1);
      }

      const isQuiet = opts.quiet ?? false;
      const isInteractive = format === 'interactive' && Boolean(process.stdout.isTTY) && !isQuiet;

      if (opts.verbose) setLogLevel('debug');
      else if (isQuiet || isInteractive || format === 'json') setLogLevel('error');

      const configStore = new JsonConfigStore(getConfigDir());
      const resultRepository: ResultRepository = opts.save
        ? new JsonResultRepository(getDataDir())
        : new DiscardingResultRepository();
      const input = buildInput(profile, opts);

      // --- Interactive mode: Ink UI ---
      if (isInteractive) {
        let state: SuiteProgressState = { ...initialState };

        const dispatch = (action: Action) => {
          state = suiteProgressReducer(state, action);
          ink.rerender(React.createElement(App, { state }));
        };

        const ink = inkRender(React.createElement(App, { state }));

        const events = createCallbackEventBridge({
          ...progressHandlers(dispatch),
          onComplete: (suite) => {
            dispatch({ type: 'COMPLETE', suite });
            // Brief delay so the final frame renders before unmount
            setTimeout(() => ink.unmount(), 100);
          },
        });

        const service = new BenchmarkService({ configStore, resultRepository, events });

        try {
          const suite = await service.run(input);
          await ink.waitUntilExit();
          if (opts.save) console.log(`  Suite saved: ${suite.id}\n`);
        } catch {
          // The error frame was rendered by onError.
          ink.unmount();
          process.exit(1);
        }

        return;
      }

      // --- Non-interactive mode: line output, then the chosen formatter ---
      const formatter = createFormatter(format === 'interactive' ? 'plain' : format);
      const showProgress = format !== 'json' && !isQuiet;

      const events = createCallbackEventBridge({
        onSuiteStart: (suiteId, profileName, total) => {
          if (showProgress) console.log(`\n  Suite ${suiteId}: profile ${profileName}, ${total} experiment(s)\n`);
        },
        onExperimentStart: (index, total, config) => {
          if (showProgress) console.log(`  ▶ [${index + 1}/${total}] ${formatExperimentConfig(config)}`);
        },
        onExperimentComplete: (index, record) => {
          if (showProgress) {
            console.log(
              `  ✓ [${index + 1}] ${record.votesProcessed} processed, ${record.votesFailed} failed, ` +
                `p95 ${formatLatency(record.latencyP95)}`,
            );
          }
        },
        onCooldown: (seconds) => {
          if (showProgress) console.log(`  ○ cooling down for ${seconds}s`);
        },
        onComplete: (suite) => {
          if (showProgress) console.log();
          formatter.renderComplete(suite);
          if (showProgress && opts.save) console.log(`\n  Suite saved: ${suite.id}\n`);
        },
        onError: (error) => formatter.renderError(error),
      });

      const service = new BenchmarkService({ configStore, resultRepository, events });

      try {
        await service.run(input);
      } catch {
        process.exit(1);
      }
    });
}
