import type { Command } from 'commander';
import { JsonResultRepository, describeError } from '@ballotbench/core';
import { getDataDir } from '../adapters/xdg-paths.js';
import { createFormatter } from '../formatters/formatter.js';
import { SATURATION_THRESHOLD_PERCENT } from '../formatters/summary.js';

interface HistoryOptions {
  json?: boolean;
  last?: boolean;
  format?: string;
}

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('List or view past experiment suites')
    .argument('[suite-id]', 'View a specific suite by ID')
    .option('--json', 'Output as JSON')
    .option('--last', 'Show the most recent suite')
    .option('--format <type>', 'Report format for a single suite: plain (default) or md')
    .action(async (suiteId: string | undefined, opts: HistoryOptions) => {
      const repo = new JsonResultRepository(getDataDir());

      if (opts.last) {
        const suites = await repo.list();
        if (suites.length === 0) {
          console.log('No suites found.');
          return;
        }
        suiteId = suites[0].id;
      }

      if (suiteId) {
        try {
          const suite = await repo.load(suiteId);
          createFormatter(opts.json ? 'json' : opts.format === 'md' ? 'md' : 'plain').renderComplete(suite);
        } catch (err) {
          console.error(`Suite not found: ${suiteId} (${describeError(err)})`);
          process.exit(1);
        }
        return;
      }

      const suites = await repo.list();
      if (opts.json) {
        console.log(JSON.stringify(suites, null, 2));
        return;
      }
      if (suites.length === 0) {
        console.log('No suites found.');
        return;
      }

      console.log(`\n  ${'ID'.padEnd(38)} ${'Date'.padEnd(22)} ${'Profile'.padEnd(9)} ${'Runs'.padEnd(5)} Max err %`);
      console.log(`  ${'-'.repeat(38)} ${'-'.repeat(22)} ${'-'.repeat(9)} ${'-'.repeat(5)} ${'-'.repeat(20)}`);
      for (const suite of suites) {
        const date = new Date(suite.createdAt).toLocaleString();
        const marker = suite.maxErrorRatePercent > SATURATION_THRESHOLD_PERCENT ? ' (saturated)' : '';
        console.log(
          `  ${suite.id.padEnd(38)} ${date.padEnd(22)} ${suite.profile.padEnd(9)} ` +
            `${String(suite.experimentCount).padEnd(5)} ${suite.maxErrorRatePercent.toFixed(2)}${marker}`,
        );
      }
      console.log();
    });
}
