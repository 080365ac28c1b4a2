import type { Command } from 'commander';
import {
  ConfigError,
  ConfigService,
  JsonConfigStore,
  describeError,
  type Endpoint,
  type HarnessPrefs,
} from '@ballotbench/core';
import { getConfigDir } from '../adapters/xdg-paths.js';
import { splitList } from './options.js';

export const CONFIG_KEYS = ['profile', 'query-mode', 'vote-mode', 'query-urls', 'vote-url', 'seed', 'timeout'] as const;
export type ConfigKey = (typeof CONFIG_KEYS)[number];

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

function parseInteger(key: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new ConfigError(`${key} must be an integer, got "${value}"`);
  }
  return Number(value);
}

/** Maps a `config set <key> <value>` pair onto stored preferences. */
export function prefsForKey(key: string, value: string): HarnessPrefs {
  if (!isConfigKey(key)) {
    throw new ConfigError(`Unknown config key: ${key}. Valid keys: ${CONFIG_KEYS.join(', ')}`);
  }
  switch (key) {
    case 'profile':
      return { profile: value };
    case 'query-mode':
      return { queryMode: value };
    case 'vote-mode':
      return { voteMode: value };
    case 'query-urls':
      return { queryUrls: splitList(value) };
    case 'vote-url':
      return { voteUrl: value };
    case 'seed':
      return { seed: parseInteger(key, value) };
    case 'timeout':
      return { requestTimeoutMs: parseInteger(key, value) };
  }
}

interface ConfigDisplay {
  profile: string;
  queryMode: string;
  voteMode: string;
  queryEndpoints: Endpoint[];
  voteEndpoint: string;
  requestTimeoutMs: number;
  seed: number | null;
  configFile: string;
}

function createService(): { service: ConfigService; store: JsonConfigStore } {
  const store = new JsonConfigStore(getConfigDir());
  return { service: new ConfigService(store), store };
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage configuration');

  config
    .command('show')
    .description('Show the resolved configuration')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      const { service, store } = createService();
      let display: ConfigDisplay;
      try {
        const resolved = await service.resolve();
        display = {
          profile: resolved.profile.name,
          queryMode: resolved.queryMode,
          voteMode: resolved.voteMode,
          queryEndpoints: resolved.queryEndpoints,
          voteEndpoint: resolved.voteEndpoint,
          requestTimeoutMs: resolved.requestTimeoutMs,
          seed: resolved.seed ?? null,
          configFile: store.prefsPath,
        };
      } catch (err) {
        console.error(`Error: ${describeError(err)}`);
        process.exit(1);
      }

      if (opts.json) {
        console.log(JSON.stringify(display, null, 2));
        return;
      }
      console.log(`\n  Configuration:`);
      console.log(`  Profile:        ${display.profile}`);
      console.log(`  Query mode:     ${display.queryMode}`);
      console.log(`  Vote mode:      ${display.voteMode}`);
      console.log(`  Query targets:  ${display.queryEndpoints.map((e) => `${e.name}=${e.url}`).join(', ')}`);
      console.log(`  Vote target:    ${display.voteEndpoint}`);
      console.log(`  Timeout:        ${display.requestTimeoutMs}ms`);
      console.log(`  Seed:           ${display.seed ?? '(random)'}`);
      console.log(`  Config file:    ${display.configFile}`);
      console.log();
    });

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', `Configuration key (${CONFIG_KEYS.join(', ')})`)
    .argument('<value>', 'Value to set')
    .action(async (key: string, value: string) => {
      const { service } = createService();
      try {
        await service.savePrefs(prefsForKey(key, value));
      } catch (err) {
        console.error(`Error: ${describeError(err)}`);
        process.exit(1);
      }
      console.log(`${key} set to: ${value}`);
    });

  config
    .command('reset')
    .description('Reset configuration to defaults')
    .action(async () => {
      await createService().service.reset();
      console.log('Configuration reset to defaults.');
    });

  config
    .command('path')
    .description('Print the config file location')
    .action(() => {
      console.log(createService().store.prefsPath);
    });

  // Default: show config when no subcommand
  config.action(async () => {
    await config.commands.find((c) => c.name() === 'show')?.parseAsync([], { from: 'user' });
  });
}
