#!/usr/bin/env node

import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { registerConfigCommand } from '../src/commands/config.js';
import { registerHistoryCommand } from '../src/commands/history.js';
import { registerProfilesCommand } from '../src/commands/profiles.js';
import { registerRunCommand } from '../src/commands/run.js';

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

const program = new Command();

program
  .name('ballotbench')
  .description('Load and performance harness for voting platforms')
  .version(readVersion());

registerRunCommand(program);
registerHistoryCommand(program);
registerConfigCommand(program);
registerProfilesCommand(program);
await program.parseAsync();
