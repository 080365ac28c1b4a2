import { join } from 'node:path';
import { homedir } from 'node:os';

const APP_DIR = 'ballotbench';

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.XDG_CONFIG_HOME
    ? join(env.XDG_CONFIG_HOME, APP_DIR)
    : join(homedir(), '.config', APP_DIR);
}

export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.XDG_DATA_HOME
    ? join(env.XDG_DATA_HOME, APP_DIR)
    : join(homedir(), '.local', 'share', APP_DIR);
}
