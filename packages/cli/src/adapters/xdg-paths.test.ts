import { homedir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { getConfigDir, getDataDir } from './xdg-paths.js';

describe('xdg paths', () => {
  it('should honour XDG overrides', () => {
    const env = { XDG_CONFIG_HOME: '/tmp/cfg', XDG_DATA_HOME: '/tmp/data' };
    expect(getConfigDir(env)).toBe(join('/tmp/cfg', 'ballotbench'));
    expect(getDataDir(env)).toBe(join('/tmp/data', 'ballotbench'));
  });

  it('should fall back to the home directory', () => {
    expect(getConfigDir({})).toBe(join(homedir(), '.config', 'ballotbench'));
    expect(getDataDir({})).toBe(join(homedir(), '.local', 'share', 'ballotbench'));
  });
});
