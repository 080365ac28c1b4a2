import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { JsonConfigStore } from '../adapters/json-config-store.js';
import type { ConfigStore, HarnessPrefs } from '../ports/config-store.js';
import { ConfigError } from '../shared/errors.js';
import { ConfigService, DEFAULT_QUERY_ENDPOINTS, DEFAULT_VOTE_ENDPOINT, parseEndpoint } from './config-service.js';

class MemoryConfigStore implements ConfigStore {
  saves = 0;

  constructor(public prefs: HarnessPrefs = {}) {}

  async getHarnessPrefs(): Promise<HarnessPrefs> {
    return { ...this.prefs };
  }

  async saveHarnessPrefs(prefs: HarnessPrefs): Promise<void> {
    this.saves++;
    this.prefs = { ...prefs };
  }
}

describe('parseEndpoint', () => {
  it('should split name=url pairs', () => {
    expect(parseEndpoint('station = http://localhost:1/a')).toEqual({ name: 'station', url: 'http://localhost:1/a' });
  });

  it('should name bare URLs after host and path', () => {
    expect(parseEndpoint('http://h:2/x')).toEqual({ name: 'h:2/x', url: 'http://h:2/x' });
  });

  it('should reject malformed and non-http URLs', () => {
    expect(() => parseEndpoint('not a url')).toThrow('Invalid endpoint URL: not a url');
    expect(() => parseEndpoint('ftp://h/x')).toThrow('Endpoint must use http or https: ftp://h/x');
  });
});

describe('ConfigService', () => {
  it('should fall back to defaults', async () => {
    const settings = await new ConfigService(new MemoryConfigStore(), {}).resolve();

    expect(settings.profile.name).toBe('fast');
    expect(settings.queryMode).toBe('simulated');
    expect(settings.voteMode).toBe('simulated');
    expect(settings.queryEndpoints).toEqual(DEFAULT_QUERY_ENDPOINTS);
    expect(settings.voteEndpoint).toBe(DEFAULT_VOTE_ENDPOINT);
    expect(settings.requestTimeoutMs).toBe(5_000);
    expect(settings.seed).toBeUndefined();
  });

  it('should prefer overrides, then environment, then stored preferences', async () => {
    const store = new MemoryConfigStore({ profile: 'standard', queryMode: 'http', seed: 1, requestTimeoutMs: 750 });
    const env = { BALLOTBENCH_PROFILE: 'fast', BALLOTBENCH_SEED: '2' };
    const service = new ConfigService(store, env);

    const fromEnv = await service.resolve();
    expect(fromEnv.profile.name).toBe('fast');
    expect(fromEnv.seed).toBe(2);
    expect(fromEnv.queryMode).toBe('http');
    expect(fromEnv.requestTimeoutMs).toBe(750);

    const overridden = await service.resolve({ profile: 'standard', seed: 3, voteUrl: undefined });
    expect(overridden.profile.name).toBe('standard');
    expect(overridden.seed).toBe(3);
  });

  it('should read endpoint lists from the environment', async () => {
    const env = {
      BALLOTBENCH_QUERY_URLS: 'station=http://10.0.0.5/metrics, http://10.0.0.6/metrics',
      BALLOTBENCH_VOTE_URL: 'http://10.0.0.7/votes',
    };
    const settings = await new ConfigService(new MemoryConfigStore(), env).resolve();

    expect(settings.queryEndpoints).toEqual([
      { name: 'station', url: 'http://10.0.0.5/metrics' },
      { name: '10.0.0.6/metrics', url: 'http://10.0.0.6/metrics' },
    ]);
    expect(settings.voteEndpoint).toBe('http://10.0.0.7/votes');
  });

  it('should reject unknown profiles and modes', async () => {
    const service = new ConfigService(new MemoryConfigStore(), {});

    await expect(service.resolve({ profile: 'turbo' })).rejects.toThrow('Unknown profile "turbo". Available: fast, standard');
    await expect(service.resolve({ voteMode: 'grpc' })).rejects.toThrow('voteMode must be "simulated" or "http", got "grpc"');
  });

  it('should reject a non-integer seed from the environment', async () => {
    const service = new ConfigService(new MemoryConfigStore(), { BALLOTBENCH_SEED: 'abc' });
    await expect(service.resolve()).rejects.toThrow(ConfigError);
  });

  it('should merge and validate preferences before saving', async () => {
    const store = new MemoryConfigStore({ profile: 'standard' });
    const service = new ConfigService(store, {});

    await service.savePrefs({ seed: 11 });
    expect(store.prefs).toEqual({ profile: 'standard', seed: 11 });

    await expect(service.savePrefs({ requestTimeoutMs: 0 })).rejects.toThrow('requestTimeoutMs must be positive, got 0');
    expect(store.saves).toBe(1);
    expect(store.prefs).toEqual({ profile: 'standard', seed: 11 });
  });

  it('should clear stored preferences on reset', async () => {
    const store = new MemoryConfigStore({ profile: 'standard', seed: 4 });
    const service = new ConfigService(store, {});

    await service.reset();

    await expect(service.getStoredPrefs()).resolves.toEqual({});
  });
});

describe('JsonConfigStore', () => {
  it('should round-trip preferences and keep unrelated keys', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'ballotbench-config-'));
    try {
      const store = new JsonConfigStore(dir);
      await expect(store.getHarnessPrefs()).resolves.toEqual({});

      await writeFile(store.prefsPath, JSON.stringify({ theme: 'dark' }), 'utf-8');
      await store.saveHarnessPrefs({ profile: 'standard', queryUrls: ['http://h/a'], seed: 9 });

      await expect(store.getHarnessPrefs()).resolves.toEqual({ profile: 'standard', queryUrls: ['http://h/a'], seed: 9 });
      const onDisk: unknown = JSON.parse(await readFile(store.prefsPath, 'utf-8'));
      expect(onDisk).toMatchObject({ theme: 'dark' });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('should drop fields of the wrong type', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'ballotbench-config-'));
    try {
      const store = new JsonConfigStore(dir);
      await writeFile(
        store.prefsPath,
        JSON.stringify({ harness: { profile: 3, voteMode: 'http', queryUrls: ['ok', 2], seed: '5' } }),
        'utf-8',
      );

      await expect(store.getHarnessPrefs()).resolves.toEqual({ voteMode: 'http' });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
