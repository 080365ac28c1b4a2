import { DEFAULT_REQUEST_TIMEOUT_MS, type Endpoint } from '../adapters/http-query-target.js';
import {
  HARNESS_PROFILES,
  isHarnessProfileName,
  type HarnessProfile,
} from '../domain/experiment/harness-profile.js';
import { isTargetMode, type TargetMode } from '../domain/suite/suite-record.js';
import type { ConfigStore, HarnessPrefs } from '../ports/config-store.js';
import { ConfigError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('config-service');

export interface HarnessSettings {
  profile: HarnessProfile;
  queryMode: TargetMode;
  voteMode: TargetMode;
  queryEndpoints: Endpoint[];
  voteEndpoint: string;
  requestTimeoutMs: number;
  seed?: number;
}

export type SettingsOverrides = HarnessPrefs;

export const DEFAULT_QUERY_ENDPOINTS: readonly Endpoint[] = [
  { name: 'EstacionVotacion', url: 'http://localhost:9090/metrics' },
  { name: 'CentroVotacion', url: 'http://localhost:9090/metrics' },
];
export const DEFAULT_VOTE_ENDPOINT = 'http://localhost:9090/votes';

/**
 * Accepts `name=url` or a bare URL, in which case the host and path name it.
 */
export function parseEndpoint(input: string): Endpoint {
  const trimmed = input.trim();
  const eq = trimmed.indexOf('=');
  const [name, url] = eq > 0 ? [trimmed.slice(0, eq).trim(), trimmed.slice(eq + 1).trim()] : ['', trimmed];
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigError(`Invalid endpoint URL: ${url}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigError(`Endpoint must use http or https: ${url}`);
  }
  return { name: name || `${parsed.host}${parsed.pathname}`, url };
}

function splitList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

function parseSeed(value: string): number {
  const seed = Number(value);
  if (!Number.isInteger(seed)) {
    throw new ConfigError(`Seed must be an integer, got "${value}"`);
  }
  return seed;
}

function prefsFromEnv(env: NodeJS.ProcessEnv): HarnessPrefs {
  const prefs: HarnessPrefs = {};
  if (env.BALLOTBENCH_PROFILE) prefs.profile = env.BALLOTBENCH_PROFILE;
  if (env.BALLOTBENCH_QUERY_MODE) prefs.queryMode = env.BALLOTBENCH_QUERY_MODE;
  if (env.BALLOTBENCH_VOTE_MODE) prefs.voteMode = env.BALLOTBENCH_VOTE_MODE;
  if (env.BALLOTBENCH_QUERY_URLS) prefs.queryUrls = splitList(env.BALLOTBENCH_QUERY_URLS);
  if (env.BALLOTBENCH_VOTE_URL) prefs.voteUrl = env.BALLOTBENCH_VOTE_URL;
  if (env.BALLOTBENCH_SEED) prefs.seed = parseSeed(env.BALLOTBENCH_SEED);
  return prefs;
}

function resolveMode(value: string | undefined, field: string): TargetMode {
  if (value === undefined) return 'simulated';
  if (!isTargetMode(value)) {
    throw new ConfigError(`${field} must be "simulated" or "http", got "${value}"`);
  }
  return value;
}

/**
 * Turns merged preferences into validated settings, filling defaults.
 */
export function buildSettings(prefs: HarnessPrefs): HarnessSettings {
  const profileName = prefs.profile ?? 'fast';
  if (!isHarnessProfileName(profileName)) {
    throw new ConfigError(`Unknown profile "${profileName}". Available: ${Object.keys(HARNESS_PROFILES).join(', ')}`);
  }

  const timeout = prefs.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  if (!(timeout > 0)) {
    throw new ConfigError(`requestTimeoutMs must be positive, got ${timeout}`);
  }
  if (prefs.seed !== undefined && !Number.isInteger(prefs.seed)) {
    throw new ConfigError(`Seed must be an integer, got ${prefs.seed}`);
  }

  return {
    profile: HARNESS_PROFILES[profileName],
    queryMode: resolveMode(prefs.queryMode, 'queryMode'),
    voteMode: resolveMode(prefs.voteMode, 'voteMode'),
    queryEndpoints: prefs.queryUrls && prefs.queryUrls.length > 0
      ? prefs.queryUrls.map(parseEndpoint)
      : [...DEFAULT_QUERY_ENDPOINTS],
    voteEndpoint: parseEndpoint(prefs.voteUrl ?? DEFAULT_VOTE_ENDPOINT).url,
    requestTimeoutMs: timeout,
    seed: prefs.seed,
  };
}

export class ConfigService {
  constructor(
    private readonly configStore: ConfigStore,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  /**
   * Precedence: overrides, then environment, then stored preferences, then
   * the defaults.
   */
  async resolve(overrides: SettingsOverrides = {}): Promise<HarnessSettings> {
    const stored = await this.configStore.getHarnessPrefs();
    const settings = buildSettings({ ...stored, ...prefsFromEnv(this.env), ...definedOnly(overrides) });

    log.debug(
      `resolve: profile=${settings.profile.name} query=${settings.queryMode} vote=${settings.voteMode}` +
        (settings.seed !== undefined ? ` seed=${settings.seed}` : ''),
    );
    return settings;
  }

  async getStoredPrefs(): Promise<HarnessPrefs> {
    return this.configStore.getHarnessPrefs();
  }

  async savePrefs(prefs: HarnessPrefs): Promise<void> {
    const current = await this.configStore.getHarnessPrefs();
    const next: HarnessPrefs = { ...current, ...definedOnly(prefs) };
    buildSettings(next);
    await this.configStore.saveHarnessPrefs(next);
  }

  async reset(): Promise<void> {
    await this.configStore.saveHarnessPrefs({});
  }
}

function definedOnly(prefs: HarnessPrefs): HarnessPrefs {
  const result: HarnessPrefs = {};
  if (prefs.profile !== undefined) result.profile = prefs.profile;
  if (prefs.queryMode !== undefined) result.queryMode = prefs.queryMode;
  if (prefs.voteMode !== undefined) result.voteMode = prefs.voteMode;
  if (prefs.queryUrls !== undefined) result.queryUrls = prefs.queryUrls;
  if (prefs.voteUrl !== undefined) result.voteUrl = prefs.voteUrl;
  if (prefs.seed !== undefined) result.seed = prefs.seed;
  if (prefs.requestTimeoutMs !== undefined) result.requestTimeoutMs = prefs.requestTimeoutMs;
  return result;
}
