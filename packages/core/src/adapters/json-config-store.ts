import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ConfigStore, HarnessPrefs } from '../ports/config-store.js';

interface Preferences {
  harness?: HarnessPrefs;
  [key: string]: unknown;
}

function sanitizePrefs(value: unknown): HarnessPrefs {
  if (typeof value !== 'object' || value === null) return {};
  const raw: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  const prefs: HarnessPrefs = {};
  if (typeof raw.profile === 'string') prefs.profile = raw.profile;
  if (typeof raw.queryMode === 'string') prefs.queryMode = raw.queryMode;
  if (typeof raw.voteMode === 'string') prefs.voteMode = raw.voteMode;
  if (Array.isArray(raw.queryUrls) && raw.queryUrls.every((u) => typeof u === 'string')) {
    prefs.queryUrls = raw.queryUrls;
  }
  if (typeof raw.voteUrl === 'string') prefs.voteUrl = raw.voteUrl;
  if (typeof raw.seed === 'number') prefs.seed = raw.seed;
  if (typeof raw.requestTimeoutMs === 'number') prefs.requestTimeoutMs = raw.requestTimeoutMs;
  return prefs;
}

export class JsonConfigStore implements ConfigStore {
  constructor(private readonly configDir: string) {}

  get prefsPath(): string {
    return join(this.configDir, 'preferences.json');
  }

  private async readPrefs(): Promise<Preferences> {
    let data: string;
    try {
      data = await readFile(this.prefsPath, 'utf-8');
    } catch {
      // First run: no preferences written yet.
      return {};
    }
    const parsed: unknown = JSON.parse(data);
    return typeof parsed === 'object' && parsed !== null ? Object.fromEntries(Object.entries(parsed)) : {};
  }

  private async writePrefs(prefs: Preferences): Promise<void> {
    await mkdir(this.configDir, { recursive: true });
    await writeFile(this.prefsPath, JSON.stringify(prefs, null, 2), 'utf-8');
  }

  async getHarnessPrefs(): Promise<HarnessPrefs> {
    const prefs = await this.readPrefs();
    return sanitizePrefs(prefs.harness);
  }

  async saveHarnessPrefs(harness: HarnessPrefs): Promise<void> {
    const prefs = await this.readPrefs();
    prefs.harness = harness;
    await this.writePrefs(prefs);
  }
}
