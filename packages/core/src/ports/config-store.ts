export interface HarnessPrefs {
  profile?: string;
  queryMode?: string;
  voteMode?: string;
  queryUrls?: string[];
  voteUrl?: string;
  seed?: number;
  requestTimeoutMs?: number;
}

export interface ConfigStore {
  getHarnessPrefs(): Promise<HarnessPrefs>;
  saveHarnessPrefs(prefs: HarnessPrefs): Promise<void>;
}
