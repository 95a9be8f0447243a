import type { ContainmentScope } from '../domain/transcript/dedup.js';
import type { StaleLocalPolicy } from '../domain/transcript/ledger-matcher.js';

export interface EnginePrefs {
  runLogUrl?: string;
  apiKeyEncrypted?: string;
  runLogTimeoutMs?: number;
  runLogMaxRetries?: number;
  runLogRetryDelayMs?: number;
  runLogCacheTtlMs?: number;
  dbPath?: string;
  staleLocalPolicy?: StaleLocalPolicy;
  containmentScope?: ContainmentScope;
  defaultPageSize?: number;
  maxPageSize?: number;
}

export interface ConfigStore {
  getEnginePrefs(): Promise<EnginePrefs>;
  saveEnginePrefs(prefs: EnginePrefs): Promise<void>;
  resetEnginePrefs(): Promise<void>;
}
