import type { ContainmentScope } from '../transcript/dedup.js';
import type { StaleLocalPolicy } from '../transcript/ledger-matcher.js';

export interface EngineConfig {
  /** Base URL of the orchestration service; without one the run log is read from snapshots or skipped. */
  runLogUrl: string | null;
  runLogApiKey: string;
  runLogTimeoutMs: number;
  runLogMaxRetries: number;
  runLogRetryDelayMs: number;
  /** 0 disables the run-log response cache. */
  runLogCacheTtlMs: number;
  dbPath: string | null;
  staleLocalPolicy: StaleLocalPolicy;
  containmentScope: ContainmentScope;
  exactWindowMs: number;
  prefixWindowMs: number;
  signatureToleranceMs: number;
  defaultPageSize: number;
  maxPageSize: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  runLogUrl: null,
  runLogApiKey: '',
  runLogTimeoutMs: 10_000,
  runLogMaxRetries: 2,
  runLogRetryDelayMs: 500,
  runLogCacheTtlMs: 0,
  dbPath: null,
  staleLocalPolicy: 'retain',
  containmentScope: 'session',
  exactWindowMs: 60_000,
  prefixWindowMs: 10_000,
  signatureToleranceMs: 3_000,
  defaultPageSize: 10,
  maxPageSize: 20,
};
