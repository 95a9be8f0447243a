import {
  ConfigService,
  HttpRunLogProvider,
  JsonConfigStore,
  JsonRunLogProvider,
  KvStreamMarkerStore,
  MemoryKeyValueStore,
  MessageLedgerService,
  PlaintextSecretStore,
  SqliteAgentDirectory,
  SqliteAttachmentIndex,
  SqliteFeedbackStore,
  SqliteKeyValueStore,
  SqliteLedgerStore,
  TranscriptService,
  TtlCache,
  createLogger,
  openDatabase,
  type EngineConfig,
  type ReconcileRequest,
  type RunLogProvider,
  type SqliteDatabase,
  type TranscriptPage,
} from '@threadmerge/core';
import { getConfigDir, getDefaultDbPath, getDefaultRunsDir } from './adapters/xdg-paths.js';

const log = createLogger('engine');

export interface EngineOptions {
  /** Read the run log from `<runsDir>/<session>.json` snapshots instead of over HTTP. */
  runsDir?: string;
  dbPath?: string;
  config?: Partial<EngineConfig>;
}

export interface Engine {
  config: EngineConfig;
  transcripts: TranscriptService;
  ledger: MessageLedgerService;
  db: SqliteDatabase;
  markers: SqliteKeyValueStore;
  agents: SqliteAgentDirectory;
  attachments: SqliteAttachmentIndex;
  feedback: SqliteFeedbackStore;
  close(): void;
}

export function createConfigService(): ConfigService {
  return new ConfigService(new JsonConfigStore(getConfigDir()), new PlaintextSecretStore());
}

function createRunLog(config: EngineConfig, runsDir: string | undefined): RunLogProvider {
  if (runsDir) return new JsonRunLogProvider(runsDir);
  if (!config.runLogUrl) {
    log.debug(`no run-log URL configured, reading snapshots from ${getDefaultRunsDir()}`);
    return new JsonRunLogProvider(getDefaultRunsDir());
  }
  const cache =
    config.runLogCacheTtlMs > 0
      ? new TtlCache(new MemoryKeyValueStore(), { ttlMs: config.runLogCacheTtlMs, namespace: 'runs' })
      : null;
  return new HttpRunLogProvider({
    baseUrl: config.runLogUrl,
    apiKey: config.runLogApiKey || undefined,
    timeoutMs: config.runLogTimeoutMs,
    maxRetries: config.runLogMaxRetries,
    retryDelayMs: config.runLogRetryDelayMs,
    cache,
  });
}

/** Resolve configuration and open the ledger database with every adapter wired to it. */
export async function openEngine(options: EngineOptions = {}): Promise<Engine> {
  const resolved = await createConfigService().resolve();
  const config: EngineConfig = { ...resolved, ...options.config };

  const db = openDatabase(options.dbPath ?? config.dbPath ?? getDefaultDbPath());
  const ledgerStore = new SqliteLedgerStore(db);
  const markers = new SqliteKeyValueStore(db);
  const agents = new SqliteAgentDirectory(db);
  const attachments = new SqliteAttachmentIndex(db);
  const feedback = new SqliteFeedbackStore(db);

  const transcripts = new TranscriptService({
    runLog: createRunLog(config, options.runsDir),
    ledger: ledgerStore,
    markers: new KvStreamMarkerStore(markers),
    agents,
    attachments,
    feedback,
    config,
  });

  return {
    config,
    transcripts,
    ledger: new MessageLedgerService(ledgerStore),
    db,
    markers,
    agents,
    attachments,
    feedback,
    close: () => db.close(),
  };
}

export interface ReconcileOptions extends ReconcileRequest, EngineOptions {}

/**
 * One reconciled page of a session's transcript.
 * Suitable for use as a programmatic API.
 */
export async function reconcileSession(options: ReconcileOptions): Promise<TranscriptPage> {
  const { runsDir, dbPath, config, ...request } = options;
  const engine = await openEngine({ runsDir, dbPath, config });
  try {
    return await engine.transcripts.reconcile(request);
  } finally {
    engine.close();
  }
}

// Re-export everything from core for advanced usage
export * from '@threadmerge/core';
