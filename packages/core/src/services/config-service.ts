import { z } from 'zod';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../domain/config/engine-config.js';
import type { ConfigStore, EnginePrefs } from '../ports/config-store.js';
import type { SecretStore } from '../ports/secret-store.js';
import { ConfigError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('config-service');

export const ENV_KEYS = {
  runLogUrl: 'THREADMERGE_RUNLOG_URL',
  runLogApiKey: 'THREADMERGE_RUNLOG_API_KEY',
  runLogTimeoutMs: 'THREADMERGE_RUNLOG_TIMEOUT_MS',
  runLogMaxRetries: 'THREADMERGE_RUNLOG_MAX_RETRIES',
  runLogRetryDelayMs: 'THREADMERGE_RUNLOG_RETRY_DELAY_MS',
  runLogCacheTtlMs: 'THREADMERGE_RUNLOG_CACHE_TTL_MS',
  dbPath: 'THREADMERGE_DB_PATH',
  staleLocalPolicy: 'THREADMERGE_STALE_LOCAL_POLICY',
  containmentScope: 'THREADMERGE_CONTAINMENT_SCOPE',
} as const;

const CountSchema = z.coerce.number().int().nonnegative();
const UrlSchema = z.string().url();
const StalePolicySchema = z.enum(['retain', 'drop']);
const ScopeSchema = z.enum(['session', 'run']);

export interface ConfigUpdate extends Omit<EnginePrefs, 'apiKeyEncrypted'> {
  apiKey?: string;
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function fromEnv<T>(env: NodeJS.ProcessEnv, key: string, schema: z.ZodType<T>, expected: string): T | undefined {
  const raw = readEnv(env, key);
  if (raw === undefined) return undefined;
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`${key} must be ${expected}, got ${JSON.stringify(raw)}`, key);
  }
  return parsed.data;
}

export class ConfigService {
  constructor(
    private configStore: ConfigStore,
    private secretStore: SecretStore,
    private env: NodeJS.ProcessEnv = process.env,
  ) {}

  /** Environment first, then the preferences file, then defaults. */
  async resolve(): Promise<EngineConfig> {
    const env = this.env;
    const prefs = await this.configStore.getEnginePrefs();

    const envApiKey = readEnv(env, ENV_KEYS.runLogApiKey) ?? '';
    let prefApiKey = '';
    if (prefs.apiKeyEncrypted && !envApiKey) {
      try {
        prefApiKey = this.secretStore.decode(prefs.apiKeyEncrypted);
      } catch (err) {
        log.warn('resolve: stored API key could not be decoded:', err instanceof Error ? err.message : String(err));
      }
    }

    const count = (key: string) => fromEnv(env, key, CountSchema, 'a non-negative integer');

    const config: EngineConfig = {
      ...DEFAULT_ENGINE_CONFIG,
      runLogUrl: fromEnv(env, ENV_KEYS.runLogUrl, UrlSchema, 'a URL') ?? prefs.runLogUrl ?? DEFAULT_ENGINE_CONFIG.runLogUrl,
      runLogApiKey: envApiKey || prefApiKey,
      runLogTimeoutMs:
        count(ENV_KEYS.runLogTimeoutMs) ?? prefs.runLogTimeoutMs ?? DEFAULT_ENGINE_CONFIG.runLogTimeoutMs,
      runLogMaxRetries:
        count(ENV_KEYS.runLogMaxRetries) ?? prefs.runLogMaxRetries ?? DEFAULT_ENGINE_CONFIG.runLogMaxRetries,
      runLogRetryDelayMs:
        count(ENV_KEYS.runLogRetryDelayMs) ?? prefs.runLogRetryDelayMs ?? DEFAULT_ENGINE_CONFIG.runLogRetryDelayMs,
      runLogCacheTtlMs:
        count(ENV_KEYS.runLogCacheTtlMs) ?? prefs.runLogCacheTtlMs ?? DEFAULT_ENGINE_CONFIG.runLogCacheTtlMs,
      dbPath: readEnv(env, ENV_KEYS.dbPath) ?? prefs.dbPath ?? DEFAULT_ENGINE_CONFIG.dbPath,
      staleLocalPolicy:
        fromEnv(env, ENV_KEYS.staleLocalPolicy, StalePolicySchema, '"retain" or "drop"') ??
        prefs.staleLocalPolicy ??
        DEFAULT_ENGINE_CONFIG.staleLocalPolicy,
      containmentScope:
        fromEnv(env, ENV_KEYS.containmentScope, ScopeSchema, '"session" or "run"') ??
        prefs.containmentScope ??
        DEFAULT_ENGINE_CONFIG.containmentScope,
      defaultPageSize: prefs.defaultPageSize ?? DEFAULT_ENGINE_CONFIG.defaultPageSize,
      maxPageSize: prefs.maxPageSize ?? DEFAULT_ENGINE_CONFIG.maxPageSize,
    };

    if (config.runLogTimeoutMs === 0) {
      throw new ConfigError('run-log timeout must be greater than 0', ENV_KEYS.runLogTimeoutMs);
    }
    if (config.defaultPageSize < 1 || config.maxPageSize < config.defaultPageSize) {
      throw new ConfigError(
        `page sizes must satisfy 1 <= defaultPageSize (${config.defaultPageSize}) <= maxPageSize (${config.maxPageSize})`,
        'defaultPageSize',
      );
    }
    return config;
  }

  async saveApiKey(key: string): Promise<void> {
    await this.configStore.saveEnginePrefs({ apiKeyEncrypted: this.secretStore.encode(key) });
  }

  /** Validates and stores settings in the preferences file; the API key is stored encoded. */
  async save(update: ConfigUpdate): Promise<void> {
    const { apiKey, ...rest } = update;
    const prefs: EnginePrefs = { ...rest };
    if (prefs.runLogUrl !== undefined && !UrlSchema.safeParse(prefs.runLogUrl).success) {
      throw new ConfigError(`runLogUrl must be a URL, got ${JSON.stringify(prefs.runLogUrl)}`, 'runLogUrl');
    }
    for (const key of ['runLogTimeoutMs', 'runLogMaxRetries', 'runLogRetryDelayMs', 'runLogCacheTtlMs'] as const) {
      const value = prefs[key];
      if (value !== undefined && !CountSchema.safeParse(value).success) {
        throw new ConfigError(`${key} must be a non-negative integer, got ${value}`, key);
      }
    }
    if (apiKey) prefs.apiKeyEncrypted = this.secretStore.encode(apiKey);
    await this.configStore.saveEnginePrefs(prefs);
    log.debug(`save: updated ${Object.keys(update).join(', ')}`);
  }

  async reset(): Promise<void> {
    await this.configStore.resetEnginePrefs();
  }
}
