import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { ConfigStore, EnginePrefs } from '../ports/config-store.js';
import { isRecord } from '../shared/guards.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('json-config-store');

interface Preferences {
  engine?: unknown;
  [key: string]: unknown;
}

const optionalCount = z.number().int().nonnegative().optional().catch(undefined);

// A bad field is dropped on its own; the rest of the file still applies.
const EnginePrefsSchema = z.object({
  runLogUrl: z.string().url().optional().catch(undefined),
  apiKeyEncrypted: z.string().optional().catch(undefined),
  runLogTimeoutMs: optionalCount,
  runLogMaxRetries: optionalCount,
  runLogRetryDelayMs: optionalCount,
  runLogCacheTtlMs: optionalCount,
  dbPath: z.string().min(1).optional().catch(undefined),
  staleLocalPolicy: z.enum(['retain', 'drop']).optional().catch(undefined),
  containmentScope: z.enum(['session', 'run']).optional().catch(undefined),
  defaultPageSize: optionalCount,
  maxPageSize: optionalCount,
});

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
      return {};
    }
    try {
      const parsed: unknown = JSON.parse(data);
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      log.warn(`readPrefs: ignoring unreadable ${this.prefsPath}:`, err instanceof Error ? err.message : String(err));
      return {};
    }
  }

  private async writePrefs(prefs: Preferences): Promise<void> {
    await mkdir(this.configDir, { recursive: true });
    await writeFile(this.prefsPath, JSON.stringify(prefs, null, 2), 'utf-8');
  }

  async getEnginePrefs(): Promise<EnginePrefs> {
    const prefs = await this.readPrefs();
    const parsed = EnginePrefsSchema.safeParse(prefs.engine ?? {});
    return parsed.success ? parsed.data : {};
  }

  async saveEnginePrefs(update: EnginePrefs): Promise<void> {
    const prefs = await this.readPrefs();
    const current = await this.getEnginePrefs();
    // Keys set to undefined are left out of the written JSON, which unsets them.
    prefs.engine = { ...current, ...update };
    await this.writePrefs(prefs);
  }

  async resetEnginePrefs(): Promise<void> {
    const prefs = await this.readPrefs();
    delete prefs.engine;
    if (Object.keys(prefs).length === 0) {
      await rm(this.prefsPath, { force: true });
      return;
    }
    await this.writePrefs(prefs);
  }
}
