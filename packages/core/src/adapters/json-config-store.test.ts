import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { JsonConfigStore } from './json-config-store.js';

describe('JsonConfigStore', () => {
  let dir: string;
  let store: JsonConfigStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'prefs-'));
    store = new JsonConfigStore(join(dir, 'config'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return no preferences before anything is saved', async () => {
    expect(await store.getEnginePrefs()).toEqual({});
  });

  it('should merge saved preferences and keep other sections of the file', async () => {
    await store.saveEnginePrefs({});
    await writeFile(
      store.prefsPath,
      JSON.stringify({ engine: { runLogUrl: 'https://runs.example.test' }, theme: 'dark' }),
    );

    await store.saveEnginePrefs({ maxPageSize: 50 });

    expect(await store.getEnginePrefs()).toEqual({ runLogUrl: 'https://runs.example.test', maxPageSize: 50 });
    expect(JSON.parse(await readFile(store.prefsPath, 'utf-8'))).toMatchObject({ theme: 'dark' });
  });

  it('should drop invalid fields and keep the valid ones', async () => {
    await store.saveEnginePrefs({});
    await writeFile(
      store.prefsPath,
      JSON.stringify({ engine: { runLogTimeoutMs: -5, dbPath: '/var/lib/ledger.db', containmentScope: 'everything' } }),
    );

    expect(await store.getEnginePrefs()).toEqual({ dbPath: '/var/lib/ledger.db' });
  });

  it('should ignore a file that is not JSON', async () => {
    await store.saveEnginePrefs({});
    await writeFile(store.prefsPath, '{ engine');

    expect(await store.getEnginePrefs()).toEqual({});
  });

  it('should remove the file on reset when nothing else is in it', async () => {
    await store.saveEnginePrefs({ staleLocalPolicy: 'drop' });

    await store.resetEnginePrefs();

    expect(existsSync(store.prefsPath)).toBe(false);
    expect(await store.getEnginePrefs()).toEqual({});
  });
});
