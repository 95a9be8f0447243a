import type { KeyValueStore } from '../../ports/key-value-store.js';
import { systemClock, type Clock } from '../../shared/clock.js';
import type { SqliteDatabase } from './database.js';

interface KvRow {
  value: string;
  expires_at: number | null;
}

/**
 * Keyspace with expiry in the ledger database, so stream markers written by
 * one process are visible to the next. Expired rows are removed as they are read.
 */
export class SqliteKeyValueStore implements KeyValueStore {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly clock: Clock = systemClock,
  ) {}

  private live(key: string): KvRow | null {
    const row = this.db.prepare<[string], KvRow>('SELECT value, expires_at FROM kv WHERE key = ?').get(key);
    if (!row) return null;
    if (row.expires_at !== null && row.expires_at <= this.clock.now()) {
      this.db.prepare<[string]>('DELETE FROM kv WHERE key = ?').run(key);
      return null;
    }
    return row;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    const expiresAt = ttlMs !== undefined && ttlMs > 0 ? this.clock.now() + ttlMs : null;
    this.db
      .prepare<[string, string, number | null]>('INSERT OR REPLACE INTO kv (key, value, expires_at) VALUES (?, ?, ?)')
      .run(key, value, expiresAt);
  }

  async delete(key: string): Promise<void> {
    this.db.prepare<[string]>('DELETE FROM kv WHERE key = ?').run(key);
  }

  async keys(prefix: string): Promise<string[]> {
    return this.db
      .prepare<[number, string, number], { key: string }>(
        `SELECT key FROM kv
         WHERE substr(key, 1, ?) = ? AND (expires_at IS NULL OR expires_at > ?)
         ORDER BY key ASC`,
      )
      .all(prefix.length, prefix, this.clock.now())
      .map((row) => row.key);
  }

  async ttl(key: string): Promise<number | null> {
    const row = this.live(key);
    if (!row || row.expires_at === null) return null;
    return row.expires_at - this.clock.now();
  }
}
