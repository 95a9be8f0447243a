import type { KeyValueStore } from '../ports/key-value-store.js';
import { systemClock, type Clock } from '../shared/clock.js';

interface StoredValue {
  value: string;
  expiresAt: number | null;
}

/** In-process keyspace with per-key expiry, read against an injected clock. */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly values = new Map<string, StoredValue>();

  constructor(private readonly clock: Clock = systemClock) {}

  private live(key: string): StoredValue | null {
    const stored = this.values.get(key);
    if (!stored) return null;
    if (stored.expiresAt !== null && stored.expiresAt <= this.clock.now()) {
      this.values.delete(key);
      return null;
    }
    return stored;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    const expiresAt = ttlMs !== undefined && ttlMs > 0 ? this.clock.now() + ttlMs : null;
    this.values.set(key, { value, expiresAt });
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }

  async keys(prefix: string): Promise<string[]> {
    return [...this.values.keys()].filter((key) => key.startsWith(prefix) && this.live(key) !== null).sort();
  }

  async ttl(key: string): Promise<number | null> {
    const stored = this.live(key);
    if (!stored || stored.expiresAt === null) return null;
    return stored.expiresAt - this.clock.now();
  }
}
