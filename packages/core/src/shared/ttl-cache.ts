import { z } from 'zod';
import type { KeyValueStore } from '../ports/key-value-store.js';
import { systemClock, type Clock } from './clock.js';
import { createLogger } from './logger.js';

const log = createLogger('ttl-cache');

const EnvelopeSchema = z.object({
  expiresAt: z.number(),
  value: z.unknown(),
});

export interface TtlCacheOptions {
  ttlMs: number;
  /** Key prefix inside a shared store. */
  namespace: string;
  clock?: Clock;
}

export interface TtlCacheStats {
  hits: number;
  misses: number;
  writes: number;
}

/**
 * JSON values with an expiry, kept in a KeyValueStore. Expiry is checked
 * against the injected clock, so a store that does not expire keys on its
 * own still never serves a stale value.
 */
export class TtlCache {
  private readonly clock: Clock;
  private readonly counters: TtlCacheStats = { hits: 0, misses: 0, writes: 0 };

  constructor(
    private readonly store: KeyValueStore,
    private readonly options: TtlCacheOptions,
  ) {
    this.clock = options.clock ?? systemClock;
  }

  private key(key: string): string {
    return `${this.options.namespace}:${key}`;
  }

  async get(key: string): Promise<unknown> {
    const raw = await this.store.get(this.key(key));
    if (raw === null) {
      this.counters.misses++;
      return undefined;
    }

    let envelope: z.infer<typeof EnvelopeSchema>;
    try {
      envelope = EnvelopeSchema.parse(JSON.parse(raw));
    } catch (err) {
      log.warn(`get: dropping unreadable entry ${key}:`, err instanceof Error ? err.message : String(err));
      await this.store.delete(this.key(key));
      this.counters.misses++;
      return undefined;
    }

    if (envelope.expiresAt <= this.clock.now()) {
      await this.store.delete(this.key(key));
      this.counters.misses++;
      return undefined;
    }
    this.counters.hits++;
    return envelope.value;
  }

  async set(key: string, value: unknown): Promise<void> {
    const envelope = { expiresAt: this.clock.now() + this.options.ttlMs, value };
    await this.store.set(this.key(key), JSON.stringify(envelope), this.options.ttlMs);
    this.counters.writes++;
  }

  async invalidate(key: string): Promise<void> {
    await this.store.delete(this.key(key));
  }

  stats(): TtlCacheStats {
    return { ...this.counters };
  }
}
