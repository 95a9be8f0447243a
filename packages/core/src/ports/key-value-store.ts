export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs?: number): Promise<void>;
  delete(key: string): Promise<void>;
  keys(prefix: string): Promise<string[]>;
  /** Remaining time to live in ms; null for a missing key or one that never expires. */
  ttl(key: string): Promise<number | null>;
}
