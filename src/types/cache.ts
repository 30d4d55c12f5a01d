// Cache types and interfaces

export interface CachedEntry {
  status: number;
  headers: Record<string, string[]>; // Multi-valued, lower-cased names
  body: Uint8Array;
  cachedAt: Date;
}

// Shape of an entry as serialized into the key-value store
export interface StoredEntry {
  status_code: number;
  headers: Record<string, string[]>;
  body: string; // base64
  cached_at: string; // ISO-8601
}

/**
 * Key-value store holding cached responses. Expiry is the store's job.
 * `get` resolves null on a miss and rejects on backend or decoding faults.
 */
export interface CacheStore {
  get(key: string, signal?: AbortSignal): Promise<CachedEntry | null>;
  set(key: string, entry: CachedEntry, ttlMs: number, signal?: AbortSignal): Promise<void>;
  delete(key: string): Promise<void>;
  deleteByPrefix(prefix: string): Promise<number>;
  close(): Promise<void>;
}
