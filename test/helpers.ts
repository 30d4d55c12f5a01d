import { parseConfig, ProxyConfig, Env } from '../src/config';
import { Logger, LogLevel } from '../src/logger';
import { CachedEntry, CacheStore } from '../src/types/cache';

export interface StoredRecord {
  entry: CachedEntry;
  ttlMs: number;
}

/**
 * In-process CacheStore; faults can be injected per operation.
 */
export class MemoryStore implements CacheStore {
  readonly records = new Map<string, StoredRecord>();
  getError?: Error;
  setError?: Error;

  async get(key: string): Promise<CachedEntry | null> {
    if (this.getError) throw this.getError;
    return this.records.get(key)?.entry ?? null;
  }

  async set(key: string, entry: CachedEntry, ttlMs: number): Promise<void> {
    if (this.setError) throw this.setError;
    this.records.set(key, { entry, ttlMs });
  }

  async delete(key: string): Promise<void> {
    this.records.delete(key);
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    let count = 0;
    for (const key of [...this.records.keys()]) {
      if (key.startsWith(prefix)) {
        this.records.delete(key);
        count++;
      }
    }
    return count;
  }

  async close(): Promise<void> {}
}

export type LogRecord = Record<string, unknown>;

function isRecord(value: unknown): value is LogRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createCapturingLogger(level: LogLevel = 'DEBUG'): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = new Logger(level, 'json', line => {
    const parsed: unknown = JSON.parse(line);
    if (isRecord(parsed)) records.push(parsed);
  });
  return { logger, records };
}

export function findLog(records: LogRecord[], message: string): LogRecord | undefined {
  return records.find(record => record.message === message);
}

export const UPSTREAM_BASE_URL = 'http://upstream.test';

export function buildConfig(overrides: Record<string, unknown> = {}, env: Env = {}): ProxyConfig {
  return parseConfig({ upstream: { base_url: UPSTREAM_BASE_URL }, ...overrides }, env);
}
