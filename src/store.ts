// Redis/Valkey-backed CacheStore
import Redis from 'ioredis';
import { CachedEntry, CacheStore } from './types/cache';
import { decodeEntry, encodeEntry } from './cache';
import { raceWithSignal } from './abort';
import { CacheStoreError, RequestAbortedError, describeError } from './errors';
import { Logger } from './logger';

export interface ValkeyConfig {
  host: string;
  port: number;
  password?: string;
  db: number;
  maxRetries: number;
}

const SCAN_BATCH_SIZE = 100;
const CONNECT_TIMEOUT_MS = 5000;

// Escape glob metacharacters so a prefix is matched literally by SCAN MATCH
function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, '\\$&');
}

export class RedisStore implements CacheStore {
  constructor(private readonly client: Redis) {}

  async get(key: string, signal?: AbortSignal): Promise<CachedEntry | null> {
    const raw = await this.run(this.client.get(key), signal, 'cache get');
    if (raw === null) {
      return null;
    }
    return decodeEntry(key, raw);
  }

  async set(key: string, entry: CachedEntry, ttlMs: number, signal?: AbortSignal): Promise<void> {
    const payload = encodeEntry(entry);
    // A non-positive TTL stores the entry without expiry
    const command = ttlMs > 0
      ? this.client.set(key, payload, 'PX', Math.ceil(ttlMs))
      : this.client.set(key, payload);
    await this.run(command, signal, 'cache set');
  }

  async delete(key: string): Promise<void> {
    await this.run(this.client.del(key), undefined, 'cache delete');
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    const stream = this.client.scanStream({ match: `${escapeGlob(prefix)}*`, count: SCAN_BATCH_SIZE });
    let count = 0;

    try {
      for await (const batch of stream) {
        const keys: unknown = batch;
        if (!Array.isArray(keys)) continue;
        const names = keys.filter((key): key is string => typeof key === 'string');
        if (names.length > 0) {
          count += await this.client.del(...names);
        }
      }
    } catch (error) {
      throw new CacheStoreError(`failed to scan cache: ${describeError(error)}`, { cause: error });
    }

    return count;
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private async run<T>(command: Promise<T>, signal: AbortSignal | undefined, stage: string): Promise<T> {
    try {
      return await raceWithSignal(command, signal, stage);
    } catch (error) {
      if (error instanceof RequestAbortedError) {
        throw error;
      }
      throw new CacheStoreError(`${stage} failed: ${describeError(error)}`, { cause: error });
    }
  }
}

/**
 * Connect to Valkey/Redis and verify the connection before serving traffic.
 */
export async function createRedisStore(config: ValkeyConfig, logger: Logger): Promise<RedisStore> {
  const client = new Redis({
    host: config.host,
    port: config.port,
    password: config.password || undefined,
    db: config.db,
    maxRetriesPerRequest: config.maxRetries,
    connectTimeout: CONNECT_TIMEOUT_MS,
    lazyConnect: true
  });

  client.on('error', (error: Error) => {
    logger.error('Valkey connection error', { error });
  });

  try {
    await client.connect();
    await client.ping();
  } catch (error) {
    client.disconnect();
    throw new CacheStoreError(`failed to connect to valkey at ${config.host}:${config.port}: ${describeError(error)}`, {
      cause: error
    });
  }

  logger.info('Successfully connected to Valkey', { host: config.host, port: config.port, db: config.db });
  return new RedisStore(client);
}
