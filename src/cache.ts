// Response Caching Layer
import { createHash } from 'node:crypto';
import { z } from 'zod';
import { CachedEntry, CacheStore, StoredEntry } from './types/cache';
import { CacheRule, QueryLookup } from './endpoints';
import { MalformedCacheEntryError, RequestAbortedError } from './errors';
import { Logger } from './logger';
import { MetricsCollector } from './metrics';

export const CACHE_KEY_PREFIX = 'cache:';

// Statuses for which a Response must not carry a body
export const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

const storedEntrySchema = z.object({
  status_code: z.number().int().min(100).max(599),
  headers: z.record(z.array(z.string())),
  body: z.string(),
  cached_at: z.string().datetime({ offset: true })
});

export interface HeaderLookup {
  get(name: string): string | null;
}

/**
 * Lookup yielding the first value of a repeated header. `Headers` joins
 * repeats with commas, so per-line values are read from `distinct`
 * (lower-cased names, as Node's `headersDistinct`) when the server has them.
 */
export function firstHeaderValues(
  headers: Headers,
  distinct?: Record<string, string[] | undefined>
): HeaderLookup {
  return {
    get: name => distinct?.[name.toLowerCase()]?.[0] ?? headers.get(name)
  };
}

/**
 * Derive the store key for a request.
 *
 * Only the query parameters and headers the matched rule names take part,
 * so tracing headers or pagination noise never fragment the cache.
 */
export function generateCacheKey(
  method: string,
  path: string,
  query: QueryLookup,
  headers: HeaderLookup,
  rule?: CacheRule
): string {
  const parts = [method, path];

  if (rule && rule.keyQueryParams.length > 0) {
    const queryParts = rule.keyQueryParams
      .flatMap(param => {
        const value = query.get(param);
        return value ? [`${param}=${value}`] : [];
      })
      .sort();
    if (queryParts.length > 0) {
      parts.push(queryParts.join('&'));
    }
  }

  if (rule && rule.keyHeaders.length > 0) {
    const headerParts = rule.keyHeaders
      .flatMap(header => {
        const value = headers.get(header);
        return value ? [`${header}=${value}`] : [];
      })
      .sort();
    if (headerParts.length > 0) {
      parts.push(headerParts.join('|'));
    }
  }

  const digest = createHash('sha256').update(parts.join(':'), 'utf8').digest('hex');
  return `${CACHE_KEY_PREFIX}${digest}`;
}

export function encodeEntry(entry: CachedEntry): string {
  const stored: StoredEntry = {
    status_code: entry.status,
    headers: entry.headers,
    body: Buffer.from(entry.body).toString('base64'),
    cached_at: entry.cachedAt.toISOString()
  };
  return JSON.stringify(stored);
}

export function decodeEntry(cacheKey: string, raw: string): CachedEntry {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new MalformedCacheEntryError(cacheKey, error instanceof Error ? error.message : 'invalid JSON');
  }

  const parsed = storedEntrySchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(issue => issue.path.join('.') || '(root)').join(', ');
    throw new MalformedCacheEntryError(cacheKey, `unexpected shape at ${fields}`);
  }

  return {
    status: parsed.data.status_code,
    headers: parsed.data.headers,
    body: new Uint8Array(Buffer.from(parsed.data.body, 'base64')),
    cachedAt: new Date(parsed.data.cached_at)
  };
}

/**
 * RFC 3339 at second precision, e.g. 2026-03-01T12:00:00Z
 */
export function formatCacheTime(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}

export function toHeaders(headers: Record<string, string[]>): Headers {
  const result = new Headers();
  for (const [name, values] of Object.entries(headers)) {
    for (const value of values) {
      result.append(name, value);
    }
  }
  return result;
}

export function buildResponse(status: number, headers: Headers, body: Uint8Array): Response {
  return new Response(NULL_BODY_STATUSES.has(status) ? null : toArrayBuffer(body), { status, headers });
}

/**
 * Convert cached entry back to Response object
 */
export function createResponseFromCache(entry: CachedEntry): Response {
  const headers = toHeaders(entry.headers);
  headers.set('X-Cache', 'HIT');
  headers.set('X-Cache-Time', formatCacheTime(entry.cachedAt));
  return buildResponse(entry.status, headers, entry.body);
}

/**
 * Best-effort access to the shared store. Read faults become misses and
 * write faults are only logged; an aborted request still aborts.
 */
export class CacheManager {
  constructor(
    private readonly store: CacheStore,
    private readonly logger: Logger,
    private readonly defaultTtlMs: number,
    private readonly metrics?: MetricsCollector
  ) {}

  resolveTtl(rule?: CacheRule): number {
    return rule && rule.ttlMs > 0 ? rule.ttlMs : this.defaultTtlMs;
  }

  async get(cacheKey: string, signal?: AbortSignal, logger: Logger = this.logger): Promise<CachedEntry | null> {
    try {
      const entry = await this.store.get(cacheKey, signal);
      if (entry) {
        logger.debug('Cache hit', { cache_key: cacheKey });
      }
      return entry;
    } catch (error) {
      if (error instanceof RequestAbortedError) {
        throw error;
      }
      this.metrics?.recordCacheError();
      logger.error('Failed to get from cache', { cache_key: cacheKey, error });
      return null;
    }
  }

  async set(
    cacheKey: string,
    entry: CachedEntry,
    ttlMs: number,
    signal?: AbortSignal,
    logger: Logger = this.logger
  ): Promise<boolean> {
    try {
      await this.store.set(cacheKey, entry, ttlMs, signal);
      this.metrics?.recordCacheWrite();
      logger.debug('Response cached successfully', {
        cache_key: cacheKey,
        ttl: ttlMs / 1000,
        body_size: entry.body.byteLength
      });
      return true;
    } catch (error) {
      if (error instanceof RequestAbortedError) {
        throw error;
      }
      this.metrics?.recordCacheError();
      logger.error('Failed to cache response', { cache_key: cacheKey, error });
      return false;
    }
  }

  async delete(cacheKey: string): Promise<void> {
    await this.store.delete(cacheKey);
    this.logger.info('Cache entry deleted', { cache_key: cacheKey });
  }

  /**
   * Invalidate every key starting with `prefix`
   */
  async invalidateByPrefix(prefix: string): Promise<number> {
    const count = await this.store.deleteByPrefix(prefix);
    this.logger.info('Cache entries invalidated', { prefix, count });
    return count;
  }
}
