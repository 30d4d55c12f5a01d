import { createHash } from 'node:crypto';
import { describe, it, expect } from 'vitest';
import {
  CacheManager,
  createResponseFromCache,
  decodeEntry,
  encodeEntry,
  firstHeaderValues,
  formatCacheTime,
  generateCacheKey
} from '../src/cache';
import { EndpointRuleTable } from '../src/endpoints';
import { CacheStoreError, MalformedCacheEntryError, RequestAbortedError } from '../src/errors';
import { MetricsCollector } from '../src/metrics';
import { CachedEntry } from '../src/types/cache';
import { createCapturingLogger, findLog, MemoryStore } from './helpers';

function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

const rules = EndpointRuleTable.compile(
  [
    {
      path: '/query',
      cacheKeyQueryParams: ['symbol', 'function'],
      cacheKeyHeaders: ['Accept-Language'],
      ttlMs: 60_000
    }
  ],
  []
);
const rule = rules.cacheRules[0];

describe('firstHeaderValues', () => {
  it('takes the first line of a repeated header', () => {
    const headers = new Headers([
      ['Accept-Language', 'en'],
      ['Accept-Language', 'de']
    ]);
    const lookup = firstHeaderValues(headers, { 'accept-language': ['en', 'de'] });

    expect(headers.get('Accept-Language')).toBe('en, de');
    expect(lookup.get('Accept-Language')).toBe('en');
    expect(generateCacheKey('GET', '/query', new URLSearchParams(), lookup, rule)).toBe(
      `cache:${sha256('GET:/query:Accept-Language=en')}`
    );
  });

  it('reads Headers as is without per-line values', () => {
    const lookup = firstHeaderValues(new Headers({ accept: 'text/html, application/json' }));
    expect(lookup.get('Accept')).toBe('text/html, application/json');
    expect(lookup.get('Accept-Language')).toBeNull();
  });
});

describe('generateCacheKey', () => {
  it('hashes method, path, sorted query and header components', () => {
    const key = generateCacheKey(
      'GET',
      '/query',
      new URLSearchParams('symbol=IBM&function=EOD'),
      new Headers({ 'accept-language': 'en' }),
      rule
    );
    expect(key).toBe(`cache:${sha256('GET:/query:function=EOD&symbol=IBM:Accept-Language=en')}`);
  });

  it('uses only method and path without a rule', () => {
    const key = generateCacheKey('GET', '/query', new URLSearchParams('symbol=IBM'), new Headers());
    expect(key).toBe(`cache:${sha256('GET:/query')}`);
  });

  it('omits components whose values are all absent', () => {
    const key = generateCacheKey('GET', '/query', new URLSearchParams('symbol='), new Headers(), rule);
    expect(key).toBe(`cache:${sha256('GET:/query')}`);
  });

  it('is stable for identical key-relevant values in any order', () => {
    const a = generateCacheKey('GET', '/query', new URLSearchParams('symbol=IBM&function=EOD'), new Headers(), rule);
    const b = generateCacheKey('GET', '/query', new URLSearchParams('function=EOD&symbol=IBM'), new Headers(), rule);
    expect(a).toBe(b);
    expect(a).toMatch(/^cache:[0-9a-f]{64}$/);
  });

  it('ignores unlisted query parameters and headers', () => {
    const base = generateCacheKey('GET', '/query', new URLSearchParams('symbol=IBM'), new Headers(), rule);
    const noisy = generateCacheKey(
      'GET',
      '/query',
      new URLSearchParams('symbol=IBM&page=2&_ts=123'),
      new Headers({ 'x-trace-id': 'abc', 'user-agent': 'test' }),
      rule
    );
    expect(noisy).toBe(base);
  });

  it('changes when any key-relevant value changes', () => {
    const base = generateCacheKey('GET', '/query', new URLSearchParams('symbol=IBM'), new Headers(), rule);
    expect(generateCacheKey('GET', '/query', new URLSearchParams('symbol=MSFT'), new Headers(), rule)).not.toBe(base);
    expect(
      generateCacheKey('GET', '/query', new URLSearchParams('symbol=IBM'), new Headers({ 'accept-language': 'de' }), rule)
    ).not.toBe(base);
    expect(generateCacheKey('GET', '/other', new URLSearchParams('symbol=IBM'), new Headers(), rule)).not.toBe(base);
  });
});

describe('cache entry encoding', () => {
  const entry: CachedEntry = {
    status: 200,
    headers: { 'content-type': ['application/octet-stream'], 'set-cookie': ['a=1', 'b=2'] },
    body: new Uint8Array([0, 1, 2, 254, 255]),
    cachedAt: new Date('2026-03-01T12:00:00.000Z')
  };

  it('round-trips status, headers and body bytes', () => {
    const decoded = decodeEntry('cache:k', encodeEntry(entry));
    expect(decoded.status).toBe(200);
    expect(decoded.headers).toEqual(entry.headers);
    expect(Array.from(decoded.body)).toEqual([0, 1, 2, 254, 255]);
    expect(decoded.cachedAt.toISOString()).toBe('2026-03-01T12:00:00.000Z');
  });

  it('stores the documented JSON shape', () => {
    expect(JSON.parse(encodeEntry(entry))).toEqual({
      status_code: 200,
      headers: { 'content-type': ['application/octet-stream'], 'set-cookie': ['a=1', 'b=2'] },
      body: 'AAEC/v8=',
      cached_at: '2026-03-01T12:00:00.000Z'
    });
  });

  it('rejects values that are not JSON', () => {
    expect(() => decodeEntry('cache:k', 'not json')).toThrow(MalformedCacheEntryError);
  });

  it('rejects JSON of the wrong shape', () => {
    expect(() => decodeEntry('cache:k', '{"status_code":"200","headers":{},"body":""}')).toThrow(
      MalformedCacheEntryError
    );
  });
});

describe('createResponseFromCache', () => {
  it('replays the stored response with hit markers', async () => {
    const response = createResponseFromCache({
      status: 201,
      headers: { 'content-type': ['text/plain'], 'x-upstream': ['a', 'b'] },
      body: new TextEncoder().encode('hello'),
      cachedAt: new Date('2026-03-01T12:00:00.456Z')
    });

    expect(response.status).toBe(201);
    expect(response.headers.get('X-Cache')).toBe('HIT');
    expect(response.headers.get('X-Cache-Time')).toBe('2026-03-01T12:00:00Z');
    expect(response.headers.get('x-upstream')).toBe('a, b');
    expect(await response.text()).toBe('hello');
  });

  it('sends no body for statuses that forbid one', async () => {
    const response = createResponseFromCache({
      status: 204,
      headers: {},
      body: new Uint8Array(),
      cachedAt: new Date('2026-03-01T12:00:00Z')
    });

    expect(response.status).toBe(204);
    expect(response.body).toBeNull();
  });
});

describe('formatCacheTime', () => {
  it('drops milliseconds', () => {
    expect(formatCacheTime(new Date('2026-03-01T12:00:00.123Z'))).toBe('2026-03-01T12:00:00Z');
  });
});

describe('CacheManager', () => {
  const entry: CachedEntry = {
    status: 200,
    headers: {},
    body: new Uint8Array([1]),
    cachedAt: new Date('2026-03-01T12:00:00Z')
  };

  it('returns null for a miss without logging an error', async () => {
    const { logger, records } = createCapturingLogger();
    const cache = new CacheManager(new MemoryStore(), logger, 1000);

    expect(await cache.get('cache:missing')).toBeNull();
    expect(records.filter(record => record.level === 'ERROR')).toEqual([]);
  });

  it('turns a store read fault into a logged miss', async () => {
    const { logger, records } = createCapturingLogger();
    const store = new MemoryStore();
    store.getError = new CacheStoreError('connection refused');
    const metrics = new MetricsCollector();
    const cache = new CacheManager(store, logger, 1000, metrics);

    expect(await cache.get('cache:k')).toBeNull();
    expect(findLog(records, 'Failed to get from cache')).toMatchObject({
      level: 'ERROR',
      cache_key: 'cache:k',
      error: 'connection refused'
    });
    expect(metrics.getMetrics().cache.errors).toBe(1);
  });

  it('propagates an aborted request', async () => {
    const { logger } = createCapturingLogger();
    const store = new MemoryStore();
    store.getError = new RequestAbortedError('cache get');
    const cache = new CacheManager(store, logger, 1000);

    await expect(cache.get('cache:k')).rejects.toBeInstanceOf(RequestAbortedError);
  });

  it('reports write faults without throwing', async () => {
    const { logger, records } = createCapturingLogger();
    const store = new MemoryStore();
    store.setError = new CacheStoreError('read only replica');
    const cache = new CacheManager(store, logger, 1000);

    expect(await cache.set('cache:k', entry, 1000)).toBe(false);
    expect(findLog(records, 'Failed to cache response')).toMatchObject({ level: 'ERROR', error: 'read only replica' });
  });

  it('writes with the given TTL and counts the write', async () => {
    const { logger } = createCapturingLogger();
    const store = new MemoryStore();
    const metrics = new MetricsCollector();
    const cache = new CacheManager(store, logger, 1000, metrics);

    expect(await cache.set('cache:k', entry, 5000)).toBe(true);
    expect(store.records.get('cache:k')?.ttlMs).toBe(5000);
    expect(metrics.getMetrics().cache.writes).toBe(1);
  });

  it('resolves the rule TTL when positive, else the default', () => {
    const { logger } = createCapturingLogger();
    const cache = new CacheManager(new MemoryStore(), logger, 1000);
    const table = EndpointRuleTable.compile([{ path: '/a', ttlMs: 0 }, { path: '/b', ttlMs: 2500 }], []);

    expect(cache.resolveTtl(table.cacheRules[0])).toBe(1000);
    expect(cache.resolveTtl(table.cacheRules[1])).toBe(2500);
    expect(cache.resolveTtl(undefined)).toBe(1000);
  });

  it('invalidates by prefix and reports the count', async () => {
    const { logger } = createCapturingLogger();
    const store = new MemoryStore();
    const cache = new CacheManager(store, logger, 1000);
    await cache.set('cache:a', entry, 1000);
    await cache.set('cache:b', entry, 1000);
    await cache.set('other:c', entry, 1000);

    expect(await cache.invalidateByPrefix('cache:')).toBe(2);
    expect([...store.records.keys()]).toEqual(['other:c']);
  });
});
