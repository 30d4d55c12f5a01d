import type { HttpBindings } from '@hono/node-server';
import { Hono, MiddlewareHandler } from 'hono';
import { requestId, RequestIdVariables } from 'hono/request-id';
import { CacheManager } from './cache';
import { ProxyConfig } from './config';
import { Logger } from './logger';
import { MetricsCollector } from './metrics';
import { rateLimitMiddleware, RateLimiterRegistry } from './ratelimit';
import { FetchLike, ProxyHandler } from './router';
import { Sleeper } from './retry';

export interface AppDeps {
  config: ProxyConfig;
  cache: CacheManager;
  logger: Logger;
  metrics: MetricsCollector;
  registry?: RateLimiterRegistry;
  fetch?: FetchLike;
  sleep?: Sleeper;
}

// Node server bindings; absent when the app is driven through app.request
export type AppEnv = { Bindings: Partial<HttpBindings>; Variables: RequestIdVariables };

export const HEALTH_BODY = { status: 'healthy', service: 'api-cache' };

function adminAuth(adminKey: string | undefined, logger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const providedKey = c.req.header('X-Admin-Key');
    if (adminKey && providedKey !== adminKey) {
      logger.warn('Unauthorized admin request', { path: c.req.path, method: c.req.method });
      return c.json({ success: false, message: 'Unauthorized' }, 401);
    }
    await next();
  };
}

export function createApp(deps: AppDeps): Hono<AppEnv> {
  const { config, cache, logger, metrics } = deps;
  const registry = deps.registry ?? new RateLimiterRegistry();
  const handler = new ProxyHandler({
    config,
    cache,
    logger,
    metrics,
    fetch: deps.fetch,
    sleep: deps.sleep
  });

  const app = new Hono<AppEnv>();

  app.use('*', requestId());
  // Proxied responses are built as raw Responses, which skip headers prepared before next()
  app.use('*', async (c, next) => {
    await next();
    c.header('X-Request-Id', c.get('requestId'));
  });

  // Health check endpoint
  app.get('/health', c => c.json(HEALTH_BODY));

  // Only the routes below; other /admin paths belong to the upstream
  const requireAdmin = adminAuth(config.adminKey, logger);

  // Admin endpoint to invalidate cache by key prefix
  app.post('/admin/cache-invalidate', requireAdmin, async c => {
    const prefix = c.req.query('prefix');
    if (!prefix) {
      return c.json({ success: false, message: 'Missing required query parameter: prefix' }, 400);
    }

    const count = await cache.invalidateByPrefix(prefix);
    return c.json({
      success: true,
      message: `Invalidated ${count} cache entries`,
      count
    });
  });

  // Admin endpoint to delete a single cache entry
  app.post('/admin/cache-delete', requireAdmin, async c => {
    const key = c.req.query('key');
    if (!key) {
      return c.json({ success: false, message: 'Missing required query parameter: key' }, 400);
    }

    await cache.delete(key);
    return c.json({ success: true, message: `Deleted cache entry ${key}` });
  });

  // Admin endpoint to get metrics
  app.get('/admin/metrics', requireAdmin, c => c.json({ success: true, metrics: metrics.getMetrics() }));

  // Catch-all proxy handler
  app.all(
    '*',
    rateLimitMiddleware({
      enabled: config.rateLimit.enabled,
      defaults: config.rateLimit,
      rules: config.rules,
      registry,
      logger,
      metrics
    }),
    c => handler.handle(c.req.raw, c.get('requestId'), c.env?.incoming?.headersDistinct)
  );

  app.onError((error, c) => {
    logger.error('Unhandled error', {
      request_id: c.get('requestId'),
      method: c.req.method,
      path: c.req.path,
      error
    });
    metrics.recordRequest(500, 0);
    return c.text('internal server error', 500);
  });

  return app;
}
