/**
 * Rate Limiting Module
 *
 * Strategy:
 * - One token bucket per distinct request path, created on first sight
 * - Endpoint rule rate/burst when a rule matches, global defaults otherwise
 * - Buckets live for the life of the process
 *
 * Responses:
 * - Rate limited: 429 with a fixed JSON body and Retry-After header
 */

import { MiddlewareHandler } from 'hono';
import { Clock, TokenBucket } from './ratelimit-tokenbucket';
import { EndpointRuleTable, RateLimitRule } from './endpoints';
import { Logger } from './logger';
import { MetricsCollector } from './metrics';

export interface RateLimitDefaults {
  requestsPerSecond: number;
  burst: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  retryAfter: number;
}

export const RATE_LIMIT_BODY = { error: 'rate limit exceeded', message: 'too many requests' };

export class RateLimiterRegistry {
  // Never pruned: evicting a bucket would hand a cold path a fresh burst
  private readonly limiters = new Map<string, TokenBucket>();

  constructor(private readonly clock: Clock = Date.now) {}

  /**
   * Get or create the bucket for `path`. Lookup and insert run without
   * yielding to the event loop, so concurrent requests for a new path
   * always share a single bucket.
   */
  getLimiter(path: string, rule: RateLimitRule | undefined, defaults: RateLimitDefaults): TokenBucket {
    const existing = this.limiters.get(path);
    if (existing) {
      return existing;
    }

    const requestsPerSecond = rule ? rule.requestsPerSecond : defaults.requestsPerSecond;
    const burst = rule ? rule.burst : defaults.burst;
    const limiter = new TokenBucket(requestsPerSecond, burst, this.clock);
    this.limiters.set(path, limiter);
    return limiter;
  }

  check(path: string, rule: RateLimitRule | undefined, defaults: RateLimitDefaults): RateLimitDecision {
    const limiter = this.getLimiter(path, rule, defaults);

    if (limiter.tryRemoveToken()) {
      return {
        allowed: true,
        limit: limiter.capacity,
        remaining: Math.floor(limiter.getStats().tokens),
        retryAfter: 0
      };
    }

    return {
      allowed: false,
      limit: limiter.capacity,
      remaining: 0,
      retryAfter: limiter.retryAfterSeconds()
    };
  }

  allow(path: string, rule: RateLimitRule | undefined, defaults: RateLimitDefaults): boolean {
    return this.check(path, rule, defaults).allowed;
  }

  get size(): number {
    return this.limiters.size;
  }
}

export interface RateLimitMiddlewareOptions {
  enabled: boolean;
  defaults: RateLimitDefaults;
  rules: EndpointRuleTable;
  registry: RateLimiterRegistry;
  logger: Logger;
  metrics: MetricsCollector;
}

export function rateLimitMiddleware(options: RateLimitMiddlewareOptions): MiddlewareHandler {
  const { enabled, defaults, rules, registry, logger, metrics } = options;

  return async (c, next) => {
    if (!enabled) {
      await next();
      return;
    }

    const path = c.req.path;
    const decision = registry.check(path, rules.resolveRateLimit(path), defaults);

    if (!decision.allowed) {
      metrics.recordRateLimit(true);
      metrics.recordRequest(429, 0);
      logger.warn('Rate limit exceeded', {
        path,
        method: c.req.method,
        limit: decision.limit,
        retry_after: decision.retryAfter
      });
      c.header('Retry-After', String(decision.retryAfter));
      return c.json(RATE_LIMIT_BODY, 429);
    }

    metrics.recordRateLimit(false);
    await next();
  };
}
