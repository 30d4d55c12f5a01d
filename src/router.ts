import { AttemptSignal, createAttemptSignal } from './abort';
import {
  CacheManager,
  NULL_BODY_STATUSES,
  buildResponse,
  createResponseFromCache,
  firstHeaderValues,
  generateCacheKey,
  toHeaders
} from './cache';
import { ProxyConfig } from './config';
import { describeRule } from './endpoints';
import { RequestAbortedError, UpstreamBodyError, UpstreamUnavailableError } from './errors';
import { Logger, sanitizeQuery } from './logger';
import { MetricsCollector } from './metrics';
import { Sleeper, executeWithRetry } from './retry';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ProxyHandlerDeps {
  config: ProxyConfig;
  cache: CacheManager;
  logger: Logger;
  metrics: MetricsCollector;
  fetch?: FetchLike;
  sleep?: Sleeper;
}

interface UpstreamResult {
  response: Response;
  attempts: number;
  release(): void;
}

const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade'
]);

// Recomputed by fetch for the outbound request
const STRIPPED_REQUEST_HEADERS = new Set(['host', 'content-length', 'expect']);

// fetch has already decoded the body, so the upstream framing no longer applies
const STRIPPED_RESPONSE_HEADERS = new Set(['content-encoding', 'content-length']);

const BODYLESS_METHODS = new Set(['GET', 'HEAD']);

function connectionTokens(headers: Headers): Set<string> {
  const tokens = new Set<string>();
  for (const token of (headers.get('connection') ?? '').split(',')) {
    const name = token.trim().toLowerCase();
    if (name) tokens.add(name);
  }
  return tokens;
}

export function buildUpstreamHeaders(incoming: Headers): Headers {
  const listed = connectionTokens(incoming);
  const headers = new Headers();
  incoming.forEach((value, name) => {
    if (HOP_BY_HOP_HEADERS.has(name) || STRIPPED_REQUEST_HEADERS.has(name) || listed.has(name)) {
      return;
    }
    headers.append(name, value);
  });
  return headers;
}

/**
 * Copy upstream response headers into a multi-valued record, dropping
 * hop-by-hop and body framing headers.
 */
export function collectResponseHeaders(upstream: Headers): Record<string, string[]> {
  const listed = connectionTokens(upstream);
  const collected: Record<string, string[]> = {};
  upstream.forEach((value, name) => {
    if (HOP_BY_HOP_HEADERS.has(name) || STRIPPED_RESPONSE_HEADERS.has(name) || listed.has(name)) {
      return;
    }
    const values = collected[name];
    if (values) {
      values.push(value);
    } else {
      collected[name] = [value];
    }
  });
  return collected;
}

export function buildUpstreamUrl(baseUrl: string, url: URL): string {
  return `${baseUrl.replace(/\/+$/, '')}${url.pathname}${url.search}`;
}

function textResponse(message: string, status: number): Response {
  return new Response(message, {
    status,
    headers: { 'Content-Type': 'text/plain; charset=utf-8' }
  });
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Per-request orchestration: cache lookup for GET, upstream call with
 * retry, cache population and response assembly.
 */
export class ProxyHandler {
  private readonly config: ProxyConfig;
  private readonly cache: CacheManager;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly fetchImpl: FetchLike;
  private readonly sleep?: Sleeper;

  constructor(deps: ProxyHandlerDeps) {
    this.config = deps.config;
    this.cache = deps.cache;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = deps.sleep;
  }

  /**
   * @param distinctHeaders per-line request header values, when the server exposes them
   */
  async handle(
    request: Request,
    requestId: string,
    distinctHeaders?: Record<string, string[] | undefined>
  ): Promise<Response> {
    const startTime = Date.now();
    const url = new URL(request.url);
    const logger = this.logger.child({
      request_id: requestId,
      method: request.method,
      path: url.pathname
    });

    logger.info('Incoming request', {
      query: sanitizeQuery(url.search, this.config.logging.redactQueryParams) || undefined
    });

    let response: Response;
    try {
      response =
        request.method === 'GET'
          ? await this.handleCacheable(request, url, logger, distinctHeaders)
          : await this.forwardRequest(request, url, logger);
    } catch (error) {
      response = this.failureResponse(error, logger);
    }

    const duration = Date.now() - startTime;
    this.metrics.recordRequest(response.status, duration);
    logger.info('Request completed', {
      status: response.status,
      duration_ms: duration,
      cache: response.headers.get('X-Cache') ?? undefined
    });
    return response;
  }

  private async handleCacheable(
    request: Request,
    url: URL,
    logger: Logger,
    distinctHeaders?: Record<string, string[] | undefined>
  ): Promise<Response> {
    const match = this.config.rules.resolveCache(url.pathname, request.method, url.searchParams);
    const cacheKey = generateCacheKey(
      request.method,
      url.pathname,
      url.searchParams,
      firstHeaderValues(request.headers, distinctHeaders),
      match.rule
    );
    const ruleLogger = logger.child({ cache_key: cacheKey });

    ruleLogger.debug('Cache key generated', {
      cache_rule: describeRule(match.rule),
      match_kind: match.kind,
      path_match: match.pathMatch
    });

    const cached = await this.cache.get(cacheKey, request.signal, ruleLogger);
    if (cached) {
      this.metrics.recordCache(true);
      ruleLogger.info('Request served from cache', {
        status: cached.status,
        cached_at: cached.cachedAt.toISOString()
      });
      return createResponseFromCache(cached);
    }

    this.metrics.recordCache(false);
    ruleLogger.debug('Cache miss');

    const upstream = await this.callUpstream(request, url, undefined, ruleLogger);
    const { response } = upstream;

    let body: Uint8Array;
    try {
      body = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      if (request.signal.aborted) {
        throw new RequestAbortedError('upstream body read');
      }
      throw new UpstreamBodyError(error);
    } finally {
      upstream.release();
    }

    const headers = collectResponseHeaders(response.headers);

    if (isSuccess(response.status)) {
      const ttlMs = this.cache.resolveTtl(match.rule);
      await this.cache.set(
        cacheKey,
        { status: response.status, headers, body, cachedAt: new Date() },
        ttlMs,
        request.signal,
        ruleLogger
      );
    } else {
      ruleLogger.debug('Response not cached (non-2xx status)', { status: response.status });
    }

    ruleLogger.info('Request forwarded to upstream', {
      status: response.status,
      attempts: upstream.attempts,
      body_size: body.byteLength
    });

    const responseHeaders = toHeaders(headers);
    responseHeaders.set('X-Cache', 'MISS');
    return buildResponse(response.status, responseHeaders, body);
  }

  private async forwardRequest(request: Request, url: URL, logger: Logger): Promise<Response> {
    logger.debug('Forwarding non-cacheable request to upstream');

    const body = await this.readRequestBody(request);
    const upstream = await this.callUpstream(request, url, body, logger);
    const { response } = upstream;

    logger.info('Request forwarded (non-cacheable)', {
      status: response.status,
      attempts: upstream.attempts
    });

    const headers = toHeaders(collectResponseHeaders(response.headers));
    if (NULL_BODY_STATUSES.has(response.status) || !response.body) {
      upstream.release();
      return new Response(null, { status: response.status, headers });
    }

    // The attempt timeout keeps bounding the body until it has streamed to the client
    const responseBody = response.body.pipeThrough(
      new TransformStream<Uint8Array, Uint8Array>({ flush: () => upstream.release() })
    );
    return new Response(responseBody, { status: response.status, headers });
  }

  private async readRequestBody(request: Request): Promise<ArrayBuffer | undefined> {
    if (BODYLESS_METHODS.has(request.method) || request.body === null) {
      return undefined;
    }
    try {
      return await request.arrayBuffer();
    } catch (error) {
      if (request.signal.aborted) {
        throw new RequestAbortedError('request body read');
      }
      throw error;
    }
  }

  private async callUpstream(
    request: Request,
    url: URL,
    body: ArrayBuffer | undefined,
    logger: Logger
  ): Promise<UpstreamResult> {
    const target = buildUpstreamUrl(this.config.upstream.baseUrl, url);
    const headers = buildUpstreamHeaders(request.headers);
    const timeoutMs = this.config.upstream.timeoutMs;
    // One signal per attempt; superseded ones are disposed as the loop moves on
    const signals: AttemptSignal[] = [];
    const release = () => signals.forEach(signal => signal.dispose());

    logger.debug('Forwarding request to upstream', { upstream_url: `${this.config.upstream.baseUrl}${url.pathname}` });

    try {
      const result = await executeWithRetry(
        async attempt => {
          release();
          const attemptSignal = createAttemptSignal(request.signal, timeoutMs);
          signals.push(attemptSignal);
          logger.debug('Attempting upstream request', { attempt });
          try {
            return await this.fetchImpl(target, {
              method: request.method,
              headers,
              body,
              redirect: 'manual',
              signal: attemptSignal.signal
            });
          } catch (error) {
            if (attemptSignal.timedOut()) {
              logger.warn('Upstream request timed out', { attempt, timeout_ms: timeoutMs });
            }
            throw error;
          }
        },
        { policy: this.config.retry, logger, signal: request.signal, sleep: this.sleep }
      );

      this.metrics.recordUpstream(result.attempts, false);
      return { response: result.response, attempts: result.attempts, release };
    } catch (error) {
      release();
      if (error instanceof UpstreamUnavailableError) {
        this.metrics.recordUpstream(error.attempts, true);
      }
      throw error;
    }
  }

  private failureResponse(error: unknown, logger: Logger): Response {
    if (error instanceof RequestAbortedError) {
      logger.warn('Client closed request', { error });
      return textResponse('client closed request', 499);
    }
    if (error instanceof UpstreamUnavailableError) {
      logger.error('Failed to forward request', { error, attempts: error.attempts });
      return textResponse('upstream service unavailable', 502);
    }
    if (error instanceof UpstreamBodyError) {
      logger.error('Failed to read response body', { error });
      return textResponse('failed to read upstream response', 500);
    }
    throw error;
  }
}
