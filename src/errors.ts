// Error taxonomy for the proxy. Only the fixed messages in router.ts ever reach a client.

export class ProxyError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProxyError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Invalid configuration. Raised while loading config, before any request is served.
 */
export class ConfigError extends ProxyError {
  constructor(message: string, public readonly issues: string[] = [], options?: { cause?: unknown }) {
    super(message, 'CONFIG_INVALID', options);
    this.name = 'ConfigError';
  }
}

/**
 * The key-value store could not be reached or rejected a command.
 */
export class CacheStoreError extends ProxyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CACHE_BACKEND', options);
    this.name = 'CacheStoreError';
  }
}

/**
 * A stored value could not be decoded into a cached entry.
 */
export class MalformedCacheEntryError extends CacheStoreError {
  constructor(public readonly cacheKey: string, reason: string) {
    super(`malformed cache entry for ${cacheKey}: ${reason}`);
    this.name = 'MalformedCacheEntryError';
  }
}

/**
 * Every upstream attempt failed at the transport level.
 */
export class UpstreamUnavailableError extends ProxyError {
  constructor(public readonly attempts: number, cause: unknown) {
    super(`all ${attempts} upstream attempt(s) failed: ${describeError(cause)}`, 'UPSTREAM_UNAVAILABLE', { cause });
    this.name = 'UpstreamUnavailableError';
  }
}

/**
 * The upstream sent a status line but its body could not be read.
 */
export class UpstreamBodyError extends ProxyError {
  constructor(cause: unknown) {
    super(`failed to read upstream response body: ${describeError(cause)}`, 'UPSTREAM_BODY_READ', { cause });
    this.name = 'UpstreamBodyError';
  }
}

/**
 * The inbound request was aborted (client disconnect) while work was in flight.
 */
export class RequestAbortedError extends ProxyError {
  constructor(stage: string) {
    super(`request aborted during ${stage}`, 'REQUEST_ABORTED');
    this.name = 'RequestAbortedError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
