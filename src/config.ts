// Configuration loading: YAML file + environment overrides, validated once at startup
import { readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { EndpointRuleTable } from './endpoints';
import { ConfigError, describeError } from './errors';
import { LoggingConfig, parseLogLevel } from './logger';
import { RetryPolicy } from './retry';
import { RateLimitDefaults } from './ratelimit';
import { ValkeyConfig } from './store';

export interface ServerConfig {
  host: string;
  port: number;
  readTimeoutMs: number;
  writeTimeoutMs: number;
  idleTimeoutMs: number;
}

export interface UpstreamConfig {
  baseUrl: string;
  timeoutMs: number;
}

export interface ProxyConfig {
  server: ServerConfig;
  valkey: ValkeyConfig;
  cache: { defaultTtlMs: number };
  rateLimit: RateLimitDefaults & { enabled: boolean };
  retry: RetryPolicy;
  upstream: UpstreamConfig;
  logging: LoggingConfig;
  adminKey?: string;
  rules: EndpointRuleTable;
}

export type Env = Record<string, string | undefined>;

const DURATION_UNITS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000
};

/**
 * Parse a duration such as "500ms", "5m" or "1h30m" into milliseconds.
 * Plain numbers are taken as milliseconds.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') {
    return value;
  }

  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }

  const segment = /(\d+(?:\.\d+)?)(ns|us|µs|ms|s|m|h)/g;
  let total = 0;
  let consumed = 0;
  for (const match of trimmed.matchAll(segment)) {
    if (match.index !== consumed) break;
    total += Number(match[1]) * DURATION_UNITS[match[2]];
    consumed += match[0].length;
  }

  if (trimmed === '' || consumed !== trimmed.length) {
    return Number.NaN;
  }
  return total;
}

const duration = z
  .union([z.string(), z.number()])
  .transform((value, ctx) => {
    const ms = parseDuration(value);
    if (Number.isNaN(ms) || ms < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid duration ${JSON.stringify(value)}` });
      return z.NEVER;
    }
    return ms;
  });

const port = z.number().int().min(1).max(65535);

const cacheEndpointSchema = z.object({
  path: z.string().optional(),
  path_regex: z.string().optional(),
  methods: z.array(z.string()).optional(),
  ttl: duration.default(0),
  cache_key_headers: z.array(z.string()).default([]),
  cache_key_query_params: z.array(z.string()).default([]),
  match_query_params: z.record(z.array(z.string())).optional(),
  match_query_params_regex: z.record(z.array(z.string())).optional()
});

const rateLimitEndpointSchema = z.object({
  path: z.string().optional(),
  path_regex: z.string().optional(),
  requests_per_second: z.number().min(0),
  burst: z.number().int().min(0)
});

const configSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: port.default(8080),
      read_timeout: duration.default('30s'),
      write_timeout: duration.default('30s'),
      idle_timeout: duration.default('120s')
    })
    .default({}),
  valkey: z
    .object({
      host: z.string().default('localhost'),
      port: port.default(6379),
      password: z.string().optional(),
      db: z.number().int().min(0).default(0),
      max_retries: z.number().int().min(0).default(3)
    })
    .default({}),
  cache: z
    .object({
      default_ttl: duration.default('5m'),
      endpoints: z.array(cacheEndpointSchema).default([])
    })
    .default({}),
  rate_limit: z
    .object({
      enabled: z.boolean().default(false),
      requests_per_second: z.number().min(0).default(10),
      burst: z.number().int().min(0).default(20),
      endpoints: z.array(rateLimitEndpointSchema).default([])
    })
    .default({}),
  retry: z
    .object({
      enabled: z.boolean().default(false),
      max_attempts: z.number().int().min(1).default(3),
      initial_backoff: duration.default('100ms'),
      max_backoff: duration.default('5s'),
      backoff_multiplier: z.number().min(1).default(2),
      retryable_status_codes: z.array(z.number().int().min(100).max(599)).default([502, 503, 504])
    })
    .default({}),
  upstream: z.object({
    base_url: z.string().url(),
    timeout: duration.default('30s')
  }),
  logging: z
    .object({
      level: z.string().default('info'),
      format: z.enum(['json', 'text']).default('json'),
      output: z.enum(['stdout', 'stderr', 'file']).default('stdout'),
      file_path: z.string().optional(),
      redact_query_params: z.array(z.string()).default([])
    })
    .default({})
    .refine(logging => logging.output !== 'file' || !!logging.file_path, {
      message: 'file_path is required when output is "file"',
      path: ['file_path']
    })
});

function applyEnvOverrides(raw: unknown, env: Env): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return raw;
  }

  const merged: Record<string, unknown> = { ...raw };
  const section = (name: string): Record<string, unknown> => {
    const current = merged[name];
    const copy: Record<string, unknown> =
      typeof current === 'object' && current !== null && !Array.isArray(current) ? { ...current } : {};
    merged[name] = copy;
    return copy;
  };

  if (env.UPSTREAM_BASE_URL) section('upstream').base_url = env.UPSTREAM_BASE_URL;
  if (env.VALKEY_HOST) section('valkey').host = env.VALKEY_HOST;
  if (env.VALKEY_PORT) section('valkey').port = Number(env.VALKEY_PORT);
  if (env.VALKEY_PASSWORD) section('valkey').password = env.VALKEY_PASSWORD;
  if (env.LOG_LEVEL) section('logging').level = env.LOG_LEVEL;

  return merged;
}

/**
 * Validate a parsed configuration document and compile its endpoint rules.
 */
export function parseConfig(raw: unknown, env: Env = {}): ProxyConfig {
  const result = configSchema.safeParse(applyEnvOverrides(raw ?? {}, env));
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`invalid configuration: ${issues.join('; ')}`, issues);
  }

  const cfg = result.data;
  const rules = EndpointRuleTable.compile(
    cfg.cache.endpoints.map(ep => ({
      path: ep.path,
      pathRegex: ep.path_regex,
      methods: ep.methods,
      ttlMs: ep.ttl,
      cacheKeyHeaders: ep.cache_key_headers,
      cacheKeyQueryParams: ep.cache_key_query_params,
      matchQueryParams: ep.match_query_params,
      matchQueryParamsRegex: ep.match_query_params_regex
    })),
    cfg.rate_limit.endpoints.map(ep => ({
      path: ep.path,
      pathRegex: ep.path_regex,
      requestsPerSecond: ep.requests_per_second,
      burst: ep.burst
    }))
  );

  return {
    server: {
      host: cfg.server.host,
      port: cfg.server.port,
      readTimeoutMs: cfg.server.read_timeout,
      writeTimeoutMs: cfg.server.write_timeout,
      idleTimeoutMs: cfg.server.idle_timeout
    },
    valkey: {
      host: cfg.valkey.host,
      port: cfg.valkey.port,
      password: cfg.valkey.password,
      db: cfg.valkey.db,
      maxRetries: cfg.valkey.max_retries
    },
    cache: { defaultTtlMs: cfg.cache.default_ttl },
    rateLimit: {
      enabled: cfg.rate_limit.enabled,
      requestsPerSecond: cfg.rate_limit.requests_per_second,
      burst: cfg.rate_limit.burst
    },
    retry: {
      enabled: cfg.retry.enabled,
      maxAttempts: cfg.retry.max_attempts,
      initialBackoffMs: cfg.retry.initial_backoff,
      maxBackoffMs: cfg.retry.max_backoff,
      backoffMultiplier: cfg.retry.backoff_multiplier,
      retryableStatusCodes: cfg.retry.retryable_status_codes
    },
    upstream: {
      baseUrl: cfg.upstream.base_url.replace(/\/+$/, ''),
      timeoutMs: cfg.upstream.timeout
    },
    logging: {
      level: parseLogLevel(cfg.logging.level),
      format: cfg.logging.format,
      output: cfg.logging.output,
      filePath: cfg.logging.file_path,
      redactQueryParams: cfg.logging.redact_query_params
    },
    adminKey: env.ADMIN_KEY || undefined,
    rules
  };
}

export function loadConfig(path: string, env: Env = process.env): ProxyConfig {
  let source: string;
  try {
    source = readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`failed to read config file ${path}: ${describeError(error)}`, [], { cause: error });
  }

  let raw: unknown;
  try {
    raw = yaml.load(source);
  } catch (error) {
    throw new ConfigError(`failed to parse config file ${path}: ${describeError(error)}`, [], { cause: error });
  }

  return parseConfig(raw, env);
}
