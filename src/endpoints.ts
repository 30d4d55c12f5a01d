/**
 * Endpoint Rule Table and Resolver
 *
 * Rules are compiled once from configuration (patterns included) and frozen;
 * request handling only reads them.
 *
 * Cache precedence:
 * - a rule whose query-parameter constraints all hold wins immediately
 * - otherwise the first matching rule without constraints, exact or pattern
 * - otherwise no rule (caller applies the default TTL)
 *
 * Rate limits take the first rule whose path matches, exact or pattern.
 * List specific paths before broad patterns.
 */

import { ConfigError } from './errors';

export interface CacheRuleDefinition {
  path?: string;
  pathRegex?: string;
  methods?: string[];
  ttlMs: number;
  cacheKeyQueryParams?: string[];
  cacheKeyHeaders?: string[];
  matchQueryParams?: Record<string, string[]>;
  matchQueryParamsRegex?: Record<string, string[]>;
}

export interface RateLimitRuleDefinition {
  path?: string;
  pathRegex?: string;
  requestsPerSecond: number;
  burst: number;
}

export interface CacheRule {
  readonly path?: string;
  readonly pattern?: RegExp;
  readonly methods: ReadonlySet<string>;
  readonly ttlMs: number;
  readonly keyQueryParams: readonly string[];
  readonly keyHeaders: readonly string[];
  readonly matchQueryParams: ReadonlyMap<string, readonly string[]>;
  readonly matchQueryPatterns: ReadonlyMap<string, readonly RegExp[]>;
}

export interface RateLimitRule {
  readonly path?: string;
  readonly pattern?: RegExp;
  readonly requestsPerSecond: number;
  readonly burst: number;
}

export type PathMatchKind = 'exact' | 'pattern';

export type MatchKind = 'query-discriminated' | 'fallback-exact' | 'fallback-pattern' | 'none-default';

export interface MatchResult {
  rule?: CacheRule;
  kind: MatchKind;
  pathMatch?: PathMatchKind;
}

export interface QueryLookup {
  get(name: string): string | null;
}

function compilePattern(source: string, context: string): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    throw new ConfigError(`invalid ${context} regex pattern ${JSON.stringify(source)}`, [], { cause: error });
  }
}

function compileCacheRule(definition: CacheRuleDefinition, index: number): CacheRule {
  if (!definition.path && !definition.pathRegex) {
    throw new ConfigError(`cache endpoint #${index} must set path or path_regex`);
  }

  const matchQueryParams = new Map<string, readonly string[]>();
  for (const [param, values] of Object.entries(definition.matchQueryParams ?? {})) {
    if (values.length > 0) {
      matchQueryParams.set(param, Object.freeze([...values]));
    }
  }

  const matchQueryPatterns = new Map<string, readonly RegExp[]>();
  for (const [param, sources] of Object.entries(definition.matchQueryParamsRegex ?? {})) {
    const compiled = sources.map(source => compilePattern(source, `query param "${param}"`));
    if (compiled.length > 0) {
      matchQueryPatterns.set(param, Object.freeze(compiled));
    }
  }

  const methods = definition.methods && definition.methods.length > 0 ? definition.methods : ['GET'];

  return Object.freeze({
    path: definition.path || undefined,
    pattern: definition.pathRegex ? compilePattern(definition.pathRegex, 'cache endpoint') : undefined,
    methods: new Set(methods.map(method => method.toUpperCase())),
    ttlMs: definition.ttlMs,
    keyQueryParams: Object.freeze([...(definition.cacheKeyQueryParams ?? [])]),
    keyHeaders: Object.freeze([...(definition.cacheKeyHeaders ?? [])]),
    matchQueryParams,
    matchQueryPatterns
  });
}

function compileRateLimitRule(definition: RateLimitRuleDefinition, index: number): RateLimitRule {
  if (!definition.path && !definition.pathRegex) {
    throw new ConfigError(`rate limit endpoint #${index} must set path or path_regex`);
  }

  return Object.freeze({
    path: definition.path || undefined,
    pattern: definition.pathRegex ? compilePattern(definition.pathRegex, 'rate limit endpoint') : undefined,
    requestsPerSecond: definition.requestsPerSecond,
    burst: definition.burst
  });
}

export function isDiscriminating(rule: CacheRule): boolean {
  return rule.matchQueryParams.size > 0 || rule.matchQueryPatterns.size > 0;
}

/**
 * Human-readable identifier of a rule for logs.
 */
export function describeRule(rule: { path?: string; pattern?: RegExp } | undefined): string {
  if (!rule) return '<default>';
  if (rule.path) return rule.path;
  if (rule.pattern) return `regex:${rule.pattern.source}`;
  return '<unknown>';
}

function matchPath(rule: { path?: string; pattern?: RegExp }, path: string): PathMatchKind | null {
  if (rule.path && rule.path === path) {
    return 'exact';
  }
  if (rule.pattern && rule.pattern.test(path)) {
    return 'pattern';
  }
  return null;
}

// Only the first value of a repeated parameter counts; absent or empty never matches.
function queryConstraintsHold(rule: CacheRule, query: QueryLookup): boolean {
  for (const [param, allowed] of rule.matchQueryParams) {
    const value = query.get(param);
    if (!value || !allowed.includes(value)) {
      return false;
    }
  }

  for (const [param, patterns] of rule.matchQueryPatterns) {
    const value = query.get(param);
    if (!value || !patterns.some(pattern => pattern.test(value))) {
      return false;
    }
  }

  return true;
}

export class EndpointRuleTable {
  private constructor(
    readonly cacheRules: readonly CacheRule[],
    readonly rateLimitRules: readonly RateLimitRule[]
  ) {
    Object.freeze(this);
  }

  static compile(
    cacheDefinitions: CacheRuleDefinition[],
    rateLimitDefinitions: RateLimitRuleDefinition[]
  ): EndpointRuleTable {
    return new EndpointRuleTable(
      Object.freeze(cacheDefinitions.map(compileCacheRule)),
      Object.freeze(rateLimitDefinitions.map(compileRateLimitRule))
    );
  }

  static empty(): EndpointRuleTable {
    return EndpointRuleTable.compile([], []);
  }

  resolveCache(path: string, method: string, query: QueryLookup): MatchResult {
    let fallback: CacheRule | undefined;
    let fallbackPathMatch: PathMatchKind | undefined;

    for (const rule of this.cacheRules) {
      if (!rule.methods.has(method)) {
        continue;
      }

      const pathMatch = matchPath(rule, path);
      if (!pathMatch) {
        continue;
      }

      if (!isDiscriminating(rule)) {
        if (!fallback) {
          fallback = rule;
          fallbackPathMatch = pathMatch;
        }
        continue;
      }

      if (queryConstraintsHold(rule, query)) {
        return { rule, kind: 'query-discriminated', pathMatch };
      }
    }

    if (fallback) {
      return {
        rule: fallback,
        kind: fallbackPathMatch === 'pattern' ? 'fallback-pattern' : 'fallback-exact',
        pathMatch: fallbackPathMatch
      };
    }

    return { kind: 'none-default' };
  }

  resolveRateLimit(path: string): RateLimitRule | undefined {
    return this.rateLimitRules.find(rule => matchPath(rule, path) !== null);
  }
}
