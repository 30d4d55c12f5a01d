// In-process request, cache and upstream counters
import { MetricsSnapshot } from './types/metrics';

const LATENCY_SAMPLE_SIZE = 1000; // Most recent latencies kept for percentiles

export class MetricsCollector {
  private requests = 0;
  private errors = 0;
  private statusCodes = new Map<number, number>();
  private latencies: number[] = [];
  private cacheHits = 0;
  private cacheMisses = 0;
  private cacheWrites = 0;
  private cacheErrors = 0;
  private rateLimitBlocked = 0;
  private rateLimitAllowed = 0;
  private upstreamAttempts = 0;
  private upstreamRetries = 0;
  private upstreamFailures = 0;
  private startedAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  recordRequest(statusCode: number, latencyMs: number): void {
    this.requests++;
    if (statusCode >= 500) this.errors++;
    this.statusCodes.set(statusCode, (this.statusCodes.get(statusCode) ?? 0) + 1);

    this.latencies.push(latencyMs);
    if (this.latencies.length > LATENCY_SAMPLE_SIZE) {
      this.latencies.shift();
    }
  }

  recordCache(isHit: boolean): void {
    if (isHit) {
      this.cacheHits++;
    } else {
      this.cacheMisses++;
    }
  }

  recordCacheWrite(): void {
    this.cacheWrites++;
  }

  recordCacheError(): void {
    this.cacheErrors++;
  }

  recordRateLimit(blocked: boolean): void {
    if (blocked) {
      this.rateLimitBlocked++;
    } else {
      this.rateLimitAllowed++;
    }
  }

  recordUpstream(attempts: number, failed: boolean): void {
    this.upstreamAttempts += attempts;
    this.upstreamRetries += Math.max(0, attempts - 1);
    if (failed) this.upstreamFailures++;
  }

  private calculatePercentile(sortedLatencies: number[], percentile: number): number {
    if (sortedLatencies.length === 0) return 0;
    const index = Math.ceil((percentile / 100) * sortedLatencies.length) - 1;
    return sortedLatencies[Math.max(0, index)];
  }

  getMetrics(): MetricsSnapshot {
    const sorted = [...this.latencies].sort((a, b) => a - b);
    const avg = sorted.length > 0 ? sorted.reduce((sum, l) => sum + l, 0) / sorted.length : 0;
    const lookups = this.cacheHits + this.cacheMisses;
    const now = this.now();

    return {
      requests: {
        total: this.requests,
        success: this.requests - this.errors,
        errors: this.errors,
        byStatus: Object.fromEntries(this.statusCodes)
      },
      latency: {
        p50: this.calculatePercentile(sorted, 50),
        p95: this.calculatePercentile(sorted, 95),
        p99: this.calculatePercentile(sorted, 99),
        avg
      },
      cache: {
        hits: this.cacheHits,
        misses: this.cacheMisses,
        writes: this.cacheWrites,
        errors: this.cacheErrors,
        hitRate: lookups > 0 ? (this.cacheHits / lookups) * 100 : 0
      },
      rateLimit: {
        blocked: this.rateLimitBlocked,
        allowed: this.rateLimitAllowed
      },
      upstream: {
        attempts: this.upstreamAttempts,
        retries: this.upstreamRetries,
        failures: this.upstreamFailures
      },
      uptimeSeconds: Math.floor((now - this.startedAt) / 1000),
      timestamp: now
    };
  }

  reset(): void {
    this.requests = 0;
    this.errors = 0;
    this.statusCodes.clear();
    this.latencies = [];
    this.cacheHits = 0;
    this.cacheMisses = 0;
    this.cacheWrites = 0;
    this.cacheErrors = 0;
    this.rateLimitBlocked = 0;
    this.rateLimitAllowed = 0;
    this.upstreamAttempts = 0;
    this.upstreamRetries = 0;
    this.upstreamFailures = 0;
    this.startedAt = this.now();
  }
}
