// Metrics types and interfaces

export interface MetricsSnapshot {
  requests: {
    total: number;
    success: number;
    errors: number;
    byStatus: Record<number, number>;
  };
  latency: {
    p50: number;
    p95: number;
    p99: number;
    avg: number;
  };
  cache: {
    hits: number;
    misses: number;
    writes: number;
    errors: number;
    hitRate: number;
  };
  rateLimit: {
    blocked: number;
    allowed: number;
  };
  upstream: {
    attempts: number;
    retries: number;
    failures: number;
  };
  uptimeSeconds: number;
  timestamp: number;
}
