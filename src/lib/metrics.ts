/**
 * Metrics Tracking
 *
 * In-memory metrics for monitoring and alerting.
 * Designed for serverless - metrics reset on cold start.
 */

import type { KeyKind } from "./matchers.js";

export interface RequestMetric {
  count: number;
  errors: number;
  latencies: number[];
}

export interface DecodeMetric {
  count: number;
  unmatched: number;
  byKind: Partial<Record<KeyKind, number>>;
}

interface MetricsStore {
  requests: Record<string, RequestMetric>;
  decode: DecodeMetric;
  startTime: number;
}

const store: MetricsStore = {
  requests: {},
  decode: { count: 0, unmatched: 0, byKind: {} },
  startTime: Date.now(),
};

// Keep only last N latencies to prevent memory growth
const MAX_LATENCIES = 1000;

/**
 * Record a request metric
 */
export function recordRequest(
  endpoint: string,
  status: number,
  durationMs: number
): void {
  const metric = store.requests[endpoint] ?? { count: 0, errors: 0, latencies: [] };
  store.requests[endpoint] = metric;
  metric.count++;

  if (status >= 500) {
    metric.errors++;
  }

  metric.latencies.push(durationMs);
  if (metric.latencies.length > MAX_LATENCIES) {
    metric.latencies.shift();
  }
}

/**
 * Record the outcome of a key classification (null = unrecognized)
 */
export function recordDecode(kind: KeyKind | null): void {
  store.decode.count++;
  if (kind === null) {
    store.decode.unmatched++;
    return;
  }
  store.decode.byKind[kind] = (store.decode.byKind[kind] ?? 0) + 1;
}

/**
 * Calculate percentile from array of values
 */
function percentile(arr: number[], p: number): number {
  if (arr.length === 0) return 0;
  const sorted = [...arr].sort((a, b) => a - b);
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, index)];
}

export type LatencyStats = {
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
};

function calculateStats(latencies: number[]): LatencyStats {
  if (latencies.length === 0) {
    return { min: 0, max: 0, avg: 0, p50: 0, p95: 0, p99: 0 };
  }

  const sum = latencies.reduce((a, b) => a + b, 0);
  return {
    min: Math.min(...latencies),
    max: Math.max(...latencies),
    avg: Math.round(sum / latencies.length),
    p50: percentile(latencies, 50),
    p95: percentile(latencies, 95),
    p99: percentile(latencies, 99),
  };
}

// percentage with 2 decimals
function rate(part: number, whole: number): number {
  return whole > 0 ? Math.round((part / whole) * 10000) / 100 : 0;
}

export type MetricsSnapshot = {
  uptime: number;
  requests: Record<string, {
    count: number;
    errors: number;
    errorRate: number;
    latency: LatencyStats;
  }>;
  decode: DecodeMetric & { unmatchedRate: number };
  totals: {
    requests: number;
    errors: number;
    errorRate: number;
  };
};

/**
 * Get all metrics for reporting
 */
export function getMetrics(): MetricsSnapshot {
  const requests: MetricsSnapshot["requests"] = {};
  let totalRequests = 0;
  let totalErrors = 0;

  for (const [endpoint, metric] of Object.entries(store.requests)) {
    requests[endpoint] = {
      count: metric.count,
      errors: metric.errors,
      errorRate: rate(metric.errors, metric.count),
      latency: calculateStats(metric.latencies),
    };
    totalRequests += metric.count;
    totalErrors += metric.errors;
  }

  return {
    uptime: Math.floor((Date.now() - store.startTime) / 1000),
    requests,
    decode: {
      count: store.decode.count,
      unmatched: store.decode.unmatched,
      byKind: { ...store.decode.byKind },
      unmatchedRate: rate(store.decode.unmatched, store.decode.count),
    },
    totals: {
      requests: totalRequests,
      errors: totalErrors,
      errorRate: rate(totalErrors, totalRequests),
    },
  };
}

/**
 * Reset all metrics (tests, cold start simulation)
 */
export function resetMetrics(): void {
  store.requests = {};
  store.decode = { count: 0, unmatched: 0, byKind: {} };
  store.startTime = Date.now();
}
