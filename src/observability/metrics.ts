/**
 * PRODUCTION OBSERVABILITY - METRICS COLLECTION
 *
 * Lightweight in-process metrics for the shakemap API
 * Exposes a Prometheus-compatible /metrics endpoint
 *
 * Collected metrics:
 * - Overlay computation latency (event fetch + overlay)
 * - Upstream fetch latency
 * - Cache lock wait time
 * - Total request latency
 * - Cache hits / misses / coalesced hits / forced refreshes
 * - Computation failures, simulations
 * - Error counts by type
 */

import { Router, Request, Response, NextFunction } from 'express';

// Histogram bucket boundaries (milliseconds)
const LATENCY_BUCKETS = [10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000];

interface HistogramData {
  buckets: Map<number, number>;
  sum: number;
  count: number;
}

interface HistogramSummary {
  count: number;
  sum_ms: number;
  avg_ms: number;
}

export interface MetricsSnapshot {
  cache: {
    hits: number;
    misses: number;
    coalesced_hits: number;
    forced_refreshes: number;
    hit_rate: number;
  };
  computations: {
    success: number;
    failures: number;
    latency: HistogramSummary;
  };
  upstream: {
    latency: HistogramSummary;
  };
  lock_wait: HistogramSummary;
  simulations: number;
  errors_by_type: Record<string, number>;
  concurrency: {
    current: number;
    peak: number;
  };
  requests: HistogramSummary;
}

/**
 * Metrics collector singleton
 */
class MetricsCollector {
  // Histograms
  private computeLatency: HistogramData;
  private upstreamLatency: HistogramData;
  private lockWaitTime: HistogramData;
  private totalRequestLatency: HistogramData;

  // Counters
  private cacheHits: number = 0;
  private cacheMisses: number = 0;
  private coalescedHits: number = 0;
  private forcedRefreshes: number = 0;
  private computeSuccess: number = 0;
  private computeFailures: number = 0;
  private simulations: number = 0;
  private errorsByType: Map<string, number> = new Map();

  // Gauges
  private activeConcurrentRequests: number = 0;
  private peakConcurrentRequests: number = 0;

  constructor() {
    this.computeLatency = this.createHistogram();
    this.upstreamLatency = this.createHistogram();
    this.lockWaitTime = this.createHistogram();
    this.totalRequestLatency = this.createHistogram();
  }

  private createHistogram(): HistogramData {
    const buckets = new Map<number, number>();
    LATENCY_BUCKETS.forEach(b => buckets.set(b, 0));
    buckets.set(Infinity, 0);
    return { buckets, sum: 0, count: 0 };
  }

  private recordHistogram(histogram: HistogramData, value: number): void {
    histogram.sum += value;
    histogram.count += 1;

    for (const bucket of LATENCY_BUCKETS) {
      if (value <= bucket) {
        histogram.buckets.set(bucket, (histogram.buckets.get(bucket) || 0) + 1);
      }
    }
    histogram.buckets.set(Infinity, (histogram.buckets.get(Infinity) || 0) + 1);
  }

  private summarize(histogram: HistogramData): HistogramSummary {
    return {
      count: histogram.count,
      sum_ms: histogram.sum,
      avg_ms: histogram.count > 0 ? Math.round(histogram.sum / histogram.count) : 0,
    };
  }

  // Computation metrics
  recordComputeLatency(ms: number): void {
    this.recordHistogram(this.computeLatency, ms);
  }

  recordUpstreamLatency(ms: number): void {
    this.recordHistogram(this.upstreamLatency, ms);
  }

  incrementComputeSuccess(): void {
    this.computeSuccess++;
  }

  incrementComputeFailure(): void {
    this.computeFailures++;
  }

  incrementSimulation(): void {
    this.simulations++;
  }

  // Lock metrics
  recordLockWait(ms: number): void {
    this.recordHistogram(this.lockWaitTime, ms);
  }

  // Request metrics
  recordRequestLatency(ms: number): void {
    this.recordHistogram(this.totalRequestLatency, ms);
  }

  incrementError(errorType: string): void {
    this.errorsByType.set(errorType, (this.errorsByType.get(errorType) || 0) + 1);
  }

  // Cache metrics
  incrementCacheHit(): void {
    this.cacheHits++;
  }

  incrementCacheMiss(): void {
    this.cacheMisses++;
  }

  // a waiter found the cache refreshed by the caller ahead of it
  incrementCoalescedHit(): void {
    this.coalescedHits++;
  }

  incrementForcedRefresh(): void {
    this.forcedRefreshes++;
  }

  // Concurrency tracking
  incrementConcurrentRequests(): void {
    this.activeConcurrentRequests++;
    if (this.activeConcurrentRequests > this.peakConcurrentRequests) {
      this.peakConcurrentRequests = this.activeConcurrentRequests;
    }
  }

  decrementConcurrentRequests(): void {
    this.activeConcurrentRequests = Math.max(0, this.activeConcurrentRequests - 1);
  }

  // coalesced hits count as hits: they were served without a computation
  getCacheHitRate(): number {
    const hits = this.cacheHits + this.coalescedHits;
    const total = hits + this.cacheMisses + this.forcedRefreshes;
    return total > 0 ? hits / total : 0;
  }

  // Format histogram for Prometheus
  private formatHistogram(name: string, histogram: HistogramData, help: string): string {
    const lines: string[] = [];
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} histogram`);

    for (const bucket of LATENCY_BUCKETS) {
      lines.push(`${name}_bucket{le="${bucket}"} ${histogram.buckets.get(bucket) || 0}`);
    }
    lines.push(`${name}_bucket{le="+Inf"} ${histogram.count}`);
    lines.push(`${name}_sum ${histogram.sum}`);
    lines.push(`${name}_count ${histogram.count}`);

    return lines.join('\n');
  }

  private formatScalar(name: string, type: 'counter' | 'gauge', value: number | string, help: string): string {
    return [
      `# HELP ${name} ${help}`,
      `# TYPE ${name} ${type}`,
      `${name} ${value}`,
    ].join('\n');
  }

  // Generate Prometheus-compatible metrics output
  toPrometheus(): string {
    const sections: string[] = [];

    sections.push(this.formatHistogram(
      'shakemap_compute_latency_ms',
      this.computeLatency,
      'Event fetch plus overlay computation latency in milliseconds'
    ));

    sections.push(this.formatHistogram(
      'shakemap_upstream_latency_ms',
      this.upstreamLatency,
      'Upstream event feed latency in milliseconds'
    ));

    sections.push(this.formatHistogram(
      'shakemap_cache_lock_wait_ms',
      this.lockWaitTime,
      'Time spent waiting for the cache lock in milliseconds'
    ));

    sections.push(this.formatHistogram(
      'shakemap_request_latency_ms',
      this.totalRequestLatency,
      'Total request latency in milliseconds'
    ));

    sections.push(this.formatScalar('shakemap_cache_hits_total', 'counter', this.cacheHits, 'Total cache hits'));
    sections.push(this.formatScalar('shakemap_cache_misses_total', 'counter', this.cacheMisses, 'Total cache misses'));
    sections.push(this.formatScalar(
      'shakemap_cache_coalesced_hits_total',
      'counter',
      this.coalescedHits,
      'Cache misses served by a computation another request finished'
    ));
    sections.push(this.formatScalar(
      'shakemap_cache_forced_refreshes_total',
      'counter',
      this.forcedRefreshes,
      'Forced cache refreshes'
    ));
    sections.push(this.formatScalar(
      'shakemap_cache_hit_rate',
      'gauge',
      this.getCacheHitRate().toFixed(4),
      'Cache hit rate (0-1)'
    ));

    sections.push(this.formatScalar(
      'shakemap_computations_total',
      'counter',
      this.computeSuccess,
      'Successful overlay computations'
    ));
    sections.push(this.formatScalar(
      'shakemap_computation_failures_total',
      'counter',
      this.computeFailures,
      'Failed overlay computations'
    ));
    sections.push(this.formatScalar(
      'shakemap_simulations_total',
      'counter',
      this.simulations,
      'Simulated events served'
    ));

    // Errors by type
    const errorLines = [
      '# HELP shakemap_errors_total Errors by type',
      '# TYPE shakemap_errors_total counter',
    ];
    for (const [type, count] of this.errorsByType) {
      errorLines.push(`shakemap_errors_total{type="${type}"} ${count}`);
    }
    sections.push(errorLines.join('\n'));

    sections.push(this.formatScalar(
      'shakemap_concurrent_requests',
      'gauge',
      this.activeConcurrentRequests,
      'Current concurrent requests'
    ));
    sections.push(this.formatScalar(
      'shakemap_peak_concurrent_requests',
      'gauge',
      this.peakConcurrentRequests,
      'Peak concurrent requests'
    ));

    return sections.join('\n\n') + '\n';
  }

  // Get summary for JSON endpoint
  toJSON(): MetricsSnapshot {
    return {
      cache: {
        hits: this.cacheHits,
        misses: this.cacheMisses,
        coalesced_hits: this.coalescedHits,
        forced_refreshes: this.forcedRefreshes,
        hit_rate: this.getCacheHitRate(),
      },
      computations: {
        success: this.computeSuccess,
        failures: this.computeFailures,
        latency: this.summarize(this.computeLatency),
      },
      upstream: {
        latency: this.summarize(this.upstreamLatency),
      },
      lock_wait: this.summarize(this.lockWaitTime),
      simulations: this.simulations,
      errors_by_type: Object.fromEntries(this.errorsByType),
      concurrency: {
        current: this.activeConcurrentRequests,
        peak: this.peakConcurrentRequests,
      },
      requests: this.summarize(this.totalRequestLatency),
    };
  }

  // Reset all metrics (for testing)
  reset(): void {
    this.computeLatency = this.createHistogram();
    this.upstreamLatency = this.createHistogram();
    this.lockWaitTime = this.createHistogram();
    this.totalRequestLatency = this.createHistogram();
    this.cacheHits = 0;
    this.cacheMisses = 0;
    this.coalescedHits = 0;
    this.forcedRefreshes = 0;
    this.computeSuccess = 0;
    this.computeFailures = 0;
    this.simulations = 0;
    this.errorsByType.clear();
    this.activeConcurrentRequests = 0;
    this.peakConcurrentRequests = 0;
  }
}

// Singleton instance
export const metrics = new MetricsCollector();

/**
 * Create metrics router
 */
export function createMetricsRouter(): Router {
  const router = Router();

  // Prometheus-compatible metrics endpoint
  router.get('/metrics', (_req: Request, res: Response) => {
    res.set('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(metrics.toPrometheus());
  });

  // JSON metrics endpoint
  router.get('/metrics/json', (_req: Request, res: Response) => {
    res.json(metrics.toJSON());
  });

  return router;
}

/**
 * Middleware to track request metrics
 */
export function metricsMiddleware() {
  return (_req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    metrics.incrementConcurrentRequests();

    res.on('finish', () => {
      metrics.decrementConcurrentRequests();
      metrics.recordRequestLatency(Date.now() - startTime);
    });

    next();
  };
}
