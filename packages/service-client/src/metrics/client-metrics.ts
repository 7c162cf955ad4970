/**
 * Client Metrics
 *
 * Per-client registry of call outcomes. Keeps an in-process snapshot
 * (counters plus a bounded latency window for percentiles) and forwards every
 * observation, labeled, to a metrics sink.
 */

import { LatencyWindow } from './latency-window.js';
import {
  CLIENT_METRICS,
  type MetricsCounters,
  type MetricsSink,
  type MetricsSnapshot,
} from './types.js';

const LATENCY_WINDOW_SIZE = 1000;

function emptyCounters(): MetricsCounters {
  return {
    requestsTotal: 0,
    requestsSuccess: 0,
    requestsFailed: 0,
    circuitOpens: 0,
    cacheHits: 0,
    cacheMisses: 0,
    retriesTotal: 0,
  };
}

export class ClientMetrics {
  private counters: MetricsCounters = emptyCounters();
  private readonly latencies = new LatencyWindow(LATENCY_WINDOW_SIZE);

  constructor(
    readonly serviceName: string,
    private readonly sink?: MetricsSink
  ) {}

  recordRequest(targetService: string, endpoint: string, method: string): void {
    this.counters.requestsTotal++;
    this.sink?.incrementCounter(CLIENT_METRICS.REQUESTS_TOTAL, { target: targetService, endpoint, method });
  }

  /** `latency` is in seconds. */
  recordSuccess(targetService: string, endpoint: string, latency: number, method: string): void {
    this.counters.requestsSuccess++;
    this.latencies.push(latency);
    this.sink?.incrementCounter(CLIENT_METRICS.REQUESTS_SUCCESS, { target: targetService, endpoint, method });
    this.sink?.recordHistogram(CLIENT_METRICS.REQUEST_DURATION, latency, { target: targetService, method });
  }

  recordFailure(targetService: string, endpoint: string, errorType: string, method: string): void {
    this.counters.requestsFailed++;
    this.sink?.incrementCounter(CLIENT_METRICS.REQUESTS_FAILED, {
      target: targetService,
      endpoint,
      method,
      status: errorType,
    });
  }

  recordCircuitOpen(circuitName: string): void {
    this.counters.circuitOpens++;
    this.sink?.incrementCounter(CLIENT_METRICS.CIRCUIT_OPENS, { circuit: circuitName });
  }

  recordCacheHit(targetService: string): void {
    this.counters.cacheHits++;
    this.sink?.incrementCounter(CLIENT_METRICS.CACHE_HITS, { target: targetService });
  }

  recordCacheMiss(targetService: string): void {
    this.counters.cacheMisses++;
    this.sink?.incrementCounter(CLIENT_METRICS.CACHE_MISSES, { target: targetService });
  }

  recordRetry(targetService: string): void {
    this.counters.retriesTotal++;
    this.sink?.incrementCounter(CLIENT_METRICS.RETRIES_TOTAL, { target: targetService });
  }

  recordCircuitState(circuitName: string, gaugeValue: number): void {
    this.sink?.setGauge(CLIENT_METRICS.CIRCUIT_STATE, gaugeValue, { circuit: circuitName });
  }

  getSnapshot(): MetricsSnapshot {
    const snapshot: MetricsSnapshot = { ...this.counters };
    const sorted = this.latencies.values().sort((a, b) => a - b);

    if (sorted.length > 0) {
      const at = (p: number) => sorted[Math.floor(sorted.length * p)];
      snapshot.latencyP50 = at(0.5);
      snapshot.latencyP95 = at(0.95);
      snapshot.latencyP99 = at(0.99);
      snapshot.latencyAvg = sorted.reduce((sum, v) => sum + v, 0) / sorted.length;
    }

    if (this.counters.requestsTotal > 0) {
      snapshot.successRate = this.counters.requestsSuccess / this.counters.requestsTotal;
      snapshot.errorRate = this.counters.requestsFailed / this.counters.requestsTotal;
    }

    const lookups = this.counters.cacheHits + this.counters.cacheMisses;
    if (lookups > 0) {
      snapshot.cacheHitRate = this.counters.cacheHits / lookups;
    }

    return snapshot;
  }

  reset(): void {
    this.counters = emptyCounters();
    this.latencies.clear();
  }
}
