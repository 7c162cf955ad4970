export const MetricType = {
  COUNTER: 'counter',
  HISTOGRAM: 'histogram',
  GAUGE: 'gauge',
} as const;

export type MetricTypeValue = (typeof MetricType)[keyof typeof MetricType];

export type MetricLabels = Record<string, string>;

/**
 * Destination for named counters, histograms and gauges. Implementations
 * must never throw.
 */
export interface MetricsSink {
  incrementCounter(name: string, labels?: MetricLabels, value?: number): void;
  recordHistogram(name: string, value: number, labels?: MetricLabels): void;
  setGauge(name: string, value: number, labels?: MetricLabels): void;
}

export interface MetricsConfig {
  serviceName: string;
  prefix?: string;
  collectDefaultMetrics?: boolean;
}

export const CLIENT_METRICS = {
  REQUESTS_TOTAL: 'requests_total',
  REQUESTS_SUCCESS: 'requests_success',
  REQUESTS_FAILED: 'requests_failed',
  CIRCUIT_OPENS: 'circuit_opens',
  CACHE_HITS: 'cache_hits',
  CACHE_MISSES: 'cache_misses',
  RETRIES_TOTAL: 'retries_total',
  REQUEST_DURATION: 'request_duration_seconds',
  CIRCUIT_STATE: 'circuit_state',
} as const;

export interface MetricsCounters {
  requestsTotal: number;
  requestsSuccess: number;
  requestsFailed: number;
  circuitOpens: number;
  cacheHits: number;
  cacheMisses: number;
  retriesTotal: number;
}

export interface MetricsSnapshot extends MetricsCounters {
  latencyP50?: number;
  latencyP95?: number;
  latencyP99?: number;
  latencyAvg?: number;
  successRate?: number;
  errorRate?: number;
  cacheHitRate?: number;
}
