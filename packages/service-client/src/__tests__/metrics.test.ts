import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ClientMetrics } from '../metrics/client-metrics.js';
import { LatencyWindow } from '../metrics/latency-window.js';
import { PrometheusMetrics } from '../metrics/prometheus-metrics.js';
import { CLIENT_METRICS, type MetricsSink } from '../metrics/types.js';

function fakeSink() {
  return {
    incrementCounter: vi.fn<MetricsSink['incrementCounter']>(),
    recordHistogram: vi.fn<MetricsSink['recordHistogram']>(),
    setGauge: vi.fn<MetricsSink['setGauge']>(),
  };
}

describe('LatencyWindow', () => {
  it('keeps samples in arrival order until full', () => {
    const window = new LatencyWindow(3);
    window.push(1);
    window.push(2);
    expect(window.values()).toEqual([1, 2]);
    expect(window.size).toBe(2);
  });

  it('evicts the oldest sample once full', () => {
    const window = new LatencyWindow(3);
    [1, 2, 3, 4, 5].forEach(v => window.push(v));
    expect(window.values()).toEqual([3, 4, 5]);
    expect(window.size).toBe(3);
  });

  it('empties on clear', () => {
    const window = new LatencyWindow(2);
    [1, 2, 3].forEach(v => window.push(v));
    window.clear();
    window.push(9);
    expect(window.values()).toEqual([9]);
  });
});

describe('ClientMetrics', () => {
  let metrics: ClientMetrics;

  beforeEach(() => {
    metrics = new ClientMetrics('orders-service');
  });

  it('reports only counters before any traffic', () => {
    expect(metrics.getSnapshot()).toEqual({
      requestsTotal: 0,
      requestsSuccess: 0,
      requestsFailed: 0,
      circuitOpens: 0,
      cacheHits: 0,
      cacheMisses: 0,
      retriesTotal: 0,
    });
  });

  it('computes percentiles from the sorted latency window', () => {
    for (const latency of [10, 9, 8, 7, 6, 5, 4, 3, 2, 1]) {
      metrics.recordRequest('billing-service', '/items', 'GET');
      metrics.recordSuccess('billing-service', '/items', latency, 'GET');
    }

    const snapshot = metrics.getSnapshot();
    expect(snapshot.latencyP50).toBe(6);
    expect(snapshot.latencyP95).toBe(10);
    expect(snapshot.latencyP99).toBe(10);
    expect(snapshot.latencyAvg).toBe(5.5);
    expect(snapshot.successRate).toBe(1);
    expect(snapshot.errorRate).toBe(0);
  });

  it('only keeps the most recent 1000 latencies', () => {
    metrics.recordSuccess('billing-service', '/items', 1000, 'GET');
    for (let i = 0; i < 1000; i++) {
      metrics.recordSuccess('billing-service', '/items', 1, 'GET');
    }
    expect(metrics.getSnapshot().latencyP99).toBe(1);
  });

  it('derives rates from the counters', () => {
    for (let i = 0; i < 4; i++) metrics.recordRequest('billing-service', '/items', 'GET');
    metrics.recordSuccess('billing-service', '/items', 0.1, 'GET');
    metrics.recordFailure('billing-service', '/items', 'ServiceUnavailableError', 'GET');
    metrics.recordCacheHit('billing-service');
    metrics.recordCacheHit('billing-service');
    metrics.recordCacheHit('billing-service');
    metrics.recordCacheMiss('billing-service');

    const snapshot = metrics.getSnapshot();
    expect(snapshot.successRate).toBe(0.25);
    expect(snapshot.errorRate).toBe(0.25);
    expect(snapshot.cacheHitRate).toBe(0.75);
  });

  it('starts over after reset', () => {
    metrics.recordRequest('billing-service', '/items', 'GET');
    metrics.recordSuccess('billing-service', '/items', 0.1, 'GET');
    metrics.recordRetry('billing-service');
    metrics.recordCircuitOpen('billing-service-circuit');

    metrics.reset();

    const snapshot = metrics.getSnapshot();
    expect(snapshot.requestsTotal).toBe(0);
    expect(snapshot.retriesTotal).toBe(0);
    expect(snapshot.circuitOpens).toBe(0);
    expect(snapshot.latencyP50).toBeUndefined();
  });

  it('forwards labeled observations to the sink', () => {
    const sink = fakeSink();
    const forwarding = new ClientMetrics('orders-service', sink);

    forwarding.recordSuccess('billing-service', '/items', 0.2, 'GET');
    forwarding.recordFailure('billing-service', '/items', 'RequestTimeoutError', 'POST');
    forwarding.recordCircuitState('billing-service-circuit', 1);

    expect(sink.incrementCounter).toHaveBeenCalledWith(CLIENT_METRICS.REQUESTS_SUCCESS, {
      target: 'billing-service',
      endpoint: '/items',
      method: 'GET',
    });
    expect(sink.recordHistogram).toHaveBeenCalledWith(CLIENT_METRICS.REQUEST_DURATION, 0.2, {
      target: 'billing-service',
      method: 'GET',
    });
    expect(sink.incrementCounter).toHaveBeenCalledWith(CLIENT_METRICS.REQUESTS_FAILED, {
      target: 'billing-service',
      endpoint: '/items',
      method: 'POST',
      status: 'RequestTimeoutError',
    });
    expect(sink.setGauge).toHaveBeenCalledWith(CLIENT_METRICS.CIRCUIT_STATE, 1, {
      circuit: 'billing-service-circuit',
    });
  });
});

describe('PrometheusMetrics', () => {
  let prometheus: PrometheusMetrics;

  beforeEach(() => {
    prometheus = new PrometheusMetrics({ serviceName: 'orders-service', collectDefaultMetrics: false });
  });

  it('exposes counters under the service prefix with the service label', async () => {
    const labels = { target: 'billing-service', endpoint: '/items', method: 'GET' };
    prometheus.incrementCounter(CLIENT_METRICS.REQUESTS_TOTAL, labels);
    prometheus.incrementCounter(CLIENT_METRICS.REQUESTS_TOTAL, labels);

    const text = await prometheus.exportPrometheusFormat();
    expect(text).toContain('# HELP meshline_orders_service_requests_total Outbound calls started');
    expect(text).toContain('# TYPE meshline_orders_service_requests_total counter');
    expect(text).toContain(
      'meshline_orders_service_requests_total{target="billing-service",endpoint="/items",method="GET",service="orders-service"} 2'
    );
  });

  it('fills missing labels with empty values', async () => {
    prometheus.incrementCounter(CLIENT_METRICS.REQUESTS_TOTAL, { target: 'billing-service', extra: 'dropped' });

    const text = await prometheus.exportPrometheusFormat();
    expect(text).toContain(
      'meshline_orders_service_requests_total{target="billing-service",endpoint="",method="",service="orders-service"} 1'
    );
  });

  it('skips observations whose type conflicts with the registered metric', async () => {
    prometheus.incrementCounter(CLIENT_METRICS.RETRIES_TOTAL, { target: 'billing-service' });
    prometheus.setGauge(CLIENT_METRICS.RETRIES_TOTAL, 9, { target: 'billing-service' });

    const text = await prometheus.exportPrometheusFormat();
    expect(text).toContain('meshline_orders_service_retries_total{target="billing-service",service="orders-service"} 1');
  });

  it('records gauges and histograms', async () => {
    prometheus.setGauge(CLIENT_METRICS.CIRCUIT_STATE, 2, { circuit: 'billing-service-circuit' });
    prometheus.recordHistogram(CLIENT_METRICS.REQUEST_DURATION, 0.05, { target: 'billing-service', method: 'GET' });

    const text = await prometheus.exportPrometheusFormat();
    expect(text).toContain(
      'meshline_orders_service_circuit_state{circuit="billing-service-circuit",service="orders-service"} 2'
    );
    expect(text).toContain('# TYPE meshline_orders_service_request_duration_seconds histogram');
  });

  it('ignores non-finite values', async () => {
    prometheus.setGauge(CLIENT_METRICS.CIRCUIT_STATE, Number.NaN);
    expect(prometheus.getRegistry().getSingleMetric('meshline_orders_service_circuit_state')).toBeUndefined();
  });

  it('zeroes values on reset', async () => {
    prometheus.incrementCounter(CLIENT_METRICS.RETRIES_TOTAL, { target: 'billing-service' });
    prometheus.reset();

    const text = await prometheus.exportPrometheusFormat();
    expect(text).not.toContain('meshline_orders_service_retries_total{target="billing-service"');
  });
});
