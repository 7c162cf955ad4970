import client from 'prom-client';
import { getLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';
import {
  CLIENT_METRICS,
  MetricType,
  type MetricLabels,
  type MetricTypeValue,
  type MetricsConfig,
  type MetricsSink,
} from './types.js';

const logger = getLogger('prometheus-metrics');

const LATENCY_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30];

interface InstrumentSpec {
  type: MetricTypeValue;
  help: string;
  labelNames: string[];
}

/**
 * Instruments reported by the service client. Names outside this table are
 * still accepted; their label set is taken from the first observation.
 */
const CLIENT_INSTRUMENTS: Record<string, InstrumentSpec> = {
  [CLIENT_METRICS.REQUESTS_TOTAL]: {
    type: MetricType.COUNTER,
    help: 'Outbound calls started',
    labelNames: ['target', 'endpoint', 'method'],
  },
  [CLIENT_METRICS.REQUESTS_SUCCESS]: {
    type: MetricType.COUNTER,
    help: 'Outbound calls answered with a usable response',
    labelNames: ['target', 'endpoint', 'method'],
  },
  [CLIENT_METRICS.REQUESTS_FAILED]: {
    type: MetricType.COUNTER,
    help: 'Outbound calls that ended in an error, by error type',
    labelNames: ['target', 'endpoint', 'method', 'status'],
  },
  [CLIENT_METRICS.CIRCUIT_OPENS]: {
    type: MetricType.COUNTER,
    help: 'Calls rejected by an open circuit',
    labelNames: ['circuit'],
  },
  [CLIENT_METRICS.CACHE_HITS]: { type: MetricType.COUNTER, help: 'Response cache hits', labelNames: ['target'] },
  [CLIENT_METRICS.CACHE_MISSES]: { type: MetricType.COUNTER, help: 'Response cache misses', labelNames: ['target'] },
  [CLIENT_METRICS.RETRIES_TOTAL]: { type: MetricType.COUNTER, help: 'Retried attempts', labelNames: ['target'] },
  [CLIENT_METRICS.REQUEST_DURATION]: {
    type: MetricType.HISTOGRAM,
    help: 'Latency of successful outbound calls in seconds',
    labelNames: ['target', 'method'],
  },
  [CLIENT_METRICS.CIRCUIT_STATE]: {
    type: MetricType.GAUGE,
    help: 'Circuit state (0 closed, 1 open, 2 half-open)',
    labelNames: ['circuit'],
  },
};

type Instrument =
  | { type: typeof MetricType.COUNTER; metric: client.Counter<string>; labelNames: string[] }
  | { type: typeof MetricType.HISTOGRAM; metric: client.Histogram<string>; labelNames: string[] }
  | { type: typeof MetricType.GAUGE; metric: client.Gauge<string>; labelNames: string[] };

/**
 * prom-client sink with its own registry. Every series carries a `service`
 * label and is named `<prefix>_<service>_<metric>`.
 */
export class PrometheusMetrics implements MetricsSink {
  private readonly prefix: string;
  private readonly registry = new client.Registry();
  private readonly instruments = new Map<string, Instrument>();

  constructor(config: MetricsConfig) {
    this.prefix = `${config.prefix ?? 'meshline'}_${config.serviceName.replace(/[^a-zA-Z0-9_]/g, '_')}`;
    this.registry.setDefaultLabels({ service: config.serviceName });

    if (config.collectDefaultMetrics ?? process.env.NODE_ENV === 'production') {
      client.collectDefaultMetrics({ register: this.registry });
    }
  }

  private create(type: MetricTypeValue, name: string, labels: MetricLabels): Instrument {
    const spec = CLIENT_INSTRUMENTS[name];
    const labelNames = spec?.labelNames ?? Object.keys(labels).sort();
    const options = {
      name: `${this.prefix}_${name}`,
      help: spec?.help ?? `${name} ${type}`,
      labelNames,
      registers: [this.registry],
    };

    switch (type) {
      case MetricType.COUNTER:
        return { type, metric: new client.Counter(options), labelNames };
      case MetricType.HISTOGRAM:
        return { type, metric: new client.Histogram({ ...options, buckets: LATENCY_BUCKETS }), labelNames };
      case MetricType.GAUGE:
        return { type, metric: new client.Gauge(options), labelNames };
    }
  }

  private instrument(type: MetricTypeValue, name: string, labels: MetricLabels): Instrument | undefined {
    let instrument = this.instruments.get(name);
    if (!instrument) {
      instrument = this.create(type, name, labels);
      this.instruments.set(name, instrument);
    }
    if (instrument.type !== type) {
      logger.debug('Metric observed with a conflicting type', { name, registered: instrument.type, observed: type });
      return undefined;
    }
    return instrument;
  }

  // Unknown label keys are dropped, missing ones recorded as empty.
  private labelValues(labelNames: string[], labels: MetricLabels): MetricLabels {
    const values: MetricLabels = {};
    for (const key of labelNames) {
      values[key] = labels[key] ?? '';
    }
    return values;
  }

  private observe(type: MetricTypeValue, name: string, value: number, labels: MetricLabels = {}): void {
    if (!Number.isFinite(value)) return;
    try {
      const instrument = this.instrument(type, name, labels);
      if (!instrument) return;
      const values = this.labelValues(instrument.labelNames, labels);
      switch (instrument.type) {
        case MetricType.COUNTER:
          instrument.metric.inc(values, value);
          break;
        case MetricType.HISTOGRAM:
          instrument.metric.observe(values, value);
          break;
        case MetricType.GAUGE:
          instrument.metric.set(values, value);
          break;
      }
    } catch (error) {
      logger.debug('Metric observation dropped', { name, error: serializeError(error).message });
    }
  }

  incrementCounter(name: string, labels?: MetricLabels, value: number = 1): void {
    this.observe(MetricType.COUNTER, name, value, labels);
  }

  recordHistogram(name: string, value: number, labels?: MetricLabels): void {
    this.observe(MetricType.HISTOGRAM, name, value, labels);
  }

  setGauge(name: string, value: number, labels?: MetricLabels): void {
    this.observe(MetricType.GAUGE, name, value, labels);
  }

  async exportPrometheusFormat(): Promise<string> {
    return this.registry.metrics();
  }

  getRegistry(): client.Registry {
    return this.registry;
  }

  reset(): void {
    this.registry.resetMetrics();
  }
}
