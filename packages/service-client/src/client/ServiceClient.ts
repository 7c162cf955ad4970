/**
 * Service Client
 *
 * Calls other services through the API gateway. Each call passes the target's
 * circuit breaker, then the response cache (GET only), then the retry engine
 * around a single gateway request; the outcome is fed back to the breaker,
 * the metrics and the cache. A failed GET falls back to a cached response
 * when one exists.
 *
 * @example
 * const client = createServiceClient({
 *   gatewayUrl: 'http://gateway:8080',
 *   serviceName: 'orders-service',
 *   serviceToken: process.env.SERVICE_TOKEN,
 * });
 * const invoice = await client.get('billing-service', '/invoices/42');
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { getLogger } from '../logging/logger.js';
import { generateRequestId, runWithContext } from '../logging/correlation.js';
import { serializeError } from '../logging/error-serializer.js';
import {
  parseServiceClientConfig,
  type CircuitBreakerConfig,
  type ServiceClientConfig,
  type ServiceClientConfigInput,
} from '../config/client-config.js';
import {
  CircuitOpenError,
  DomainErrorCode,
  InvalidConfigurationError,
  RequestCancelledError,
  RequestTimeoutError,
  ServiceClientError,
  ServiceUnavailableError,
  toError,
} from '../error-handling/errors.js';
import { CircuitBreaker } from '../resilience/circuit-breaker.js';
import { RetryHandler } from '../resilience/retry-handler.js';
import { CIRCUIT_STATE_GAUGE, type CircuitBreakerStats, type CircuitStateValue } from '../resilience/types.js';
import { ResponseCache, createCacheStore } from '../cache/ResponseCache.js';
import type { CacheStats, CacheStore, QueryParams } from '../cache/types.js';
import { ClientMetrics } from '../metrics/client-metrics.js';
import { PrometheusMetrics } from '../metrics/prometheus-metrics.js';
import type { MetricsSink, MetricsSnapshot } from '../metrics/types.js';
import { AxiosGatewayTransport } from '../http/gateway-transport.js';
import { checkGatewayHealth, createGatewayCircuitStatusQuery, trimBaseUrl } from '../http/gateway-status.js';
import { decodeBody, parseClientErrorResponse, serverErrorResponse } from '../http/gateway-errors.js';
import { parseServiceResponse } from '../http/response-validation.js';
import {
  TransportError,
  isHttpMethod,
  type GatewayResponse,
  type GatewayTransport,
  type HttpMethod,
} from '../http/types.js';

const logger = getLogger('service-client');

export interface CallOptions {
  method?: HttpMethod | Lowercase<HttpMethod>;
  data?: unknown;
  params?: QueryParams;
  headers?: Record<string, string>;
  /** Bounds a single gateway request, not the whole retry loop. */
  timeoutMs?: number;
  useCache?: boolean;
  useCircuitBreaker?: boolean;
  useRetry?: boolean;
}

export interface ValidatedCallOptions<T> extends CallOptions {
  schema: ZodType<T, ZodTypeDef, unknown>;
}

export interface BatchRequest extends CallOptions {
  targetService: string;
  endpoint: string;
}

export interface ServiceClientDependencies {
  transport?: GatewayTransport;
  /** `null` disables caching regardless of configuration. */
  cacheStore?: CacheStore | null;
  metricsSink?: MetricsSink;
}

interface AttemptRequest {
  targetService: string;
  endpoint: string;
  method: HttpMethod;
  data: unknown;
  params: QueryParams;
  headers: Record<string, string>;
  timeoutMs: number;
  requestId: string;
  signal: AbortSignal;
}

function normalizeMethod(method: string = 'GET'): HttpMethod {
  const upper = method.toUpperCase();
  if (!isHttpMethod(upper)) {
    throw new InvalidConfigurationError('method', method, `Unsupported HTTP method: ${method}`);
  }
  return upper;
}

function normalizeEndpoint(endpoint: string): string {
  return endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
}

function elapsedSeconds(start: bigint): number {
  return Number(process.hrtime.bigint() - start) / 1e9;
}

function isSuccess(response: GatewayResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

function isClientError(response: GatewayResponse): boolean {
  return response.status >= 400 && response.status < 500;
}

export class ServiceClient {
  readonly config: ServiceClientConfig;

  private readonly transport: GatewayTransport;
  private readonly retryHandler: RetryHandler;
  private readonly cache: ResponseCache;
  private readonly metrics: ClientMetrics;
  private readonly prometheus?: PrometheusMetrics;

  private readonly circuitBreakers = new Map<string, CircuitBreaker>();
  private readonly activeRequests = new Map<string, AbortController>();

  private gatewayAvailable = true;
  private healthCheckTimer: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(config: ServiceClientConfigInput, deps: ServiceClientDependencies = {}) {
    this.config = parseServiceClientConfig(config);

    this.transport = deps.transport ?? new AxiosGatewayTransport();
    this.retryHandler = new RetryHandler(this.config.retry);

    const store = deps.cacheStore === undefined ? createCacheStore(this.config.cache, this.config.serviceName) : deps.cacheStore;
    this.cache = new ResponseCache(this.config.cache, store);

    const sink = deps.metricsSink ?? new PrometheusMetrics({ serviceName: this.config.serviceName });
    this.prometheus = sink instanceof PrometheusMetrics ? sink : undefined;
    this.metrics = new ClientMetrics(this.config.serviceName, sink);

    this.retryHandler.onRetry(event => this.metrics.recordRetry(event.operationName));
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  start(): void {
    const interval = this.config.gatewayHealthCheckIntervalMs;
    if (!interval || this.healthCheckTimer) return;

    this.healthCheckTimer = setInterval(() => {
      this.checkGatewayHealth().catch(error =>
        logger.warn('Gateway health check failed', { error: serializeError(error).message })
      );
    }, interval);
    this.healthCheckTimer.unref();
  }

  /**
   * Aborts every in-flight request and releases the transport and cache
   * store. Aborted calls reject with `RequestCancelledError`.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.healthCheckTimer) {
      clearInterval(this.healthCheckTimer);
      this.healthCheckTimer = null;
    }

    for (const controller of this.activeRequests.values()) {
      controller.abort();
    }
    this.activeRequests.clear();

    this.transport.close?.();
    await this.cache.close();
    logger.info('Service client closed', { serviceName: this.config.serviceName });
  }

  // ---------------------------------------------------------------------------
  // Calls
  // ---------------------------------------------------------------------------

  call<T>(targetService: string, endpoint: string, options: ValidatedCallOptions<T>): Promise<T>;
  call(targetService: string, endpoint: string, options?: CallOptions): Promise<unknown>;
  async call<T>(
    targetService: string,
    endpoint: string,
    options: CallOptions | ValidatedCallOptions<T> = {}
  ): Promise<unknown> {
    const body = await this.execute(targetService, endpoint, options);
    if ('schema' in options) {
      return parseServiceResponse(options.schema, body, targetService, endpoint);
    }
    return body;
  }

  get(targetService: string, endpoint: string, params?: QueryParams, options: CallOptions = {}): Promise<unknown> {
    return this.call(targetService, endpoint, { ...options, method: 'GET', params });
  }

  post(targetService: string, endpoint: string, data?: unknown, options: CallOptions = {}): Promise<unknown> {
    return this.call(targetService, endpoint, { ...options, method: 'POST', data });
  }

  put(targetService: string, endpoint: string, data?: unknown, options: CallOptions = {}): Promise<unknown> {
    return this.call(targetService, endpoint, { ...options, method: 'PUT', data });
  }

  patch(targetService: string, endpoint: string, data?: unknown, options: CallOptions = {}): Promise<unknown> {
    return this.call(targetService, endpoint, { ...options, method: 'PATCH', data });
  }

  delete(targetService: string, endpoint: string, options: CallOptions = {}): Promise<unknown> {
    return this.call(targetService, endpoint, { ...options, method: 'DELETE' });
  }

  /**
   * Runs every request concurrently. The result array follows input order;
   * a failed request leaves its `Error` in its slot instead of rejecting.
   */
  async batchCall(requests: BatchRequest[]): Promise<unknown[]> {
    const settled = await Promise.allSettled(
      requests.map(({ targetService, endpoint, ...options }) => this.call(targetService, endpoint, options))
    );
    return settled.map(result => (result.status === 'fulfilled' ? result.value : toError(result.reason)));
  }

  private async execute(targetService: string, endpoint: string, options: CallOptions): Promise<unknown> {
    const method = normalizeMethod(options.method);
    const params = options.params ?? {};
    const useCircuitBreaker = options.useCircuitBreaker ?? true;
    const useRetry = options.useRetry ?? true;
    const cacheable = (options.useCache ?? true) && method === 'GET';

    const requestId = generateRequestId();
    const startTime = process.hrtime.bigint();

    return runWithContext({ requestId, targetService, endpoint, method }, async () => {
      this.metrics.recordRequest(targetService, endpoint, method);

      if (this.closed) {
        throw new ServiceClientError('Service client is closed', 503, DomainErrorCode.SERVICE_UNAVAILABLE);
      }

      // Must be registered before the first await; close() aborts calls still in the breaker or cache checks.
      const controller = new AbortController();
      this.activeRequests.set(requestId, controller);
      const throwIfCancelled = () => {
        if (controller.signal.aborted) {
          throw new RequestCancelledError(targetService, normalizeEndpoint(endpoint));
        }
      };

      try {
        const breaker = useCircuitBreaker ? this.getCircuitBreaker(targetService) : null;
        if (breaker) {
          const allowed = await breaker.canExecute();
          throwIfCancelled();
          if (!allowed) {
            this.metrics.recordCircuitOpen(breaker.name);
            throw new CircuitOpenError(targetService, breaker.name);
          }
        }

        if (cacheable) {
          const cached = await this.cache.get(targetService, endpoint, method, params);
          throwIfCancelled();
          if (cached.hit) {
            this.metrics.recordCacheHit(targetService);
            return cached.value;
          }
          this.metrics.recordCacheMiss(targetService);
        }

        const attempt = () =>
          this.executeRequest({
            targetService,
            endpoint,
            method,
            data: options.data,
            params,
            headers: options.headers ?? {},
            timeoutMs: options.timeoutMs ?? this.config.serviceTimeouts[targetService] ?? this.config.gatewayTimeoutMs,
            requestId,
            signal: controller.signal,
          });

        try {
          const response = useRetry
            ? await this.retryHandler.executeWithRetry(attempt, targetService, { endpoint, signal: controller.signal })
            : await attempt();

          await breaker?.recordSuccess();
          this.metrics.recordSuccess(targetService, endpoint, elapsedSeconds(startTime), method);
          if (cacheable && !controller.signal.aborted) {
            await this.cache.set(targetService, endpoint, method, params, response);
          }
          return response;
        } catch (error) {
          if (error instanceof RequestCancelledError) {
            throw error;
          }

          const failure = toError(error);
          this.metrics.recordFailure(targetService, endpoint, failure.name, method);
          await breaker?.recordFailure();

          if (cacheable && !controller.signal.aborted) {
            const fallback = await this.cache.get(targetService, endpoint, method, params);
            if (fallback.hit) {
              logger.warn('Returning cached response due to error', {
                targetService,
                endpoint,
                error: failure.message,
              });
              return fallback.value;
            }
          }
          throw error;
        }
      } finally {
        this.activeRequests.delete(requestId);
      }
    });
  }

  /**
   * One request through the gateway, without retries.
   */
  private async executeRequest(request: AttemptRequest): Promise<unknown> {
    const path = normalizeEndpoint(request.endpoint);
    const url = `${trimBaseUrl(this.config.gatewayUrl)}/gateway/${request.targetService}${path}`;

    if (!this.isGatewayAvailable()) {
      throw new ServiceUnavailableError('gateway', 'API Gateway is unavailable');
    }

    const headers: Record<string, string> = {
      'X-Service-Name': this.config.serviceName,
      'X-Service-Token': this.config.serviceToken,
      'X-Request-ID': request.requestId,
      'Content-Type': 'application/json',
      ...request.headers,
    };

    let response: GatewayResponse;
    try {
      response = await this.transport.send({
        method: request.method,
        url,
        headers,
        params: Object.keys(request.params).length > 0 ? request.params : undefined,
        data: request.data,
        timeoutMs: request.timeoutMs,
        signal: request.signal,
      });
    } catch (error) {
      throw this.mapTransportError(error, request, path);
    }

    if (isSuccess(response)) {
      return decodeBody(response.body);
    }
    if (isClientError(response)) {
      throw parseClientErrorResponse(response);
    }
    throw serverErrorResponse(request.targetService, response);
  }

  private mapTransportError(error: unknown, request: AttemptRequest, path: string): unknown {
    if (request.signal.aborted) {
      return new RequestCancelledError(request.targetService, path);
    }
    if (!(error instanceof TransportError)) {
      return error;
    }
    switch (error.kind) {
      case 'cancelled':
        return new RequestCancelledError(request.targetService, path);
      case 'timeout':
        return new RequestTimeoutError(request.targetService, path, request.timeoutMs, error);
      case 'network':
        return new ServiceUnavailableError(request.targetService, error.message, 503, error);
    }
  }

  // ---------------------------------------------------------------------------
  // Circuit breakers
  // ---------------------------------------------------------------------------

  private resolveCircuitConfig(targetService: string): CircuitBreakerConfig {
    const base = this.config.circuitBreaker;
    const override = this.config.circuitBreakers[targetService] ?? {};
    return {
      failureThreshold: override.failureThreshold ?? base.failureThreshold,
      recoveryTimeoutMs: override.recoveryTimeoutMs ?? base.recoveryTimeoutMs,
      successThreshold: override.successThreshold ?? base.successThreshold,
      gatewaySyncIntervalMs: override.gatewaySyncIntervalMs ?? base.gatewaySyncIntervalMs,
      gatewaySyncTimeoutMs: override.gatewaySyncTimeoutMs ?? base.gatewaySyncTimeoutMs,
    };
  }

  private getCircuitBreaker(targetService: string): CircuitBreaker {
    let breaker = this.circuitBreakers.get(targetService);
    if (breaker) return breaker;

    const circuitConfig = this.resolveCircuitConfig(targetService);
    breaker = new CircuitBreaker(
      `${targetService}-circuit`,
      circuitConfig,
      createGatewayCircuitStatusQuery(
        this.transport,
        this.config.gatewayUrl,
        this.config.serviceToken,
        circuitConfig.gatewaySyncTimeoutMs
      )
    );
    breaker.onStateChange(event => this.metrics.recordCircuitState(event.name, CIRCUIT_STATE_GAUGE[event.to]));
    this.metrics.recordCircuitState(breaker.name, CIRCUIT_STATE_GAUGE[breaker.getState()]);
    this.circuitBreakers.set(targetService, breaker);
    return breaker;
  }

  getCircuitState(targetService: string): CircuitStateValue {
    return this.getCircuitBreaker(targetService).getState();
  }

  getCircuitStats(): CircuitBreakerStats[] {
    return Array.from(this.circuitBreakers.values()).map(breaker => breaker.getStats());
  }

  async resetCircuit(targetService: string): Promise<void> {
    await this.getCircuitBreaker(targetService).reset();
  }

  // ---------------------------------------------------------------------------
  // Cache, metrics, gateway liveness
  // ---------------------------------------------------------------------------

  async clearCache(targetService?: string): Promise<void> {
    await this.cache.clear(targetService);
  }

  getCacheStats(): Promise<CacheStats> {
    return this.cache.getStats();
  }

  getMetrics(): MetricsSnapshot {
    return this.metrics.getSnapshot();
  }

  resetMetrics(): void {
    this.metrics.reset();
    this.prometheus?.reset();
  }

  /** Prometheus exposition text, or an empty string with a custom sink. */
  async exportMetrics(): Promise<string> {
    return this.prometheus ? this.prometheus.exportPrometheusFormat() : '';
  }

  isGatewayAvailable(): boolean {
    return this.gatewayAvailable;
  }

  setGatewayAvailable(available: boolean): void {
    if (available !== this.gatewayAvailable) {
      logger.warn(available ? 'API gateway marked available' : 'API gateway marked unavailable', {
        gatewayUrl: this.config.gatewayUrl,
      });
    }
    this.gatewayAvailable = available;
  }

  async checkGatewayHealth(): Promise<boolean> {
    const healthy = await checkGatewayHealth(this.transport, this.config.gatewayUrl);
    this.setGatewayAvailable(healthy);
    return healthy;
  }
}

export function createServiceClient(
  config: ServiceClientConfigInput,
  deps: ServiceClientDependencies = {}
): ServiceClient {
  return new ServiceClient(config, deps);
}
