/**
 * Meshline Service Client
 *
 * Resilient service-to-service calls through the API gateway:
 * - Per-target circuit breakers reconciled with the gateway's breaker view
 * - Backoff retries with jitter
 * - GET response caching with stale fallback
 * - Prometheus metrics and correlated structured logging
 */

export * from './client/index.js';
export * from './config/index.js';
export * from './error-handling/index.js';
export * from './http/index.js';
export * from './logging/index.js';
export * from './metrics/index.js';
export * from './resilience/index.js';
export * from './cache/index.js';
