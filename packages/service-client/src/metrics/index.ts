export * from './types.js';
export * from './latency-window.js';
export * from './client-metrics.js';
export * from './prometheus-metrics.js';
