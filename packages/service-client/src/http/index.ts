/**
 * HTTP Module
 */

export * from './types.js';
export * from './gateway-transport.js';
export * from './gateway-status.js';
export * from './gateway-errors.js';
export * from './response-validation.js';
