export * from './ServiceClient.js';
