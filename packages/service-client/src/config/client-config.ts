/**
 * Service Client Configuration
 *
 * Zod schemas for the client configuration. Every nested section has
 * defaults, so `parseServiceClientConfig({ gatewayUrl, serviceName, serviceToken })`
 * yields a complete configuration.
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '../error-handling/errors.js';

export const BackoffStrategy = {
  EXPONENTIAL: 'exponential',
  LINEAR: 'linear',
  CONSTANT: 'constant',
} as const;

export type BackoffStrategyValue = (typeof BackoffStrategy)[keyof typeof BackoffStrategy];

export const circuitBreakerConfigSchema = z
  .object({
    failureThreshold: z.number().int().min(1).default(3),
    recoveryTimeoutMs: z.number().int().min(0).default(30000),
    successThreshold: z.number().int().min(1).default(2),
    gatewaySyncIntervalMs: z.number().int().min(0).default(10000),
    gatewaySyncTimeoutMs: z.number().int().min(1).default(2000),
  })
  .strict();

export const retryConfigSchema = z
  .object({
    maxAttempts: z.number().int().min(1).default(5),
    backoffStrategy: z
      .enum([BackoffStrategy.EXPONENTIAL, BackoffStrategy.LINEAR, BackoffStrategy.CONSTANT])
      .default(BackoffStrategy.EXPONENTIAL),
    initialDelayMs: z.number().positive().default(1000),
    maxDelayMs: z.number().positive().default(10000),
  })
  .strict()
  .refine(retry => retry.maxDelayMs >= retry.initialDelayMs, {
    message: 'maxDelayMs must be greater than or equal to initialDelayMs',
    path: ['maxDelayMs'],
  });

export const cacheConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    ttlSeconds: z.number().int().min(1).default(60),
    redisUrl: z.string().url().optional(),
    keyPrefix: z.string().default(''),
    maxEntries: z.number().int().min(1).default(1000),
  })
  .strict();

export const serviceClientConfigSchema = z
  .object({
    gatewayUrl: z.string().url(),
    gatewayTimeoutMs: z.number().int().positive().default(30000),
    gatewayHealthCheckIntervalMs: z.number().int().positive().optional(),

    serviceName: z.string().min(1),
    serviceToken: z.string().min(1),

    circuitBreaker: circuitBreakerConfigSchema.default({}),
    retry: retryConfigSchema.default({}),
    cache: cacheConfigSchema.default({}),

    serviceTimeouts: z.record(z.number().int().positive()).default({}),
    circuitBreakers: z.record(circuitBreakerConfigSchema.partial()).default({}),
  })
  .strict();

export type CircuitBreakerConfig = z.infer<typeof circuitBreakerConfigSchema>;
export type RetryConfig = z.infer<typeof retryConfigSchema>;
export type CacheConfig = z.infer<typeof cacheConfigSchema>;
export type ServiceClientConfig = z.infer<typeof serviceClientConfigSchema>;
export type ServiceClientConfigInput = z.input<typeof serviceClientConfigSchema>;

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = circuitBreakerConfigSchema.parse({});
export const DEFAULT_RETRY_CONFIG: RetryConfig = retryConfigSchema.parse({});
export const DEFAULT_CACHE_CONFIG: CacheConfig = cacheConfigSchema.parse({});

function toInvalidConfiguration(error: z.ZodError, input: unknown): InvalidConfigurationError {
  const issue = error.issues[0];
  const key = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
  let value: unknown = input;
  for (const segment of issue?.path ?? []) {
    value = typeof value === 'object' && value !== null ? Reflect.get(value, segment) : undefined;
  }
  return new InvalidConfigurationError(key, value, `Invalid configuration for key '${key}': ${issue?.message ?? 'invalid'}`);
}

export function parseServiceClientConfig(input: unknown): ServiceClientConfig {
  const result = serviceClientConfigSchema.safeParse(input);
  if (!result.success) {
    throw toInvalidConfiguration(result.error, input);
  }
  return result.data;
}

export function parseRetryConfig(input: unknown = {}): RetryConfig {
  const result = retryConfigSchema.safeParse(input);
  if (!result.success) {
    throw toInvalidConfiguration(result.error, input);
  }
  return result.data;
}
