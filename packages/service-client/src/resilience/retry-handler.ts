import { getLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';
import { BackoffStrategy, DEFAULT_RETRY_CONFIG, type RetryConfig } from '../config/client-config.js';
import {
  CircuitOpenError,
  InvalidConfigurationError,
  MaxRetriesExceededError,
  RequestCancelledError,
  ServiceDiscoveryError,
  getErrorStatus,
  toError,
} from '../error-handling/errors.js';
import type { RetryContext, RetryEvent, RetryEventHandler } from './types.js';

const logger = getLogger('retry-handler');

const JITTER_MIN = 0.1;
const JITTER_MAX = 0.3;

/**
 * Client errors are permanent, except 429 which asks us to come back later.
 * Everything else (5xx, timeouts, refused connections) is worth another try.
 */
export function isRetryableError(error: unknown): boolean {
  if (
    error instanceof CircuitOpenError ||
    error instanceof RequestCancelledError ||
    error instanceof ServiceDiscoveryError ||
    error instanceof InvalidConfigurationError
  ) {
    return false;
  }
  const status = getErrorStatus(error);
  if (status !== undefined && status >= 400 && status < 500 && status !== 429) {
    return false;
  }
  return true;
}

/**
 * Base delay before the attempt following `attempt`, without jitter or clamping.
 */
export function baseDelayMs(config: RetryConfig, attempt: number): number {
  switch (config.backoffStrategy) {
    case BackoffStrategy.EXPONENTIAL:
      return config.initialDelayMs * Math.pow(2, attempt - 1);
    case BackoffStrategy.LINEAR:
      return config.initialDelayMs * attempt;
    case BackoffStrategy.CONSTANT:
      return config.initialDelayMs;
  }
}

function sleep(ms: number, signal: AbortSignal | undefined, onAbort: () => Error): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(onAbort());
      return;
    }
    const abort = () => {
      clearTimeout(timer);
      reject(onAbort());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', abort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', abort, { once: true });
  });
}

export class RetryHandler {
  readonly config: RetryConfig;
  private eventHandlers: RetryEventHandler[] = [];

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = Object.freeze({ ...DEFAULT_RETRY_CONFIG, ...config });
  }

  onRetry(handler: RetryEventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      const idx = this.eventHandlers.indexOf(handler);
      if (idx >= 0) this.eventHandlers.splice(idx, 1);
    };
  }

  private emit(event: RetryEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (handlerError) {
        logger.warn('Retry event handler threw', {
          operationName: event.operationName,
          error: serializeError(handlerError),
        });
      }
    }
  }

  /**
   * Delay in ms before the attempt following `attempt`: strategy base delay,
   * plus 10-30% jitter, capped at `maxDelayMs`.
   */
  calculateDelay(attempt: number): number {
    const delay = baseDelayMs(this.config, attempt);
    const jitter = (JITTER_MIN + Math.random() * (JITTER_MAX - JITTER_MIN)) * delay;
    return Math.min(delay + jitter, this.config.maxDelayMs);
  }

  async executeWithRetry<T>(operation: () => Promise<T>, operationName: string, context: RetryContext = {}): Promise<T> {
    const endpoint = context.endpoint ?? 'unknown';
    const cancelled = () => new RequestCancelledError(operationName, endpoint);
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      if (context.signal?.aborted) {
        throw cancelled();
      }

      try {
        const result = await operation();
        if (attempt > 1) {
          logger.info('Operation succeeded after retry', { operationName, endpoint, attempt });
        }
        return result;
      } catch (error) {
        if (!isRetryableError(error)) {
          throw error;
        }
        lastError = toError(error);

        if (attempt === this.config.maxAttempts) {
          break;
        }

        const delayMs = this.calculateDelay(attempt);
        const rateLimited = getErrorStatus(lastError) === 429;
        logger.warn(rateLimited ? 'Rate limited (429), retrying' : 'Attempt failed, retrying', {
          operationName,
          endpoint,
          attempt,
          delayMs: Math.round(delayMs),
          error: lastError.message,
        });
        this.emit({ operationName, endpoint, attempt, delayMs, error: lastError, rateLimited });

        await sleep(delayMs, context.signal, cancelled);
      }
    }

    throw new MaxRetriesExceededError(operationName, endpoint, this.config.maxAttempts, lastError);
  }
}
