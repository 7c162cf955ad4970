/**
 * Per-target circuit breaker.
 *
 * Local state is authoritative for every decision; the gateway's breaker view
 * is folded in at most once per sync interval, before a permission check.
 * The gateway read is not atomic with concurrent local failures, only the
 * resulting mutation is serialized, so a failure recorded between the read
 * and the write can be overridden by the gateway's answer.
 */

import { getLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';
import { DEFAULT_CIRCUIT_BREAKER_CONFIG, type CircuitBreakerConfig } from '../config/client-config.js';
import { SerialLock } from './serial-lock.js';
import {
  CircuitState,
  type CircuitBreakerStats,
  type CircuitStateChangeHandler,
  type CircuitStateValue,
  type CircuitTransitionReason,
  type GatewayCircuitStatusQuery,
} from './types.js';

const logger = getLogger('circuit-breaker');

export class CircuitBreaker {
  readonly name: string;
  readonly config: CircuitBreakerConfig;

  private state: CircuitStateValue = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private lastStateChangeTime = Date.now();
  private lastGatewaySyncTime = 0;

  private readonly lock = new SerialLock();
  private readonly handlers: CircuitStateChangeHandler[] = [];

  constructor(
    name: string,
    config: Partial<CircuitBreakerConfig> = {},
    private readonly gatewayStatus?: GatewayCircuitStatusQuery
  ) {
    this.name = name;
    this.config = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };
  }

  onStateChange(handler: CircuitStateChangeHandler): () => void {
    this.handlers.push(handler);
    return () => {
      const idx = this.handlers.indexOf(handler);
      if (idx >= 0) this.handlers.splice(idx, 1);
    };
  }

  getState(): CircuitStateValue {
    return this.state;
  }

  getStats(): CircuitBreakerStats {
    return {
      name: this.name,
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime,
      lastStateChangeTime: this.lastStateChangeTime,
      lastGatewaySyncTime: this.lastGatewaySyncTime,
    };
  }

  /**
   * Whether a call may proceed. An OPEN circuit past its recovery timeout
   * moves to HALF_OPEN here and lets the caller through as a probe.
   */
  async canExecute(): Promise<boolean> {
    await this.syncWithGateway();

    return this.lock.run(() => {
      switch (this.state) {
        case CircuitState.CLOSED:
          return true;
        case CircuitState.OPEN:
          if (Date.now() - this.lastStateChangeTime > this.config.recoveryTimeoutMs) {
            this.transition(CircuitState.HALF_OPEN, 'recovery-timeout');
            return true;
          }
          return false;
        case CircuitState.HALF_OPEN:
          return true;
      }
    });
  }

  async recordSuccess(): Promise<void> {
    await this.lock.run(() => {
      if (this.state === CircuitState.HALF_OPEN) {
        this.successCount++;
        if (this.successCount >= this.config.successThreshold) {
          this.transition(CircuitState.CLOSED, 'recovered');
        }
      } else if (this.state === CircuitState.CLOSED && this.failureCount > 0) {
        this.failureCount = 0;
      }
    });
  }

  async recordFailure(): Promise<void> {
    await this.lock.run(() => {
      this.failureCount++;
      this.lastFailureTime = Date.now();

      if (this.state === CircuitState.CLOSED && this.failureCount >= this.config.failureThreshold) {
        this.transition(CircuitState.OPEN, 'threshold');
      } else if (this.state === CircuitState.HALF_OPEN) {
        this.transition(CircuitState.OPEN, 'probe-failed');
      }
    });
  }

  async reset(): Promise<void> {
    await this.lock.run(() => {
      if (this.state === CircuitState.CLOSED) {
        this.failureCount = 0;
        this.successCount = 0;
        return;
      }
      this.transition(CircuitState.CLOSED, 'manual-reset');
    });
  }

  private async syncWithGateway(): Promise<void> {
    if (!this.gatewayStatus) return;

    const now = Date.now();
    if (now - this.lastGatewaySyncTime < this.config.gatewaySyncIntervalMs) return;
    this.lastGatewaySyncTime = now;

    let remoteState: string | null;
    try {
      remoteState = await this.gatewayStatus(this.name);
    } catch (error) {
      logger.debug('Gateway circuit sync skipped', { circuit: this.name, error: serializeError(error).message });
      return;
    }
    if (remoteState === null) return;

    await this.lock.run(() => {
      if (remoteState === CircuitState.OPEN && this.state !== CircuitState.OPEN) {
        this.transition(CircuitState.OPEN, 'gateway-sync');
      } else if (remoteState === CircuitState.CLOSED && this.state !== CircuitState.CLOSED) {
        this.transition(CircuitState.CLOSED, 'gateway-sync');
      }
    });
  }

  // Callers must hold the lock.
  private transition(to: CircuitStateValue, reason: CircuitTransitionReason): void {
    const from = this.state;
    const timestamp = Date.now();

    this.state = to;
    this.lastStateChangeTime = timestamp;
    if (to !== CircuitState.OPEN) {
      this.failureCount = 0;
      this.successCount = 0;
    }

    const meta = { circuit: this.name, from, to, reason, failures: this.failureCount };
    if (to === CircuitState.OPEN) {
      logger.warn('Circuit breaker OPENED', meta);
    } else if (to === CircuitState.HALF_OPEN) {
      logger.info('Circuit breaker HALF-OPEN, testing recovery', meta);
    } else {
      logger.info('Circuit breaker CLOSED', meta);
    }

    for (const handler of this.handlers) {
      try {
        handler({ name: this.name, from, to, reason, timestamp });
      } catch (handlerError) {
        logger.warn('Circuit state handler threw', { circuit: this.name, error: serializeError(handlerError) });
      }
    }
  }
}
