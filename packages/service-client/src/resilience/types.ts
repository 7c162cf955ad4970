export const CircuitState = {
  CLOSED: 'CLOSED',
  OPEN: 'OPEN',
  HALF_OPEN: 'HALF_OPEN',
} as const;

export type CircuitStateValue = (typeof CircuitState)[keyof typeof CircuitState];

/** Gauge encoding used by the `circuit_state` metric. */
export const CIRCUIT_STATE_GAUGE: Record<CircuitStateValue, number> = {
  CLOSED: 0,
  OPEN: 1,
  HALF_OPEN: 2,
};

export type CircuitTransitionReason =
  | 'threshold'
  | 'probe-failed'
  | 'recovered'
  | 'recovery-timeout'
  | 'gateway-sync'
  | 'manual-reset';

export interface CircuitStateChangeEvent {
  name: string;
  from: CircuitStateValue;
  to: CircuitStateValue;
  reason: CircuitTransitionReason;
  timestamp: number;
}

export type CircuitStateChangeHandler = (event: CircuitStateChangeEvent) => void;

export interface CircuitBreakerStats {
  name: string;
  state: CircuitStateValue;
  failureCount: number;
  successCount: number;
  lastFailureTime: number | null;
  lastStateChangeTime: number;
  lastGatewaySyncTime: number;
}

/**
 * Asks the gateway for its own view of a circuit. Resolves to the reported
 * state, or `null` when the gateway answered without one (non-200).
 */
export type GatewayCircuitStatusQuery = (circuitName: string) => Promise<string | null>;

export interface RetryEvent {
  operationName: string;
  endpoint?: string;
  attempt: number;
  delayMs: number;
  error: Error;
  rateLimited: boolean;
}

export type RetryEventHandler = (event: RetryEvent) => void;

export interface RetryContext {
  endpoint?: string;
  signal?: AbortSignal;
}
