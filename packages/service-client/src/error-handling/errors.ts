export enum DomainErrorCode {
  UNKNOWN = 'UNKNOWN',
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  GATEWAY_ERROR = 'GATEWAY_ERROR',
  CLIENT_ERROR = 'CLIENT_ERROR',
  RATE_LIMITED = 'RATE_LIMITED',
  TIMEOUT = 'TIMEOUT',
  CANCELLED = 'CANCELLED',
  MAX_RETRIES_EXCEEDED = 'MAX_RETRIES_EXCEEDED',
  SERVICE_DISCOVERY_ERROR = 'SERVICE_DISCOVERY_ERROR',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
}

export class DomainError extends Error {
  public readonly statusCode: number;
  public readonly cause?: Error;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    statusCode: number = 500,
    cause?: Error,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.cause = cause;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.code && { code: this.code }),
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }
}

/**
 * Base of every error raised by the service client. `statusCode` is the
 * upstream HTTP status when the gateway answered, otherwise the closest
 * HTTP equivalent of the failure.
 */
export class ServiceClientError extends DomainError {
  constructor(
    message: string,
    statusCode: number = 500,
    code: DomainErrorCode = DomainErrorCode.CLIENT_ERROR,
    cause?: Error,
    details?: Record<string, unknown>
  ) {
    super(message, statusCode, cause, code, details);
    this.name = 'ServiceClientError';
  }

  static fromStatus(status: number, body: string): ServiceClientError {
    const code = status === 429 ? DomainErrorCode.RATE_LIMITED : DomainErrorCode.CLIENT_ERROR;
    return new ServiceClientError(`Client error ${status}: ${body}`, status, code, undefined, { status });
  }
}

export class ServiceUnavailableError extends ServiceClientError {
  public readonly serviceName: string;
  public readonly reason?: string;

  constructor(serviceName: string, reason?: string, statusCode: number = 503, cause?: Error) {
    const message = reason
      ? `Service '${serviceName}' is unavailable: ${reason}`
      : `Service '${serviceName}' is unavailable`;
    super(message, statusCode, DomainErrorCode.SERVICE_UNAVAILABLE, cause, { serviceName });
    this.name = 'ServiceUnavailableError';
    this.serviceName = serviceName;
    this.reason = reason;
  }
}

export class CircuitOpenError extends ServiceClientError {
  public readonly serviceName: string;
  public readonly circuitName: string;

  constructor(serviceName: string, circuitName: string) {
    super(`Circuit ${circuitName} for service ${serviceName} is OPEN`, 503, DomainErrorCode.CIRCUIT_OPEN, undefined, {
      serviceName,
      circuitName,
    });
    this.name = 'CircuitOpenError';
    this.serviceName = serviceName;
    this.circuitName = circuitName;
  }
}

export class GatewayErrorResponse extends ServiceClientError {
  public readonly errorType: string;
  public readonly correlationId?: string;

  constructor(errorType: string, message: string, statusCode: number, correlationId?: string) {
    const fullMessage = correlationId
      ? `${errorType}: ${message} (correlation_id: ${correlationId})`
      : `${errorType}: ${message}`;
    const code = statusCode === 429 ? DomainErrorCode.RATE_LIMITED : DomainErrorCode.GATEWAY_ERROR;
    super(fullMessage, statusCode, code, undefined, { errorType, correlationId });
    this.name = 'GatewayErrorResponse';
    this.errorType = errorType;
    this.correlationId = correlationId;
  }
}

export class MaxRetriesExceededError extends ServiceClientError {
  public readonly serviceName: string;
  public readonly endpoint: string;
  public readonly attempts: number;

  constructor(serviceName: string, endpoint: string, attempts: number, cause?: Error) {
    super(
      `Max retries (${attempts}) exceeded for ${serviceName}: ${endpoint}`,
      503,
      DomainErrorCode.MAX_RETRIES_EXCEEDED,
      cause,
      { serviceName, endpoint, attempts }
    );
    this.name = 'MaxRetriesExceededError';
    this.serviceName = serviceName;
    this.endpoint = endpoint;
    this.attempts = attempts;
  }
}

export class RequestTimeoutError extends ServiceClientError {
  public readonly serviceName: string;
  public readonly endpoint: string;
  public readonly timeoutMs: number;

  constructor(serviceName: string, endpoint: string, timeoutMs: number, cause?: Error) {
    super(`Request to ${serviceName}${endpoint} timed out after ${timeoutMs}ms`, 504, DomainErrorCode.TIMEOUT, cause, {
      serviceName,
      endpoint,
      timeoutMs,
    });
    this.name = 'RequestTimeoutError';
    this.serviceName = serviceName;
    this.endpoint = endpoint;
    this.timeoutMs = timeoutMs;
  }
}

export class RequestCancelledError extends ServiceClientError {
  constructor(serviceName: string, endpoint: string) {
    super(`Request to ${serviceName}${endpoint} was cancelled`, 499, DomainErrorCode.CANCELLED, undefined, {
      serviceName,
      endpoint,
    });
    this.name = 'RequestCancelledError';
  }
}

export class ServiceDiscoveryError extends ServiceClientError {
  public readonly serviceName: string;

  constructor(serviceName: string, errorDetails?: string) {
    const message = errorDetails
      ? `Failed to discover instances for service '${serviceName}': ${errorDetails}`
      : `Failed to discover instances for service '${serviceName}'`;
    super(message, 503, DomainErrorCode.SERVICE_DISCOVERY_ERROR, undefined, { serviceName });
    this.name = 'ServiceDiscoveryError';
    this.serviceName = serviceName;
  }
}

export class InvalidConfigurationError extends ServiceClientError {
  public readonly configKey: string;

  constructor(configKey: string, configValue: unknown, message?: string) {
    super(
      message ?? `Invalid configuration for key '${configKey}' with value '${String(configValue)}'`,
      500,
      DomainErrorCode.INVALID_CONFIGURATION,
      undefined,
      { configKey }
    );
    this.name = 'InvalidConfigurationError';
    this.configKey = configKey;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Reads an HTTP-like status from an error, whether it is one of ours or a
 * foreign error exposing `statusCode` or `status`.
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  if ('status' in error && typeof error.status === 'number') return error.status;
  return undefined;
}

export function isErrorCode(error: unknown, code: DomainErrorCode): boolean {
  return error instanceof DomainError && error.code === code;
}
