/**
 * HTTP Types
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

export interface GatewayRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  params?: Record<string, unknown>;
  data?: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface GatewayResponse {
  status: number;
  /** Raw response body text; decoding is left to the caller. */
  body: string;
}

/**
 * Sends one HTTP request and reports whatever status came back. Only
 * transport-level failures reject, as a `TransportError`.
 */
export interface GatewayTransport {
  send(request: GatewayRequest): Promise<GatewayResponse>;
  close?(): void;
}

export type TransportFailureKind = 'timeout' | 'cancelled' | 'network';

export class TransportError extends Error {
  constructor(
    message: string,
    readonly kind: TransportFailureKind,
    readonly code?: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'TransportError';
  }
}

const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'];

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some(method => method === value);
}
