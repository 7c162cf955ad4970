import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import http from 'node:http';
import https from 'node:https';
import { getLogger } from '../logging/logger.js';
import { TransportError, type GatewayRequest, type GatewayResponse, type GatewayTransport } from './types.js';

const logger = getLogger('gateway-transport');

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export interface AxiosTransportOptions {
  maxSockets?: number;
  /** Extra axios defaults, e.g. a custom `adapter`. */
  axiosDefaults?: CreateAxiosDefaults;
}

function toBodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return JSON.stringify(data);
}

export function toTransportError(error: unknown, timeoutMs: number): TransportError {
  if (axios.isCancel(error)) {
    return new TransportError('Request cancelled', 'cancelled', 'ERR_CANCELED', error);
  }
  if (axios.isAxiosError(error)) {
    const code = error.code;
    if (code && TIMEOUT_CODES.has(code)) {
      return new TransportError(`Request timed out after ${timeoutMs}ms`, 'timeout', code, error);
    }
    return new TransportError(error.message || 'Network error - unable to reach gateway', 'network', code, error);
  }
  return new TransportError(error instanceof Error ? error.message : String(error), 'network', undefined, error);
}

/**
 * Axios-backed transport. Every status is handed back as-is and bodies are
 * kept as raw text, so status classification and JSON decoding happen in
 * one place on the client side.
 */
export class AxiosGatewayTransport implements GatewayTransport {
  private readonly client: AxiosInstance;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;

  constructor(options: AxiosTransportOptions = {}) {
    const maxSockets = options.maxSockets ?? 20;

    this.httpAgent = new http.Agent({ keepAlive: true, keepAliveMsecs: 1000, maxSockets, maxFreeSockets: 5 });
    this.httpsAgent = new https.Agent({ keepAlive: true, keepAliveMsecs: 1000, maxSockets, maxFreeSockets: 5 });

    this.client = axios.create({
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      maxRedirects: 5,
      responseType: 'text',
      transformResponse: [data => data],
      validateStatus: () => true,
      ...options.axiosDefaults,
    });
  }

  async send(request: GatewayRequest): Promise<GatewayResponse> {
    const withBody = request.method !== 'GET' && request.method !== 'HEAD' && request.data !== undefined;
    try {
      const response = await this.client.request({
        method: request.method,
        url: request.url,
        headers: request.headers,
        params: request.params,
        data: withBody ? request.data : undefined,
        timeout: request.timeoutMs,
        signal: request.signal,
      });
      return { status: response.status, body: toBodyText(response.data) };
    } catch (error) {
      const transportError = toTransportError(error, request.timeoutMs);
      logger.debug('Gateway transport failure', {
        method: request.method,
        url: request.url,
        kind: transportError.kind,
        code: transportError.code,
      });
      throw transportError;
    }
  }

  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
