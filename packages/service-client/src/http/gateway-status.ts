/**
 * Queries against the gateway's own endpoints: its breaker view of a target
 * and its liveness. Both run on short budgets, separate from call timeouts.
 */

import { z } from 'zod';
import type { GatewayCircuitStatusQuery } from '../resilience/types.js';
import type { GatewayTransport } from './types.js';

export const GATEWAY_HEALTH_TIMEOUT_MS = 5000;

const circuitStatusSchema = z.object({ state: z.string() }).passthrough();

export function trimBaseUrl(url: string): string {
  return url.replace(/\/+$/, '');
}

export function circuitStatusUrl(gatewayUrl: string, circuitName: string): string {
  return `${trimBaseUrl(gatewayUrl)}/internal/circuit-breaker/status/${encodeURIComponent(circuitName)}`;
}

export function createGatewayCircuitStatusQuery(
  transport: GatewayTransport,
  gatewayUrl: string,
  serviceToken: string,
  timeoutMs: number
): GatewayCircuitStatusQuery {
  return async (circuitName: string) => {
    const response = await transport.send({
      method: 'GET',
      url: circuitStatusUrl(gatewayUrl, circuitName),
      headers: { 'X-Service-Token': serviceToken },
      timeoutMs,
    });
    if (response.status !== 200) {
      return null;
    }
    return circuitStatusSchema.parse(JSON.parse(response.body)).state.toUpperCase();
  };
}

export async function checkGatewayHealth(
  transport: GatewayTransport,
  gatewayUrl: string,
  timeoutMs: number = GATEWAY_HEALTH_TIMEOUT_MS
): Promise<boolean> {
  try {
    const response = await transport.send({
      method: 'GET',
      url: `${trimBaseUrl(gatewayUrl)}/health`,
      headers: {},
      timeoutMs,
    });
    return response.status === 200;
  } catch {
    return false;
  }
}
