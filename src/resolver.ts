import type { FastifyRequest } from 'fastify';
import { ulid } from 'ulid';
import type { HandlerDescriptor, RpcContext, TransportKind } from './types';

export const CARRIER_KEY = 'capture.carrier';
export const GRPC_REQUEST_KEY = 'capture.grpc.request';
export const GRPC_RESPONSE_KEY = 'capture.grpc.response';

export type HandlerResolver = (request: FastifyRequest) => HandlerDescriptor;

export type RpcContextProvider = (request: FastifyRequest) => RpcContext | undefined;

declare module 'fastify' {
  interface FastifyContextConfig {
    /** Human-readable handler name recorded as the controller action. */
    action?: string;
    transport?: TransportKind;
  }
}

/**
 * Reads the handler name and transport from route config, falling back to
 * `METHOD /route/url` and the server-wide transport.
 */
export function routeResolver(defaultTransport: TransportKind = 'http'): HandlerResolver {
  return (request) => {
    const { config, url } = request.routeOptions;
    const route = url ?? '';
    return {
      action: config.action ?? (route ? `${request.method} ${route}` : ''),
      transport: config.transport ?? defaultTransport,
    };
  };
}

/**
 * Context keyed by string, for hosts that hand carriers over in memory.
 */
export class MapRpcContext implements RpcContext {
  private readonly values: Map<string, unknown>;

  constructor(values: Record<string, unknown> = {}) {
    this.values = new Map(Object.entries(values));
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  set(key: string, value: unknown): this {
    this.values.set(key, value);
    return this;
  }
}

export function carrierBatchId(rpc: RpcContext | undefined): string {
  const carrier = rpc?.get(CARRIER_KEY);
  if (typeof carrier !== 'object' || carrier === null || !('batch-id' in carrier)) {
    return '';
  }
  const batchId = carrier['batch-id'];
  return typeof batchId === 'string' ? batchId : '';
}

/**
 * Inbound header first, then the RPC carrier, then a fresh ulid.
 */
export function resolveBatchId(header: string | undefined, rpc: RpcContext | undefined, generate: () => string = ulid): string {
  return header || carrierBatchId(rpc) || generate();
}
