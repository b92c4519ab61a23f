import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { isEnabled } from './decision';
import { logger as defaultLogger, Logger } from './log';
import { CapturePipeline } from './pipeline';
import { HandlerResolver, resolveBatchId, routeResolver, RpcContextProvider } from './resolver';
import type { CaptureFacts, HeaderMap, RpcContext } from './types';

export interface CaptureContext {
  batchId: string;
  startedAt: number | null;
  middleware: string[];
  /** Outgoing body as sent; `null` for streams. */
  responseBody: string | null;
  rpc?: RpcContext;
}

declare module 'fastify' {
  interface FastifyRequest {
    capture: CaptureContext | null;
  }
}

export interface CaptureHookOptions {
  pipeline: CapturePipeline;
  resolveHandler?: HandlerResolver;
  rpcContext?: RpcContextProvider;
  logger?: Logger;
}

export function normalizeHeaders(headers: Record<string, string | string[] | number | undefined>): HeaderMap {
  const result: HeaderMap = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    result[key.toLowerCase()] = Array.isArray(value) ? [...value] : [String(value)];
  }
  return result;
}

function bodyAsText(payload: unknown): string | null {
  if (payload === undefined || payload === null) {
    return '';
  }
  if (typeof payload === 'string') {
    return payload;
  }
  if (Buffer.isBuffer(payload)) {
    return payload.toString('utf8');
  }
  return null;
}

function headerValue(value: string | string[] | number | undefined): string {
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  return value === undefined ? '' : String(value);
}

/**
 * First value of a header that may have been sent more than once. Node joins
 * repeated custom headers with commas, so those are split as well.
 */
export function firstHeaderValue(value: string | string[] | undefined): string {
  const first = Array.isArray(value) ? value[0] : value;
  return (first ?? '').split(',')[0].trim();
}

/**
 * Records a middleware name on the request so it shows up in the entry.
 */
export function trackMiddleware(request: FastifyRequest, name: string): void {
  request.capture?.middleware.push(name);
}

export function collectFacts(request: FastifyRequest, reply: FastifyReply, context: CaptureContext, resolveHandler: HandlerResolver): CaptureFacts {
  return {
    batchId: context.batchId,
    request: {
      method: request.method,
      uri: request.url,
      path: request.url.split('?')[0],
      headers: normalizeHeaders(request.headers),
      query: request.query,
      body: request.body,
      remoteAddress: request.socket.remoteAddress,
    },
    response: {
      statusCode: reply.statusCode,
      contentType: headerValue(reply.getHeader('content-type')),
      body: context.responseBody,
    },
    handler: resolveHandler(request),
    middleware: context.middleware,
    startedAt: context.startedAt,
    rpc: context.rpc,
  };
}

/**
 * Attaches capture hooks. Registered hooks apply to routes declared after
 * this call, so register it before the routes to be captured.
 */
export async function registerCaptureHooks(fastify: FastifyInstance, options: CaptureHookOptions): Promise<void> {
  const { pipeline } = options;
  const config = pipeline.config;
  const resolveHandler = options.resolveHandler ?? routeResolver();
  const clock = pipeline.clock;
  const log = options.logger ?? defaultLogger;

  if (!isEnabled(config, 'request')) {
    log.debug('Request capture disabled');
    return;
  }

  fastify.decorateRequest('capture', null);

  fastify.addHook('onRequest', async (request, reply) => {
    try {
      const rpc = options.rpcContext?.(request);
      const batchId = resolveBatchId(firstHeaderValue(request.headers[config.batchHeader]), rpc);

      request.capture = {
        batchId,
        startedAt: clock.now(),
        middleware: [],
        responseBody: '',
        rpc,
      };
      reply.header(config.batchHeader, batchId);
    } catch (error) {
      log.warn({ error, url: request.url }, 'Could not start capture');
    }
  });

  fastify.addHook('onSend', async (request, _reply, payload) => {
    if (request.capture) {
      request.capture.responseBody = bodyAsText(payload);
    }
    return payload;
  });

  // Runs once the response has been sent
  fastify.addHook('onResponse', async (request, reply) => {
    const context = request.capture;
    if (!context) {
      return;
    }

    try {
      pipeline.handle(collectFacts(request, reply, context, resolveHandler));
    } catch (error) {
      log.warn({ error, batchId: context.batchId }, 'Could not schedule capture');
    }
  });

  fastify.addHook('onClose', async () => {
    const dropped = pipeline.close();
    if (dropped > 0) {
      log.debug({ dropped }, 'Dropped pending captures on close');
    }
  });
}
