import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { registerCaptureHooks } from './capture';
import { loadCaptureConfig } from './config';
import { Env, getEnv } from './env';
import { CaptureMetrics, registerHealthRoutes } from './health';
import { logger } from './log';
import { CapturePipeline } from './pipeline';
import { LogRecorder, Recorder } from './recorder';
import { RpcContextProvider } from './resolver';
import { ImmediateExecutor } from './scheduler';

export interface BuildServerOptions {
  env?: Env;
  recorder?: Recorder;
  rpcContext?: RpcContextProvider;
  version?: string;
}

const packageSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = readFileSync(join(__dirname, '..', 'package.json'), 'utf8');
  return packageSchema.parse(JSON.parse(raw)).version;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const env = options.env ?? getEnv();
  const config = loadCaptureConfig(env);
  const metrics = new CaptureMetrics();

  const executor = new ImmediateExecutor((error) => {
    metrics.recordFailed();
    logger.warn({ error }, 'Deferred capture failed');
  });

  const pipeline = new CapturePipeline({
    config,
    recorder: options.recorder ?? new LogRecorder(logger.child({ component: 'capture' })),
    executor,
    metrics,
  });

  const fastify = Fastify({
    logger: false, // We use our own logger
    disableRequestLogging: true,
  });

  await fastify.register(cors, {
    exposedHeaders: [config.batchHeader],
  });

  fastify.setErrorHandler((error, request, reply) => {
    logger.error({ error, url: request.url, method: request.method }, 'Unhandled error');
    reply.status(500).send({
      status: 'error',
      error: 'Internal server error',
      message: env.NODE_ENV === 'development' ? error.message : undefined,
    });
  });

  // Capture hooks first so they wrap every route below
  await registerCaptureHooks(fastify, { pipeline, rpcContext: options.rpcContext });
  await registerHealthRoutes(fastify, {
    version: options.version ?? readVersion(),
    metrics,
    pending: () => pipeline.pending,
  });

  fastify.get('/', { config: { action: 'index' } }, async () => ({ status: 'ok' }));

  fastify.post('/echo', { config: { action: 'echo' } }, async (request) => ({ received: request.body ?? null }));

  return fastify;
}

async function main() {
  const env = getEnv();
  logger.info({ env: { port: env.PORT, nodeEnv: env.NODE_ENV } }, 'Starting server');

  const fastify = await buildServer({ env });

  try {
    await fastify.listen({ port: env.PORT, host: env.HOST });
    logger.info({ port: env.PORT }, 'Server started successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown; pending captures are dropped
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down gracefully');
    await fastify.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

if (require.main === module) {
  main().catch((error) => {
    logger.error(
      {
        error:
          error instanceof Error
            ? {
                message: error.message,
                stack: error.stack,
                name: error.name,
              }
            : error,
      },
      'Fatal error'
    );
    process.exit(1);
  });
}
