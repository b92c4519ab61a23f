import { afterEach, describe, it, expect } from 'vitest';
import Fastify, { FastifyInstance } from 'fastify';
import { carrierBatchId, CARRIER_KEY, MapRpcContext, resolveBatchId, routeResolver } from '../resolver';

describe('resolveBatchId', () => {
  const carrier = new MapRpcContext({ [CARRIER_KEY]: { 'batch-id': 'from-rpc' } });

  it('prefers the inbound header over the rpc carrier', () => {
    expect(resolveBatchId('abc', carrier, () => 'generated')).toBe('abc');
  });

  it('falls back to the rpc carrier', () => {
    expect(resolveBatchId('', carrier, () => 'generated')).toBe('from-rpc');
    expect(resolveBatchId(undefined, carrier, () => 'generated')).toBe('from-rpc');
  });

  it('generates an id when nothing is inbound', () => {
    expect(resolveBatchId('', undefined, () => 'generated')).toBe('generated');
    expect(resolveBatchId('', new MapRpcContext(), () => 'generated')).toBe('generated');
  });

  it('generates a ulid by default', () => {
    expect(resolveBatchId(undefined, undefined)).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });
});

describe('carrierBatchId', () => {
  it('ignores carriers without a string batch id', () => {
    expect(carrierBatchId(new MapRpcContext({ [CARRIER_KEY]: 'batch' }))).toBe('');
    expect(carrierBatchId(new MapRpcContext({ [CARRIER_KEY]: { 'batch-id': 42 } }))).toBe('');
    expect(carrierBatchId(new MapRpcContext().set(CARRIER_KEY, { 'batch-id': 'ok' }))).toBe('ok');
  });
});

describe('routeResolver', () => {
  const apps: FastifyInstance[] = [];

  afterEach(async () => {
    await Promise.all(apps.splice(0).map((app) => app.close()));
  });

  it('reads action and transport from route config', async () => {
    const app = Fastify();
    apps.push(app);
    const resolve = routeResolver();

    app.get('/orders/:id', async (request) => resolve(request));
    app.post('/grpc/Greeter/SayHello', { config: { action: 'Greeter/SayHello', transport: 'grpc' } }, async (request) =>
      resolve(request)
    );

    const plain = await app.inject({ method: 'GET', url: '/orders/9' });
    const grpc = await app.inject({ method: 'POST', url: '/grpc/Greeter/SayHello' });

    expect(plain.json()).toEqual({ action: 'GET /orders/:id', transport: 'http' });
    expect(grpc.json()).toEqual({ action: 'Greeter/SayHello', transport: 'grpc' });
  });

  it('uses the server-wide default transport', async () => {
    const app = Fastify();
    apps.push(app);
    const resolve = routeResolver('json-rpc-http');

    app.post('/', async (request) => resolve(request));

    const response = await app.inject({ method: 'POST', url: '/' });

    expect(response.json()).toEqual({ action: 'POST /', transport: 'json-rpc-http' });
  });
});
