import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';

vi.mock('../config.js', async () => ({ config: (await import('./testConfig.js')).testConfig }));

import type { HandlerStatus } from '../registry/capabilityTypes.js';
import { overallHealth, systemRoutes, type ServiceHealth } from '../routes/systemRoutes.js';
import { createServices, type Services } from '../server.js';
import { InMemorySessionStore } from '../session/InMemorySessionStore.js';

describe('overallHealth', () => {
  const cases: Array<[HandlerStatus[], ServiceHealth]> = [
    [[], 'unhealthy'],
    [['healthy', 'healthy'], 'healthy'],
    [['healthy', 'unknown'], 'degraded'],
    [['healthy', 'unreachable'], 'degraded'],
    [['unknown'], 'degraded'],
    [['degraded', 'unreachable'], 'unhealthy'],
  ];

  it.each(cases)('%j is %s', (statuses, expected) => {
    expect(overallHealth(statuses)).toBe(expected);
  });
});

describe('system routes', () => {
  let fastify: FastifyInstance;
  let store: InMemorySessionStore;
  let services: Services;

  beforeEach(async () => {
    store = new InMemorySessionStore({ ttlSeconds: 600 });
    services = await createServices(store);
    fastify = Fastify({ logger: false });
    await fastify.register(systemRoutes, {
      registry: services.registry,
      sessions: services.sessions,
      transport: services.transport,
    });
  });

  afterEach(async () => {
    store.destroy();
    await fastify.close();
  });

  it('reports health per handler', async () => {
    await services.registry.probeAll();
    services.registry.markDegraded('comparison', 'slow');

    const response = await fastify.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      status: 'degraded',
      handlers: {
        discovery: 'healthy',
        footprint: 'healthy',
        cart: 'healthy',
        checkout: 'healthy',
        comparison: 'degraded',
        general: 'healthy',
      },
      endpoints: ['catalog', 'emissions'],
    });
  });

  it('reports healthy once every handler answered its probe', async () => {
    await services.registry.probeAll();

    const response = await fastify.inject({ method: 'GET', url: '/health' });

    expect(response.json().status).toBe('healthy');
  });

  it('sums handler metrics', async () => {
    await services.router.send('footprint', { intent: 'shipping_options' });
    await services.router.send('cart', { intent: 'cart_remove', parameters: { productId: 'p-mug' } });

    const response = await fastify.inject({ method: 'GET', url: '/metrics' });

    const body = response.json();
    expect(body.totals).toEqual({ requestsProcessed: 2, successfulRequests: 1, failedRequests: 1 });
    expect(body.handlers.find((handler: { name: string }) => handler.name === 'cart')).toMatchObject({
      requestsProcessed: 1,
      failedRequests: 1,
    });
  });

  it('returns the zero session for an unknown id without storing it', async () => {
    const response = await fastify.inject({ method: 'GET', url: '/sessions/sess-new' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      sessionId: 'sess-new',
      cartItems: [],
      totalFootprintKg: 0,
      lifecycle: 'active',
      version: 0,
    });
    expect(await store.exists('sess-new')).toBe(false);
  });

  it('returns the committed session state', async () => {
    await services.sessions.addToCart('sess-known', {
      productId: 'p-mug',
      name: 'Stoneware Mug',
      quantity: 2,
      unitPrice: 8.99,
      currency: 'USD',
      footprintKg: 2.12,
    });

    const response = await fastify.inject({ method: 'GET', url: '/sessions/sess-known' });

    expect(response.json()).toMatchObject({ version: 1, productFootprintKg: 4.24, totalFootprintKg: 4.24 });
  });
});
