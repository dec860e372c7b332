import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import earningsPlugin from '../../src/infrastructure/storage/earnings-plugin.js';
import earningsRoutes from '../../src/interfaces/http/earnings-routes.js';
import { InMemoryArtifactStore } from '../../src/infrastructure/storage/in-memory-artifact-store.js';
import type { EarningsIndex } from '../../src/domain/index.js';
import { makeIndexed, HOUR_MS } from '../helpers.js';

const INDEX: EarningsIndex = {
  AAPL: makeIndexed({ symbol: 'AAPL', date: '2024-05-01', time: 'amc', metadata: { epsEstimate: 1.5 } }),
  MSFT: makeIndexed({ symbol: 'MSFT', date: '2024-04-25', time: 'amc' }),
  'SAP.DE': makeIndexed({ symbol: 'SAP.DE', date: '2024-07-22' }),
};

async function buildApp(store: InMemoryArtifactStore): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  await app.register(earningsPlugin, { store, ttlHours: 20 });
  await app.register(earningsRoutes);
  await app.ready();
  return app;
}

describe('earnings routes', () => {
  let store: InMemoryArtifactStore;
  let app: FastifyInstance;

  beforeEach(async () => {
    store = new InMemoryArtifactStore();
    store.seed(INDEX, new Date(Date.now() - 2 * HOUR_MS));
    app = await buildApp(store);
  });

  afterEach(async () => {
    await app.close();
  });

  // --- GET /api/v1/earnings ---

  it('lists the whole index', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/earnings' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.count).toBe(3);
    expect(body.data).toEqual(INDEX);
    expect(body.generatedAt).toBe(store.modifiedAt?.toISOString());
  });

  it('restricts to requested symbols case-insensitively', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/earnings?symbols=aapl,%20sap.de,XYZ' });

    expect(res.statusCode).toBe(200);
    expect(Object.keys(res.json().data).sort()).toEqual(['AAPL', 'SAP.DE']);
  });

  it('filters by an inclusive date range', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/earnings?from=2024-04-25&to=2024-05-01' });

    expect(res.statusCode).toBe(200);
    expect(res.json().count).toBe(2);
    expect(Object.keys(res.json().data).sort()).toEqual(['AAPL', 'MSFT']);
  });

  it('rejects an invalid from date', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/earnings?from=2024-02-30' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'from must be a YYYY-MM-DD date' });
  });

  it('rejects an invalid to date', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/earnings?to=tomorrow' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'to must be a YYYY-MM-DD date' });
  });

  it('rejects from after to', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/earnings?from=2024-06-01&to=2024-05-01' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'from must not be after to' });
  });

  // --- GET /api/v1/earnings/:symbol ---

  it('returns the next event for a symbol', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/earnings/aapl' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(INDEX['AAPL']);
  });

  it('returns 404 for a symbol without upcoming earnings', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/earnings/XYZ' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'No upcoming earnings for symbol' });
  });

  it.each(['constructor', 'toString', '__proto__'])(
    'returns 404 for the inherited member %s',
    async (symbol) => {
      const res = await app.inject({ method: 'GET', url: `/api/v1/earnings/${symbol}` });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'No upcoming earnings for symbol' });
    },
  );

  it('ignores inherited members in the symbols filter', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/earnings?symbols=constructor,AAPL' });

    expect(res.statusCode).toBe(200);
    expect(res.json().count).toBe(1);
    expect(Object.keys(res.json().data)).toEqual(['AAPL']);
  });

  it('serves a rewritten artifact without restart', async () => {
    store.seed({ TSLA: makeIndexed({ symbol: 'TSLA', date: '2024-04-23' }) }, new Date());

    const res = await app.inject({ method: 'GET', url: '/api/v1/earnings/TSLA' });

    expect(res.statusCode).toBe(200);
    expect(res.json().date).toBe('2024-04-23');
  });

  // --- GET /api/v1/earnings/status ---

  it('reports a fresh artifact', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/earnings/status' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok', count: 3, stale: false });
    expect(res.json().ageHours).toBeGreaterThanOrEqual(2);
    expect(res.json().ageHours).toBeLessThan(3);
  });

  it('reports a stale artifact', async () => {
    store.seed(INDEX, new Date(Date.now() - 30 * HOUR_MS));

    const res = await app.inject({ method: 'GET', url: '/api/v1/earnings/status' });

    expect(res.json()).toMatchObject({ status: 'stale', count: 3, stale: true });
  });

  it('reports a missing artifact', async () => {
    await app.close();
    app = await buildApp(new InMemoryArtifactStore());

    const res = await app.inject({ method: 'GET', url: '/api/v1/earnings/status' });

    expect(res.json()).toEqual({
      status: 'missing',
      count: 0,
      generatedAt: null,
      ageHours: null,
      stale: true,
    });
  });
});
