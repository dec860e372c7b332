import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { IndexSnapshot } from '../../application/index.js';
import type { ArtifactStore } from '../../application/index.js';

export interface EarningsPluginOptions {
  store: ArtifactStore;
  /** Age in hours after which the status route reports the index as stale. */
  ttlHours: number;
}

/**
 * Fastify plugin exposing the persisted index to routes.
 *
 * - Decorates `fastify.earnings` with a read-through snapshot.
 * - Decorates `fastify.earningsTtlHours` for staleness reporting.
 */
async function earningsPlugin(fastify: FastifyInstance, opts: EarningsPluginOptions): Promise<void> {
  const snapshot = new IndexSnapshot(opts.store);

  const initial = await snapshot.get();
  fastify.log.info(
    { symbols: Object.keys(initial.index).length, generatedAt: initial.generatedAt?.toISOString() ?? null },
    'Earnings index loaded',
  );

  fastify.decorate('earnings', snapshot);
  fastify.decorate('earningsTtlHours', opts.ttlHours);
}

export default fp(earningsPlugin, {
  name: 'earnings',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.earnings` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    earnings: IndexSnapshot;
    earningsTtlHours: number;
  }
}
