import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { isIsoDate } from '../../domain/index.js';
import type { EarningsIndex } from '../../domain/index.js';
import { artifactAgeHours } from '../../application/index.js';

/**
 * Splits a comma-separated symbol list, trimmed and upper-cased.
 * Returns `undefined` when no list was given.
 */
function parseSymbols(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((s) => s.trim().toUpperCase())
    .filter((s) => s !== '');
}

function own(index: EarningsIndex, key: string): EarningsIndex[string] | undefined {
  return Object.hasOwn(index, key) ? index[key] : undefined;
}

/** Exact key first, then the upper-cased form. Inherited members never match. */
function lookup(index: EarningsIndex, symbol: string): EarningsIndex[string] | undefined {
  return own(index, symbol) ?? own(index, symbol.toUpperCase());
}

/**
 * Read-only earnings index routes.
 *
 * GET /api/v1/earnings          — whole index, optional symbols/from/to filters
 * GET /api/v1/earnings/status   — artifact age and staleness
 * GET /api/v1/earnings/:symbol  — next event for one symbol
 */
async function earningsRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * GET /api/v1/earnings
   *
   * Query params: symbols (comma-separated), from, to (YYYY-MM-DD, inclusive)
   */
  fastify.get(
    '/api/v1/earnings',
    async (
      request: FastifyRequest<{
        Querystring: {
          symbols?: string;
          from?: string;
          to?: string;
        };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      if (q.from !== undefined && !isIsoDate(q.from)) {
        return reply.status(400).send({ error: 'from must be a YYYY-MM-DD date' });
      }
      if (q.to !== undefined && !isIsoDate(q.to)) {
        return reply.status(400).send({ error: 'to must be a YYYY-MM-DD date' });
      }
      if (q.from !== undefined && q.to !== undefined && q.from > q.to) {
        return reply.status(400).send({ error: 'from must not be after to' });
      }

      const { index, generatedAt } = await fastify.earnings.get();
      const symbols = parseSymbols(q.symbols);

      const candidates = symbols === undefined
        ? Object.values(index)
        : symbols.flatMap((symbol) => {
          const entry = lookup(index, symbol);
          return entry === undefined ? [] : [entry];
        });

      const data: EarningsIndex = Object.fromEntries(
        candidates
          .filter((entry) => q.from === undefined || entry.date >= q.from)
          .filter((entry) => q.to === undefined || entry.date <= q.to)
          .map((entry) => [entry.symbol, entry] as const),
      );

      return reply.status(200).send({
        generatedAt: generatedAt?.toISOString() ?? null,
        count: Object.keys(data).length,
        data,
      });
    },
  );

  /**
   * GET /api/v1/earnings/status
   *
   * Registered before `/:symbol`; the static segment wins either way.
   * Age is measured from the artifact's last write, so an index that
   * refreshes without changing reads as stale once the TTL has passed.
   */
  fastify.get(
    '/api/v1/earnings/status',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { index, generatedAt } = await fastify.earnings.get();

      if (generatedAt === null) {
        return reply.status(200).send({
          status: 'missing',
          count: 0,
          generatedAt: null,
          ageHours: null,
          stale: true,
        });
      }

      const ageHours = artifactAgeHours(generatedAt, new Date());
      const stale = ageHours >= fastify.earningsTtlHours;

      return reply.status(200).send({
        status: stale ? 'stale' : 'ok',
        count: Object.keys(index).length,
        generatedAt: generatedAt.toISOString(),
        ageHours,
        stale,
      });
    },
  );

  /**
   * GET /api/v1/earnings/:symbol
   */
  fastify.get(
    '/api/v1/earnings/:symbol',
    async (
      request: FastifyRequest<{ Params: { symbol: string } }>,
      reply: FastifyReply,
    ) => {
      const { index } = await fastify.earnings.get();
      const entry = lookup(index, request.params.symbol.trim());

      if (entry === undefined) {
        return reply.status(404).send({ error: 'No upcoming earnings for symbol' });
      }

      return reply.status(200).send(entry);
    },
  );
}

export default fp(earningsRoutes, {
  name: 'earnings-routes',
  dependencies: ['earnings'],
  fastify: '5.x',
});
