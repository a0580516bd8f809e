/**
 * Market Data — API Routes
 *
 *   GET    /api/market/v1/cache  — Cache stats
 *   DELETE /api/market/v1/cache  — Invalidate (optional ?pattern=)
 */

import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { MarketDataService } from './market_data.service.js';

export interface MarketDataRoutesOptions {
  marketData: MarketDataService;
}

export async function marketDataRoutes(fastify: FastifyInstance, opts: MarketDataRoutesOptions): Promise<void> {
  const { marketData } = opts;

  fastify.get('/api/market/v1/cache', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({ ok: true, ...marketData.cacheStats() });
  });

  fastify.delete('/api/market/v1/cache', async (
    request: FastifyRequest<{ Querystring: { pattern?: string } }>,
    reply: FastifyReply
  ) => {
    const invalidated = marketData.invalidate(request.query.pattern || undefined);
    return reply.send({ ok: true, invalidated });
  });

  console.log('[MarketData] Routes registered at /api/market/v1/*');
}
