/**
 * Market Data Routes
 * ==================
 *
 * ENDPOINTS (prefix /api/v1/market-data):
 *   GET    /series/:symbol?start&end              - Daily bars
 *   GET    /quote/:symbol                         - Latest quote
 *   POST   /metrics/portfolio                     - Portfolio risk metrics
 *   GET    /metrics/symbol/:symbol?start&end&riskFreeRate
 *   POST   /pnl                                   - Position P&L
 *   DELETE /cache?symbol=                         - Invalidate (all when no symbol)
 *   GET    /providers/health                      - Provider + memory cache health
 */

import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { ValidationError, type ErrorCode } from '../../common/errors.js';
import type { EngineResult } from './market-data.types.js';
import type { MarketDataEngine } from './market-data.engine.js';

const HTTP_STATUS: Record<ErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  RATE_LIMITED: 429,
  TRANSIENT: 503,
  TIMEOUT: 504,
  CANCELLED: 499,
};

// ═══════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════

const SymbolParams = z.object({ symbol: z.string().min(1) });

const SeriesQuery = z.object({
  start: z.string(),
  end: z.string(),
});

const SymbolMetricsQuery = z.object({
  start: z.string().optional(),
  end: z.string().optional(),
  riskFreeRate: z.coerce.number().optional(),
});

const PortfolioMetricsBody = z.object({
  allocations: z.array(z.object({ symbol: z.string(), amount: z.number() })).min(1),
  riskFreeRate: z.number().optional(),
  start: z.string().optional(),
  end: z.string().optional(),
});

const PnlBody = z.object({
  positions: z
    .array(z.object({ symbol: z.string(), quantity: z.number(), costBasis: z.number() }))
    .min(1),
});

const CacheQuery = z.object({ symbol: z.string().min(1).optional() });

/** Both bounds or neither; neither means the default lookback */
function rangeOf(start?: string, end?: string) {
  if (start === undefined && end === undefined) return undefined;
  if (start === undefined || end === undefined) {
    throw new ValidationError('start and end must be given together');
  }
  return { start, end };
}

function send<T>(reply: FastifyReply, result: EngineResult<T>) {
  if (!result.ok) {
    return reply.status(HTTP_STATUS[result.error.code]).send({
      ok: false,
      error: result.error.code,
      message: result.error.message,
      retryable: result.error.retryable,
    });
  }
  return reply.status(200).send(result);
}

// ═══════════════════════════════════════════════════════════════
// ROUTES
// ═══════════════════════════════════════════════════════════════

export async function marketDataRoutes(
  fastify: FastifyInstance,
  opts: { engine: MarketDataEngine }
): Promise<void> {
  const { engine } = opts;

  fastify.get('/series/:symbol', async (request, reply) => {
    const { symbol } = SymbolParams.parse(request.params);
    const { start, end } = SeriesQuery.parse(request.query);
    return send(reply, await engine.getHistoricalSeries(symbol, start, end));
  });

  fastify.get('/quote/:symbol', async (request, reply) => {
    const { symbol } = SymbolParams.parse(request.params);
    return send(reply, await engine.getLiveQuote(symbol));
  });

  // ─────────────────────────────────────────────────────────────
  // Analytics
  // ─────────────────────────────────────────────────────────────

  fastify.post('/metrics/portfolio', async (request, reply) => {
    const body = PortfolioMetricsBody.parse(request.body);
    return send(
      reply,
      await engine.getPortfolioMetrics(body.allocations, body.riskFreeRate, rangeOf(body.start, body.end))
    );
  });

  fastify.get('/metrics/symbol/:symbol', async (request, reply) => {
    const { symbol } = SymbolParams.parse(request.params);
    const query = SymbolMetricsQuery.parse(request.query);
    return send(
      reply,
      await engine.getSymbolMetrics(symbol, rangeOf(query.start, query.end), query.riskFreeRate)
    );
  });

  fastify.post('/pnl', async (request, reply) => {
    const { positions } = PnlBody.parse(request.body);
    return send(reply, await engine.getPortfolioPnl(positions));
  });

  // ─────────────────────────────────────────────────────────────
  // Admin
  // ─────────────────────────────────────────────────────────────

  fastify.delete('/cache', async (request, reply) => {
    const { symbol } = CacheQuery.parse(request.query);
    return send(reply, await engine.invalidateCache(symbol ? { symbol } : 'all'));
  });

  fastify.get('/providers/health', async (_request, reply) => {
    return send(reply, engine.getProviderHealth());
  });
}
