/**
 * Engine facade: result envelope, defaults, P&L
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { NotFoundError, TransientError } from '../../../common/errors.js';
import { createMarketDataEngine, MemoryPriceStore, type MarketDataEngine } from '../index.js';
import { bar, FakeSource, mockLogger, testClock, testConfig } from './fixtures.js';

const T0 = Date.UTC(2024, 2, 10, 12);
const DAY = 24 * 60 * 60 * 1000;

describe('MarketDataEngine', () => {
  let clock: ReturnType<typeof testClock>;
  let source: FakeSource;
  let logger: ReturnType<typeof mockLogger>;
  let engine: MarketDataEngine;

  beforeEach(() => {
    clock = testClock(T0);
    source = new FakeSource(clock);
    logger = mockLogger();
    engine = createMarketDataEngine(testConfig, {
      store: new MemoryPriceStore(),
      logger,
      clock,
      source,
    });
  });

  describe('getHistoricalSeries', () => {
    it('should return fresh data in an ok envelope', async () => {
      const result = await engine.getHistoricalSeries(' aapl ', '2024-03-01', '2024-03-05');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.stale).toBe(false);
      expect(result.data.symbol).toBe('AAPL');
      expect(result.data.bars.map(b => b.close)).toEqual([100, 101, 102, 103, 104]);
    });

    it('should return a validation failure without throwing', async () => {
      const result = await engine.getHistoricalSeries('AAPL', '2024-03-05', '2024-03-01');

      expect(result).toEqual({
        ok: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid date range: start 2024-03-05 is after end 2024-03-01',
          retryable: false,
        },
      });
      expect(logger.info).toHaveBeenCalledWith(
        expect.objectContaining({ op: 'getHistoricalSeries', code: 'VALIDATION_ERROR' }),
        'Market data request rejected'
      );
      expect(source.fetchHistory).not.toHaveBeenCalled();
    });

    it('should flag stored data served while providers fail', async () => {
      await engine.getHistoricalSeries('AAPL', '2024-03-05', '2024-03-10');
      clock.advance(2 * DAY);
      source.failWith = new TransientError('upstream 503');

      const result = await engine.getHistoricalSeries('AAPL', '2024-03-05', '2024-03-10');

      expect(result.ok).toBe(true);
      if (!result.ok || !result.stale) throw new Error('expected a stale result');
      expect(result.data.bars).toHaveLength(6);
      expect(result.warnings).toEqual([
        {
          code: 'STALE_DATA_RETURNED',
          symbol: 'AAPL',
          cause: 'TRANSIENT',
          message: 'Serving stored data for AAPL: upstream 503',
          asOf: T0,
        },
      ]);
    });

    it('should surface not found with nothing stored', async () => {
      source.failWith = new NotFoundError('Unknown symbol ZZZZ');

      const result = await engine.getHistoricalSeries('ZZZZ', '2024-03-01', '2024-03-05');

      expect(result).toEqual({
        ok: false,
        error: { code: 'NOT_FOUND', message: 'Unknown symbol ZZZZ', retryable: false },
      });
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ op: 'getHistoricalSeries', code: 'NOT_FOUND' }),
        'Market data request failed'
      );
    });
  });

  describe('metrics', () => {
    it('should default to the lookback window ending today and cache the analysis', async () => {
      const allocations = [
        { symbol: 'aapl', amount: 500 },
        { symbol: 'MSFT', amount: 500 },
      ];

      const first = await engine.getPortfolioMetrics(allocations);
      const second = await engine.getPortfolioMetrics(allocations);

      if (!first.ok || !second.ok) throw new Error('expected success');
      expect(first.data.range).toEqual({ start: '2024-02-09', end: '2024-03-10' });
      expect(first.data.symbols).toEqual(['AAPL', 'MSFT']);
      expect(first.data.metrics.observations).toBe(30);
      expect(first.data.metrics.correlationMatrix?.values[0][1]).toBeCloseTo(1, 12);
      expect(Object.keys(first.data.perAsset ?? {})).toEqual(['AAPL', 'MSFT']);
      expect(second.data.key).toBe(first.data.key);
      expect(source.fetchHistory).toHaveBeenCalledTimes(2);
    });

    it('should reject allocations that sum to zero', async () => {
      const result = await engine.getPortfolioMetrics([
        { symbol: 'AAPL', amount: 0 },
        { symbol: 'MSFT', amount: 0 },
      ]);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(source.fetchHistory).not.toHaveBeenCalled();
    });

    it('should honour an explicit risk-free rate and range for a symbol', async () => {
      const result = await engine.getSymbolMetrics(
        'AAPL',
        { start: '2024-03-01', end: '2024-03-05' },
        0.05
      );

      if (!result.ok) throw new Error('expected success');
      expect(result.data.riskFreeRate).toBe(0.05);
      expect(result.data.subject).toEqual({ kind: 'SYMBOL', symbol: 'AAPL' });
      expect(result.data.metrics.observations).toBe(4);
    });
  });

  describe('getPortfolioPnl', () => {
    it('should price positions from live quotes', async () => {
      source.quotes.set('AAPL', bar('AAPL', '2024-03-10', 171.25));
      source.quotes.set('MSFT', bar('MSFT', '2024-03-10', 380));

      const result = await engine.getPortfolioPnl([
        { symbol: 'aapl', quantity: 10, costBasis: 1500 },
        { symbol: 'MSFT', quantity: 5, costBasis: 2000 },
      ]);

      if (!result.ok) throw new Error('expected success');
      expect(result.stale).toBe(false);
      expect(result.data.totalValue).toBe(3612.5);
      expect(result.data.totalPnl).toBe(112.5);
      expect(result.data.positions[0].symbol).toBe('AAPL');
    });

    it('should fall back to the latest stored close when the quote fails', async () => {
      await engine.getHistoricalSeries('AAPL', '2024-03-01', '2024-03-05');

      const result = await engine.getPortfolioPnl([{ symbol: 'AAPL', quantity: 2, costBasis: 100 }]);

      if (!result.ok || !result.stale) throw new Error('expected a stale result');
      expect(result.data.positions[0]).toMatchObject({ price: 104, priceDate: '2024-03-05', pnl: 108 });
      expect(result.warnings[0].asOf).toBe(Date.UTC(2024, 2, 5));
    });

    it('should fail when a quote is unavailable and nothing is stored', async () => {
      const result = await engine.getPortfolioPnl([{ symbol: 'AAPL', quantity: 1, costBasis: 1 }]);

      expect(result).toEqual({
        ok: false,
        error: { code: 'TRANSIENT', message: 'no scripted quote for AAPL', retryable: true },
      });
    });

    it('should reject an empty position set and negative quantities', async () => {
      const empty = await engine.getPortfolioPnl([]);
      const negative = await engine.getPortfolioPnl([{ symbol: 'AAPL', quantity: -1, costBasis: 1 }]);

      expect(empty.ok || empty.error.code).toBe('VALIDATION_ERROR');
      expect(negative.ok || negative.error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('admin', () => {
    it('should report cleared entries on invalidation', async () => {
      await engine.getHistoricalSeries('AAPL', '2024-03-01', '2024-03-05');

      // memory series entry + store coverage
      expect(await engine.invalidateCache({ symbol: 'aapl' })).toEqual({
        ok: true,
        stale: false,
        data: { cleared: 2 },
      });
    });

    it('should expose provider and memory health', () => {
      const result = engine.getProviderHealth();

      if (!result.ok) throw new Error('expected success');
      expect(result.data.providers).toEqual([{ id: 'ALPHA_VANTAGE', status: 'UP', errorStreak: 0 }]);
      expect(result.data.memory.inflight).toBe(0);
    });
  });
});
