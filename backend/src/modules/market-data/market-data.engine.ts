/**
 * MARKET DATA ENGINE
 * ==================
 *
 * Facade for collaborators. Every method resolves to an EngineResult and
 * never throws for domain failures: errors become `{ok: false, error}`,
 * stale answers carry their warnings.
 */

import type { EngineConfig } from '../../config/env.js';
import { ValidationError, toAppError } from '../../common/errors.js';
import type { Clock, Logger } from '../../common/host.deps.js';
import { systemClock } from '../../common/host.deps.js';
import { calculatePnl, computeWeights } from '../risk/risk.engine.js';
import type {
  Allocation,
  AnalysisResult,
  PnlSummary,
  Position,
} from '../risk/risk.types.js';
import type { CacheOrchestrator, ResolveOptions } from './cache/cache.orchestrator.js';
import { addDays, dayOf } from './date-range.js';
import type {
  DateRange,
  EngineResult,
  PriceBar,
  PriceSeries,
  Resolution,
  StaleDataWarning,
} from './market-data.types.js';
import type { ProviderHealth } from './providers/provider.types.js';
import { normalizeSymbol } from './symbol.js';

export interface HealthSource {
  getHealth(): ProviderHealth[];
}

export interface MarketDataEngineDeps {
  orchestrator: CacheOrchestrator;
  providers: HealthSource;
  config: EngineConfig;
  logger: Logger;
  clock?: Clock;
}

export interface ProviderHealthReport {
  providers: ProviderHealth[];
  memory: ReturnType<CacheOrchestrator['memoryStats']>;
}

export class MarketDataEngine {
  private readonly orchestrator: CacheOrchestrator;
  private readonly providers: HealthSource;
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: MarketDataEngineDeps) {
    this.orchestrator = deps.orchestrator;
    this.providers = deps.providers;
    this.config = deps.config;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
  }

  getHistoricalSeries(
    symbol: string,
    startDate: string,
    endDate: string,
    options?: ResolveOptions
  ): Promise<EngineResult<PriceSeries>> {
    return this.run('getHistoricalSeries', () =>
      this.orchestrator.resolveSeries(symbol, { start: startDate, end: endDate }, options)
    );
  }

  getLiveQuote(symbol: string, options?: ResolveOptions): Promise<EngineResult<PriceBar>> {
    return this.run('getLiveQuote', () => this.orchestrator.resolveQuote(symbol, options));
  }

  getPortfolioMetrics(
    allocations: Allocation[],
    riskFreeRate?: number,
    range?: DateRange,
    options?: ResolveOptions
  ): Promise<EngineResult<AnalysisResult>> {
    return this.run('getPortfolioMetrics', () => {
      const weighted = computeWeights(
        allocations.map(a => ({ symbol: normalizeSymbol(a.symbol), amount: a.amount }))
      );
      return this.orchestrator.resolveMetrics(
        { kind: 'PORTFOLIO', allocations: weighted },
        this.analysisParams(range, riskFreeRate),
        options
      );
    });
  }

  getSymbolMetrics(
    symbol: string,
    range?: DateRange,
    riskFreeRate?: number,
    options?: ResolveOptions
  ): Promise<EngineResult<AnalysisResult>> {
    return this.run('getSymbolMetrics', () =>
      this.orchestrator.resolveMetrics(
        { kind: 'SYMBOL', symbol: normalizeSymbol(symbol) },
        this.analysisParams(range, riskFreeRate),
        options
      )
    );
  }

  getPortfolioPnl(positions: Position[], options?: ResolveOptions): Promise<EngineResult<PnlSummary>> {
    return this.run('getPortfolioPnl', async (): Promise<Resolution<PnlSummary>> => {
      const normalized = validatePositions(positions);
      const symbols = Array.from(new Set(normalized.map(p => p.symbol)));
      const quotes = await Promise.all(symbols.map(s => this.orchestrator.resolveQuote(s, options)));

      const bySymbol = new Map<string, PriceBar>();
      const warnings: StaleDataWarning[] = [];
      for (const q of quotes) {
        bySymbol.set(q.value.symbol, q.value);
        if (q.status === 'STALE') warnings.push(...q.warnings);
      }

      const value = calculatePnl(normalized, bySymbol);
      return warnings.length > 0
        ? { status: 'STALE', value, warnings }
        : { status: 'FRESH', value };
    });
  }

  invalidateCache(scope: { symbol: string } | 'all'): Promise<EngineResult<{ cleared: number }>> {
    return this.run('invalidateCache', async (): Promise<Resolution<{ cleared: number }>> => ({
      status: 'FRESH',
      value: { cleared: await this.orchestrator.invalidate(scope) },
    }));
  }

  getProviderHealth(): EngineResult<ProviderHealthReport> {
    return {
      ok: true,
      stale: false,
      data: {
        providers: this.providers.getHealth(),
        memory: this.orchestrator.memoryStats(),
      },
    };
  }

  // ─────────────────────────────────────────────────────────────

  private analysisParams(range: DateRange | undefined, riskFreeRate: number | undefined) {
    const rf = riskFreeRate ?? this.config.riskFreeRate;
    if (!Number.isFinite(rf)) {
      throw new ValidationError('riskFreeRate must be a finite number');
    }
    return {
      range: range ?? this.defaultRange(),
      riskFreeRate: rf,
      minCorrelationSamples: this.config.minCorrelationSamples,
      benchmark: this.config.benchmarkSymbol ? normalizeSymbol(this.config.benchmarkSymbol) : undefined,
    };
  }

  private defaultRange(): DateRange {
    const end = dayOf(this.clock.now());
    return { start: addDays(end, -this.config.defaultLookbackDays), end };
  }

  private async run<T>(op: string, fn: () => Promise<Resolution<T>>): Promise<EngineResult<T>> {
    try {
      const resolution = await fn();
      if (resolution.status === 'STALE') {
        return { ok: true, stale: true, data: resolution.value, warnings: resolution.warnings };
      }
      return { ok: true, stale: false, data: resolution.value };
    } catch (raw) {
      const error = toAppError(raw);
      const entry = { op, code: error.code, err: error.message };
      if (error instanceof ValidationError) {
        this.logger.info(entry, 'Market data request rejected');
      } else {
        this.logger.warn(entry, 'Market data request failed');
      }
      return { ok: false, error: error.toJSON() };
    }
  }
}

function validatePositions(positions: Position[]): Position[] {
  if (positions.length === 0) {
    throw new ValidationError('Position set is empty');
  }
  return positions.map(p => {
    if (!Number.isFinite(p.quantity) || p.quantity < 0) {
      throw new ValidationError(`Quantity for ${p.symbol} must be a non-negative number`);
    }
    if (!Number.isFinite(p.costBasis) || p.costBasis < 0) {
      throw new ValidationError(`Cost basis for ${p.symbol} must be a non-negative number`);
    }
    return { ...p, symbol: normalizeSymbol(p.symbol) };
  });
}
