/**
 * CACHE ORCHESTRATOR
 * ==================
 *
 * Walks memory → store → provider for every read.
 *
 *   resolveSeries   daily bars for (symbol, range)
 *   resolveQuote    latest quote, LIVE in memory only
 *   resolveMetrics  risk analysis, cached at both tiers by fingerprint
 *   invalidate      drop memory entries and store coverage
 *
 * Locking:
 * - KeyedMutex per symbol guards cache check and write-back only
 * - provider fetches are started under the lock but awaited outside it
 * - one in-flight fetch per (symbol, sub-range); the coalesced unit
 *   includes the write-back, so a later reader either joins the fetch
 *   or sees its bars in the store
 *
 * A caller's deadline or AbortSignal only detaches that caller. The
 * shared fetch keeps running and still writes back.
 */

import type { EngineConfig } from '../../../config/env.js';
import {
  AppError,
  CancelledError,
  TimeoutError,
  ValidationError,
  toAppError,
} from '../../../common/errors.js';
import type { Clock, Logger } from '../../../common/host.deps.js';
import { systemClock } from '../../../common/host.deps.js';
import { KeyedMutex } from '../../shared/runtime/keyed-mutex.js';
import { LruCache } from '../../shared/runtime/lru-cache.js';
import { RequestCoalescer } from '../../shared/runtime/request-coalescer.js';
import { waitWithDeadline } from '../../shared/runtime/deadline.js';
import { analysisFingerprint, canonicalSubject, subjectSymbols } from '../../risk/analysis.fingerprint.js';
import { computePortfolioMetrics, computeSymbolMetrics } from '../../risk/risk.engine.js';
import type {
  AnalysisParams,
  AnalysisResult,
  AnalysisSubject,
  RiskMetrics,
} from '../../risk/risk.types.js';
import {
  contains,
  freshPart,
  inRange,
  mergeRanges,
  subtractRanges,
  toDayNumber,
  validateRange,
} from '../date-range.js';
import type {
  CoverageSegment,
  DataSource,
  DateRange,
  PriceBar,
  PriceSeries,
  Resolution,
  StaleDataWarning,
} from '../market-data.types.js';
import { normalizeSymbol } from '../symbol.js';
import type { InvalidateScope, PriceStore } from '../store/price-store.types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

/** What the orchestrator needs from the provider layer */
export interface MarketDataSource {
  fetchHistory(symbol: string, range: DateRange): Promise<PriceSeries>;
  fetchQuote(symbol: string): Promise<PriceBar>;
}

export type MemoryValue =
  | { kind: 'series'; series: PriceSeries }
  | { kind: 'quote'; bar: PriceBar }
  | { kind: 'analysis'; result: AnalysisResult };

export interface ResolveOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type OrchestratorConfig = Pick<
  EngineConfig,
  'ttl' | 'memoryMaxEntries' | 'mergePolicy' | 'requestTimeoutMs'
>;

export interface CacheOrchestratorDeps {
  store: PriceStore;
  source: MarketDataSource;
  config: OrchestratorConfig;
  logger: Logger;
  clock?: Clock;
}

type FetchOutcome =
  | { ok: true; series: PriceSeries }
  | { ok: false; range: DateRange; error: AppError };

type CheckResult =
  | { kind: 'hit'; series: PriceSeries }
  | { kind: 'miss'; pending: Promise<FetchOutcome>[] };

const seriesKey = (symbol: string) => `series:${symbol}`;
const quoteKey = (symbol: string) => `quote:${symbol}`;
const analysisKey = (key: string) => `analysis:${key}`;

function sliceSeries(series: PriceSeries, range: DateRange, source: DataSource): PriceSeries {
  return {
    symbol: series.symbol,
    range: { ...range },
    bars: series.bars.filter(b => inRange(b.date, range)).map(b => ({ ...b })),
    source,
    fetchedAt: series.fetchedAt,
  };
}

function newestFetch(segments: CoverageSegment[]): number {
  return segments.reduce((max, s) => Math.max(max, s.fetchedAt), 0);
}

function staleWarning(symbol: string, error: AppError, asOf: number): StaleDataWarning {
  return {
    code: 'STALE_DATA_RETURNED',
    symbol,
    cause: error.code,
    message: `Serving stored data for ${symbol}: ${error.message}`,
    asOf,
  };
}

/**
 * Callers get their own copy. Memory entries and coalesced results are
 * shared, so nothing a caller does to a result may reach them.
 */
function detach<T>(resolution: Resolution<T>): Resolution<T> {
  return structuredClone(resolution);
}

/** Caller-side failures are never answered with stale data */
function isCallerFailure(error: AppError): boolean {
  return (
    error instanceof ValidationError ||
    error instanceof TimeoutError ||
    error instanceof CancelledError
  );
}

// ═══════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════

export class CacheOrchestrator {
  private readonly memory: LruCache<MemoryValue>;
  private readonly mutex = new KeyedMutex();
  private readonly historyFlights = new RequestCoalescer<PriceSeries>();
  private readonly quoteFlights = new RequestCoalescer<PriceBar>();
  private readonly analysisFlights = new RequestCoalescer<Resolution<AnalysisResult>>();
  private readonly store: PriceStore;
  private readonly source: MarketDataSource;
  private readonly config: OrchestratorConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: CacheOrchestratorDeps) {
    this.store = deps.store;
    this.source = deps.source;
    this.config = deps.config;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.memory = new LruCache<MemoryValue>({
      maxSize: deps.config.memoryMaxEntries,
      ttl: {
        LIVE: deps.config.ttl.liveMs,
        HISTORICAL: deps.config.ttl.historicalMs,
        ANALYSIS: deps.config.ttl.analysisMs,
      },
      clock: this.clock,
    });
  }

  // ─────────────────────────────────────────────────────────────
  // Series
  // ─────────────────────────────────────────────────────────────

  resolveSeries(
    rawSymbol: string,
    range: DateRange,
    options: ResolveOptions = {}
  ): Promise<Resolution<PriceSeries>> {
    const symbol = normalizeSymbol(rawSymbol);
    validateRange(range);
    return this.withDeadline(
      this.seriesFlow(symbol, range).then(detach),
      options,
      `series ${symbol}`
    );
  }

  private async seriesFlow(symbol: string, range: DateRange): Promise<Resolution<PriceSeries>> {
    const check = await this.mutex.runExclusive(symbol, () => this.checkSeries(symbol, range));
    if (check.kind === 'hit') {
      return { status: 'FRESH', value: check.series };
    }

    const outcomes = await Promise.all(check.pending);
    const failures = outcomes.filter((o): o is Extract<FetchOutcome, { ok: false }> => !o.ok);
    const fetched = outcomes.filter((o): o is Extract<FetchOutcome, { ok: true }> => o.ok);

    return this.mutex.runExclusive(symbol, async () => {
      const slice = await this.store.get(symbol, range);
      const series: PriceSeries = {
        symbol,
        range: { ...range },
        bars: slice.bars,
        source: fetched.length > 0 ? fetched[fetched.length - 1].series.source : 'STORE',
        fetchedAt: newestFetch(slice.segments),
      };

      if (failures.length === 0) {
        this.memory.set(seriesKey(symbol), { kind: 'series', series }, 'LIVE');
        return { status: 'FRESH', value: series };
      }

      if (series.bars.length === 0) {
        throw failures[0].error;
      }

      const warnings = failures.map(f => staleWarning(symbol, f.error, series.fetchedAt));
      this.logger.warn(
        {
          symbol,
          range,
          missing: failures.map(f => f.range),
          code: failures[0].error.code,
        },
        'Provider unavailable, serving stored bars'
      );
      return { status: 'STALE', value: series, warnings };
    });
  }

  /**
   * Runs under the symbol lock. Starts (or joins) fetches for missing
   * sub-ranges but does not wait for them.
   */
  private async checkSeries(symbol: string, range: DateRange): Promise<CheckResult> {
    const cached = this.memory.get(seriesKey(symbol));
    if (cached?.kind === 'series' && contains(cached.series.range, range)) {
      return { kind: 'hit', series: sliceSeries(cached.series, range, 'MEMORY') };
    }

    const slice = await this.store.get(symbol, range);
    const now = this.clock.now();
    const stale = slice.segments.flatMap(seg => {
      const fresh = freshPart(seg, now, this.config.ttl.historicalMs);
      return fresh ? subtractRanges(seg, [fresh]) : [{ start: seg.start, end: seg.end }];
    });
    // uncovered gaps plus covered-but-stale tails, adjacent ones fetched together
    const missing = mergeRanges([...slice.gaps, ...stale]);

    if (missing.length === 0) {
      const series: PriceSeries = {
        symbol,
        range: { ...range },
        bars: slice.bars,
        source: 'STORE',
        fetchedAt: newestFetch(slice.segments),
      };
      this.memory.set(seriesKey(symbol), { kind: 'series', series }, 'LIVE');
      return { kind: 'hit', series };
    }

    this.logger.info({ symbol, range, missing }, 'Series cache miss');
    const pending = missing.map(sub =>
      this.historyFlights
        .run(`${symbol}:${sub.start}:${sub.end}`, () => this.fetchAndPersist(symbol, sub))
        .then(
          (series): FetchOutcome => ({ ok: true, series }),
          (error: unknown): FetchOutcome => ({ ok: false, range: sub, error: toAppError(error) })
        )
    );
    return { kind: 'miss', pending };
  }

  private async fetchAndPersist(symbol: string, range: DateRange): Promise<PriceSeries> {
    const series = await this.source.fetchHistory(symbol, range);
    await this.mutex.runExclusive(symbol, () => this.persist(series));
    return series;
  }

  /**
   * Merge a fetched series into the store. FRESHEST_WINS overwrites
   * differing stored bars; STORED_WINS only fills dates not yet stored.
   */
  private async persist(series: PriceSeries): Promise<void> {
    let toWrite = series;
    if (this.config.mergePolicy === 'STORED_WINS') {
      const existing = await this.store.get(series.symbol, series.range);
      const known = new Set(existing.bars.map(b => b.date));
      toWrite = { ...series, bars: series.bars.filter(b => !known.has(b.date)) };
    }
    const { written, revision } = await this.store.put(toWrite);
    this.logger.info(
      {
        symbol: series.symbol,
        range: series.range,
        provider: series.source,
        bars: series.bars.length,
        written,
        revision,
      },
      'Series written back'
    );
  }

  // ─────────────────────────────────────────────────────────────
  // Quotes
  // ─────────────────────────────────────────────────────────────

  async resolveQuote(rawSymbol: string, options: ResolveOptions = {}): Promise<Resolution<PriceBar>> {
    const symbol = normalizeSymbol(rawSymbol);

    const cached = this.memory.get(quoteKey(symbol));
    if (cached?.kind === 'quote') {
      return { status: 'FRESH', value: { ...cached.bar } };
    }

    try {
      const bar = await this.withDeadline(
        this.quoteFlights.run(symbol, async () => {
          const quote = await this.source.fetchQuote(symbol);
          this.memory.set(quoteKey(symbol), { kind: 'quote', bar: quote }, 'LIVE');
          return quote;
        }),
        options,
        `quote ${symbol}`
      );
      return { status: 'FRESH', value: { ...bar } };
    } catch (raw) {
      const error = toAppError(raw);
      if (isCallerFailure(error)) throw error;

      const fallback = await this.store.latestBar(symbol);
      if (!fallback) throw error;

      this.logger.warn(
        { symbol, code: error.code, date: fallback.date },
        'Quote unavailable, serving latest stored bar'
      );
      return {
        status: 'STALE',
        value: fallback,
        warnings: [staleWarning(symbol, error, toDayNumber(fallback.date) * DAY_MS)],
      };
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Metrics
  // ─────────────────────────────────────────────────────────────

  resolveMetrics(
    rawSubject: AnalysisSubject,
    params: AnalysisParams,
    options: ResolveOptions = {}
  ): Promise<Resolution<AnalysisResult>> {
    validateRange(params.range);
    const subject = canonicalSubject(rawSubject);
    const key = analysisFingerprint(subject, params);
    return this.withDeadline(
      this.analysisFlights.run(key, () => this.metricsFlow(key, subject, params)).then(detach),
      options,
      `metrics ${subjectSymbols(subject).join(',')}`
    );
  }

  private async metricsFlow(
    key: string,
    subject: AnalysisSubject,
    params: AnalysisParams
  ): Promise<Resolution<AnalysisResult>> {
    const symbols = subjectSymbols(subject);
    const dependencies = params.benchmark ? [...symbols, params.benchmark] : symbols;

    const cached = await this.cachedAnalysis(key, dependencies);
    if (cached) {
      return { status: 'FRESH', value: cached };
    }

    const resolved = await Promise.all(symbols.map(s => this.seriesFlow(s, params.range)));
    const benchmark = params.benchmark
      ? await this.seriesFlow(params.benchmark, params.range)
      : undefined;

    const seriesBySymbol = new Map<string, PriceSeries>();
    const warnings: StaleDataWarning[] = [];
    for (const r of benchmark ? [...resolved, benchmark] : resolved) {
      seriesBySymbol.set(r.value.symbol, r.value);
      if (r.status === 'STALE') warnings.push(...r.warnings);
    }

    let metrics: RiskMetrics;
    let perAsset: Record<string, RiskMetrics> | undefined;
    if (subject.kind === 'SYMBOL') {
      metrics = computeSymbolMetrics(resolved[0].value, params, benchmark?.value);
    } else {
      ({ metrics, perAsset } = computePortfolioMetrics(
        subject.allocations,
        seriesBySymbol,
        params,
        benchmark?.value
      ));
    }

    const result: AnalysisResult = {
      key,
      subject,
      symbols,
      range: { ...params.range },
      riskFreeRate: params.riskFreeRate,
      computedAt: this.clock.now(),
      seriesAsOf: Math.max(0, ...Array.from(seriesBySymbol.values(), s => s.fetchedAt)),
      seriesRevisions: await this.store.getRevisions(dependencies),
      metrics,
      ...(perAsset ? { perAsset } : {}),
    };

    if (warnings.length > 0) {
      return { status: 'STALE', value: result, warnings };
    }

    this.memory.set(analysisKey(key), { kind: 'analysis', result }, 'ANALYSIS', result.computedAt);
    await this.store.putAnalysis(result);
    this.logger.info({ key, symbols, observations: metrics.observations }, 'Analysis computed');
    return { status: 'FRESH', value: result };
  }

  /**
   * Memory then store. A cached analysis is valid only within the ANALYSIS
   * TTL and while every backing series is at the revision it was built on.
   */
  private async cachedAnalysis(key: string, dependencies: string[]): Promise<AnalysisResult | null> {
    const inMemory = this.memory.get(analysisKey(key));
    const stored = inMemory?.kind === 'analysis' ? null : await this.store.getAnalysis(key);
    const candidate = inMemory?.kind === 'analysis' ? inMemory.result : stored;
    if (!candidate) return null;

    if (this.clock.now() - candidate.computedAt >= this.config.ttl.analysisMs) {
      return null;
    }
    const revisions = await this.store.getRevisions(dependencies);
    const unchanged = dependencies.every(s => revisions[s] === candidate.seriesRevisions[s]);
    if (!unchanged) {
      this.memory.delete(analysisKey(key));
      return null;
    }

    if (stored) {
      this.memory.set(analysisKey(key), { kind: 'analysis', result: stored }, 'ANALYSIS', stored.computedAt);
    }
    return candidate;
  }

  // ─────────────────────────────────────────────────────────────
  // Invalidation
  // ─────────────────────────────────────────────────────────────

  async invalidate(scope: InvalidateScope): Promise<number> {
    if (scope === 'all') {
      const memoryCleared = this.memory.clear();
      const storeCleared = await this.store.invalidate('all');
      this.logger.info({ memoryCleared, storeCleared }, 'Cache invalidated');
      return memoryCleared + storeCleared;
    }

    const symbol = normalizeSymbol(scope.symbol);
    const memoryCleared = this.memory.deleteWhere((key, value) => {
      if (value.kind === 'analysis') return symbol in value.result.seriesRevisions;
      return key === seriesKey(symbol) || key === quoteKey(symbol);
    });
    const storeCleared = await this.mutex.runExclusive(symbol, () => this.store.invalidate({ symbol }));
    this.logger.info({ symbol, memoryCleared, storeCleared }, 'Cache invalidated');
    return memoryCleared + storeCleared;
  }

  memoryStats() {
    return {
      ...this.memory.stats(),
      inflight: this.historyFlights.size() + this.quoteFlights.size() + this.analysisFlights.size(),
    };
  }

  private withDeadline<T>(work: Promise<T>, options: ResolveOptions, label: string): Promise<T> {
    return waitWithDeadline(work, {
      timeoutMs: options.timeoutMs ?? this.config.requestTimeoutMs,
      signal: options.signal,
      label,
    });
  }
}
