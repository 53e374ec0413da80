/**
 * Risk Analytics Engine
 * =====================
 *
 * Pure functions over price series. No I/O, no clock, deterministic.
 *
 * Conventions:
 * - daily return r[t] = (c[t] - c[t-1]) / c[t-1], dated at t, skipped when c[t-1] == 0
 * - annualization uses 252 trading days
 * - undefined statistics are null
 */

import { ValidationError } from '../../common/errors.js';
import type { PriceBar, PriceSeries } from '../market-data/market-data.types.js';
import {
  TRADING_DAYS_PER_YEAR,
  type Allocation,
  type AnalysisParams,
  type CorrelationMatrix,
  type PnlSummary,
  type PortfolioWeight,
  type Position,
  type PositionPnl,
  type ReturnPoint,
  type RiskMetrics,
  type WeightedAllocation,
} from './risk.types.js';

export const WEIGHT_TOLERANCE = 1e-6;
export const MIN_BETA_SAMPLES = 30;
const ZERO_VARIANCE = 1e-15;

// ═══════════════════════════════════════════════════════════════
// RETURNS & MOMENTS
// ═══════════════════════════════════════════════════════════════

export function dailyReturns(bars: PriceBar[]): ReturnPoint[] {
  const out: ReturnPoint[] = [];
  for (let t = 1; t < bars.length; t++) {
    const prev = bars[t - 1].close;
    if (prev === 0) continue;
    out.push({ date: bars[t].date, value: (bars[t].close - prev) / prev });
  }
  return out;
}

export function mean(xs: number[]): number | null {
  if (xs.length === 0) return null;
  let sum = 0;
  for (const x of xs) sum += x;
  return sum / xs.length;
}

/** Sample (n - 1) standard deviation */
export function sampleStd(xs: number[]): number | null {
  const m = mean(xs);
  if (m === null || xs.length < 2) return null;
  let ss = 0;
  for (const x of xs) ss += (x - m) ** 2;
  return Math.sqrt(ss / (xs.length - 1));
}

export function annualizedVolatility(returns: number[]): number | null {
  const sd = sampleStd(returns);
  return sd === null ? null : sd * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

/**
 * (mean × 252 − rf) / volatility. Null for a zero-variance series rather
 * than ±Infinity.
 */
export function sharpeRatio(returns: number[], riskFreeRate: number): number | null {
  const m = mean(returns);
  const vol = annualizedVolatility(returns);
  if (m === null || vol === null || vol < ZERO_VARIANCE) return null;
  return (m * TRADING_DAYS_PER_YEAR - riskFreeRate) / vol;
}

export function sortinoRatio(returns: number[], riskFreeRate: number): number | null {
  const m = mean(returns);
  const downside = annualizedVolatility(returns.filter(r => r < 0));
  if (m === null || downside === null || downside < ZERO_VARIANCE) return null;
  return (m * TRADING_DAYS_PER_YEAR - riskFreeRate) / downside;
}

/** Largest peak-to-trough decline, as a non-positive fraction */
export function maxDrawdown(prices: number[]): number | null {
  if (prices.length === 0) return null;
  let peak = prices[0];
  let worst = 0;
  for (const p of prices) {
    if (p > peak) peak = p;
    if (peak > 0) {
      const dd = (p - peak) / peak;
      if (dd < worst) worst = dd;
    }
  }
  return worst;
}

/** Linear-interpolated quantile, q in [0, 1] */
export function quantile(xs: number[], q: number): number | null {
  if (xs.length === 0) return null;
  const sorted = [...xs].sort((a, b) => a - b);
  const pos = q * (sorted.length - 1);
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function valueAtRisk(returns: number[], confidence: number): number | null {
  const q = quantile(returns, 1 - confidence);
  return q === null ? null : -q;
}

export function expectedShortfall(returns: number[], confidence: number): number | null {
  const v = valueAtRisk(returns, confidence);
  if (v === null) return null;
  const tail = mean(returns.filter(r => r <= -v));
  return tail === null ? null : -tail;
}

/** Null without a drawdown to divide by */
export function calmarRatio(annualReturn: number | null, drawdown: number | null): number | null {
  if (annualReturn === null || drawdown === null || Math.abs(drawdown) < ZERO_VARIANCE) return null;
  return annualReturn / Math.abs(drawdown);
}

function centralMoments(xs: number[]): { m2: number; m3: number; m4: number } | null {
  const m = mean(xs);
  if (m === null) return null;
  let m2 = 0;
  let m3 = 0;
  let m4 = 0;
  for (const x of xs) {
    const d = x - m;
    m2 += d * d;
    m3 += d * d * d;
    m4 += d * d * d * d;
  }
  const n = xs.length;
  return { m2: m2 / n, m3: m3 / n, m4: m4 / n };
}

/** Adjusted Fisher-Pearson skewness; needs 3 returns and some variance */
export function skewness(xs: number[]): number | null {
  const n = xs.length;
  const moments = n >= 3 ? centralMoments(xs) : null;
  if (!moments || moments.m2 < ZERO_VARIANCE) return null;
  const g1 = moments.m3 / moments.m2 ** 1.5;
  return (g1 * Math.sqrt(n * (n - 1))) / (n - 2);
}

/** Bias-adjusted excess kurtosis (0 for a normal sample); needs 4 returns */
export function excessKurtosis(xs: number[]): number | null {
  const n = xs.length;
  const moments = n >= 4 ? centralMoments(xs) : null;
  if (!moments || moments.m2 < ZERO_VARIANCE) return null;
  const g2 = moments.m4 / moments.m2 ** 2 - 3;
  return ((n - 1) / ((n - 2) * (n - 3))) * ((n + 1) * g2 + 6);
}

// ═══════════════════════════════════════════════════════════════
// CO-MOVEMENT
// ═══════════════════════════════════════════════════════════════

/**
 * Inner join of two return series on date.
 */
export function alignReturns(a: ReturnPoint[], b: ReturnPoint[]): { x: number[]; y: number[] } {
  const byDate = new Map(b.map(p => [p.date, p.value]));
  const x: number[] = [];
  const y: number[] = [];
  for (const p of a) {
    const other = byDate.get(p.date);
    if (other !== undefined) {
      x.push(p.value);
      y.push(other);
    }
  }
  return { x, y };
}

export function pearson(x: number[], y: number[]): number | null {
  const mx = mean(x);
  const my = mean(y);
  if (mx === null || my === null || x.length !== y.length || x.length < 2) return null;
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < x.length; i++) {
    const dx = x[i] - mx;
    const dy = y[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }
  if (sxx < ZERO_VARIANCE || syy < ZERO_VARIANCE) return null;
  const r = sxy / Math.sqrt(sxx * syy);
  return Math.max(-1, Math.min(1, r));
}

/**
 * Pairwise Pearson correlation, each pair aligned on its own common dates.
 * Symmetric with a unit diagonal; pairs below minSamples are null.
 */
export function correlationMatrix(
  returnsBySymbol: { symbol: string; returns: ReturnPoint[] }[],
  minSamples: number
): CorrelationMatrix {
  const n = returnsBySymbol.length;
  const values: (number | null)[][] = Array.from({ length: n }, () => new Array<number | null>(n).fill(null));
  const observations: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(0));

  for (let i = 0; i < n; i++) {
    values[i][i] = 1;
    observations[i][i] = returnsBySymbol[i].returns.length;
    for (let j = i + 1; j < n; j++) {
      const { x, y } = alignReturns(returnsBySymbol[i].returns, returnsBySymbol[j].returns);
      const r = x.length >= minSamples ? pearson(x, y) : null;
      values[i][j] = r;
      values[j][i] = r;
      observations[i][j] = x.length;
      observations[j][i] = x.length;
    }
  }

  return { symbols: returnsBySymbol.map(s => s.symbol), values, observations };
}

export function beta(asset: ReturnPoint[], benchmark: ReturnPoint[]): number | null {
  const { x, y } = alignReturns(asset, benchmark);
  if (x.length < MIN_BETA_SAMPLES) return null;
  const mx = mean(x);
  const my = mean(y);
  if (mx === null || my === null) return null;
  let cov = 0;
  let varB = 0;
  for (let i = 0; i < x.length; i++) {
    cov += (x[i] - mx) * (y[i] - my);
    varB += (y[i] - my) ** 2;
  }
  if (varB < ZERO_VARIANCE) return null;
  return cov / varB;
}

// ═══════════════════════════════════════════════════════════════
// PORTFOLIO
// ═══════════════════════════════════════════════════════════════

/**
 * weight = amount / Σ amounts. Rejects empty, duplicate, negative,
 * non-finite and zero-sum allocations.
 */
export function computeWeights(allocations: Allocation[]): WeightedAllocation[] {
  if (allocations.length === 0) {
    throw new ValidationError('Allocation set is empty');
  }
  const seen = new Set<string>();
  let total = 0;
  for (const a of allocations) {
    if (seen.has(a.symbol)) {
      throw new ValidationError(`Duplicate allocation for ${a.symbol}`);
    }
    seen.add(a.symbol);
    if (!Number.isFinite(a.amount) || a.amount < 0) {
      throw new ValidationError(`Allocation for ${a.symbol} must be a non-negative amount`);
    }
    total += a.amount;
  }
  if (!(total > 0)) {
    throw new ValidationError('Allocation amounts sum to zero');
  }

  const weighted = allocations.map(a => ({ ...a, weight: a.amount / total }));
  const sum = weighted.reduce((s, a) => s + a.weight, 0);
  if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
    throw new ValidationError(`Weights sum to ${sum}, expected 1`);
  }
  return weighted;
}

/**
 * Σ weight_i × r_i(t) for every date where all constituents have a return.
 */
export function weightedPortfolioReturns(
  allocations: PortfolioWeight[],
  returnsBySymbol: Map<string, ReturnPoint[]>
): ReturnPoint[] {
  const lookups = allocations.map(a => ({
    weight: a.weight,
    byDate: new Map((returnsBySymbol.get(a.symbol) ?? []).map(p => [p.date, p.value])),
  }));
  const first = returnsBySymbol.get(allocations[0]?.symbol ?? '') ?? [];

  const out: ReturnPoint[] = [];
  for (const { date } of first) {
    let total = 0;
    let complete = true;
    for (const l of lookups) {
      const r = l.byDate.get(date);
      if (r === undefined) {
        complete = false;
        break;
      }
      total += l.weight * r;
    }
    if (complete) out.push({ date, value: total });
  }
  return out;
}

/** Growth of 1 under the given returns, starting at 1 */
export function cumulativeIndex(returns: ReturnPoint[]): number[] {
  const out = [1];
  for (const r of returns) out.push(out[out.length - 1] * (1 + r.value));
  return out;
}

export function summarize(returns: ReturnPoint[], prices: number[], riskFreeRate: number): RiskMetrics {
  const values = returns.map(r => r.value);
  const m = mean(values);
  const annualReturn = m === null ? null : m * TRADING_DAYS_PER_YEAR;
  const drawdown = maxDrawdown(prices);
  return {
    observations: values.length,
    meanReturn: m,
    annualReturn,
    volatility: annualizedVolatility(values),
    sharpeRatio: sharpeRatio(values, riskFreeRate),
    sortinoRatio: sortinoRatio(values, riskFreeRate),
    calmarRatio: calmarRatio(annualReturn, drawdown),
    maxDrawdown: drawdown,
    valueAtRisk95: valueAtRisk(values, 0.95),
    valueAtRisk99: valueAtRisk(values, 0.99),
    expectedShortfall95: expectedShortfall(values, 0.95),
    expectedShortfall99: expectedShortfall(values, 0.99),
    skewness: skewness(values),
    kurtosis: excessKurtosis(values),
  };
}

// ═══════════════════════════════════════════════════════════════
// ENTRY POINTS
// ═══════════════════════════════════════════════════════════════

export function computeSymbolMetrics(
  series: PriceSeries,
  params: AnalysisParams,
  benchmark?: PriceSeries
): RiskMetrics {
  const returns = dailyReturns(series.bars);
  const metrics = summarize(returns, series.bars.map(b => b.close), params.riskFreeRate);
  if (benchmark) {
    metrics.beta = beta(returns, dailyReturns(benchmark.bars));
  }
  return metrics;
}

export function computePortfolioMetrics(
  allocations: PortfolioWeight[],
  seriesBySymbol: Map<string, PriceSeries>,
  params: AnalysisParams,
  benchmark?: PriceSeries
): { metrics: RiskMetrics; perAsset: Record<string, RiskMetrics> } {
  const returnsBySymbol = new Map<string, ReturnPoint[]>();
  const perAsset: Record<string, RiskMetrics> = {};

  for (const a of allocations) {
    const series = seriesBySymbol.get(a.symbol);
    const bars = series?.bars ?? [];
    const returns = dailyReturns(bars);
    returnsBySymbol.set(a.symbol, returns);
    perAsset[a.symbol] = summarize(returns, bars.map(b => b.close), params.riskFreeRate);
  }

  const portfolio = weightedPortfolioReturns(allocations, returnsBySymbol);
  const metrics = summarize(portfolio, cumulativeIndex(portfolio), params.riskFreeRate);
  metrics.correlationMatrix = correlationMatrix(
    allocations.map(a => ({ symbol: a.symbol, returns: returnsBySymbol.get(a.symbol) ?? [] })),
    params.minCorrelationSamples
  );
  if (benchmark) {
    metrics.beta = beta(portfolio, dailyReturns(benchmark.bars));
  }
  return { metrics, perAsset };
}

/**
 * P&L per position: price × quantity − costBasis.
 */
export function calculatePnl(
  positions: Position[],
  quotes: Map<string, PriceBar>
): PnlSummary {
  const rows: PositionPnl[] = positions.map(p => {
    const quote = quotes.get(p.symbol);
    if (!quote) {
      throw new ValidationError(`No price for ${p.symbol}`);
    }
    const marketValue = quote.close * p.quantity;
    const pnl = marketValue - p.costBasis;
    return {
      ...p,
      price: quote.close,
      priceDate: quote.date,
      marketValue,
      pnl,
      pnlPercent: p.costBasis > 0 ? (pnl / p.costBasis) * 100 : 0,
    };
  });

  const totalValue = rows.reduce((s, r) => s + r.marketValue, 0);
  const totalCost = rows.reduce((s, r) => s + r.costBasis, 0);
  const totalPnl = totalValue - totalCost;

  return {
    positions: rows,
    totalValue,
    totalCost,
    totalPnl,
    pnlPercent: totalCost > 0 ? (totalPnl / totalCost) * 100 : 0,
  };
}
