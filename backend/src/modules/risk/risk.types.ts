/**
 * Risk Analytics Types
 */

import type { DateRange, IsoDay } from '../market-data/market-data.types.js';

export const TRADING_DAYS_PER_YEAR = 252;

export interface ReturnPoint {
  date: IsoDay; // date of the later close
  value: number;
}

export interface CorrelationMatrix {
  symbols: string[];
  /** values[i][j]; null when the pair has too few overlapping returns */
  values: (number | null)[][];
  /** overlapping return count per pair */
  observations: number[][];
}

/**
 * Undefined statistics are null, never NaN or Infinity.
 */
export interface RiskMetrics {
  observations: number;
  meanReturn: number | null;        // mean daily return
  annualReturn: number | null;      // mean × 252
  volatility: number | null;        // sample std × √252
  sharpeRatio: number | null;       // null when volatility is 0 or undefined
  sortinoRatio: number | null;
  calmarRatio: number | null;       // annualReturn / |maxDrawdown|
  maxDrawdown: number | null;       // ≤ 0
  valueAtRisk95: number | null;     // historical, positive = loss
  valueAtRisk99: number | null;
  expectedShortfall95: number | null;
  expectedShortfall99: number | null;
  skewness: number | null;          // bias-adjusted sample skewness
  kurtosis: number | null;          // bias-adjusted excess kurtosis
  beta?: number | null;
  correlationMatrix?: CorrelationMatrix;
}

export interface Allocation {
  symbol: string;
  amount: number; // dollars
}

export interface PortfolioWeight {
  symbol: string;
  weight: number; // fraction of the portfolio, weights sum to 1
}

export interface WeightedAllocation extends Allocation, PortfolioWeight {}

export interface Position {
  symbol: string;
  quantity: number;
  costBasis: number; // total dollars paid
}

export interface PositionPnl extends Position {
  price: number;
  priceDate: IsoDay;
  marketValue: number;
  pnl: number;
  pnlPercent: number;
}

export interface PnlSummary {
  positions: PositionPnl[];
  totalValue: number;
  totalCost: number;
  totalPnl: number;
  pnlPercent: number;
}

export type AnalysisSubject =
  | { kind: 'SYMBOL'; symbol: string }
  /** Weights only; dollar amounts do not change the analysis */
  | { kind: 'PORTFOLIO'; allocations: PortfolioWeight[] };

export interface AnalysisParams {
  range: DateRange;
  riskFreeRate: number;
  minCorrelationSamples: number;
  benchmark?: string;
}

export interface AnalysisResult {
  key: string;
  subject: AnalysisSubject;
  symbols: string[];
  range: DateRange;
  riskFreeRate: number;
  computedAt: number;
  /** newest fetchedAt among backing series */
  seriesAsOf: number;
  /** store revision of each backing series when computed */
  seriesRevisions: Record<string, number>;
  metrics: RiskMetrics;
  perAsset?: Record<string, RiskMetrics>;
}
