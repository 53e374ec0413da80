/**
 * Market Data Types
 * =================
 *
 * Normalized contracts shared by providers, store, cache and analytics.
 * Providers map their payloads into these; nothing downstream knows which
 * provider a bar came from except through `source`.
 */

import type { ErrorBody, ErrorCode } from '../../common/errors.js';

// ═══════════════════════════════════════════════════════════════
// BARS & SERIES
// ═══════════════════════════════════════════════════════════════

/** ISO calendar day, YYYY-MM-DD (UTC). */
export type IsoDay = string;

export interface DateRange {
  start: IsoDay; // inclusive
  end: IsoDay;   // inclusive
}

export interface PriceBar {
  symbol: string;
  date: IsoDay;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type DataSource = 'ALPHA_VANTAGE' | 'YAHOO' | 'STORE' | 'MEMORY';

export interface PriceSeries {
  symbol: string;
  range: DateRange;
  bars: PriceBar[];   // ascending by date, unique dates
  source: DataSource;
  fetchedAt: number;  // latest provider fetch backing these bars
}

// ═══════════════════════════════════════════════════════════════
// CACHE
// ═══════════════════════════════════════════════════════════════

export type TtlClass = 'LIVE' | 'HISTORICAL' | 'ANALYSIS';

export interface CoverageSegment extends DateRange {
  fetchedAt: number;
}

// ═══════════════════════════════════════════════════════════════
// STALENESS & RESULTS
// ═══════════════════════════════════════════════════════════════

export interface StaleDataWarning {
  code: 'STALE_DATA_RETURNED';
  symbol: string;
  cause: ErrorCode;
  message: string;
  asOf: number; // fetchedAt of the newest data actually returned
}

export type Resolution<T> =
  | { status: 'FRESH'; value: T }
  | { status: 'STALE'; value: T; warnings: StaleDataWarning[] };

/**
 * Envelope returned to collaborators. Hard failures and stale-but-served
 * data are separate variants so they can never be confused.
 */
export type EngineResult<T> =
  | { ok: true; stale: false; data: T }
  | { ok: true; stale: true; data: T; warnings: StaleDataWarning[] }
  | { ok: false; error: ErrorBody };
