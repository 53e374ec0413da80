/**
 * Persistent Price Store Contract
 */

import type { AnalysisResult } from '../../risk/risk.types.js';
import type {
  CoverageSegment,
  DateRange,
  PriceBar,
  PriceSeries,
} from '../market-data.types.js';

export interface StoredSlice {
  bars: PriceBar[];             // ascending, within the requested range
  segments: CoverageSegment[];  // coverage clipped to the range
  gaps: DateRange[];            // uncovered sub-ranges
  revision: number;
}

export interface PutResult {
  written: number; // bars inserted or changed
  revision: number;
}

export type InvalidateScope = { symbol: string } | 'all';

export interface PriceStore {
  get(symbol: string, range: DateRange): Promise<StoredSlice>;

  /**
   * Upsert bars and record `series.range` as covered at `series.fetchedAt`.
   * Identical bars are no-ops; the revision moves only when bars change.
   */
  put(series: PriceSeries): Promise<PutResult>;

  latestBar(symbol: string): Promise<PriceBar | null>;

  getRevisions(symbols: string[]): Promise<Record<string, number>>;

  getAnalysis(key: string): Promise<AnalysisResult | null>;
  putAnalysis(result: AnalysisResult): Promise<void>;

  /** Drops coverage (bars stay) and analyses; returns records cleared */
  invalidate(scope: InvalidateScope): Promise<number>;
}

export function sameBar(a: PriceBar, b: PriceBar): boolean {
  return (
    a.open === b.open &&
    a.high === b.high &&
    a.low === b.low &&
    a.close === b.close &&
    a.volume === b.volume
  );
}
