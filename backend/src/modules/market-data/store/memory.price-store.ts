/**
 * In-process PriceStore. Used by tests and STORE_DRIVER=memory.
 * Returns copies so callers never alias stored state.
 */

import type { AnalysisResult } from '../../risk/risk.types.js';
import { applyCoverage, clipSegments, inRange, subtractRanges } from '../date-range.js';
import type {
  CoverageSegment,
  DateRange,
  IsoDay,
  PriceBar,
  PriceSeries,
} from '../market-data.types.js';
import {
  sameBar,
  type InvalidateScope,
  type PriceStore,
  type PutResult,
  type StoredSlice,
} from './price-store.types.js';

interface SymbolRecord {
  bars: Map<IsoDay, PriceBar>;
  segments: CoverageSegment[];
  revision: number;
}

export class MemoryPriceStore implements PriceStore {
  private symbols = new Map<string, SymbolRecord>();
  private analyses = new Map<string, AnalysisResult>();

  async get(symbol: string, range: DateRange): Promise<StoredSlice> {
    const record = this.symbols.get(symbol);
    if (!record) {
      return { bars: [], segments: [], gaps: [{ ...range }], revision: 0 };
    }
    const bars = Array.from(record.bars.values())
      .filter(b => inRange(b.date, range))
      .sort((a, b) => (a.date < b.date ? -1 : 1))
      .map(b => ({ ...b }));
    const segments = clipSegments(record.segments, range);
    return {
      bars,
      segments,
      gaps: subtractRanges(range, segments),
      revision: record.revision,
    };
  }

  async put(series: PriceSeries): Promise<PutResult> {
    const record = this.record(series.symbol);
    let written = 0;
    for (const bar of series.bars) {
      const existing = record.bars.get(bar.date);
      if (existing && sameBar(existing, bar)) continue;
      record.bars.set(bar.date, { ...bar });
      written++;
    }
    if (written > 0) record.revision++;
    record.segments = applyCoverage(record.segments, {
      ...series.range,
      fetchedAt: series.fetchedAt,
    });
    return { written, revision: record.revision };
  }

  async latestBar(symbol: string): Promise<PriceBar | null> {
    const record = this.symbols.get(symbol);
    if (!record) return null;
    let latest: PriceBar | null = null;
    for (const bar of record.bars.values()) {
      if (!latest || bar.date > latest.date) latest = bar;
    }
    return latest ? { ...latest } : null;
  }

  async getRevisions(symbols: string[]): Promise<Record<string, number>> {
    const out: Record<string, number> = {};
    for (const s of symbols) out[s] = this.symbols.get(s)?.revision ?? 0;
    return out;
  }

  async getAnalysis(key: string): Promise<AnalysisResult | null> {
    const result = this.analyses.get(key);
    return result ? structuredClone(result) : null;
  }

  async putAnalysis(result: AnalysisResult): Promise<void> {
    this.analyses.set(result.key, structuredClone(result));
  }

  async invalidate(scope: InvalidateScope): Promise<number> {
    let cleared = 0;
    for (const [symbol, record] of this.symbols) {
      if (scope !== 'all' && symbol !== scope.symbol) continue;
      if (record.segments.length > 0) {
        record.segments = [];
        cleared++;
      }
    }
    for (const [key, result] of this.analyses) {
      if (scope === 'all' || scope.symbol in result.seriesRevisions) {
        this.analyses.delete(key);
        cleared++;
      }
    }
    return cleared;
  }

  private record(symbol: string): SymbolRecord {
    let record = this.symbols.get(symbol);
    if (!record) {
      record = { bars: new Map(), segments: [], revision: 0 };
      this.symbols.set(symbol, record);
    }
    return record;
  }
}
