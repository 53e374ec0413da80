/**
 * MongoDB PriceStore
 * ==================
 *
 * Bars are upserted with bulkWrite on (symbol, date); Mongo reports an
 * unchanged $set as not modified, which gives the identical-bar no-op.
 * Coverage and revision live in one document per symbol. Writers for a
 * symbol are serialized by the orchestrator's keyed mutex.
 */

import type { AnalysisResult } from '../../risk/risk.types.js';
import { applyCoverage, clipSegments, subtractRanges } from '../date-range.js';
import type { DateRange, PriceBar, PriceSeries } from '../market-data.types.js';
import {
  AnalysisCacheModel,
  PriceBarModel,
  PriceCoverageModel,
  type IAnalysisCacheDoc,
  type IPriceBarDoc,
  type IPriceCoverageDoc,
} from './price-store.models.js';
import type {
  InvalidateScope,
  PriceStore,
  PutResult,
  StoredSlice,
} from './price-store.types.js';

function toBar(doc: IPriceBarDoc): PriceBar {
  return {
    symbol: doc.symbol,
    date: doc.date,
    open: doc.open,
    high: doc.high,
    low: doc.low,
    close: doc.close,
    volume: doc.volume,
  };
}

export class MongoPriceStore implements PriceStore {
  async get(symbol: string, range: DateRange): Promise<StoredSlice> {
    const [docs, coverage] = await Promise.all([
      PriceBarModel.find({ symbol, date: { $gte: range.start, $lte: range.end } })
        .sort({ date: 1 })
        .lean<IPriceBarDoc[]>(),
      PriceCoverageModel.findOne({ symbol }).lean<IPriceCoverageDoc>(),
    ]);

    const segments = clipSegments(
      (coverage?.segments ?? []).map(s => ({ start: s.start, end: s.end, fetchedAt: s.fetchedAt })),
      range
    );
    return {
      bars: docs.map(toBar),
      segments,
      gaps: subtractRanges(range, segments),
      revision: coverage?.revision ?? 0,
    };
  }

  async put(series: PriceSeries): Promise<PutResult> {
    let written = 0;
    if (series.bars.length > 0) {
      const ops = series.bars.map(bar => ({
        updateOne: {
          filter: { symbol: series.symbol, date: bar.date },
          update: {
            $set: {
              open: bar.open,
              high: bar.high,
              low: bar.low,
              close: bar.close,
              volume: bar.volume,
            },
          },
          upsert: true,
        },
      }));
      const result = await PriceBarModel.bulkWrite(ops, { ordered: false });
      written = (result.upsertedCount || 0) + (result.modifiedCount || 0);
    }

    const existing = await PriceCoverageModel.findOne({ symbol: series.symbol }).lean<IPriceCoverageDoc>();
    const segments = applyCoverage(existing?.segments ?? [], {
      ...series.range,
      fetchedAt: series.fetchedAt,
    });
    const bump = written > 0 ? 1 : 0;

    await PriceCoverageModel.updateOne(
      { symbol: series.symbol },
      { $set: { segments }, $inc: { revision: bump } },
      { upsert: true }
    );

    return { written, revision: (existing?.revision ?? 0) + bump };
  }

  async latestBar(symbol: string): Promise<PriceBar | null> {
    const doc = await PriceBarModel.findOne({ symbol }).sort({ date: -1 }).lean<IPriceBarDoc>();
    return doc ? toBar(doc) : null;
  }

  async getRevisions(symbols: string[]): Promise<Record<string, number>> {
    const docs = await PriceCoverageModel.find({ symbol: { $in: symbols } })
      .select({ symbol: 1, revision: 1 })
      .lean<Pick<IPriceCoverageDoc, 'symbol' | 'revision'>[]>();
    const out: Record<string, number> = {};
    for (const s of symbols) out[s] = 0;
    for (const d of docs) out[d.symbol] = d.revision;
    return out;
  }

  async getAnalysis(key: string): Promise<AnalysisResult | null> {
    const doc = await AnalysisCacheModel.findOne({ key }).lean<IAnalysisCacheDoc>();
    return doc?.result ?? null;
  }

  async putAnalysis(result: AnalysisResult): Promise<void> {
    await AnalysisCacheModel.updateOne(
      { key: result.key },
      { $set: { symbols: Object.keys(result.seriesRevisions), computedAt: result.computedAt, result } },
      { upsert: true }
    );
  }

  async invalidate(scope: InvalidateScope): Promise<number> {
    const symbolFilter = scope === 'all' ? {} : { symbol: scope.symbol };
    const coverage = await PriceCoverageModel.updateMany(
      { ...symbolFilter, 'segments.0': { $exists: true } },
      { $set: { segments: [] } }
    );
    const analyses = await AnalysisCacheModel.deleteMany(
      scope === 'all' ? {} : { symbols: scope.symbol }
    );
    return coverage.modifiedCount + analyses.deletedCount;
  }
}
