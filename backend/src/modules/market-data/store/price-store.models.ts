/**
 * MARKET DATA STORE MODELS
 * ========================
 *
 * market_price_bars      one document per (symbol, date)
 * market_price_coverage  one document per symbol: fetched segments + revision
 * market_analysis_cache  computed analyses keyed by fingerprint
 */

import mongoose, { Schema } from 'mongoose';
import type { AnalysisResult } from '../../risk/risk.types.js';

// ═══════════════════════════════════════════════════════════════
// PRICE BAR
// ═══════════════════════════════════════════════════════════════

export interface IPriceBarDoc {
  symbol: string;
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

const PriceBarSchema = new Schema<IPriceBarDoc>({
  symbol: { type: String, required: true },
  date: { type: String, required: true },
  open: { type: Number, required: true },
  high: { type: Number, required: true },
  low: { type: Number, required: true },
  close: { type: Number, required: true },
  volume: { type: Number, default: 0 },
}, {
  timestamps: true,
  collection: 'market_price_bars',
});

PriceBarSchema.index({ symbol: 1, date: 1 }, { unique: true });

export const PriceBarModel = mongoose.model<IPriceBarDoc>('MarketPriceBar', PriceBarSchema);

// ═══════════════════════════════════════════════════════════════
// COVERAGE
// ═══════════════════════════════════════════════════════════════

export interface ICoverageSegmentDoc {
  start: string;
  end: string;
  fetchedAt: number;
}

export interface IPriceCoverageDoc {
  symbol: string;
  segments: ICoverageSegmentDoc[];
  revision: number;
}

const CoverageSegmentSchema = new Schema<ICoverageSegmentDoc>({
  start: { type: String, required: true },
  end: { type: String, required: true },
  fetchedAt: { type: Number, required: true },
}, { _id: false });

const PriceCoverageSchema = new Schema<IPriceCoverageDoc>({
  symbol: { type: String, required: true, unique: true },
  segments: { type: [CoverageSegmentSchema], default: [] },
  revision: { type: Number, default: 0 },
}, {
  timestamps: true,
  collection: 'market_price_coverage',
});

export const PriceCoverageModel = mongoose.model<IPriceCoverageDoc>('MarketPriceCoverage', PriceCoverageSchema);

// ═══════════════════════════════════════════════════════════════
// ANALYSIS CACHE
// ═══════════════════════════════════════════════════════════════

export interface IAnalysisCacheDoc {
  key: string;
  symbols: string[];
  computedAt: number;
  result: AnalysisResult;
}

const AnalysisCacheSchema = new Schema<IAnalysisCacheDoc>({
  key: { type: String, required: true, unique: true },
  symbols: { type: [String], index: true },
  computedAt: { type: Number, required: true },
  result: { type: Schema.Types.Mixed, required: true },
}, {
  timestamps: true,
  collection: 'market_analysis_cache',
});

export const AnalysisCacheModel = mongoose.model<IAnalysisCacheDoc>('MarketAnalysisCache', AnalysisCacheSchema);
