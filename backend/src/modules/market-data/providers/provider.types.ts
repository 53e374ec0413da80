/**
 * Quote Provider Types
 * ====================
 *
 * Universal contract for market data sources. Every provider normalizes its
 * payload into PriceBar / PriceSeries and reports failures as AppErrors
 * (NotFound / RateLimited / Transient).
 *
 * INVARIANTS:
 * - Providers are READ-ONLY
 * - Input is already validated and normalized by the adapter
 * - Daily bars only
 */

import type { DateRange, PriceBar, PriceSeries } from '../market-data.types.js';

export type ProviderId = 'ALPHA_VANTAGE' | 'YAHOO';

export type ProviderStatus = 'UP' | 'DEGRADED' | 'DOWN';

// ═══════════════════════════════════════════════════════════════
// HEALTH & CIRCUIT BREAKER
// ═══════════════════════════════════════════════════════════════

export interface ProviderHealth {
  id: ProviderId;
  status: ProviderStatus;
  errorStreak: number;
  lastOkAt?: number;
  lastErrorAt?: number;
  rateLimit?: {
    remaining: number;
    resetAt?: number;
  };
  notes?: string[];
}

// ═══════════════════════════════════════════════════════════════
// PROVIDER INTERFACE
// ═══════════════════════════════════════════════════════════════

export interface QuoteProvider {
  readonly id: ProviderId;

  /** Daily OHLCV bars within range, ascending */
  fetchHistory(symbol: string, range: DateRange): Promise<PriceSeries>;

  /** Latest quote as a bar dated on its trading day */
  fetchQuote(symbol: string): Promise<PriceBar>;
}

export interface ProviderLimits {
  /** Bucket size (burst) */
  capacity: number;
  /** Tokens added per minute */
  refillPerMinute: number;
}
