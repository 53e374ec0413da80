/**
 * Shared test doubles: controllable clock, in-process axios transport,
 * scripted history source.
 */

import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { vi } from 'vitest';
import type { EngineConfig } from '../../../config/env.js';
import { addDays, inRange } from '../date-range.js';
import type { DateRange, PriceBar, PriceSeries } from '../market-data.types.js';
import type { ProviderHealth } from '../providers/provider.types.js';

export function testClock(start: number) {
  let now = start;
  return {
    now: () => now,
    set: (ts: number) => {
      now = ts;
    },
    advance: (ms: number) => {
      now += ms;
    },
  };
}

export function mockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

// ─────────────────────────────────────────────────────────────
// CONFIG
// ─────────────────────────────────────────────────────────────

const DAY_MS = 24 * 60 * 60 * 1000;

export const testConfig: EngineConfig = {
  ttl: { liveMs: 5 * 60 * 1000, historicalMs: DAY_MS, analysisMs: DAY_MS },
  memoryMaxEntries: 100,
  mergePolicy: 'FRESHEST_WINS',
  riskFreeRate: 0.02,
  minCorrelationSamples: 20,
  requestTimeoutMs: 5_000,
  defaultLookbackDays: 30,
  providers: {
    primary: 'ALPHA_VANTAGE',
    timeoutMs: 1_000,
    alphaVantage: { apiKey: 'test-key', baseURL: 'https://av.test', requestsPerMinute: 5 },
    yahoo: { baseURL: 'https://yahoo.test', requestsPerMinute: 60 },
  },
};

// ─────────────────────────────────────────────────────────────
// HTTP
// ─────────────────────────────────────────────────────────────

export interface FakeResponse {
  status: number;
  data: unknown;
  headers?: Record<string, string>;
}

export interface RecordedRequest {
  url: string;
  params: Record<string, unknown>;
}

/**
 * Axios instance whose transport is a function. Status >= 400 rejects with
 * an AxiosError carrying the response, as the node adapter does.
 */
export function fakeHttp(handler: (req: RecordedRequest) => FakeResponse): {
  http: AxiosInstance;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const http = axios.create({
    baseURL: 'https://provider.test',
    adapter: async (config: InternalAxiosRequestConfig) => {
      const req: RecordedRequest = { url: config.url ?? '', params: { ...config.params } };
      requests.push(req);
      const res = handler(req);
      const response = {
        data: res.data,
        status: res.status,
        statusText: String(res.status),
        headers: res.headers ?? {},
        config,
      };
      if (res.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${res.status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          null,
          response
        );
      }
      return response;
    },
  });
  return { http, requests };
}

// ─────────────────────────────────────────────────────────────
// BARS
// ─────────────────────────────────────────────────────────────

export function bar(symbol: string, date: string, close: number): PriceBar {
  return { symbol, date, open: close, high: close, low: close, close, volume: 1_000 };
}

/** One bar per calendar day, closes from `closeOf(i)` */
export function dailyBars(
  symbol: string,
  range: DateRange,
  closeOf: (i: number, date: string) => number = i => 100 + i
): PriceBar[] {
  const out: PriceBar[] = [];
  for (let date = range.start, i = 0; date <= range.end; date = addDays(date, 1), i++) {
    out.push(bar(symbol, date, closeOf(i, date)));
  }
  return out;
}

// ─────────────────────────────────────────────────────────────
// SOURCE
// ─────────────────────────────────────────────────────────────

/**
 * Scripted MarketDataSource. History comes from `closes` (or a generated
 * series); `failWith` makes every call reject.
 */
export class FakeSource {
  failWith: Error | null = null;
  closes = new Map<string, PriceBar[]>();
  quotes = new Map<string, PriceBar>();
  delayMs = 0;

  readonly fetchHistory = vi.fn(async (symbol: string, range: DateRange): Promise<PriceSeries> => {
    if (this.delayMs > 0) await new Promise(resolve => setTimeout(resolve, this.delayMs));
    if (this.failWith) throw this.failWith;
    const all = this.closes.get(symbol) ?? dailyBars(symbol, range);
    return {
      symbol,
      range,
      bars: all.filter(b => inRange(b.date, range)),
      source: 'ALPHA_VANTAGE',
      fetchedAt: this.clock.now(),
    };
  });

  readonly fetchQuote = vi.fn(async (symbol: string): Promise<PriceBar> => {
    if (this.delayMs > 0) await new Promise(resolve => setTimeout(resolve, this.delayMs));
    if (this.failWith) throw this.failWith;
    const quote = this.quotes.get(symbol);
    if (!quote) throw new Error(`no scripted quote for ${symbol}`);
    return quote;
  });

  constructor(private readonly clock: { now: () => number }) {}

  getHealth(): ProviderHealth[] {
    return [{ id: 'ALPHA_VANTAGE', status: 'UP', errorStreak: 0 }];
  }
}
