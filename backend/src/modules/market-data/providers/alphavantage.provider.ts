/**
 * Alpha Vantage Provider (primary)
 * ================================
 *
 * Endpoints (all under /query):
 * - function=TIME_SERIES_DAILY  - daily OHLCV, compact (100 bars) or full
 * - function=GLOBAL_QUOTE       - latest quote
 *
 * Alpha Vantage answers 200 for most failures and signals them in the body:
 * - "Error Message"          → unknown symbol / invalid call
 * - "Note" / "Information"   → quota exhausted
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Clock } from '../../../common/host.deps.js';
import { systemClock } from '../../../common/host.deps.js';
import { NotFoundError, RateLimitedError, TransientError } from '../../../common/errors.js';
import { addDays, dayOf, inRange, isIsoDay } from '../date-range.js';
import type { DateRange, PriceBar, PriceSeries } from '../market-data.types.js';
import type { ProviderId, QuoteProvider } from './provider.types.js';
import { classifyProviderError, malformed } from './provider.errors.js';

// Compact output covers ~100 trading days; anything older needs the full dump
const COMPACT_CALENDAR_DAYS = 140;

const numeric = z.coerce.number().finite();

const DailyBarSchema = z.object({
  '1. open': numeric,
  '2. high': numeric,
  '3. low': numeric,
  '4. close': numeric,
  '5. volume': numeric,
});

const EnvelopeSchema = z
  .object({
    'Error Message': z.string().optional(),
    Note: z.string().optional(),
    Information: z.string().optional(),
  })
  .passthrough();

const DailySchema = z.object({
  'Time Series (Daily)': z.record(z.string(), DailyBarSchema),
});

const GlobalQuoteSchema = z.object({
  'Global Quote': z
    .object({
      '02. open': numeric,
      '03. high': numeric,
      '04. low': numeric,
      '05. price': numeric,
      '06. volume': numeric,
      '07. latest trading day': z.string(),
    })
    .partial(),
});

export interface AlphaVantageOptions {
  apiKey: string;
  clock?: Clock;
}

export class AlphaVantageProvider implements QuoteProvider {
  readonly id: ProviderId = 'ALPHA_VANTAGE';
  private readonly clock: Clock;

  constructor(
    private readonly http: AxiosInstance,
    private readonly options: AlphaVantageOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async fetchHistory(symbol: string, range: DateRange): Promise<PriceSeries> {
    const today = dayOf(this.clock.now());
    const outputsize = range.start < addDays(today, -COMPACT_CALENDAR_DAYS) ? 'full' : 'compact';

    const body = await this.query(symbol, {
      function: 'TIME_SERIES_DAILY',
      symbol,
      outputsize,
    });

    const parsed = DailySchema.safeParse(body);
    if (!parsed.success) {
      throw malformed(this.id, symbol, 'missing "Time Series (Daily)"');
    }

    const bars: PriceBar[] = [];
    for (const [date, row] of Object.entries(parsed.data['Time Series (Daily)'])) {
      if (!isIsoDay(date) || !inRange(date, range)) continue;
      bars.push({
        symbol,
        date,
        open: row['1. open'],
        high: row['2. high'],
        low: row['3. low'],
        close: row['4. close'],
        volume: row['5. volume'],
      });
    }
    bars.sort((a, b) => (a.date < b.date ? -1 : 1));

    return {
      symbol,
      range,
      bars,
      source: this.id,
      fetchedAt: this.clock.now(),
    };
  }

  async fetchQuote(symbol: string): Promise<PriceBar> {
    const body = await this.query(symbol, { function: 'GLOBAL_QUOTE', symbol });

    const parsed = GlobalQuoteSchema.safeParse(body);
    if (!parsed.success) {
      throw malformed(this.id, symbol, 'missing "Global Quote"');
    }
    const q = parsed.data['Global Quote'];
    const price = q['05. price'];
    const date = q['07. latest trading day'];
    // An empty Global Quote object is how unknown symbols come back
    if (price === undefined || date === undefined) {
      throw new NotFoundError(`${this.id} has no quote for ${symbol}`);
    }
    if (!isIsoDay(date)) {
      throw malformed(this.id, symbol, `bad trading day "${date}"`);
    }

    return {
      symbol,
      date,
      open: q['02. open'] ?? price,
      high: q['03. high'] ?? price,
      low: q['04. low'] ?? price,
      close: price,
      volume: q['06. volume'] ?? 0,
    };
  }

  private async query(symbol: string, params: Record<string, string>): Promise<unknown> {
    let data: unknown;
    try {
      const response = await this.http.get<unknown>('/query', {
        params: { ...params, apikey: this.options.apiKey },
      });
      data = response.data;
    } catch (error) {
      throw classifyProviderError(error, this.id, symbol, this.clock.now());
    }

    const envelope = EnvelopeSchema.safeParse(data);
    if (!envelope.success) {
      throw malformed(this.id, symbol, 'response is not an object');
    }
    const { 'Error Message': errorMessage, Note: note, Information: information } = envelope.data;

    if (errorMessage) {
      throw new NotFoundError(`${this.id} does not know ${symbol}: ${errorMessage}`);
    }
    if (note) {
      throw new RateLimitedError(`${this.id} quota: ${note}`);
    }
    if (information) {
      if (/rate limit|requests per (day|minute)|call frequency/i.test(information)) {
        throw new RateLimitedError(`${this.id} quota: ${information}`);
      }
      throw new TransientError(`${this.id}: ${information}`);
    }
    return data;
  }
}
