/**
 * Yahoo Finance Provider (fallback)
 * =================================
 *
 * Uses the public chart endpoint:
 *   GET /v8/finance/chart/{symbol}?period1&period2&interval=1d
 *
 * Bars carry exchange-local open timestamps; gmtoffset shifts them onto the
 * trading day. Rows with a null close (halts, partial days) are skipped.
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Clock } from '../../../common/host.deps.js';
import { systemClock } from '../../../common/host.deps.js';
import { NotFoundError } from '../../../common/errors.js';
import { dayOf, inRange, toDayNumber } from '../date-range.js';
import type { DateRange, PriceBar, PriceSeries } from '../market-data.types.js';
import { toYahooSymbol } from '../symbol.js';
import type { ProviderId, QuoteProvider } from './provider.types.js';
import { classifyProviderError, malformed } from './provider.errors.js';

const DAY_SECONDS = 24 * 60 * 60;

const nullableNumbers = z.array(z.number().nullable());

const ChartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z
            .object({
              gmtoffset: z.number().optional(),
              regularMarketPrice: z.number().optional(),
              regularMarketTime: z.number().optional(),
              regularMarketDayHigh: z.number().optional(),
              regularMarketDayLow: z.number().optional(),
              regularMarketVolume: z.number().optional(),
              chartPreviousClose: z.number().optional(),
            })
            .passthrough(),
          timestamp: z.array(z.number()).optional(),
          indicators: z
            .object({
              quote: z
                .array(
                  z.object({
                    open: nullableNumbers.optional(),
                    high: nullableNumbers.optional(),
                    low: nullableNumbers.optional(),
                    close: nullableNumbers.optional(),
                    volume: nullableNumbers.optional(),
                  })
                )
                .optional(),
            })
            .optional(),
        })
      )
      .nullable()
      .optional(),
    error: z
      .object({ code: z.string().optional(), description: z.string().optional() })
      .nullable()
      .optional(),
  }),
});

type ChartResult = NonNullable<z.infer<typeof ChartSchema>['chart']['result']>[number];

export interface YahooOptions {
  clock?: Clock;
}

export class YahooFinanceProvider implements QuoteProvider {
  readonly id: ProviderId = 'YAHOO';
  private readonly clock: Clock;

  constructor(
    private readonly http: AxiosInstance,
    options: YahooOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async fetchHistory(symbol: string, range: DateRange): Promise<PriceSeries> {
    const result = await this.chart(symbol, {
      period1: String(toDayNumber(range.start) * DAY_SECONDS),
      period2: String((toDayNumber(range.end) + 1) * DAY_SECONDS),
      interval: '1d',
      events: 'history',
    });

    const timestamps = result.timestamp ?? [];
    const quote = result.indicators?.quote?.[0];
    if (timestamps.length > 0 && !quote) {
      throw malformed(this.id, symbol, 'timestamps without quote indicators');
    }
    const offset = result.meta.gmtoffset ?? 0;

    const byDate = new Map<string, PriceBar>();
    timestamps.forEach((ts, i) => {
      const close = quote?.close?.[i];
      if (close === null || close === undefined) return;
      const date = dayOf((ts + offset) * 1000);
      if (!inRange(date, range)) return;
      byDate.set(date, {
        symbol,
        date,
        open: quote?.open?.[i] ?? close,
        high: quote?.high?.[i] ?? close,
        low: quote?.low?.[i] ?? close,
        close,
        volume: quote?.volume?.[i] ?? 0,
      });
    });

    const bars = Array.from(byDate.values()).sort((a, b) => (a.date < b.date ? -1 : 1));
    return {
      symbol,
      range,
      bars,
      source: this.id,
      fetchedAt: this.clock.now(),
    };
  }

  async fetchQuote(symbol: string): Promise<PriceBar> {
    const result = await this.chart(symbol, { range: '1d', interval: '1d' });
    const { meta } = result;
    const price = meta.regularMarketPrice;
    if (price === undefined) {
      throw malformed(this.id, symbol, 'no regularMarketPrice');
    }
    const time = meta.regularMarketTime ?? Math.floor(this.clock.now() / 1000);
    const quote = result.indicators?.quote?.[0];

    return {
      symbol,
      date: dayOf((time + (meta.gmtoffset ?? 0)) * 1000),
      open: quote?.open?.[0] ?? meta.chartPreviousClose ?? price,
      high: meta.regularMarketDayHigh ?? price,
      low: meta.regularMarketDayLow ?? price,
      close: price,
      volume: meta.regularMarketVolume ?? 0,
    };
  }

  private async chart(symbol: string, params: Record<string, string>): Promise<ChartResult> {
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(
        `/v8/finance/chart/${encodeURIComponent(toYahooSymbol(symbol))}`,
        { params }
      );
      data = response.data;
    } catch (error) {
      throw classifyProviderError(error, this.id, symbol, this.clock.now());
    }

    const parsed = ChartSchema.safeParse(data);
    if (!parsed.success) {
      throw malformed(this.id, symbol, parsed.error.issues[0]?.message ?? 'unexpected shape');
    }
    const { result, error } = parsed.data.chart;
    const first = result?.[0];
    if (!first) {
      if (error?.code === 'Not Found' || error?.description?.includes('No data found')) {
        throw new NotFoundError(`${this.id} has no data for ${symbol}`);
      }
      throw malformed(this.id, symbol, error?.description ?? 'empty chart result');
    }
    return first;
  }
}
