/**
 * Quote Provider Adapter
 * ======================
 *
 * One QuoteProvider face over an ordered fallback chain (primary first).
 *
 * Per request:
 * 1. Validate symbol and range - bad input never reaches a provider
 * 2. Walk the chain:
 *    - empty token bucket → skip provider without calling it
 *    - RateLimited        → drain bucket until reset, next provider
 *    - Transient          → next provider
 *    - NotFound           → next provider (maybe it knows the symbol)
 * 3. Nothing succeeded → surface one error:
 *    all NotFound → NotFound, any Transient → Transient, else RateLimited
 */

import {
  AppError,
  NotFoundError,
  RateLimitedError,
  TransientError,
} from '../../../common/errors.js';
import type { Clock, Logger } from '../../../common/host.deps.js';
import { systemClock } from '../../../common/host.deps.js';
import { validateRange } from '../date-range.js';
import type { DateRange, PriceBar, PriceSeries } from '../market-data.types.js';
import { normalizeSymbol } from '../symbol.js';
import { classifyProviderError } from './provider.errors.js';
import {
  createInitialHealth,
  registerError,
  registerSuccess,
  updateRateLimit,
} from './provider.health.js';
import type {
  ProviderHealth,
  ProviderLimits,
  QuoteProvider,
} from './provider.types.js';
import { TokenBucket } from './token-bucket.js';

export interface ProviderChainEntry {
  provider: QuoteProvider;
  limits: ProviderLimits;
}

interface ProviderSlot {
  provider: QuoteProvider;
  bucket: TokenBucket;
  health: ProviderHealth;
}

export interface QuoteProviderAdapterDeps {
  logger: Logger;
  clock?: Clock;
}

export class QuoteProviderAdapter {
  private readonly slots: ProviderSlot[];
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(chain: ProviderChainEntry[], deps: QuoteProviderAdapterDeps) {
    if (chain.length === 0) {
      throw new Error('QuoteProviderAdapter needs at least one provider');
    }
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.slots = chain.map(entry => ({
      provider: entry.provider,
      bucket: new TokenBucket(entry.limits, this.clock),
      health: createInitialHealth(entry.provider.id),
    }));
  }

  fetchHistory(rawSymbol: string, range: DateRange): Promise<PriceSeries> {
    const symbol = normalizeSymbol(rawSymbol);
    validateRange(range);
    return this.execute(symbol, 'history', p => p.fetchHistory(symbol, range));
  }

  fetchQuote(rawSymbol: string): Promise<PriceBar> {
    const symbol = normalizeSymbol(rawSymbol);
    return this.execute(symbol, 'quote', p => p.fetchQuote(symbol));
  }

  getHealth(): ProviderHealth[] {
    return this.slots.map(slot =>
      updateRateLimit(slot.health, slot.bucket.getRemaining(), slot.bucket.getResetAt())
    );
  }

  // ─────────────────────────────────────────────────────────────
  // Fallback chain
  // ─────────────────────────────────────────────────────────────

  private async execute<T>(
    symbol: string,
    op: 'history' | 'quote',
    call: (provider: QuoteProvider) => Promise<T>
  ): Promise<T> {
    const failures: AppError[] = [];

    for (const slot of this.slots) {
      const id = slot.provider.id;

      if (!slot.bucket.tryRemove()) {
        this.logger.info(
          { provider: id, symbol, op, resetAt: slot.bucket.getResetAt() },
          'Provider budget empty, routing to fallback'
        );
        failures.push(new RateLimitedError(`${id} request budget exhausted`));
        continue;
      }

      try {
        const result = await call(slot.provider);
        slot.health = registerSuccess(slot.health, this.clock.now());
        return result;
      } catch (raw) {
        const now = this.clock.now();
        const error = classifyProviderError(raw, id, symbol, now);
        failures.push(error);

        if (error instanceof RateLimitedError) {
          const until = slot.bucket.drain(
            error.retryAfterMs !== undefined ? now + error.retryAfterMs : undefined
          );
          slot.health = registerError(slot.health, now, error.message);
          this.logger.warn({ provider: id, symbol, op, until }, 'Provider rate limited');
        } else if (error instanceof NotFoundError) {
          this.logger.info({ provider: id, symbol, op }, 'Symbol not found on provider');
        } else {
          slot.health = registerError(slot.health, now, error.message);
          this.logger.warn({ provider: id, symbol, op, code: error.code, err: error.message }, 'Provider call failed');
        }
      }
    }

    throw this.surface(symbol, failures);
  }

  private surface(symbol: string, failures: AppError[]): AppError {
    if (failures.every((f): boolean => f instanceof NotFoundError)) {
      return new NotFoundError(`Symbol ${symbol} not found on any provider`);
    }
    const detail = failures.map(f => f.message).join('; ');
    if (failures.some(f => f instanceof TransientError)) {
      return new TransientError(`All providers failed for ${symbol}: ${detail}`);
    }
    const waits = failures
      .map(f => (f instanceof RateLimitedError ? f.retryAfterMs : undefined))
      .filter((ms): ms is number => ms !== undefined);
    return new RateLimitedError(
      `All providers rate limited for ${symbol}: ${detail}`,
      waits.length > 0 ? Math.min(...waits) : undefined
    );
  }
}
