/**
 * Fallback chain, token buckets and error surfacing
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  NotFoundError,
  RateLimitedError,
  TransientError,
  ValidationError,
} from '../../../common/errors.js';
import { QuoteProviderAdapter } from '../providers/quote-provider.adapter.js';
import { TokenBucket } from '../providers/token-bucket.js';
import type { ProviderId, QuoteProvider } from '../providers/provider.types.js';
import { bar, mockLogger, testClock } from './fixtures.js';

const T0 = Date.UTC(2024, 2, 10, 12);

function fakeProvider(id: ProviderId) {
  return {
    id,
    fetchHistory: vi.fn<QuoteProvider['fetchHistory']>(),
    fetchQuote: vi.fn<QuoteProvider['fetchQuote']>(),
  };
}

describe('TokenBucket', () => {
  it('should refuse tokens once empty and refill over time', () => {
    const clock = testClock(T0);
    const bucket = new TokenBucket({ capacity: 2, refillPerMinute: 60 }, clock);

    expect(bucket.tryRemove()).toBe(true);
    expect(bucket.tryRemove()).toBe(true);
    expect(bucket.tryRemove()).toBe(false);
    expect(bucket.getResetAt()).toBe(T0 + 1_000);

    clock.advance(1_000);
    expect(bucket.tryRemove()).toBe(true);
  });

  it('should stay blocked until the drain deadline', () => {
    const clock = testClock(T0);
    const bucket = new TokenBucket({ capacity: 2, refillPerMinute: 60 }, clock);

    expect(bucket.drain(T0 + 5_000)).toBe(T0 + 5_000);
    clock.advance(4_999);
    expect(bucket.tryRemove()).toBe(false);
    expect(bucket.getRemaining()).toBe(0);

    clock.advance(1);
    expect(bucket.getRemaining()).toBe(2);
    expect(bucket.tryRemove()).toBe(true);
  });
});

describe('QuoteProviderAdapter', () => {
  let clock: ReturnType<typeof testClock>;
  let logger: ReturnType<typeof mockLogger>;
  let primary: ReturnType<typeof fakeProvider>;
  let secondary: ReturnType<typeof fakeProvider>;

  const quote = bar('AAPL', '2024-03-08', 171.25);

  function adapter(primaryCapacity = 5) {
    return new QuoteProviderAdapter(
      [
        { provider: primary, limits: { capacity: primaryCapacity, refillPerMinute: primaryCapacity } },
        { provider: secondary, limits: { capacity: 60, refillPerMinute: 60 } },
      ],
      { logger, clock }
    );
  }

  beforeEach(() => {
    clock = testClock(T0);
    logger = mockLogger();
    primary = fakeProvider('ALPHA_VANTAGE');
    secondary = fakeProvider('YAHOO');
  });

  it('should use the primary when it answers', async () => {
    primary.fetchQuote.mockResolvedValue(quote);

    await expect(adapter().fetchQuote(' aapl ')).resolves.toEqual(quote);
    expect(primary.fetchQuote).toHaveBeenCalledWith('AAPL');
    expect(secondary.fetchQuote).not.toHaveBeenCalled();
  });

  it('should fall back on 429 and leave the primary alone until its reset', async () => {
    primary.fetchQuote.mockRejectedValueOnce(new RateLimitedError('quota'));
    primary.fetchQuote.mockResolvedValue(quote);
    secondary.fetchQuote.mockResolvedValue(quote);
    const chain = adapter();

    await chain.fetchQuote('AAPL');
    await chain.fetchQuote('AAPL');
    expect(primary.fetchQuote).toHaveBeenCalledTimes(1);
    expect(secondary.fetchQuote).toHaveBeenCalledTimes(2);

    // default reset is one full refill window
    clock.advance(60_000);
    await chain.fetchQuote('AAPL');
    expect(primary.fetchQuote).toHaveBeenCalledTimes(2);
    expect(secondary.fetchQuote).toHaveBeenCalledTimes(2);
  });

  it('should skip a provider whose bucket is empty without calling it', async () => {
    primary.fetchQuote.mockResolvedValue(quote);
    secondary.fetchQuote.mockResolvedValue(quote);
    const chain = adapter(1);

    await chain.fetchQuote('AAPL');
    await chain.fetchQuote('AAPL');

    expect(primary.fetchQuote).toHaveBeenCalledTimes(1);
    expect(secondary.fetchQuote).toHaveBeenCalledTimes(1);
  });

  it('should surface NotFound only when every provider said so', async () => {
    primary.fetchQuote.mockRejectedValue(new NotFoundError('unknown'));
    secondary.fetchQuote.mockRejectedValue(new NotFoundError('unknown'));
    const chain = adapter();

    await expect(chain.fetchQuote('ZZZZ')).rejects.toBeInstanceOf(NotFoundError);
    expect(chain.getHealth().map(h => h.errorStreak)).toEqual([0, 0]);
  });

  it('should prefer Transient over RateLimited when both occur', async () => {
    primary.fetchQuote.mockRejectedValue(new RateLimitedError('quota'));
    secondary.fetchQuote.mockRejectedValue(new TransientError('timeout'));

    await expect(adapter().fetchQuote('AAPL')).rejects.toBeInstanceOf(TransientError);
  });

  it('should report the shortest retry when everything is rate limited', async () => {
    primary.fetchQuote.mockRejectedValue(new RateLimitedError('quota', 30_000));
    secondary.fetchQuote.mockRejectedValue(new RateLimitedError('quota', 10_000));

    const error = await adapter().fetchQuote('AAPL').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error instanceof RateLimitedError && error.retryAfterMs).toBe(10_000);
  });

  it('should reject bad input before touching a provider', async () => {
    const chain = adapter();

    await expect(chain.fetchQuote('not a symbol!')).rejects.toBeInstanceOf(ValidationError);
    await expect(
      chain.fetchHistory('AAPL', { start: '2024-03-08', end: '2024-03-01' })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(primary.fetchQuote).not.toHaveBeenCalled();
    expect(primary.fetchHistory).not.toHaveBeenCalled();
  });

  it('should degrade provider health after repeated failures', async () => {
    primary.fetchQuote.mockRejectedValue(new TransientError('timeout'));
    secondary.fetchQuote.mockResolvedValue(quote);
    const chain = adapter();

    for (let i = 0; i < 3; i++) await chain.fetchQuote('AAPL');

    const [av, yahoo] = chain.getHealth();
    expect(av.status).toBe('DEGRADED');
    expect(av.errorStreak).toBe(3);
    expect(av.lastErrorAt).toBe(T0);
    expect(yahoo.status).toBe('UP');
    expect(yahoo.lastOkAt).toBe(T0);
  });
});
