/**
 * Quote Providers Module
 *
 * Priority order comes from PRIMARY_PROVIDER; the other provider is the
 * fallback. Both share the HTTP client factory.
 */

export * from './provider.types.js';
export * from './provider.errors.js';
export { TokenBucket } from './token-bucket.js';
export { AlphaVantageProvider } from './alphavantage.provider.js';
export { YahooFinanceProvider } from './yahoo.provider.js';
export { QuoteProviderAdapter } from './quote-provider.adapter.js';
export type { ProviderChainEntry } from './quote-provider.adapter.js';

import type { ProviderSettings } from '../../../config/env.js';
import type { Clock, Logger } from '../../../common/host.deps.js';
import { createHttpClient } from '../../network/httpClient.factory.js';
import { AlphaVantageProvider } from './alphavantage.provider.js';
import { YahooFinanceProvider } from './yahoo.provider.js';
import { QuoteProviderAdapter, type ProviderChainEntry } from './quote-provider.adapter.js';

export function createQuoteProviderAdapter(
  settings: ProviderSettings,
  deps: { logger: Logger; clock?: Clock }
): QuoteProviderAdapter {
  const alphaVantage: ProviderChainEntry = {
    provider: new AlphaVantageProvider(
      createHttpClient({
        baseURL: settings.alphaVantage.baseURL,
        timeoutMs: settings.timeoutMs,
        proxyUrl: settings.proxyUrl,
      }),
      { apiKey: settings.alphaVantage.apiKey, clock: deps.clock }
    ),
    limits: {
      capacity: settings.alphaVantage.requestsPerMinute,
      refillPerMinute: settings.alphaVantage.requestsPerMinute,
    },
  };

  const yahoo: ProviderChainEntry = {
    provider: new YahooFinanceProvider(
      createHttpClient({
        baseURL: settings.yahoo.baseURL,
        timeoutMs: settings.timeoutMs,
        proxyUrl: settings.proxyUrl,
      }),
      { clock: deps.clock }
    ),
    limits: {
      capacity: settings.yahoo.requestsPerMinute,
      refillPerMinute: settings.yahoo.requestsPerMinute,
    },
  };

  const chain = settings.primary === 'ALPHA_VANTAGE' ? [alphaVantage, yahoo] : [yahoo, alphaVantage];
  deps.logger.info(
    { chain: chain.map(e => e.provider.id) },
    'Quote providers initialized'
  );
  return new QuoteProviderAdapter(chain, deps);
}
