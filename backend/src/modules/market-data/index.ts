/**
 * Market Data Module
 *
 * Wires providers, store, cache orchestrator and the engine facade.
 */

export * from './market-data.types.js';
export { MarketDataEngine } from './market-data.engine.js';
export { CacheOrchestrator } from './cache/cache.orchestrator.js';
export { MemoryPriceStore } from './store/memory.price-store.js';
export { MongoPriceStore } from './store/mongo.price-store.js';
export { marketDataRoutes } from './market-data.routes.js';

import type { EngineConfig } from '../../config/env.js';
import type { Clock, Logger } from '../../common/host.deps.js';
import { CacheOrchestrator, type MarketDataSource } from './cache/cache.orchestrator.js';
import { MarketDataEngine, type HealthSource } from './market-data.engine.js';
import { createQuoteProviderAdapter } from './providers/index.js';
import type { PriceStore } from './store/price-store.types.js';

export interface MarketDataModuleDeps {
  store: PriceStore;
  logger: Logger;
  clock?: Clock;
  /** Replaces the HTTP provider chain, mainly for tests */
  source?: MarketDataSource & HealthSource;
}

export function createMarketDataEngine(config: EngineConfig, deps: MarketDataModuleDeps): MarketDataEngine {
  const source = deps.source ?? createQuoteProviderAdapter(config.providers, deps);
  const orchestrator = new CacheOrchestrator({
    store: deps.store,
    source,
    config,
    logger: deps.logger,
    clock: deps.clock,
  });
  return new MarketDataEngine({
    orchestrator,
    providers: source,
    config,
    logger: deps.logger,
    clock: deps.clock,
  });
}
