/**
 * Database Indexes
 * Run on startup so unique (symbol, date) and fingerprint keys exist
 * before the first write.
 */

import type { Logger } from '../common/host.deps.js';
import {
  AnalysisCacheModel,
  PriceBarModel,
  PriceCoverageModel,
} from '../modules/market-data/store/price-store.models.js';
import { mongoose } from './mongoose.js';

export async function ensureIndexes(logger: Logger): Promise<void> {
  if (!mongoose.connection.db) {
    logger.warn({}, '[DB] No database connection, skipping indexes');
    return;
  }

  for (const model of [PriceBarModel, PriceCoverageModel, AnalysisCacheModel]) {
    await model.syncIndexes();
    logger.info({ collection: model.collection.collectionName }, '[DB] indexes ensured');
  }
}
