/**
 * Market Risk Engine - process entrypoint
 *
 * Run: node dist/server.js (after npm run build)
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { env, loadEngineConfig } from './config/env.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { ensureIndexes } from './db/indexes.js';
import {
  MemoryPriceStore,
  MongoPriceStore,
  createMarketDataEngine,
} from './modules/market-data/index.js';

async function main() {
  const config = loadEngineConfig(env);
  const store = env.STORE_DRIVER === 'mongo' ? new MongoPriceStore() : new MemoryPriceStore();

  const app = buildApp({
    env,
    createEngine: logger => createMarketDataEngine(config, { store, logger }),
  });

  if (env.STORE_DRIVER === 'mongo') {
    await connectMongo(env.MONGODB_URI, app.log);
    await ensureIndexes(app.log);
  } else {
    app.log.warn({}, '[Boot] STORE_DRIVER=memory, price store is not persisted');
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    app.log.info({ signal }, '[Boot] shutting down');
    await app.close();
    if (env.STORE_DRIVER === 'mongo') await disconnectMongo();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
  app.log.info(
    { port: env.PORT, store: env.STORE_DRIVER, primary: config.providers.primary },
    '[Boot] Market risk engine started'
  );
}

main().catch((err) => {
  console.error('[Boot] Fatal error:', err);
  process.exit(1);
});
