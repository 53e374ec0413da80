/**
 * MongoDB connection (mongoose)
 */

import mongoose from 'mongoose';
import type { Logger } from '../common/host.deps.js';

export { mongoose };

export async function connectMongo(uri: string, logger: Logger): Promise<void> {
  if (mongoose.connection.readyState === 1) return;
  await mongoose.connect(uri, { serverSelectionTimeoutMS: 10_000 });
  logger.info({ db: mongoose.connection.name }, '[DB] MongoDB connected');
}

export async function disconnectMongo(): Promise<void> {
  await mongoose.disconnect();
}
