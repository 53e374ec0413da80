import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import type { Env } from './config/env.js';
import { AppError } from './common/errors.js';
import type { Logger } from './common/host.deps.js';
import { marketDataRoutes } from './modules/market-data/market-data.routes.js';
import type { MarketDataEngine } from './modules/market-data/market-data.engine.js';

export interface BuildAppOptions {
  env: Pick<Env, 'LOG_LEVEL' | 'CORS_ORIGINS' | 'NODE_ENV'>;
  /** Receives the app logger so services log through pino */
  createEngine: (logger: Logger) => MarketDataEngine;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions): FastifyInstance {
  const { env } = options;
  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      app.log.warn({ code: err.code, err: err.message }, 'Request failed');
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Body / query validation
    if (err instanceof ZodError || err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err instanceof ZodError
          ? err.issues.map(i => `${i.path.join('.') || 'input'}: ${i.message}`).join('; ')
          : err.message,
      });
    }

    app.log.error(err);

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/health', async () => ({
    ok: true,
    timestamp: new Date().toISOString(),
  }));

  const engine = options.createEngine(app.log);
  app.register(marketDataRoutes, { prefix: '/api/v1/market-data', engine });

  return app;
}
