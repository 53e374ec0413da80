/**
 * Environment Config
 * ==================
 *
 * Single place where process.env is read. Everything downstream receives
 * the typed EngineConfig built by loadEngineConfig().
 */

import { z } from 'zod';

const numberFromEnv = (fallback: number) =>
  z.coerce.number().finite().default(fallback);

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: numberFromEnv(8001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  STORE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),
  MONGODB_URI: z.string().default('mongodb://localhost:27017/market_data'),

  ALPHA_VANTAGE_API_KEY: z.string().default('demo'),
  ALPHA_VANTAGE_BASE_URL: z.string().url().default('https://www.alphavantage.co'),
  YAHOO_BASE_URL: z.string().url().default('https://query1.finance.yahoo.com'),
  PRIMARY_PROVIDER: z.enum(['ALPHA_VANTAGE', 'YAHOO']).default('ALPHA_VANTAGE'),
  ALPHA_VANTAGE_RPM: numberFromEnv(5),
  YAHOO_RPM: numberFromEnv(60),
  PROVIDER_TIMEOUT_MS: numberFromEnv(10_000),
  HTTPS_PROXY: z.string().optional(),

  TTL_LIVE_MS: numberFromEnv(5 * 60 * 1000),
  TTL_HISTORICAL_MS: numberFromEnv(24 * 60 * 60 * 1000),
  TTL_ANALYSIS_MS: numberFromEnv(24 * 60 * 60 * 1000),
  MEMORY_CACHE_MAX_ENTRIES: numberFromEnv(500),
  MERGE_POLICY: z.enum(['FRESHEST_WINS', 'STORED_WINS']).default('FRESHEST_WINS'),

  RISK_FREE_RATE: numberFromEnv(0.02),
  MIN_CORRELATION_SAMPLES: numberFromEnv(20),
  REQUEST_TIMEOUT_MS: numberFromEnv(15_000),
  DEFAULT_LOOKBACK_DAYS: numberFromEnv(365),
  BENCHMARK_SYMBOL: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export type ProviderName = Env['PRIMARY_PROVIDER'];
export type MergePolicy = Env['MERGE_POLICY'];

export interface TtlConfig {
  liveMs: number;
  historicalMs: number;
  analysisMs: number;
}

export interface ProviderSettings {
  primary: ProviderName;
  timeoutMs: number;
  proxyUrl?: string;
  alphaVantage: {
    apiKey: string;
    baseURL: string;
    requestsPerMinute: number;
  };
  yahoo: {
    baseURL: string;
    requestsPerMinute: number;
  };
}

export interface EngineConfig {
  ttl: TtlConfig;
  memoryMaxEntries: number;
  mergePolicy: MergePolicy;
  riskFreeRate: number;
  minCorrelationSamples: number;
  requestTimeoutMs: number;
  defaultLookbackDays: number;
  benchmarkSymbol?: string;
  providers: ProviderSettings;
}

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(source);
}

export function loadEngineConfig(env: Env): EngineConfig {
  return {
    ttl: {
      liveMs: env.TTL_LIVE_MS,
      historicalMs: env.TTL_HISTORICAL_MS,
      analysisMs: env.TTL_ANALYSIS_MS,
    },
    memoryMaxEntries: env.MEMORY_CACHE_MAX_ENTRIES,
    mergePolicy: env.MERGE_POLICY,
    riskFreeRate: env.RISK_FREE_RATE,
    minCorrelationSamples: env.MIN_CORRELATION_SAMPLES,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    defaultLookbackDays: env.DEFAULT_LOOKBACK_DAYS,
    benchmarkSymbol: env.BENCHMARK_SYMBOL,
    providers: {
      primary: env.PRIMARY_PROVIDER,
      timeoutMs: env.PROVIDER_TIMEOUT_MS,
      proxyUrl: env.HTTPS_PROXY,
      alphaVantage: {
        apiKey: env.ALPHA_VANTAGE_API_KEY,
        baseURL: env.ALPHA_VANTAGE_BASE_URL,
        requestsPerMinute: env.ALPHA_VANTAGE_RPM,
      },
      yahoo: {
        baseURL: env.YAHOO_BASE_URL,
        requestsPerMinute: env.YAHOO_RPM,
      },
    },
  };
}

export const env = parseEnv();
