/**
 * Provider Error Classification
 * =============================
 *
 * Maps raw HTTP / payload failures into the engine taxonomy:
 *   429                      → RateLimited
 *   404                      → NotFound
 *   timeout / network / 5xx  → Transient
 *   anything else            → Transient
 */

import axios from 'axios';
import {
  AppError,
  NotFoundError,
  RateLimitedError,
  TransientError,
} from '../../../common/errors.js';
import type { ProviderId } from './provider.types.js';

function parseRetryAfter(value: unknown, now: number): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value * 1000;
  if (typeof value !== 'string' || value.trim() === '') return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return seconds * 1000;
  const at = Date.parse(value);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
}

export function classifyProviderError(
  error: unknown,
  provider: ProviderId,
  symbol: string,
  now: number = Date.now()
): AppError {
  if (error instanceof AppError) return error;

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 429) {
      const retryAfterMs = parseRetryAfter(error.response?.headers?.['retry-after'], now);
      return new RateLimitedError(`${provider} rate limit hit for ${symbol}`, retryAfterMs);
    }
    if (status === 404) {
      return new NotFoundError(`${provider} has no data for ${symbol}`);
    }
    if (status !== undefined) {
      return new TransientError(`${provider} responded HTTP ${status} for ${symbol}`);
    }
    const reason = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' ? 'timed out' : 'network error';
    return new TransientError(`${provider} ${reason} for ${symbol}: ${error.message}`);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TransientError(`${provider} failed for ${symbol}: ${message}`);
}

export function malformed(provider: ProviderId, symbol: string, detail: string): TransientError {
  return new TransientError(`${provider} returned a malformed payload for ${symbol}: ${detail}`);
}
