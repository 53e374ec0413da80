/**
 * Provider Health & Circuit Breaker
 * =================================
 *
 * - 3 consecutive errors → DEGRADED
 * - 5 consecutive errors → DOWN
 * - Any success → UP, reset streak
 *
 * Health is informational; routing decisions are made by the token bucket.
 */

import type { ProviderHealth, ProviderId, ProviderStatus } from './provider.types.js';

const DEGRADED_THRESHOLD = 3;
const DOWN_THRESHOLD = 5;
const MAX_NOTES = 5;

export function createInitialHealth(id: ProviderId): ProviderHealth {
  return {
    id,
    status: 'UP',
    errorStreak: 0,
  };
}

export function registerSuccess(health: ProviderHealth, now: number): ProviderHealth {
  return {
    ...health,
    status: 'UP',
    errorStreak: 0,
    lastOkAt: now,
  };
}

export function registerError(health: ProviderHealth, now: number, error?: string): ProviderHealth {
  const errorStreak = health.errorStreak + 1;

  let status: ProviderStatus = health.status;
  if (errorStreak >= DOWN_THRESHOLD) {
    status = 'DOWN';
  } else if (errorStreak >= DEGRADED_THRESHOLD) {
    status = 'DEGRADED';
  }

  const notes = health.notes ? [...health.notes] : [];
  if (error) {
    notes.push(`[${new Date(now).toISOString()}] ${error}`);
    while (notes.length > MAX_NOTES) notes.shift();
  }

  return {
    ...health,
    status,
    errorStreak,
    lastErrorAt: now,
    notes,
  };
}

export function updateRateLimit(
  health: ProviderHealth,
  remaining: number,
  resetAt?: number
): ProviderHealth {
  return {
    ...health,
    rateLimit: { remaining, resetAt },
  };
}
