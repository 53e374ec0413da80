/**
 * Token Bucket Rate Limiter
 * =========================
 *
 * One bucket per provider. Tokens refill continuously at refillPerMinute up
 * to capacity. A provider that answers 429 gets its bucket drained until the
 * reset time it announced, so no further calls reach it before then.
 */

import type { Clock } from '../../../common/host.deps.js';
import { systemClock } from '../../../common/host.deps.js';
import type { ProviderLimits } from './provider.types.js';

const MINUTE_MS = 60_000;

export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private blockedUntil = 0;
  private readonly refillPerMs: number;

  constructor(
    private readonly limits: ProviderLimits,
    private readonly clock: Clock = systemClock
  ) {
    if (limits.capacity <= 0 || limits.refillPerMinute <= 0) {
      throw new Error('TokenBucket capacity and refillPerMinute must be positive');
    }
    this.tokens = limits.capacity;
    this.lastRefill = clock.now();
    this.refillPerMs = limits.refillPerMinute / MINUTE_MS;
  }

  /**
   * Take one token if available
   */
  tryRemove(): boolean {
    this.refill();
    if (this.clock.now() < this.blockedUntil || this.tokens < 1) {
      return false;
    }
    this.tokens -= 1;
    return true;
  }

  /**
   * Empty the bucket and refuse tokens until `untilMs`. Defaults to the time
   * a full bucket takes to refill.
   */
  drain(untilMs?: number): number {
    const now = this.clock.now();
    const until = untilMs ?? now + this.limits.capacity / this.refillPerMs;
    this.tokens = 0;
    this.lastRefill = now;
    this.blockedUntil = Math.max(this.blockedUntil, until);
    return this.blockedUntil;
  }

  getRemaining(): number {
    this.refill();
    if (this.clock.now() < this.blockedUntil) return 0;
    return Math.floor(this.tokens);
  }

  /** When the next token becomes available */
  getResetAt(): number {
    this.refill();
    const now = this.clock.now();
    if (now < this.blockedUntil) return this.blockedUntil;
    if (this.tokens >= 1) return now;
    return now + Math.ceil((1 - this.tokens) / this.refillPerMs);
  }

  private refill(): void {
    const now = this.clock.now();
    if (now <= this.lastRefill) return;
    this.tokens = Math.min(
      this.limits.capacity,
      this.tokens + (now - this.lastRefill) * this.refillPerMs
    );
    this.lastRefill = now;
  }
}
