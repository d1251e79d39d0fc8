/**
 * Sliding Window Rate Limiter
 *
 * Per-key limit on run submissions. Each key keeps the timestamps of its
 * accepted requests inside the window; a request is admitted while fewer
 * than `maxRequests` remain. Rejections report how long until the oldest
 * one leaves the window.
 */

import { RateLimitError } from '../errors/index.js';

export interface RateLimiterConfig {
  maxRequests: number;
  windowMs: number;
  now?: () => number;
}

export type RateLimitDecision = { allowed: true; remaining: number } | { allowed: false; retryAfterMs: number };

export class SlidingWindowRateLimiter {
  private readonly hits = new Map<string, number[]>();
  private readonly now: () => number;

  constructor(private readonly config: RateLimiterConfig) {
    this.now = config.now ?? Date.now;
  }

  /**
   * Admit or reject one request for `key`. Rejected requests are not counted.
   */
  check(key: string): RateLimitDecision {
    const now = this.now();
    const windowStart = now - this.config.windowMs;
    const recent = (this.hits.get(key) ?? []).filter((t) => t > windowStart);

    if (recent.length >= this.config.maxRequests) {
      this.hits.set(key, recent);
      const oldest = recent[0] ?? now;
      return { allowed: false, retryAfterMs: Math.max(1, oldest + this.config.windowMs - now) };
    }

    recent.push(now);
    this.hits.set(key, recent);
    return { allowed: true, remaining: this.config.maxRequests - recent.length };
  }

  /**
   * @throws RateLimitError when `key` is over its limit
   */
  consume(key: string): void {
    const decision = this.check(key);
    if (!decision.allowed) {
      throw new RateLimitError(key, decision.retryAfterMs);
    }
  }

  /** Forget keys with no hits inside the window. */
  prune(): number {
    const windowStart = this.now() - this.config.windowMs;
    let removed = 0;
    for (const [key, times] of this.hits) {
      if (!times.some((t) => t > windowStart)) {
        this.hits.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get trackedKeys(): number {
    return this.hits.size;
  }
}
