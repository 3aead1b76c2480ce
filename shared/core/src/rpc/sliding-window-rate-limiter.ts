/**
 * Sliding-window rate limiter for calls against the Bitcoin node.
 *
 * Admits at most `maxRequests` calls per client key in any trailing window
 * of `windowMs`. Each key keeps the admission timestamps still inside the
 * window; entries are pruned before every admission check.
 *
 * Design decisions:
 * - Prune-then-append is one synchronous block with no `await`, so
 *   concurrent requests on the event loop serialize around it and can never
 *   both take the last slot
 * - Non-blocking: rejection is immediate, with no queueing or cooldown hint
 * - Keys whose window empties are dropped from the map
 */

import type { ILogger } from '../logging';
import { createLogger } from '../logging';

export const GLOBAL_CLIENT_KEY = 'global';

export interface SlidingWindowConfig {
  /** Admissions allowed per window (default: 60) */
  maxRequests?: number;
  /** Window length in ms (default: 60000) */
  windowMs?: number;
  /** Clock, injectable for tests */
  now?: () => number;
  logger?: ILogger;
}

export interface RateLimiterStats {
  allowedRequests: number;
  rejectedRequests: number;
  trackedKeys: number;
}

export interface WindowState {
  /** Admissions currently inside the window */
  count: number;
  remaining: number;
  /** When the oldest admission leaves the window (ms epoch); `now` if empty */
  resetAt: number;
}

export class SlidingWindowRateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;
  private readonly now: () => number;
  private readonly logger: ILogger;
  private readonly windows = new Map<string, number[]>();
  private allowedRequests = 0;
  private rejectedRequests = 0;

  constructor(config: SlidingWindowConfig = {}) {
    this.maxRequests = config.maxRequests ?? 60;
    this.windowMs = config.windowMs ?? 60_000;
    this.now = config.now ?? Date.now;
    this.logger = config.logger ?? createLogger('rate-limiter');

    if (!Number.isInteger(this.maxRequests) || this.maxRequests < 1) {
      throw new RangeError(`maxRequests must be a positive integer, got ${this.maxRequests}`);
    }
    if (!(this.windowMs > 0)) {
      throw new RangeError(`windowMs must be positive, got ${this.windowMs}`);
    }
  }

  /**
   * Admit or reject one call for `clientKey`.
   *
   * @returns true if admitted (and recorded), false if the window is full
   */
  tryAdmit(clientKey: string = GLOBAL_CLIENT_KEY): boolean {
    const now = this.now();
    const timestamps = this.prune(clientKey, now);

    if (timestamps.length < this.maxRequests) {
      timestamps.push(now);
      this.windows.set(clientKey, timestamps);
      this.allowedRequests++;
      return true;
    }

    this.rejectedRequests++;
    this.logger.debug('Rate limit window full', {
      clientKey,
      maxRequests: this.maxRequests,
      windowMs: this.windowMs,
      retryAfterMs: timestamps[0] + this.windowMs - now,
    });
    return false;
  }

  getWindowState(clientKey: string = GLOBAL_CLIENT_KEY): WindowState {
    const now = this.now();
    const timestamps = this.prune(clientKey, now);
    return {
      count: timestamps.length,
      remaining: Math.max(0, this.maxRequests - timestamps.length),
      resetAt: timestamps.length > 0 ? timestamps[0] + this.windowMs : now,
    };
  }

  getStats(): RateLimiterStats {
    return {
      allowedRequests: this.allowedRequests,
      rejectedRequests: this.rejectedRequests,
      trackedKeys: this.windows.size,
    };
  }

  /**
   * Forget one key's window, or every window when no key is given.
   */
  reset(clientKey?: string): void {
    if (clientKey === undefined) {
      this.windows.clear();
      this.allowedRequests = 0;
      this.rejectedRequests = 0;
    } else {
      this.windows.delete(clientKey);
    }
  }

  /**
   * Drop timestamps at or before `now - windowMs`. Timestamps are appended
   * in clock order, so the survivors are a suffix of the array.
   */
  private prune(clientKey: string, now: number): number[] {
    const timestamps = this.windows.get(clientKey);
    if (!timestamps) {
      return [];
    }

    const cutoff = now - this.windowMs;
    let firstLive = 0;
    while (firstLive < timestamps.length && timestamps[firstLive] <= cutoff) {
      firstLive++;
    }
    if (firstLive > 0) {
      timestamps.splice(0, firstLive);
    }
    if (timestamps.length === 0) {
      this.windows.delete(clientKey);
    }
    return timestamps;
  }
}
