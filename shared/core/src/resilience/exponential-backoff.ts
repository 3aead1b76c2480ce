/**
 * Exponential backoff policy.
 *
 * `delay(k) = baseMs * 2^k`, where k = 0 is the wait before the first
 * retry (not the first attempt). Pure: the policy computes waits, callers
 * do the sleeping.
 *
 * With jitter off (the default) delays are deterministic and
 * non-decreasing. Jitter, when enabled, keeps at least half of each delay.
 */

export interface BackoffConfig {
  /** Delay before the first retry in ms (default: 1000) */
  baseMs?: number;
  /** Total attempts per logical call, first attempt included (default: 3) */
  maxAttempts?: number;
  /** Upper bound on any single delay (default: none) */
  maxDelayMs?: number;
  /** Randomize each delay within [delay/2, delay] (default: false) */
  jitter?: boolean;
  /** Source of randomness for jitter, injectable for tests */
  random?: () => number;
}

export class ExponentialBackoff {
  readonly baseMs: number;
  readonly maxAttempts: number;
  readonly maxDelayMs: number | undefined;
  private readonly jitter: boolean;
  private readonly random: () => number;

  constructor(config: BackoffConfig = {}) {
    this.baseMs = config.baseMs ?? 1000;
    this.maxAttempts = config.maxAttempts ?? 3;
    this.maxDelayMs = config.maxDelayMs;
    this.jitter = config.jitter ?? false;
    this.random = config.random ?? Math.random;

    if (this.baseMs < 0) {
      throw new RangeError(`baseMs cannot be negative, got ${this.baseMs}`);
    }
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
    }
  }

  /**
   * Wait before retry number `attemptIndex` (0-based).
   */
  delay(attemptIndex: number): number {
    if (!Number.isInteger(attemptIndex) || attemptIndex < 0) {
      throw new RangeError(`attemptIndex must be a non-negative integer, got ${attemptIndex}`);
    }

    let delay = this.baseMs * 2 ** attemptIndex;
    if (this.maxDelayMs !== undefined) {
      delay = Math.min(delay, this.maxDelayMs);
    }
    if (this.jitter) {
      delay = delay / 2 + this.random() * (delay / 2);
    }
    return Math.floor(delay);
  }
}
