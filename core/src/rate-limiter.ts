import { RateLimitVerdict } from "./schemas";

/**
 * RateLimiter - sliding-window request counter keyed by caller identity.
 *
 * Each key keeps the timestamps of its accepted requests inside the trailing
 * window. State lives in memory only and resets with the process.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter({ maxRequests: 100, windowMs: 60_000 });
 * const { allowed, reason } = limiter.check(userId);
 * ```
 */
export interface RateLimiterOptions {
  /** Maximum requests per key inside the window (default: 100) */
  maxRequests?: number;
  /** Window size in milliseconds (default: 60_000 = 1 minute) */
  windowMs?: number;
}

export const DEFAULT_RATE_LIMIT_KEY = "default";

export class RateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;
  // key -> accepted request timestamps, oldest first
  private readonly requests = new Map<string, number[]>();

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? 100;
    this.windowMs = options.windowMs ?? 60_000;
  }

  /**
   * Check and record a request. Rejected requests are not recorded.
   */
  check(key: string = DEFAULT_RATE_LIMIT_KEY): RateLimitVerdict {
    const now = Date.now();
    const timestamps = this.getOrCreate(key);
    this.pruneOld(timestamps, now);

    if (timestamps.length >= this.maxRequests) {
      return {
        allowed: false,
        reason: `Rate limit exceeded: ${this.maxRequests} requests per ${this.windowMs / 1000}s`,
      };
    }

    timestamps.push(now);
    return { allowed: true };
  }

  /** Requests currently counted in the window for a key. */
  getCount(key: string = DEFAULT_RATE_LIMIT_KEY): number {
    const timestamps = this.requests.get(key);
    if (!timestamps) return 0;
    this.pruneOld(timestamps, Date.now());
    return timestamps.length;
  }

  /** Reset one key, or every key when none is given. */
  reset(key?: string): void {
    if (key === undefined) {
      this.requests.clear();
    } else {
      this.requests.delete(key);
    }
  }

  private getOrCreate(key: string): number[] {
    let timestamps = this.requests.get(key);
    if (!timestamps) {
      timestamps = [];
      this.requests.set(key, timestamps);
    }
    return timestamps;
  }

  private pruneOld(timestamps: number[], now: number): void {
    // Keep entries strictly younger than the window
    while (timestamps.length > 0 && now - timestamps[0] >= this.windowMs) {
      timestamps.shift();
    }
  }
}
