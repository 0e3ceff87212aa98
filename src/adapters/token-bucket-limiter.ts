import type { RateLimiter } from "../interfaces/rate-limiter.js";

export type Clock = () => number;

/**
 * Token bucket rate limiter.
 * Holds up to `capacity` tokens and refills continuously at `tokensPerSecond`.
 *
 * Example: capacity 50, 200/s = bursts of 50 datagrams, 200 per second sustained
 */
export class TokenBucketLimiter {
  private tokens: number;
  private readonly capacity: number;
  private readonly refillRate: number; // tokens per millisecond
  private lastRefillTime: number;
  private readonly now: Clock;

  constructor(capacity: number, tokensPerSecond: number, now: Clock = Date.now) {
    this.capacity = capacity;
    this.tokens = capacity; // Start with full bucket
    this.refillRate = tokensPerSecond / 1000;
    this.now = now;
    this.lastRefillTime = now();
  }

  tryConsume(tokensNeeded = 1): boolean {
    this.refill();
    if (this.tokens >= tokensNeeded) {
      this.tokens -= tokensNeeded;
      return true;
    }
    return false;
  }

  private refill(): void {
    const now = this.now();
    const elapsed = Math.max(0, now - this.lastRefillTime);

    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillRate);
    this.lastRefillTime = now;
  }

  reset(): void {
    this.tokens = this.capacity;
    this.lastRefillTime = this.now();
  }

  /** Current token count (for testing/debugging). */
  getTokens(): number {
    this.refill();
    return this.tokens;
  }

  /** Milliseconds since the bucket last refilled. */
  idleFor(): number {
    return this.now() - this.lastRefillTime;
  }
}

export interface KeyedRateLimiterOptions {
  capacity: number;
  tokensPerSecond: number;
  /** Buckets untouched this long are evicted on the next sweep (default: 60s). */
  idleEvictMs?: number;
  /** Most buckets held at once; the least recently used goes first (default: 10000). */
  maxKeys?: number;
  now?: Clock;
}

/**
 * One token bucket per key (UDP sender address). Idle buckets are dropped, and
 * the map never holds more than `maxKeys` buckets however many sources appear.
 * An evicted key starts over with a full bucket.
 */
export class KeyedRateLimiter implements RateLimiter {
  /** Insertion order is recency order: a hit moves its key to the end. */
  private readonly buckets = new Map<string, TokenBucketLimiter>();
  private readonly options: Required<KeyedRateLimiterOptions>;
  private lastSweep: number;

  constructor(options: KeyedRateLimiterOptions) {
    this.options = { idleEvictMs: 60_000, maxKeys: 10_000, now: Date.now, ...options };
    this.lastSweep = this.options.now();
  }

  tryConsume(key: string): boolean {
    this.sweep();
    let bucket = this.buckets.get(key);
    if (bucket) {
      this.buckets.delete(key);
    } else {
      this.evictOldest();
      bucket = new TokenBucketLimiter(
        this.options.capacity,
        this.options.tokensPerSecond,
        this.options.now,
      );
    }
    this.buckets.set(key, bucket);
    return bucket.tryConsume();
  }

  get size(): number {
    return this.buckets.size;
  }

  clear(): void {
    this.buckets.clear();
  }

  private evictOldest(): void {
    while (this.buckets.size >= this.options.maxKeys) {
      const oldest = this.buckets.keys().next();
      if (oldest.done) return;
      this.buckets.delete(oldest.value);
    }
  }

  private sweep(): void {
    const now = this.options.now();
    if (now - this.lastSweep < this.options.idleEvictMs) return;
    this.lastSweep = now;
    for (const [key, bucket] of this.buckets) {
      if (bucket.idleFor() >= this.options.idleEvictMs) this.buckets.delete(key);
    }
  }
}
