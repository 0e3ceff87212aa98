/**
 * Per-source admission control for the UDP listener.
 * Keys identify a traffic source, such as a sender's `address:port`.
 */
export interface RateLimiter {
  /** True if `key` may send one more datagram now. */
  tryConsume(key: string): boolean;

  /** Forget every source. */
  clear(): void;
}
