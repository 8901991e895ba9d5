/**
 * Result of a rate limit check. `retryAfterSeconds` is set when the request
 * is refused and tells the client when a token will be available.
 */
export type RateLimitDecision = { allowed: true } | { allowed: false; retryAfterSeconds: number };

interface Bucket {
  tokens: number;
  updatedAt: number;
}

// Buckets are dropped wholesale beyond this many keys.
export const MAX_TRACKED_KEYS = 10_000;

/**
 * Token bucket per client key: `burst` tokens, refilled at
 * `requestsPerMinute` tokens per minute.
 */
export class RateLimiter {
  private buckets = new Map<string, Bucket>();
  private readonly refillPerMs: number;
  private readonly burst: number;

  constructor(requestsPerMinute: number, burst: number) {
    if (requestsPerMinute <= 0 || burst <= 0) {
      throw new RangeError("requestsPerMinute and burst must be positive");
    }
    this.burst = burst;
    this.refillPerMs = requestsPerMinute / 60_000;
  }

  check(key: string, now: number = Date.now()): RateLimitDecision {
    let bucket = this.buckets.get(key);
    if (!bucket) {
      if (this.buckets.size >= MAX_TRACKED_KEYS) {
        this.buckets.clear();
      }
      bucket = { tokens: this.burst, updatedAt: now };
      this.buckets.set(key, bucket);
    } else {
      const elapsed = Math.max(0, now - bucket.updatedAt);
      bucket.tokens = Math.min(this.burst, bucket.tokens + elapsed * this.refillPerMs);
      bucket.updatedAt = now;
    }

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { allowed: true };
    }
    const waitMs = (1 - bucket.tokens) / this.refillPerMs;
    return { allowed: false, retryAfterSeconds: Math.max(1, Math.ceil(waitMs / 1000)) };
  }

  trackedKeys(): number {
    return this.buckets.size;
  }
}
