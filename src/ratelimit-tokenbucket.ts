/**
 * Token Bucket
 *
 * - Capacity = burst, refill rate = requests per second
 * - Starts full; refilled from elapsed time on every check
 * - A check never waits: it either takes a token or refuses
 */

export type Clock = () => number;

export interface TokenBucketStats {
  tokens: number;
  capacity: number;
  refillRate: number;
}

export class TokenBucket {
  private tokens: number;
  private lastRefill: number; // Unix timestamp in milliseconds

  constructor(
    readonly refillRate: number, // Tokens per second
    readonly capacity: number,
    private readonly now: Clock = Date.now
  ) {
    this.tokens = capacity;
    this.lastRefill = now();
  }

  /**
   * Refill tokens based on time elapsed
   */
  private refill(): void {
    const now = this.now();
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillRate);
    this.lastRefill = now;
  }

  tryRemoveToken(): boolean {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /**
   * Whole seconds until the next token is available (at least 1)
   */
  retryAfterSeconds(): number {
    if (this.refillRate <= 0) {
      return 1;
    }
    const tokensNeeded = Math.max(0, 1 - this.tokens);
    return Math.max(1, Math.ceil(tokensNeeded / this.refillRate));
  }

  getStats(): TokenBucketStats {
    this.refill();
    return {
      tokens: this.tokens,
      capacity: this.capacity,
      refillRate: this.refillRate
    };
  }
}
