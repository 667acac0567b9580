/**
 * Token bucket rate limiter for SEC EDGAR API.
 * SEC allows 10 requests per second per user-agent.
 */

export type Clock = () => number;
export type Sleeper = (ms: number) => Promise<void>;

const defaultSleep: Sleeper = ms => new Promise(resolve => setTimeout(resolve, ms));

export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillPerMs: number;

  constructor(
    requestsPerSecond: number = 10,
    private readonly now: Clock = Date.now,
    private readonly sleep: Sleeper = defaultSleep
  ) {
    if (requestsPerSecond <= 0) throw new RangeError('requestsPerSecond must be positive');
    this.maxTokens = requestsPerSecond;
    this.tokens = requestsPerSecond;
    this.refillPerMs = requestsPerSecond / 1000;
    this.lastRefill = now();
  }

  private refill(): void {
    const t = this.now();
    const elapsed = Math.max(0, t - this.lastRefill);
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillPerMs);
    this.lastRefill = t;
  }

  /** Take a token without waiting. Returns false when the bucket is empty. */
  tryAcquire(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /** Milliseconds until the next token is available (0 if one is ready) */
  waitTime(): number {
    this.refill();
    return this.tokens >= 1 ? 0 : Math.ceil((1 - this.tokens) / this.refillPerMs);
  }

  async acquire(): Promise<void> {
    while (!this.tryAcquire()) {
      await this.sleep(this.waitTime());
    }
  }
}
