import { sleep as defaultSleep, type Sleep } from "./retry";

export interface RateLimiter {
  take(): Promise<void>;
}

export interface TokenBucketOptions {
  ratePerSecond?: number;
  capacity?: number;
  now?: () => number;
  sleep?: Sleep;
}

const DEFAULT_RATE_PER_SECOND = 5;

/**
 * Token bucket shared by every sender. Tokens refill continuously at
 * `ratePerSecond`; acquisitions are chained so that concurrent callers are
 * granted tokens one at a time in call order.
 */
export class TokenBucketLimiter implements RateLimiter {
  private readonly ratePerSecond: number;

  private readonly capacity: number;

  private readonly now: () => number;

  private readonly sleep: Sleep;

  private tokens: number;

  private refilledAt: number;

  private queue: Promise<void> = Promise.resolve();

  constructor(options: TokenBucketOptions = {}) {
    this.ratePerSecond = options.ratePerSecond ?? DEFAULT_RATE_PER_SECOND;
    if (this.ratePerSecond <= 0) {
      throw new Error(`ratePerSecond must be positive, got ${this.ratePerSecond}`);
    }
    this.capacity = options.capacity ?? this.ratePerSecond;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.tokens = this.capacity;
    this.refilledAt = this.now();
  }

  take(): Promise<void> {
    const next = this.queue.then(() => this.acquire());
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async acquire(): Promise<void> {
    for (;;) {
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      const waitMs = Math.ceil(((1 - this.tokens) * 1000) / this.ratePerSecond);
      await this.sleep(waitMs);
    }
  }

  private refill(): void {
    const current = this.now();
    const elapsed = current - this.refilledAt;
    if (elapsed <= 0) {
      return;
    }
    this.tokens = Math.min(this.capacity, this.tokens + (elapsed * this.ratePerSecond) / 1000);
    this.refilledAt = current;
  }
}
