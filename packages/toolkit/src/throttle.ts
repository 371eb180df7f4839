import { sleep as defaultSleep, type Sleep } from "./retry";

export interface ThrottleOptions {
  intervalMs: number;
  now?: () => number;
  sleep?: Sleep;
}

/**
 * Spaces consecutive calls at least `intervalMs` apart. Calls queue up
 * behind each other, so concurrent callers are serialised too.
 */
export class IntervalThrottle {
  private readonly intervalMs: number;

  private readonly now: () => number;

  private readonly sleep: Sleep;

  private lastCallAt?: number;

  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: ThrottleOptions) {
    this.intervalMs = options.intervalMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  run<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.queue.then(async () => {
      await this.waitForSlot();
      try {
        return await fn();
      } finally {
        this.lastCallAt = this.now();
      }
    });
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastCallAt === undefined) {
      return;
    }
    const remaining = this.lastCallAt + this.intervalMs - this.now();
    if (remaining > 0) {
      await this.sleep(remaining);
    }
  }
}
