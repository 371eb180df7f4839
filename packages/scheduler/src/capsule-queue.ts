import { describeError, scopedLogger, type Logger } from "../../toolkit/src/index";

export interface TimeCapsule<P> {
  key: string;
  payload: P;
  dueAt: number;
}

export type CapsuleHandler<P> = (payload: P) => Promise<void>;

/** Deferred work keyed by identity. Burying a key again replaces its capsule. */
export interface TimeCapsuleQueue<P> {
  bury(key: string, payload: P, dueAt: number): void;
  cancel(key: string): boolean;
  pending(): TimeCapsule<P>[];
  start(): void;
  stop(): void;
}

export interface InMemoryTimeCapsuleQueueOptions<P> {
  handler: CapsuleHandler<P>;
  pollIntervalMs?: number;
  now?: () => number;
  logger?: Logger;
}

const DEFAULT_POLL_INTERVAL_MS = 1000;

export class InMemoryTimeCapsuleQueue<P> implements TimeCapsuleQueue<P> {
  private readonly capsules = new Map<string, TimeCapsule<P>>();

  private readonly handler: CapsuleHandler<P>;

  private readonly pollIntervalMs: number;

  private readonly now: () => number;

  private readonly log: Required<Logger>;

  private timer?: NodeJS.Timeout;

  private digging = false;

  constructor(options: InMemoryTimeCapsuleQueueOptions<P>) {
    this.handler = options.handler;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.log = scopedLogger("capsules", options.logger);
  }

  bury(key: string, payload: P, dueAt: number): void {
    this.capsules.set(key, { key, payload, dueAt });
  }

  cancel(key: string): boolean {
    return this.capsules.delete(key);
  }

  pending(): TimeCapsule<P>[] {
    return [...this.capsules.values()].sort((a, b) => a.dueAt - b.dueAt);
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.dig().catch((error: unknown) => {
        this.log.error(`digging capsules failed: ${describeError(error)}`);
      });
    }, this.pollIntervalMs);
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = undefined;
  }

  /**
   * Removes every due capsule and hands it to the handler. Resolves with the
   * number of capsules dug up once all handlers have settled.
   */
  async dig(): Promise<number> {
    if (this.digging) {
      return 0;
    }
    this.digging = true;
    try {
      const current = this.now();
      const due = this.pending().filter((capsule) => capsule.dueAt <= current);
      for (const capsule of due) {
        this.capsules.delete(capsule.key);
      }

      const results = await Promise.allSettled(due.map((capsule) => this.handler(capsule.payload)));
      results.forEach((result, index) => {
        if (result.status === "rejected") {
          this.log.error(`capsule ${due[index].key} handler failed: ${describeError(result.reason)}`);
        }
      });
      return due.length;
    } finally {
      this.digging = false;
    }
  }
}
