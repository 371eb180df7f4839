export interface WorkerPoolOptions {
  maxConcurrency?: number;
}

interface QueuedTask {
  run: () => Promise<void>;
  resolve: () => void;
  reject: (error: unknown) => void;
}

const DEFAULT_MAX_CONCURRENCY = 20;

export class WorkerPool {
  readonly maxConcurrency: number;

  private running = 0;

  private readonly waiting: QueuedTask[] = [];

  private idleWaiters: Array<() => void> = [];

  constructor(options: WorkerPoolOptions = {}) {
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
  }

  get active(): number {
    return this.running;
  }

  get queued(): number {
    return this.waiting.length;
  }

  /** Resolves or rejects with the task once it has run. */
  submit(run: () => Promise<void>): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.waiting.push({ run, resolve, reject });
      this.drain();
    });
  }

  onIdle(): Promise<void> {
    if (this.running === 0 && this.waiting.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain(): void {
    while (this.running < this.maxConcurrency) {
      const task = this.waiting.shift();
      if (!task) {
        break;
      }
      this.running += 1;
      void Promise.resolve()
        .then(task.run)
        .then(task.resolve, task.reject)
        .finally(() => {
          this.running -= 1;
          this.drain();
          this.notifyIdle();
        });
    }
  }

  private notifyIdle(): void {
    if (this.running !== 0 || this.waiting.length !== 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
