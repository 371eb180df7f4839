import {
  WorkerPool,
  attempt,
  describeError,
  scopedLogger,
  type Logger,
  type Sleep
} from "../../toolkit/src/index";
import {
  resolveWindowHours,
  type RecapOptions,
  type RecapSettingsReader,
  type Subscriber
} from "../../store/src/index";
import { InMemoryTimeCapsuleQueue, type CapsuleHandler, type TimeCapsuleQueue } from "./capsule-queue";

export * from "./capsule-queue";

export interface RecapJob {
  chatId: number;
  options?: RecapOptions;
  subscribers: Subscriber[];
  trigger: "scheduled" | "manual";
}

/** Runs one recap end to end. */
export interface RecapRunner {
  run(job: RecapJob): Promise<unknown>;
}

export interface ChatCapsule {
  chatId: number;
}

export type FireOutcome = "aborted" | "disabled" | "no_subscribers" | "already_running" | "dispatched";

export interface RecapSchedulerOptions {
  store: RecapSettingsReader;
  runner: RecapRunner;
  createQueue?: (handler: CapsuleHandler<ChatCapsule>) => TimeCapsuleQueue<ChatCapsule>;
  maxConcurrentRuns?: number;
  readAttempts?: number;
  readDelayMs?: number;
  pollIntervalMs?: number;
  now?: () => number;
  sleep?: Sleep;
  logger?: Logger;
}

const HOUR_MS = 60 * 60 * 1000;
const DEFAULT_READ_ATTEMPTS = 10;
const DEFAULT_READ_DELAY_MS = 500;

export class RecapScheduler {
  private readonly store: RecapSettingsReader;

  private readonly runner: RecapRunner;

  private readonly queue: TimeCapsuleQueue<ChatCapsule>;

  private readonly pool: WorkerPool;

  private readonly inFlight = new Set<number>();

  private readonly options: Required<Pick<RecapSchedulerOptions, "readAttempts" | "readDelayMs" | "now">> &
    Pick<RecapSchedulerOptions, "sleep">;

  private readonly log: Required<Logger>;

  constructor(options: RecapSchedulerOptions) {
    this.store = options.store;
    this.runner = options.runner;
    this.pool = new WorkerPool({ maxConcurrency: options.maxConcurrentRuns });
    this.options = {
      readAttempts: options.readAttempts ?? DEFAULT_READ_ATTEMPTS,
      readDelayMs: options.readDelayMs ?? DEFAULT_READ_DELAY_MS,
      now: options.now ?? Date.now,
      sleep: options.sleep
    };
    this.log = scopedLogger("scheduler", options.logger);

    const handler: CapsuleHandler<ChatCapsule> = async (capsule) => {
      await this.onFire(capsule.chatId);
    };
    this.queue = options.createQueue
      ? options.createQueue(handler)
      : new InMemoryTimeCapsuleQueue({
          handler,
          pollIntervalMs: options.pollIntervalMs,
          now: this.options.now,
          logger: options.logger
        });
  }

  /** Schedules every enabled chat and starts polling. Returns the number of chats scheduled. */
  async start(): Promise<number> {
    const chatIds = await this.read("enabled chats", () => this.store.listEnabledChatIds());
    const pending = new Set(this.queue.pending().map((capsule) => capsule.key));
    let scheduled = 0;
    for (const chatId of chatIds) {
      if (!pending.has(capsuleKey(chatId))) {
        this.schedule(chatId);
        scheduled += 1;
      }
    }
    this.queue.start();
    this.log.info(`started with ${chatIds.length} enabled chats (${scheduled} newly scheduled)`);
    return scheduled;
  }

  /** Stops polling and waits for in-flight runs. */
  async stop(): Promise<void> {
    this.queue.stop();
    await this.pool.onIdle();
    this.log.info("stopped");
  }

  idle(): Promise<void> {
    return this.pool.onIdle();
  }

  /**
   * Buries the chat's capsule one recap interval from now, replacing any
   * pending one. Returns when it is due.
   */
  schedule(chatId: number, options?: RecapOptions): number {
    const ratesPerDay = options?.ratesPerDay ?? this.readRateQuietly(chatId);
    const dueAt = this.options.now() + resolveWindowHours(ratesPerDay) * HOUR_MS;
    this.queue.bury(capsuleKey(chatId), { chatId }, dueAt);
    this.log.debug(`chat ${chatId} scheduled for ${new Date(dueAt).toISOString()}`);
    return dueAt;
  }

  cancel(chatId: number): boolean {
    return this.queue.cancel(capsuleKey(chatId));
  }

  trigger(chatId: number): Promise<FireOutcome> {
    return this.onFire(chatId, "manual");
  }

  /**
   * Handles a fired capsule. The chat is always rescheduled before this
   * returns, whatever the outcome.
   */
  async onFire(chatId: number, trigger: RecapJob["trigger"] = "scheduled"): Promise<FireOutcome> {
    let options: RecapOptions | undefined;
    try {
      const enabled = await this.read("recap flag", () => this.store.hasRecapEnabled(chatId));
      if (!enabled) {
        this.log.info(`recap disabled for chat ${chatId}, skipping`);
        return "disabled";
      }

      options = await this.read("recap options", () => this.store.findRecapOptions(chatId));
      const subscribers = await this.read("subscribers", () => this.store.findSubscribers(chatId));
      if (options?.sendMode === "only_private_subscriptions" && !subscribers.length) {
        this.log.info(`chat ${chatId} only sends to subscribers and has none, skipping`);
        return "no_subscribers";
      }

      return this.dispatch({ chatId, options, subscribers, trigger });
    } catch (error) {
      this.log.error(`aborting recap of chat ${chatId} for this cycle: ${describeError(error)}`);
      return "aborted";
    } finally {
      this.schedule(chatId, options);
    }
  }

  private dispatch(job: RecapJob): FireOutcome {
    if (this.inFlight.has(job.chatId)) {
      this.log.warn(`recap of chat ${job.chatId} is still running, skipping this firing`);
      return "already_running";
    }

    this.inFlight.add(job.chatId);
    void this.pool
      .submit(async () => {
        await this.runner.run(job);
      })
      .catch((error: unknown) => {
        this.log.error(`recap run of chat ${job.chatId} failed: ${describeError(error)}`);
      })
      .finally(() => {
        this.inFlight.delete(job.chatId);
      });
    return "dispatched";
  }

  private read<T>(label: string, fn: () => T): Promise<T> {
    const { readAttempts, readDelayMs, sleep } = this.options;
    return attempt(readAttempts, fn, {
      delayMs: readDelayMs,
      sleep,
      onError: (error, attemptNumber) =>
        this.log.warn(`reading ${label} attempt ${attemptNumber}/${readAttempts} failed: ${describeError(error)}`)
    });
  }

  private readRateQuietly(chatId: number): number | undefined {
    try {
      return this.store.findRecapOptions(chatId)?.ratesPerDay;
    } catch (error) {
      this.log.warn(`could not read the recap rate of chat ${chatId}, using the default: ${describeError(error)}`);
      return undefined;
    }
  }
}

function capsuleKey(chatId: number): string {
  return `recap:${chatId}`;
}
