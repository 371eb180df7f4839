import { describe, expect, it, vi } from "vitest";

import {
  InMemoryTimeCapsuleQueue,
  RecapScheduler,
  type CapsuleHandler,
  type ChatCapsule,
  type RecapJob
} from "../src/index";
import type { RecapOptions, RecapSettingsReader, Subscriber } from "../../store/src/index";

const HOUR_MS = 60 * 60 * 1000;
const chatId = -1001234567890;

class FakeSettings implements RecapSettingsReader {
  readonly options = new Map<number, RecapOptions>();

  readonly subscribers = new Map<number, Subscriber[]>();

  hasRecapEnabled = vi.fn((id: number): boolean => this.options.get(id)?.enabled ?? false);

  findRecapOptions = vi.fn((id: number): RecapOptions | undefined => this.options.get(id));

  findSubscribers = vi.fn((id: number): Subscriber[] => this.subscribers.get(id) ?? []);

  listEnabledChatIds = vi.fn((): number[] =>
    [...this.options.values()].filter((options) => options.enabled).map((options) => options.chatId)
  );
}

function recapOptions(overrides: Partial<RecapOptions> = {}): RecapOptions {
  return { chatId, enabled: true, sendMode: "publicly", ratesPerDay: 4, pinEnabled: false, ...overrides };
}

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

function setup() {
  let clock = Date.UTC(2024, 4, 1);
  const settings = new FakeSettings();
  const runner = { run: vi.fn(async (_job: RecapJob): Promise<unknown> => undefined) };
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  let fire: CapsuleHandler<ChatCapsule> = async () => undefined;
  const queue = new InMemoryTimeCapsuleQueue<ChatCapsule>({
    handler: (capsule) => fire(capsule),
    now: () => clock,
    logger
  });
  const scheduler = new RecapScheduler({
    store: settings,
    runner,
    readAttempts: 3,
    sleep: async () => undefined,
    now: () => clock,
    logger,
    createQueue: (handler) => {
      fire = handler;
      return queue;
    }
  });

  return {
    settings,
    runner,
    logger,
    queue,
    scheduler,
    now: () => clock,
    advance: (ms: number) => {
      clock += ms;
    }
  };
}

describe("RecapScheduler.schedule", () => {
  it("buries one capsule per chat at the recap interval", () => {
    const { settings, queue, scheduler, now } = setup();
    settings.options.set(chatId, recapOptions({ ratesPerDay: 3 }));

    expect(scheduler.schedule(chatId)).toBe(now() + 8 * HOUR_MS);
    expect(scheduler.schedule(chatId, recapOptions({ ratesPerDay: 2 }))).toBe(now() + 12 * HOUR_MS);

    expect(queue.pending()).toEqual([
      { key: `recap:${chatId}`, payload: { chatId }, dueAt: now() + 12 * HOUR_MS }
    ]);
  });

  it("falls back to the default interval", () => {
    const { scheduler, now } = setup();

    expect(scheduler.schedule(chatId)).toBe(now() + 6 * HOUR_MS);
  });
});

describe("RecapScheduler.onFire", () => {
  it("skips disabled chats but reschedules them", async () => {
    const { settings, runner, queue, scheduler, now } = setup();
    settings.options.set(chatId, recapOptions({ enabled: false, ratesPerDay: 2 }));

    await expect(scheduler.onFire(chatId)).resolves.toBe("disabled");

    expect(runner.run).not.toHaveBeenCalled();
    expect(queue.pending().map((capsule) => capsule.dueAt)).toEqual([now() + 12 * HOUR_MS]);
  });

  it("skips private-only chats without subscribers", async () => {
    const { settings, runner, queue, scheduler } = setup();
    settings.options.set(chatId, recapOptions({ sendMode: "only_private_subscriptions" }));

    await expect(scheduler.onFire(chatId)).resolves.toBe("no_subscribers");

    expect(runner.run).not.toHaveBeenCalled();
    expect(queue.pending()).toHaveLength(1);
  });

  it("dispatches enabled chats to the runner", async () => {
    const { settings, runner, scheduler } = setup();
    const options = recapOptions();
    settings.options.set(chatId, options);
    settings.subscribers.set(chatId, [{ chatId, userId: 7 }]);

    await expect(scheduler.onFire(chatId)).resolves.toBe("dispatched");
    await scheduler.idle();

    expect(runner.run).toHaveBeenCalledWith({
      chatId,
      options,
      subscribers: [{ chatId, userId: 7 }],
      trigger: "scheduled"
    });
  });

  it("aborts the firing when reads keep failing and still reschedules", async () => {
    const { settings, runner, queue, scheduler } = setup();
    settings.hasRecapEnabled.mockImplementation(() => {
      throw new Error("database is locked");
    });

    await expect(scheduler.onFire(chatId)).resolves.toBe("aborted");

    expect(settings.hasRecapEnabled).toHaveBeenCalledTimes(3);
    expect(runner.run).not.toHaveBeenCalled();
    expect(queue.pending()).toHaveLength(1);
  });

  it("keeps the schedule after a failed run", async () => {
    const { settings, runner, logger, queue, scheduler } = setup();
    settings.options.set(chatId, recapOptions());
    runner.run.mockRejectedValueOnce(new Error("publishing failed"));

    await expect(scheduler.onFire(chatId)).resolves.toBe("dispatched");
    await scheduler.idle();
    await flush();

    expect(logger.error).toHaveBeenCalledWith(`[scheduler] recap run of chat ${chatId} failed: publishing failed`);
    expect(queue.pending()).toHaveLength(1);
    await expect(scheduler.onFire(chatId)).resolves.toBe("dispatched");
  });

  it("refuses a second run while the chat is still running", async () => {
    const { settings, runner, scheduler } = setup();
    settings.options.set(chatId, recapOptions());
    let release: () => void = () => undefined;
    runner.run.mockImplementationOnce(
      () =>
        new Promise<unknown>((resolve) => {
          release = () => resolve(undefined);
        })
    );

    await expect(scheduler.trigger(chatId)).resolves.toBe("dispatched");
    await expect(scheduler.trigger(chatId)).resolves.toBe("already_running");

    await flush();
    release();
    await scheduler.idle();
    await flush();

    await expect(scheduler.trigger(chatId)).resolves.toBe("dispatched");
    expect(runner.run.mock.calls[0][0].trigger).toBe("manual");
  });
});

describe("RecapScheduler lifecycle", () => {
  it("fires only capsules that are due", async () => {
    const { settings, runner, queue, scheduler, advance, now } = setup();
    const other = -1009876543210;
    settings.options.set(chatId, recapOptions({ ratesPerDay: 4 }));
    settings.options.set(other, recapOptions({ chatId: other, ratesPerDay: 2 }));
    scheduler.schedule(chatId);
    scheduler.schedule(other);

    advance(6 * HOUR_MS);
    await expect(queue.dig()).resolves.toBe(1);
    await scheduler.idle();

    expect(runner.run).toHaveBeenCalledTimes(1);
    expect(runner.run.mock.calls[0][0].chatId).toBe(chatId);
    expect(queue.pending().map((capsule) => [capsule.payload.chatId, capsule.dueAt])).toEqual([
      [other, now() + 6 * HOUR_MS],
      [chatId, now() + 6 * HOUR_MS]
    ]);
  });

  it("schedules enabled chats on start", async () => {
    const { settings, queue, scheduler } = setup();
    settings.options.set(1, recapOptions({ chatId: 1 }));
    settings.options.set(2, recapOptions({ chatId: 2 }));
    settings.options.set(3, recapOptions({ chatId: 3, enabled: false }));

    await expect(scheduler.start()).resolves.toBe(2);
    await expect(scheduler.start()).resolves.toBe(0);
    await scheduler.stop();

    expect(queue.pending().map((capsule) => capsule.key)).toEqual(["recap:1", "recap:2"]);
  });
});
