import { describe, expect, it, vi } from "vitest";

import { FanOutDelivery, autoUnsubscribeNotice, frameForPrivateSubscriber } from "../src/index";
import { RecapStore, type RecapOptions } from "../../store/src/index";
import { FakeDeliveryStore, FakePlatform } from "./fakes";

const chatId = -1001234567890;

const publicOptions: RecapOptions = {
  chatId,
  enabled: true,
  sendMode: "publicly",
  ratesPerDay: 4,
  pinEnabled: false
};

function setup(store = new FakeDeliveryStore()) {
  const platform = new FakePlatform();
  const limiter = { take: vi.fn(async () => undefined) };
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const sleep = vi.fn(async (_ms: number) => undefined);
  const delivery = new FanOutDelivery({
    platform,
    store,
    limiter,
    sleep,
    logger,
    now: () => new Date("2024-05-01T12:00:00.000Z")
  });
  return { platform, store, limiter, logger, sleep, delivery };
}

describe("FanOutDelivery targets", () => {
  it("broadcasts to the group in public mode", async () => {
    const { platform, store, delivery } = setup();

    const report = await delivery.deliver({
      chatId,
      chatTitle: "Reading Club",
      options: publicOptions,
      subscribers: [],
      batches: ["recap"]
    });

    expect(report.outcomes).toEqual([
      { target: { kind: "group_broadcast", chatId }, status: "sent", messageIds: [100] }
    ]);
    expect(platform.sendMessage).toHaveBeenCalledWith({
      chatId,
      text: "recap",
      parseMode: "HTML",
      disableLinkPreview: false
    });
    expect(platform.pinMessage).not.toHaveBeenCalled();
    expect(store.records).toEqual([
      { chatId, messageId: 100, text: "recap", isPinned: false, sentAt: "2024-05-01T12:00:00.000Z" }
    ]);
  });

  it("treats missing options as public", async () => {
    const { delivery } = setup();

    const report = await delivery.deliver({ chatId, chatTitle: "Reading Club", subscribers: [], batches: ["recap"] });

    expect(report.outcomes.map((outcome) => outcome.target.kind)).toEqual(["group_broadcast"]);
  });

  it("revalidates subscribers and removes departed members once", async () => {
    const { platform, store, limiter, delivery } = setup();
    platform.getChatMember.mockImplementation(async (_chatId, userId) => (userId === 12 ? "left" : "member"));

    const report = await delivery.deliver({
      chatId,
      chatTitle: "Reading Club",
      options: { ...publicOptions, sendMode: "only_private_subscriptions" },
      subscribers: [
        { chatId, userId: 11 },
        { chatId, userId: 11 },
        { chatId, userId: 12 }
      ],
      batches: ["recap"]
    });

    expect(report.outcomes).toEqual([
      { target: { kind: "private_subscriber", chatId, userId: 11 }, status: "sent", messageIds: [101] }
    ]);
    expect(report.removedSubscribers).toEqual([12]);
    expect(store.unsubscribe).toHaveBeenCalledTimes(1);
    expect(store.unsubscribe).toHaveBeenCalledWith(chatId, 12);
    expect(platform.sent).toEqual([
      { chatId: 12, text: autoUnsubscribeNotice("Reading Club"), parseMode: "HTML" },
      {
        chatId: 11,
        text: frameForPrivateSubscriber("Reading Club", "recap"),
        parseMode: "HTML",
        disableLinkPreview: true
      }
    ]);
    expect(limiter.take).toHaveBeenCalledTimes(2);
  });

  it("skips subscribers whose membership cannot be checked", async () => {
    const { platform, store, delivery } = setup();
    platform.getChatMember.mockRejectedValue(new Error("Too Many Requests"));

    const report = await delivery.deliver({
      chatId,
      chatTitle: "Reading Club",
      options: publicOptions,
      subscribers: [{ chatId, userId: 13 }],
      batches: ["recap"]
    });

    expect(report.skippedSubscribers).toEqual([13]);
    expect(report.outcomes).toHaveLength(1);
    expect(store.unsubscribe).not.toHaveBeenCalled();
  });

  it("retries unsubscribing with a fixed delay", async () => {
    const { platform, store, sleep, delivery } = setup();
    platform.getChatMember.mockResolvedValue("kicked");
    store.unsubscribe
      .mockImplementationOnce(() => {
        throw new Error("database is locked");
      })
      .mockImplementationOnce(() => {
        throw new Error("database is locked");
      });

    const report = await delivery.deliver({
      chatId,
      chatTitle: "Reading Club",
      options: publicOptions,
      subscribers: [{ chatId, userId: 14 }],
      batches: ["recap"]
    });

    expect(report.removedSubscribers).toEqual([14]);
    expect(store.unsubscribe).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[60000], [60000]]);
  });

  it("keeps delivering when one target fails", async () => {
    const { platform, delivery } = setup();
    const send = platform.sendMessage.getMockImplementation();
    platform.sendMessage.mockImplementation(async (input) => {
      if (input.chatId === chatId) {
        throw new Error("Forbidden: bot was kicked");
      }
      if (!send) {
        throw new Error("missing default implementation");
      }
      return send(input);
    });

    const report = await delivery.deliver({
      chatId,
      chatTitle: "Reading Club",
      options: publicOptions,
      subscribers: [{ chatId, userId: 11 }],
      batches: ["recap"]
    });

    expect(report.outcomes.map((outcome) => outcome.status)).toEqual(["failed", "sent"]);
    expect(report.outcomes[0].error).toBe("Forbidden: bot was kicked");
  });
});

describe("FanOutDelivery batches and pinning", () => {
  it("suffixes batches and pins only the first group message", async () => {
    const recapStore = await RecapStore.open();
    recapStore.saveSentMessage({ chatId, messageId: 50, text: "old", isPinned: true, sentAt: "2024-04-30T12:00:00.000Z" });
    const platform = new FakePlatform();
    const delivery = new FanOutDelivery({
      platform,
      store: recapStore,
      limiter: { take: async () => undefined },
      logger: { info: vi.fn() },
      now: () => new Date("2024-05-01T12:00:00.000Z")
    });

    const report = await delivery.deliver({
      chatId,
      chatTitle: "Reading Club",
      options: { ...publicOptions, pinEnabled: true },
      subscribers: [],
      batches: ["one", "two"]
    });

    expect(platform.sent.map((input) => input.text)).toEqual(["one (1/2)", "two (2/2)"]);
    expect(platform.unpinMessage).toHaveBeenCalledWith(chatId, 50);
    expect(platform.pinMessage).toHaveBeenCalledTimes(1);
    expect(platform.pinMessage).toHaveBeenCalledWith(chatId, 100);
    expect(report.pinnedMessageId).toBe(100);
    expect(recapStore.findLastPinnedMessage(chatId)?.messageId).toBe(100);
    expect(recapStore.countPinnedMessages(chatId)).toBe(1);
    recapStore.close();
  });

  it("skips the pin when the previous pin cannot be looked up", async () => {
    const { platform, store, logger, delivery } = setup();
    store.findLastPinnedMessage.mockImplementation(() => {
      throw new Error("database is locked");
    });

    const report = await delivery.deliver({
      chatId,
      chatTitle: "Reading Club",
      options: { ...publicOptions, pinEnabled: true },
      subscribers: [],
      batches: ["recap"]
    });

    expect(report.outcomes[0].status).toBe("sent");
    expect(report.pinnedMessageId).toBeUndefined();
    expect(platform.pinMessage).not.toHaveBeenCalled();
    expect(store.records[0].isPinned).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      `[delivery] failed to look up the pinned message of chat ${chatId}, skipping pin: database is locked`
    );
  });
});
