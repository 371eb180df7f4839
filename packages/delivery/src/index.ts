import {
  MembershipRevokedError,
  PinLookupError,
  TokenBucketLimiter,
  attempt,
  describeError,
  scopedLogger,
  type Logger,
  type RateLimiter,
  type Sleep
} from "../../toolkit/src/index";
import type { DeliveryStore, RecapOptions, SentMessageRecord, Subscriber } from "../../store/src/index";
import { autoUnsubscribeNotice, frameForPrivateSubscriber, withBatchSuffix } from "./messages";
import type { ChatPlatform } from "./telegram";

export * from "./messages";
export * from "./telegram";

export type DeliveryTarget =
  | { kind: "group_broadcast"; chatId: number }
  | { kind: "private_subscriber"; chatId: number; userId: number };

export interface DeliveryRequest {
  chatId: number;
  chatTitle: string;
  options?: RecapOptions;
  subscribers: Subscriber[];
  batches: string[];
}

export interface TargetOutcome {
  target: DeliveryTarget;
  status: "sent" | "failed";
  messageIds: number[];
  error?: string;
}

export interface DeliveryReport {
  chatId: number;
  outcomes: TargetOutcome[];
  removedSubscribers: number[];
  skippedSubscribers: number[];
  pinnedMessageId?: number;
}

export interface FanOutDeliveryOptions {
  platform: ChatPlatform;
  store: DeliveryStore;
  limiter?: RateLimiter;
  unsubscribeAttempts?: number;
  unsubscribeDelayMs?: number;
  sleep?: Sleep;
  now?: () => Date;
  logger?: Logger;
}

export const ALLOWED_MEMBER_STATUSES: ReadonlySet<string> = new Set([
  "creator",
  "administrator",
  "member",
  "restricted"
]);

const DEFAULT_UNSUBSCRIBE_ATTEMPTS = 10;
const DEFAULT_UNSUBSCRIBE_DELAY_MS = 60 * 1000;

export class FanOutDelivery {
  private readonly platform: ChatPlatform;

  private readonly store: DeliveryStore;

  private readonly limiter: RateLimiter;

  private readonly options: Required<Pick<FanOutDeliveryOptions, "unsubscribeAttempts" | "unsubscribeDelayMs" | "now">> &
    Pick<FanOutDeliveryOptions, "sleep">;

  private readonly log: Required<Logger>;

  constructor(options: FanOutDeliveryOptions) {
    this.platform = options.platform;
    this.store = options.store;
    this.limiter = options.limiter ?? new TokenBucketLimiter();
    this.options = {
      unsubscribeAttempts: options.unsubscribeAttempts ?? DEFAULT_UNSUBSCRIBE_ATTEMPTS,
      unsubscribeDelayMs: options.unsubscribeDelayMs ?? DEFAULT_UNSUBSCRIBE_DELAY_MS,
      now: options.now ?? (() => new Date()),
      sleep: options.sleep
    };
    this.log = scopedLogger("delivery", options.logger);
  }

  async deliver(request: DeliveryRequest): Promise<DeliveryReport> {
    const report: DeliveryReport = {
      chatId: request.chatId,
      outcomes: [],
      removedSubscribers: [],
      skippedSubscribers: []
    };

    const targets = await this.resolveTargets(request, report);
    for (const target of targets) {
      report.outcomes.push(await this.sendToTarget(target, request, report));
    }

    const sent = report.outcomes.filter((outcome) => outcome.status === "sent").length;
    this.log.info(
      `delivered recap of chat ${request.chatId} to ${sent}/${targets.length} targets` +
        (report.removedSubscribers.length ? `, removed ${report.removedSubscribers.length} subscribers` : "")
    );
    return report;
  }

  private async resolveTargets(request: DeliveryRequest, report: DeliveryReport): Promise<DeliveryTarget[]> {
    const targets: DeliveryTarget[] = [];
    if (!request.options || request.options.sendMode === "publicly") {
      targets.push({ kind: "group_broadcast", chatId: request.chatId });
    }

    const seen = new Set<number>();
    for (const subscriber of request.subscribers) {
      if (seen.has(subscriber.userId)) {
        continue;
      }
      seen.add(subscriber.userId);

      let status: string;
      try {
        status = await this.platform.getChatMember(request.chatId, subscriber.userId);
      } catch (error) {
        this.log.warn(
          `membership lookup for user ${subscriber.userId} in chat ${request.chatId} failed, skipping: ${describeError(error)}`
        );
        report.skippedSubscribers.push(subscriber.userId);
        continue;
      }

      if (ALLOWED_MEMBER_STATUSES.has(status)) {
        targets.push({ kind: "private_subscriber", chatId: request.chatId, userId: subscriber.userId });
        continue;
      }

      const revoked = new MembershipRevokedError(request.chatId, subscriber.userId, status);
      this.log.info(`${revoked.message}, removing subscription`);
      await this.removeSubscriber(request, subscriber.userId);
      report.removedSubscribers.push(subscriber.userId);
    }

    return targets;
  }

  private async removeSubscriber(request: DeliveryRequest, userId: number): Promise<void> {
    const { unsubscribeAttempts, unsubscribeDelayMs, sleep } = this.options;
    try {
      await attempt(unsubscribeAttempts, () => this.store.unsubscribe(request.chatId, userId), {
        delayMs: unsubscribeDelayMs,
        sleep,
        onError: (error, attemptNumber) =>
          this.log.warn(
            `unsubscribe of user ${userId} attempt ${attemptNumber}/${unsubscribeAttempts} failed: ${describeError(error)}`
          )
      });
    } catch (error) {
      this.log.error(`failed to unsubscribe user ${userId} from chat ${request.chatId}: ${describeError(error)}`);
    }

    try {
      await this.limiter.take();
      await this.platform.sendMessage({
        chatId: userId,
        text: autoUnsubscribeNotice(request.chatTitle),
        parseMode: "HTML"
      });
    } catch (error) {
      this.log.warn(`failed to notify user ${userId} about the removal: ${describeError(error)}`);
    }
  }

  private async sendToTarget(
    target: DeliveryTarget,
    request: DeliveryRequest,
    report: DeliveryReport
  ): Promise<TargetOutcome> {
    const destination = target.kind === "group_broadcast" ? target.chatId : target.userId;
    const messageIds: number[] = [];
    const total = request.batches.length;

    try {
      for (const [index, batch] of request.batches.entries()) {
        const body = withBatchSuffix(batch, index, total);
        const text = target.kind === "private_subscriber" ? frameForPrivateSubscriber(request.chatTitle, body) : body;

        await this.limiter.take();
        const sent = await this.platform.sendMessage({
          chatId: destination,
          text,
          parseMode: "HTML",
          disableLinkPreview: target.kind === "private_subscriber"
        });
        messageIds.push(sent.messageId);

        const shouldPin = target.kind === "group_broadcast" && index === 0 && request.options?.pinEnabled === true;
        const pinned = shouldPin ? await this.pin(destination, sent.messageId) : false;
        if (pinned) {
          report.pinnedMessageId = sent.messageId;
        }
        this.record(destination, sent.messageId, text, pinned);
      }
      return { target, status: "sent", messageIds };
    } catch (error) {
      this.log.error(`failed to deliver to ${describeTarget(target)}: ${describeError(error)}`);
      return { target, status: "failed", messageIds, error: describeError(error) };
    }
  }

  /**
   * Replaces the chat's pinned recap with `messageId`. Returns whether the new
   * message ended up pinned.
   */
  private async pin(chatId: number, messageId: number): Promise<boolean> {
    let previous: SentMessageRecord | undefined;
    try {
      previous = this.store.findLastPinnedMessage(chatId);
    } catch (error) {
      const failure = new PinLookupError(chatId, { cause: error });
      this.log.warn(`${failure.message}, skipping pin: ${describeError(error)}`);
      return false;
    }

    if (previous) {
      try {
        await this.platform.unpinMessage(chatId, previous.messageId);
      } catch (error) {
        this.log.warn(`failed to unpin message ${previous.messageId} in chat ${chatId}: ${describeError(error)}`);
      }
      try {
        this.store.updatePinnedMessage(chatId, previous.messageId, false);
      } catch (error) {
        this.log.warn(`failed to clear the pinned record of message ${previous.messageId}, skipping pin: ${describeError(error)}`);
        return false;
      }
    }

    try {
      await this.platform.pinMessage(chatId, messageId);
      return true;
    } catch (error) {
      this.log.warn(`failed to pin message ${messageId} in chat ${chatId}: ${describeError(error)}`);
      return false;
    }
  }

  private record(chatId: number, messageId: number, text: string, isPinned: boolean): void {
    try {
      this.store.saveSentMessage({
        chatId,
        messageId,
        text,
        isPinned,
        sentAt: this.options.now().toISOString()
      });
    } catch (error) {
      this.log.error(`failed to record message ${messageId} of chat ${chatId}: ${describeError(error)}`);
    }
  }
}

function describeTarget(target: DeliveryTarget): string {
  return target.kind === "group_broadcast"
    ? `chat ${target.chatId}`
    : `subscriber ${target.userId} of chat ${target.chatId}`;
}
