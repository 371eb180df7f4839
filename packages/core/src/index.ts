import {
  EmptySummarizationError,
  InsufficientHistoryError,
  attempt,
  describeError,
  scopedLogger,
  type Logger,
  type Sleep
} from "../../toolkit/src/index";
import { loadHistoryWindow, type HistoryWindow, type RecapHistoryStore } from "../../store/src/index";
import type { SummarizationResult } from "../../summarizer/src/index";
import {
  batchLimitFor,
  buildRecapMessage,
  splitMessageIntoBatches,
  type ChatInfo,
  type ChatPlatform,
  type DeliveryReport,
  type DeliveryRequest
} from "../../delivery/src/index";
import type { RecapJob, RecapRunner } from "../../scheduler/src/index";
import { recapTitle, renderRecapDocument } from "./document";

export * from "./document";

export interface RecapSummarizerPort {
  readonly model: string;
  summarize(window: HistoryWindow): Promise<SummarizationResult>;
  condense(window: HistoryWindow, summaries: string[]): Promise<string>;
}

export interface PageSeriesPublisher {
  createPageSeries(title: string, html: string): Promise<string[]>;
}

export interface RecapDeliverer {
  deliver(request: DeliveryRequest): Promise<DeliveryReport>;
}

export interface RecapPipelineOptions {
  store: RecapHistoryStore;
  platform: Pick<ChatPlatform, "getChat">;
  summarizer: RecapSummarizerPort;
  publisher: PageSeriesPublisher;
  delivery: RecapDeliverer;
  chatAttempts?: number;
  chatRetryDelayMs?: number;
  sleep?: Sleep;
  now?: () => Date;
  logger?: Logger;
}

export type RecapRunResult =
  | {
      status: "delivered";
      chatId: number;
      logId: string;
      pageUrls: string[];
      condensedSummary: string;
      report: DeliveryReport;
    }
  | { status: "skipped"; chatId: number; reason: string }
  | { status: "failed"; chatId: number; stage: RecapStage; error: string };

export type RecapStage = "resolve_chat" | "load_history" | "summarize" | "publish" | "deliver";

const DEFAULT_CHAT_ATTEMPTS = 3;
const DEFAULT_CHAT_RETRY_DELAY_MS = 1000;

/** Summarizes, publishes and delivers the recap of one chat. */
export class RecapPipeline implements RecapRunner {
  private readonly options: RecapPipelineOptions;

  private readonly log: Required<Logger>;

  constructor(options: RecapPipelineOptions) {
    this.options = options;
    this.log = scopedLogger("recap", options.logger);
  }

  async run(job: RecapJob): Promise<RecapRunResult> {
    const { store, platform, summarizer, publisher, delivery } = this.options;
    const { chatId } = job;
    const now = this.options.now?.() ?? new Date();

    let chat: ChatInfo;
    try {
      chat = await attempt(this.options.chatAttempts ?? DEFAULT_CHAT_ATTEMPTS, () => platform.getChat(chatId), {
        delayMs: this.options.chatRetryDelayMs ?? DEFAULT_CHAT_RETRY_DELAY_MS,
        sleep: this.options.sleep
      });
    } catch (error) {
      return this.fail(chatId, "resolve_chat", error);
    }

    let window: HistoryWindow;
    try {
      window = loadHistoryWindow(store, {
        chatId,
        chatTitle: chat.title,
        chatType: chat.type,
        ratesPerDay: job.options?.ratesPerDay,
        now
      });
    } catch (error) {
      return this.fail(chatId, "load_history", error);
    }

    let summarization: SummarizationResult;
    try {
      summarization = await summarizer.summarize(window);
    } catch (error) {
      if (error instanceof InsufficientHistoryError || error instanceof EmptySummarizationError) {
        this.log.info(`skipping recap of chat ${chatId}: ${error.message}`);
        return { status: "skipped", chatId, reason: error.message };
      }
      return this.fail(chatId, "summarize", error);
    }

    const { logId, summaries } = summarization;
    const createdAt = now.toISOString();
    this.recordLog({ logId, chatId, summaries, pageUrls: [], createdAt });

    const condensedSummary = await summarizer.condense(window, summaries);
    const title = recapTitle(window.chatTitle, window.until);
    const html = renderRecapDocument({ window, summaries, model: summarizer.model });

    let pageUrls: string[];
    try {
      pageUrls = await publisher.createPageSeries(title, html);
    } catch (error) {
      return this.fail(chatId, "publish", error);
    }
    this.recordLog({ logId, chatId, summaries, condensedSummary, pageUrls, createdAt });

    const message = buildRecapMessage({
      title,
      chatType: window.chatType,
      pageUrls,
      condensedSummary,
      model: summarizer.model
    });
    const batches = splitMessageIntoBatches(message, batchLimitFor(window.chatTitle));

    let report: DeliveryReport;
    try {
      report = await delivery.deliver({
        chatId,
        chatTitle: window.chatTitle,
        options: job.options,
        subscribers: job.subscribers,
        batches
      });
    } catch (error) {
      return this.fail(chatId, "deliver", error);
    }

    this.log.info(`recap ${logId} of chat ${chatId} published at ${pageUrls[0]} (${job.trigger})`);
    return { status: "delivered", chatId, logId, pageUrls, condensedSummary, report };
  }

  private recordLog(log: Parameters<RecapHistoryStore["recordRecapLog"]>[0]): void {
    try {
      this.options.store.recordRecapLog(log);
    } catch (error) {
      this.log.warn(`failed to record recap log ${log.logId}: ${describeError(error)}`);
    }
  }

  private fail(chatId: number, stage: RecapStage, error: unknown): RecapRunResult {
    const message = describeError(error);
    this.log.error(`recap of chat ${chatId} failed during ${stage}: ${message}`);
    return { status: "failed", chatId, stage, error: message };
  }
}
