import { RecapPipeline } from "../../../packages/core/src/index";
import { FanOutDelivery, TelegramBotClient } from "../../../packages/delivery/src/index";
import { PublishingService, TelegraphHttpClient } from "../../../packages/publisher/src/index";
import { RecapScheduler } from "../../../packages/scheduler/src/index";
import { RecapStore } from "../../../packages/store/src/index";
import { OpenAIChatClient, RecapSummarizer } from "../../../packages/summarizer/src/index";
import { TokenBucketLimiter, type Logger } from "../../../packages/toolkit/src/index";
import { requireSetting, type RecapConfig } from "./config";

export interface RecapContainer {
  store: RecapStore;
  pipeline: RecapPipeline;
  scheduler: RecapScheduler;
  close(): void;
}

export interface ContainerDependencies {
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

/** Wires the pipeline to the HTTP clients and the SQLite store. */
export async function createContainer(
  config: RecapConfig,
  dependencies: ContainerDependencies = {}
): Promise<RecapContainer> {
  const { fetchImpl, logger } = dependencies;
  const store = await RecapStore.open({ databaseFile: config.databaseFile });

  try {
    const platform = new TelegramBotClient({
      token: requireSetting(config.telegram.token, "TELEGRAM_BOT_TOKEN"),
      apiUrl: config.telegram.apiUrl,
      fetchImpl
    });
    const summarizer = new RecapSummarizer({
      llmClient: new OpenAIChatClient({
        apiKey: requireSetting(config.openai.apiKey, "OPENAI_API_KEY"),
        baseUrl: config.openai.baseUrl,
        model: config.openai.model,
        fetchImpl
      }),
      language: config.language,
      timeoutMs: config.llmTimeoutMs,
      logger
    });
    const publisher = new PublishingService({
      client: new TelegraphHttpClient({ apiUrl: config.telegraph.apiUrl, fetchImpl }),
      accessToken: requireSetting(config.telegraph.accessToken, "TELEGRAPH_ACCESS_TOKEN"),
      authorName: config.telegraph.authorName,
      logger
    });
    const delivery = new FanOutDelivery({
      platform,
      store,
      limiter: new TokenBucketLimiter({ ratePerSecond: config.sendRatePerSecond }),
      unsubscribeAttempts: config.unsubscribeAttempts,
      logger
    });
    const pipeline = new RecapPipeline({ store, platform, summarizer, publisher, delivery, logger });
    const scheduler = new RecapScheduler({
      store,
      runner: pipeline,
      maxConcurrentRuns: config.maxConcurrentRuns,
      readAttempts: config.storeReadAttempts,
      pollIntervalMs: config.pollIntervalMs,
      logger
    });

    return { store, pipeline, scheduler, close: () => store.close() };
  } catch (error) {
    store.close();
    throw error;
  }
}
