import {
  ConfigurationError,
  IntervalThrottle,
  PublishingError,
  PublishingOverBudgetError,
  attempt,
  describeError,
  isRecapError,
  scopedLogger,
  type Logger,
  type Sleep
} from "../../toolkit/src/index";
import {
  TELEGRAPH_PAGE_LIMIT,
  buildSeriesIndex,
  htmlToNodes,
  paginate,
  serializedSize
} from "../../paginator/src/index";
import { pagePathFromUrl, type TelegraphClient } from "./telegraph";

export * from "./telegraph";

export interface PublishingServiceOptions {
  client: TelegraphClient;
  accessToken?: string;
  authorName?: string;
  maxAttempts?: number;
  retryDelayMs?: number;
  throttleMs?: number;
  byteBudget?: number;
  safetyBuffer?: number;
  sleep?: Sleep;
  now?: () => number;
  logger?: Logger;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAY_MS = 1000;
const DEFAULT_THROTTLE_MS = 2000;

export class PublishingService {
  private readonly client: TelegraphClient;

  private readonly options: Required<
    Pick<PublishingServiceOptions, "maxAttempts" | "retryDelayMs">
  > &
    Pick<PublishingServiceOptions, "accessToken" | "authorName" | "byteBudget" | "safetyBuffer" | "sleep" | "logger">;

  private readonly throttle: IntervalThrottle;

  private readonly log: Required<Logger>;

  constructor(options: PublishingServiceOptions) {
    this.client = options.client;
    this.options = {
      accessToken: options.accessToken,
      authorName: options.authorName,
      maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      retryDelayMs: options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
      byteBudget: options.byteBudget,
      safetyBuffer: options.safetyBuffer,
      sleep: options.sleep,
      logger: options.logger
    };
    this.throttle = new IntervalThrottle({
      intervalMs: options.throttleMs ?? DEFAULT_THROTTLE_MS,
      now: options.now,
      sleep: options.sleep
    });
    this.log = scopedLogger("publisher", options.logger);
  }

  async createPage(title: string, html: string): Promise<string> {
    const accessToken = this.requireAccessToken();
    const content = htmlToNodes(html);
    const page = await this.publish("create", title, () =>
      this.client.createPage({ accessToken, title, authorName: this.options.authorName, content })
    );
    this.log.info(`created page ${page.url} (${serializedSize(html)} bytes)`);
    return page.url;
  }

  async editPage(url: string, title: string, html: string): Promise<string> {
    const accessToken = this.requireAccessToken();
    const content = htmlToNodes(html);
    const path = pagePathFromUrl(url);
    const page = await this.publish("edit", title, () =>
      this.client.editPage(path, { accessToken, title, authorName: this.options.authorName, content })
    );
    this.log.info(`edited page ${page.url}`);
    return page.url;
  }

  /**
   * Publishes `html` as one page, or as a series of pages when it exceeds the
   * page budget. Every page of a series is then edited to start with an
   * index linking all parts.
   */
  async createPageSeries(title: string, html: string): Promise<string[]> {
    this.requireAccessToken();
    const pages = paginate(html, title, {
      byteBudget: this.options.byteBudget,
      safetyBuffer: this.options.safetyBuffer,
      logger: this.options.logger
    });
    const titles = pages.map((_, index) => (index === 0 ? title : `${title} (part ${index + 1})`));

    const urls: string[] = [];
    for (const [index, page] of pages.entries()) {
      urls.push(await this.createPage(titles[index], page));
    }

    if (urls.length === 1) {
      return urls;
    }

    const seriesIndex = buildSeriesIndex(urls);
    for (const [index, url] of urls.entries()) {
      const content = seriesIndex + pages[index];
      const size = serializedSize(content);
      if (size > TELEGRAPH_PAGE_LIMIT) {
        const overflow = new PublishingOverBudgetError(size, TELEGRAPH_PAGE_LIMIT);
        this.log.warn(`skipping series index on ${url}: ${overflow.message}`);
        continue;
      }
      try {
        await this.editPage(url, titles[index], content);
      } catch (error) {
        this.log.error(`failed to add the series index to ${url}: ${describeError(error)}`);
      }
    }

    this.log.info(`published "${title}" as ${urls.length} pages`);
    return urls;
  }

  private publish<T>(action: "create" | "edit", title: string, call: () => Promise<T>): Promise<T> {
    const { maxAttempts, retryDelayMs, sleep } = this.options;
    return this.throttle.run(async () => {
      try {
        return await attempt(maxAttempts, () => call(), {
          delayMs: retryDelayMs,
          sleep,
          onError: (error, attemptNumber) =>
            this.log.warn(
              `${action} "${title}" attempt ${attemptNumber}/${maxAttempts} failed: ${describeError(error)}`
            )
        });
      } catch (error) {
        const cause = isRecapError(error, "retry_exhausted") ? error.cause : error;
        throw new PublishingError(
          `failed to ${action} page "${title}" after ${maxAttempts} attempts: ${describeError(cause)}`,
          maxAttempts,
          { cause }
        );
      }
    });
  }

  private requireAccessToken(): string {
    if (!this.options.accessToken) {
      throw new ConfigurationError("a Telegraph access token is required to publish pages");
    }
    return this.options.accessToken;
  }
}
