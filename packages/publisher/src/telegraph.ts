import { TransientNetworkError, describeError, withTimeout } from "../../toolkit/src/index";
import type { TelegraphNode } from "../../paginator/src/index";

export const TELEGRAPH_API_URL = "https://api.telegra.ph/";
export const TELEGRAPH_PAGE_URL_PREFIX = "https://telegra.ph/";

export interface TelegraphPage {
  url: string;
  path: string;
}

export interface TelegraphPageInput {
  accessToken: string;
  title: string;
  authorName?: string;
  content: TelegraphNode[];
}

export interface TelegraphClient {
  createPage(input: TelegraphPageInput): Promise<TelegraphPage>;
  editPage(path: string, input: TelegraphPageInput): Promise<TelegraphPage>;
}

export interface TelegraphHttpClientOptions {
  apiUrl?: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export class TelegraphHttpClient implements TelegraphClient {
  private readonly apiUrl: string;

  private readonly fetchImpl: typeof fetch;

  private readonly timeoutMs: number;

  constructor(options: TelegraphHttpClientOptions = {}) {
    const apiUrl = options.apiUrl ?? TELEGRAPH_API_URL;
    this.apiUrl = apiUrl.endsWith("/") ? apiUrl : `${apiUrl}/`;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  createPage(input: TelegraphPageInput): Promise<TelegraphPage> {
    return this.call("createPage", input);
  }

  editPage(path: string, input: TelegraphPageInput): Promise<TelegraphPage> {
    return this.call(`editPage/${encodeURIComponent(path)}`, input);
  }

  private async call(method: string, input: TelegraphPageInput): Promise<TelegraphPage> {
    let response: Response;
    try {
      response = await withTimeout(this.timeoutMs, (signal) =>
        this.fetchImpl(`${this.apiUrl}${method}`, {
          method: "POST",
          headers: { "Content-Type": "application/json; charset=utf-8" },
          body: JSON.stringify({
            access_token: input.accessToken,
            title: input.title,
            author_name: input.authorName,
            content: input.content,
            return_content: false
          }),
          signal
        })
      );
    } catch (error) {
      throw new TransientNetworkError(`telegraph ${method} request failed: ${describeError(error)}`, {
        cause: error
      });
    }

    if (!response.ok) {
      throw new TransientNetworkError(`telegraph ${method} responded with HTTP ${response.status}`);
    }

    const data = parseTelegraphResponse(await response.json());
    if (!data.ok || !data.result) {
      throw new TransientNetworkError(`telegraph ${method} failed: ${data.error ?? "unknown_error"}`);
    }
    return data.result;
  }
}

/** Page path used by `editPage`, e.g. `Recap-05-01` for `https://telegra.ph/Recap-05-01`. */
export function pagePathFromUrl(url: string): string {
  if (url.startsWith(TELEGRAPH_PAGE_URL_PREFIX)) {
    return url.slice(TELEGRAPH_PAGE_URL_PREFIX.length);
  }
  try {
    return new URL(url).pathname.replace(/^\/+/, "");
  } catch (error) {
    return url;
  }
}

function parseTelegraphResponse(value: unknown): { ok: boolean; result?: TelegraphPage; error?: string } {
  if (typeof value === "object" && value !== null && "ok" in value) {
    const record = value as Record<string, unknown>;
    const ok = Boolean(record.ok);
    const error = typeof record.error === "string" ? record.error : undefined;
    const result = parsePage(record.result);
    return { ok, result, error };
  }

  return { ok: false, error: "invalid_response" };
}

function parsePage(value: unknown): TelegraphPage | undefined {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  const record = value as Record<string, unknown>;
  if (typeof record.url !== "string" || typeof record.path !== "string") {
    return undefined;
  }
  return { url: record.url, path: record.path };
}
