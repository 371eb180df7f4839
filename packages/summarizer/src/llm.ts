import { TransientNetworkError, describeError } from "../../toolkit/src/index";

export interface LLMRequest {
  system: string;
  user: string;
  signal?: AbortSignal;
}

export interface LLMClient {
  model: string;
  complete(request: LLMRequest): Promise<string>;
}

export interface OpenAIChatClientOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  temperature?: number;
  fetchImpl?: typeof fetch;
}

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

/** Chat completions client for any OpenAI compatible endpoint. */
export class OpenAIChatClient implements LLMClient {
  readonly model: string;

  private readonly options: Required<Omit<OpenAIChatClientOptions, "model">>;

  constructor(options: OpenAIChatClientOptions) {
    this.model = options.model ?? DEFAULT_OPENAI_MODEL;
    this.options = {
      apiKey: options.apiKey,
      baseUrl: (options.baseUrl ?? DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, ""),
      temperature: options.temperature ?? 0.3,
      fetchImpl: options.fetchImpl ?? fetch
    };
  }

  async complete(request: LLMRequest): Promise<string> {
    let response: Response;
    try {
      response = await this.options.fetchImpl(`${this.options.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.options.apiKey}`
        },
        body: JSON.stringify({
          model: this.model,
          temperature: this.options.temperature,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.user }
          ]
        }),
        signal: request.signal
      });
    } catch (error) {
      throw new TransientNetworkError(`language model request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new TransientNetworkError(`language model responded with HTTP ${response.status}`);
    }

    return parseCompletion(await response.json());
  }
}

function parseCompletion(value: unknown): string {
  if (typeof value !== "object" || value === null) {
    return "";
  }
  const record = value as Record<string, unknown>;
  const choices = Array.isArray(record.choices) ? record.choices : [];
  const first: unknown = choices[0];
  if (typeof first !== "object" || first === null || !("message" in first)) {
    return "";
  }
  const message: unknown = first.message;
  if (typeof message === "object" && message !== null && "content" in message) {
    return typeof message.content === "string" ? message.content : "";
  }
  return "";
}
