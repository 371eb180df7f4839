import { z } from "zod";

import { ConfigurationError } from "../../../packages/toolkit/src/index";

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_API_URL: z.string().url().default("https://api.telegram.org"),
  TELEGRAPH_ACCESS_TOKEN: z.string().optional(),
  TELEGRAPH_API_URL: z.string().url().default("https://api.telegra.ph/"),
  TELEGRAPH_AUTHOR_NAME: z.string().default("Chat Recap"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  RECAP_LANGUAGE: z.string().default("English"),
  RECAP_DATABASE_FILE: z.string().default("recap.db"),
  RECAP_MAX_CONCURRENT_RUNS: z.coerce.number().int().positive().default(20),
  RECAP_SEND_RATE_PER_SECOND: z.coerce.number().positive().default(5),
  RECAP_STORE_READ_ATTEMPTS: z.coerce.number().int().positive().default(10),
  RECAP_UNSUBSCRIBE_ATTEMPTS: z.coerce.number().int().positive().default(10),
  RECAP_LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  RECAP_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000)
});

export interface RecapConfig {
  telegram: { token?: string; apiUrl: string };
  telegraph: { accessToken?: string; apiUrl: string; authorName: string };
  openai: { apiKey?: string; baseUrl: string; model: string };
  language: string;
  databaseFile: string;
  maxConcurrentRuns: number;
  sendRatePerSecond: number;
  storeReadAttempts: number;
  unsubscribeAttempts: number;
  llmTimeoutMs: number;
  pollIntervalMs: number;
}

export interface ConfigOverrides {
  databaseFile?: string;
}

/** Reads the environment, treating blank variables as unset. Flags in `overrides` win. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {}
): RecapConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => typeof entry[1] === "string" && entry[1].trim() !== "")
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`invalid environment: ${issues.join("; ")}`);
  }

  const values = parsed.data;
  return {
    telegram: { token: values.TELEGRAM_BOT_TOKEN, apiUrl: values.TELEGRAM_API_URL },
    telegraph: {
      accessToken: values.TELEGRAPH_ACCESS_TOKEN,
      apiUrl: values.TELEGRAPH_API_URL,
      authorName: values.TELEGRAPH_AUTHOR_NAME
    },
    openai: { apiKey: values.OPENAI_API_KEY, baseUrl: values.OPENAI_BASE_URL, model: values.OPENAI_MODEL },
    language: values.RECAP_LANGUAGE,
    databaseFile: overrides.databaseFile ?? values.RECAP_DATABASE_FILE,
    maxConcurrentRuns: values.RECAP_MAX_CONCURRENT_RUNS,
    sendRatePerSecond: values.RECAP_SEND_RATE_PER_SECOND,
    storeReadAttempts: values.RECAP_STORE_READ_ATTEMPTS,
    unsubscribeAttempts: values.RECAP_UNSUBSCRIBE_ATTEMPTS,
    llmTimeoutMs: values.RECAP_LLM_TIMEOUT_MS,
    pollIntervalMs: values.RECAP_POLL_INTERVAL_MS
  };
}

export function requireSetting(value: string | undefined, name: string): string {
  if (!value) {
    throw new ConfigurationError(`${name} is not set`);
  }
  return value;
}
