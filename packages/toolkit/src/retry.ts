import { RetryExhaustedError } from "./errors";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export interface AttemptOptions {
  delayMs?: number;
  sleep?: Sleep;
  onError?(error: unknown, attempt: number): void;
}

/**
 * Calls `fn` until it succeeds or `maxAttempts` calls have failed, waiting
 * `delayMs` between calls. The final failure is wrapped in a
 * {@link RetryExhaustedError} whose `cause` is the last error.
 */
export async function attempt<T>(
  maxAttempts: number,
  fn: (attempt: number) => T | Promise<T>,
  options: AttemptOptions = {}
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, Math.floor(maxAttempts));
  let lastError: unknown;

  for (let index = 1; index <= attempts; index += 1) {
    if (index > 1 && options.delayMs) {
      await wait(options.delayMs);
    }
    try {
      return await fn(index);
    } catch (error: unknown) {
      lastError = error;
      options.onError?.(error, index);
    }
  }

  throw new RetryExhaustedError(attempts, { cause: lastError });
}

export async function withTimeout<T>(
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
