export type RecapErrorCode =
  | "transient_network"
  | "publishing_failed"
  | "insufficient_history"
  | "empty_summarization"
  | "publishing_over_budget"
  | "membership_revoked"
  | "pin_lookup_failure"
  | "configuration"
  | "retry_exhausted";

export class RecapError extends Error {
  readonly code: RecapErrorCode;

  constructor(code: RecapErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class TransientNetworkError extends RecapError {
  constructor(
    message: string,
    options?: { cause?: unknown },
    code: RecapErrorCode = "transient_network"
  ) {
    super(code, message, options);
  }
}

/** A Telegraph call that kept failing after every retry. */
export class PublishingError extends TransientNetworkError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options, "publishing_failed");
    this.attempts = attempts;
  }
}

export class InsufficientHistoryError extends RecapError {
  readonly messageCount: number;
  readonly minimum: number;

  constructor(messageCount: number, minimum: number) {
    super(
      "insufficient_history",
      `chat history has ${messageCount} messages, at least ${minimum} are required`
    );
    this.messageCount = messageCount;
    this.minimum = minimum;
  }
}

export class EmptySummarizationError extends RecapError {
  constructor(message = "summarization produced no usable topics") {
    super("empty_summarization", message);
  }
}

export class PublishingOverBudgetError extends RecapError {
  readonly blockBytes: number;
  readonly limitBytes: number;

  constructor(blockBytes: number, limitBytes: number) {
    super(
      "publishing_over_budget",
      `a single block serialises to ${blockBytes} bytes, over the ${limitBytes} byte page limit`
    );
    this.blockBytes = blockBytes;
    this.limitBytes = limitBytes;
  }
}

export class MembershipRevokedError extends RecapError {
  readonly chatId: number;
  readonly userId: number;
  readonly status: string;

  constructor(chatId: number, userId: number, status: string) {
    super("membership_revoked", `user ${userId} is no longer a member of ${chatId} (status: ${status})`);
    this.chatId = chatId;
    this.userId = userId;
    this.status = status;
  }
}

export class PinLookupError extends RecapError {
  constructor(chatId: number, options?: { cause?: unknown }) {
    super("pin_lookup_failure", `failed to look up the pinned message of chat ${chatId}`, options);
  }
}

export class ConfigurationError extends RecapError {
  constructor(message: string) {
    super("configuration", message);
  }
}

export class RetryExhaustedError extends RecapError {
  readonly attempts: number;

  constructor(attempts: number, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super("retry_exhausted", `gave up after ${attempts} attempts${reason}`, options);
    this.attempts = attempts;
  }
}

export function isRecapError(error: unknown, code?: RecapErrorCode): error is RecapError {
  return error instanceof RecapError && (code === undefined || error.code === code);
}
