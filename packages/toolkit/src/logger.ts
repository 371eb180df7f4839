export interface Logger {
  info(message: string): void;
  warn?(message: string): void;
  error?(message: string): void;
  debug?(message: string): void;
}

export function normalizeLogger(logger?: Logger): Required<Logger> {
  const fallback = console;
  const target = logger ?? fallback;
  return {
    info: target.info ? target.info.bind(target) : fallback.log.bind(fallback),
    warn: target.warn ? target.warn.bind(target) : fallback.warn.bind(fallback),
    error: target.error ? target.error.bind(target) : fallback.error.bind(fallback),
    debug: target.debug
      ? target.debug.bind(target)
      : (fallback.debug ?? fallback.log).bind(fallback)
  };
}

/**
 * Normalises `logger` and prefixes every line with `[tag]`, the convention
 * every component in this repository logs with.
 */
export function scopedLogger(tag: string, logger?: Logger): Required<Logger> {
  const log = normalizeLogger(logger);
  const prefix = `[${tag}]`;
  return {
    info: (message) => log.info(`${prefix} ${message}`),
    warn: (message) => log.warn(`${prefix} ${message}`),
    error: (message) => log.error(`${prefix} ${message}`),
    debug: (message) => log.debug(`${prefix} ${message}`)
  };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
