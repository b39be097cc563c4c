/**
 * ContractExtractor – console logger
 *
 * Debug and info lines are printed only when the logger is enabled;
 * warnings and errors always are. `scopedLogger` tags every line with
 * the document it belongs to, so interleaved batch output stays readable.
 */

/* eslint-disable no-console */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ExtractorLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const PREFIX = "[ContractExtractor]";

function write(level: LogLevel, line: string, args: unknown[]): void {
  switch (level) {
    case "debug":
      console.log(line, ...args);
      return;
    case "info":
      console.info(line, ...args);
      return;
    case "warn":
      console.warn(line, ...args);
      return;
    case "error":
      console.error(line, ...args);
      return;
  }
}

/**
 * Create a logger instance.
 *
 * @param enabled – when false (default) only warnings/errors are printed.
 */
export function createLogger(enabled: boolean = false): ExtractorLogger {
  const emit =
    (level: LogLevel) =>
    (message: string, ...args: unknown[]): void => {
      if (!enabled && (level === "debug" || level === "info")) return;
      const stamp = new Date().toISOString();
      write(
        level,
        `${PREFIX}[${level.toUpperCase()}][${stamp}] ${message}`,
        args,
      );
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

/** Wrap `logger` so every message starts with `[scope]` */
export function scopedLogger(
  logger: ExtractorLogger,
  scope: string,
): ExtractorLogger {
  const tag = (message: string): string => `[${scope}] ${message}`;
  return {
    debug: (message, ...args) => logger.debug(tag(message), ...args),
    info: (message, ...args) => logger.info(tag(message), ...args),
    warn: (message, ...args) => logger.warn(tag(message), ...args),
    error: (message, ...args) => logger.error(tag(message), ...args),
  };
}

/** Shared logger with debug/info suppressed */
export const silentLogger: ExtractorLogger = createLogger(false);
