/**
 * Logger Utility
 * 
 * Diagnostics sink for the version 1 generator. The library only ever
 * calls `logDebug`, and only on a logger the caller passed in.
 * 
 * @module utils/logger
 */

export interface Logger {
  logDebug(message: string, meta?: unknown): void;
  logInfo(message: string, meta?: unknown): void;
  logWarn(message: string, meta?: unknown): void;
  logError(message: string, error?: unknown): void;
}

export interface LoggerOptions {
  debug?: boolean;
  prefix?: string;
}

type ConsoleMethod = "log" | "info" | "warn" | "error";

/**
 * Console-backed logger; debug lines are dropped unless `debug` is set
 */
export function createLogger({ debug = false, prefix = "[uuid]" }: LoggerOptions = {}): Logger {
  const line =
    (method: ConsoleMethod, level: string) =>
    (message: string, meta?: unknown): void => {
      console[method](`${prefix} [${level}] ${message}`, meta ?? "");
    };

  return {
    logDebug: debug ? line("log", "DEBUG") : () => undefined,
    logInfo: line("info", "INFO"),
    logWarn: line("warn", "WARN"),
    logError: line("error", "ERROR"),
  };
}
