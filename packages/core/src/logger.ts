/**
 * Scoped logging.
 *
 * Lines go through a single replaceable writer (stderr by default) so
 * hosts and tests can capture them. Debug lines are only produced when
 * the `debug` config flag is set.
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogWriter = (line: string) => void;

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const defaultWriter: LogWriter = (line) => console.error(line);

let writer: LogWriter = defaultWriter;

/**
 * Replace the writer all loggers use. Returns the previous writer.
 */
export function setLogWriter(next: LogWriter | undefined): LogWriter {
  const previous = writer;
  writer = next ?? defaultWriter;
  return previous;
}

export function formatLogLine(scope: string, level: LogLevel, message: string): string {
  return `[lazyview:${scope}] ${level} ${message}`;
}

export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, message: string): void => {
    if (level === "debug" && !config.has("debug")) return;
    writer(formatLogLine(scope, level, message));
  };

  return {
    scope,
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}
