/**
 * Logger handle passed to every component that reports progress.
 *
 * Output format is `LEVEL: message`, one line per call.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, cause?: unknown): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Where formatted lines go. `console` by default. */
export interface LogSink {
  log(line: string): void;
  error(line: string): void;
}

export interface ConsoleLoggerOptions {
  /** Minimum level that is printed (default: info) */
  level?: LogLevel;
  sink?: LogSink;
}

export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const { level = "info", sink = console } = opts;
  const threshold = LEVEL_RANK[level];

  const emit = (lineLevel: LogLevel, message: string): void => {
    if (LEVEL_RANK[lineLevel] < threshold) return;
    const line = `${lineLevel.toUpperCase()}: ${message}`;
    if (lineLevel === "warn" || lineLevel === "error") {
      sink.error(line);
    } else {
      sink.log(line);
    }
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message, cause) => {
      emit("error", message);
      // Stack traces only when running verbose.
      if (cause instanceof Error && cause.stack && threshold <= LEVEL_RANK.debug) {
        sink.error(cause.stack);
      }
    },
  };
}

/** Discards everything. Default for library callers that pass no logger. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
