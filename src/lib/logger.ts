export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Where formatted lines end up. Defaults to the console; tests pass their own.
 */
export interface LogSink {
  write(level: LogLevel, line: string, args: unknown[]): void;
}

export const consoleSink: LogSink = {
  write(level, line, args) {
    if (level === "error") console.error(line, ...args);
    else if (level === "warn") console.warn(line, ...args);
    else console.log(line, ...args);
  },
};

export function createLogger(
  scope: string,
  options: { level?: LogLevel; sink?: LogSink } = {}
): Logger {
  const { level = "info", sink = consoleSink } = options;

  const log = (at: LogLevel, message: string, args: unknown[]) => {
    if (LOG_LEVELS[at] < LOG_LEVELS[level]) return;
    sink.write(at, `[${scope}] ${message}`, args);
  };

  return {
    debug: (message, ...args) => log("debug", message, args),
    info: (message, ...args) => log("info", message, args),
    warn: (message, ...args) => log("warn", message, args),
    error: (message, ...args) => log("error", message, args),
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
