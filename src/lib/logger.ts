// src/lib/logger.ts
// Leveled console logger. One scoped instance per module:
//   const log = createLogger("report");
//   log.info("fetched", events.length, "events");

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const PREFIX = "[timesheet]";

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

export function createLogger(scope: string): Logger {
  const tag = `${PREFIX}[${scope}]`;
  return {
    debug: (...args) => {
      if (enabled("debug")) console.debug(tag, ...args);
    },
    info: (...args) => {
      if (enabled("info")) console.info(tag, ...args);
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn(tag, ...args);
    },
    error: (...args) => {
      if (enabled("error")) console.error(tag, ...args);
    },
  };
}
