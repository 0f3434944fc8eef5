import type { LogLevel } from "./env.ts";

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

export type LogSink = Pick<Console, "error" | "warn" | "log" | "debug">;

/**
 * Console logger that prefixes every line with `[tag]` and drops anything
 * below `level`.
 */
export function createLogger(tag: string, level: LogLevel = "info", sink: LogSink = console): Logger {
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] <= LEVEL_ORDER[level];
  const prefix = `[${tag}]`;

  return {
    error: (message, ...details) => {
      if (enabled("error")) sink.error(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled("warn")) sink.warn(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled("info")) sink.log(`${prefix} ${message}`, ...details);
    },
    debug: (message, ...details) => {
      if (enabled("debug")) sink.debug(`${prefix} ${message}`, ...details);
    },
  };
}

export const silentLogger: Logger = createLogger("silent", "error", {
  error: () => {},
  warn: () => {},
  log: () => {},
  debug: () => {},
});
