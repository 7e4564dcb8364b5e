import type { LogLevel } from "./types";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

const levelRank: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function createLogger(level: LogLevel = "warn", sink: LogSink = console): Logger {
  const enabled = (candidate: LogLevel) => levelRank[candidate] <= levelRank[level];
  return {
    debug: (message) => {
      if (enabled("debug")) {
        sink.debug(`debug: ${message}`);
      }
    },
    info: (message) => {
      if (enabled("info")) {
        sink.info(message);
      }
    },
    warn: (message) => {
      if (enabled("warn")) {
        sink.warn(`warning: ${message}`);
      }
    },
    error: (message) => {
      sink.error(`error: ${message}`);
    },
  };
}
