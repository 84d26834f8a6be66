// src/util/log.ts
//
// Leveled console logger. Level is set once at startup (see src/config.ts);
// library code only calls log.*.

/* eslint-disable no-console */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = "info";

export function isLogLevel(x: unknown): x is LogLevel {
  return typeof x === "string" && Object.prototype.hasOwnProperty.call(ORDER, x);
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return ORDER[level] >= ORDER[threshold];
}

export const log = {
  debug: (...args: unknown[]) => {
    if (enabled("debug")) console.log("[DEBUG]", ...args);
  },
  info: (...args: unknown[]) => {
    if (enabled("info")) console.log("[INFO]", ...args);
  },
  warn: (...args: unknown[]) => {
    if (enabled("warn")) console.warn("[WARN]", ...args);
  },
  error: (...args: unknown[]) => {
    if (enabled("error")) console.error("[ERROR]", ...args);
  },
};
