// src/config.ts
//
// Process configuration for the demo loop. The engine never reads the
// environment; everything comes in through constructor options.

import { isLogLevel, type LogLevel } from "./util/log";

export type Env = Record<string, string | undefined>;

export function envFlag(env: Env, name: string, defaultValue = false): boolean {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = String(v).trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}

export function envInt(env: Env, name: string, defaultValue: number): number {
  const v = env[name];
  if (v == null || v.trim() === "") return defaultValue;
  const n = Number(v);
  return Number.isInteger(n) ? n : defaultValue;
}

export function envString(env: Env, name: string): string | undefined {
  const v = env[name];
  if (v == null) return undefined;
  const s = v.trim();
  return s === "" ? undefined : s;
}

export type RunConfig = {
  /** Present => replay this log instead of reading hardware. */
  replayPath?: string;
  /** Where to write the durable log; omitted => no file sink. */
  logPath?: string;
  /** Port for the live viewer stream; omitted => no live server. */
  livePort?: number;
  /** Control loop period. */
  periodMs: number;
  /** Cycles to run in record mode; 0 runs until interrupted. */
  cycles: number;
  logLevel: LogLevel;
};

export const DEFAULT_PERIOD_MS = 20;

export function loadConfig(env: Env = process.env): RunConfig {
  const level = envString(env, "CYCLELOG_LOG_LEVEL") ?? "info";
  if (!isLogLevel(level)) {
    throw new Error(`CYCLELOG_LOG_LEVEL must be one of debug|info|warn|error|silent, got "${level}"`);
  }

  const periodMs = envInt(env, "CYCLELOG_PERIOD_MS", DEFAULT_PERIOD_MS);
  if (periodMs <= 0) {
    throw new Error(`CYCLELOG_PERIOD_MS must be positive, got ${periodMs}`);
  }

  const livePortRaw = envString(env, "CYCLELOG_LIVE_PORT");

  return {
    replayPath: envString(env, "CYCLELOG_REPLAY_PATH"),
    logPath: envString(env, "CYCLELOG_LOG_PATH"),
    livePort: livePortRaw === undefined ? undefined : envInt(env, "CYCLELOG_LIVE_PORT", 0),
    periodMs,
    cycles: Math.max(0, envInt(env, "CYCLELOG_CYCLES", 0)),
    logLevel: level,
  };
}
