import type { CycleIndex, LogType, Prefix } from "../types";
import type { CycleRecord } from "./replay";

export const LOG_FORMAT_VERSION = 1 as const;

/**
 * JSON cannot carry NaN, the infinities or negative zero, so those doubles are
 * written as these strings. Every other double is a plain JSON number.
 */
export type EncodedDouble = number | "NaN" | "Infinity" | "-Infinity" | "-0";

export type EncodedValue =
  | boolean
  | number
  | string
  | EncodedDouble
  | boolean[]
  | number[]
  | string[]
  | EncodedDouble[];

export type EncodedEntry = [key: string, type: LogType, value: EncodedValue];

export type EncodedCycle = {
  cycle: CycleIndex;
  tables: Array<[Prefix, EncodedEntry[]]>;
};

export type LogHeaderV1 = {
  formatVersion: typeof LOG_FORMAT_VERSION;

  // ISO timestamp string
  createdAt: string;

  metadata: Record<string, string>;
};

export type LogHeader = LogHeaderV1;

/**
 * A durable log as JSON Lines: the header on the first line, then one
 * EncodedCycle per line in increasing cycle order.
 */
export type LogFile = {
  header: LogHeader;
  cycles: CycleRecord[];
};
