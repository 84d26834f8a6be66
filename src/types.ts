// src/types.ts

/**
 * Every value type a LogTable can hold. The names are part of the persisted
 * log format and must not change.
 */
export type LogType =
  | "Boolean"
  | "Integer"
  | "Double"
  | "String"
  | "BooleanArray"
  | "IntegerArray"
  | "DoubleArray"
  | "StringArray";

export const LOG_TYPES: readonly LogType[] = [
  "Boolean",
  "Integer",
  "Double",
  "String",
  "BooleanArray",
  "IntegerArray",
  "DoubleArray",
  "StringArray",
] as const;

export type LogValue =
  | { type: "Boolean"; value: boolean }
  | { type: "Integer"; value: number }
  | { type: "Double"; value: number }
  | { type: "String"; value: string }
  | { type: "BooleanArray"; value: readonly boolean[] }
  | { type: "IntegerArray"; value: readonly number[] }
  | { type: "DoubleArray"; value: readonly number[] }
  | { type: "StringArray"; value: readonly string[] };

/** Prefix under which one component's fields are grouped in the log. */
export type Prefix = string;

/** 0-based index of a control cycle since the logger started. */
export type CycleIndex = number;
