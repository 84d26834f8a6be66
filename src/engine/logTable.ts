import type { LogType, LogValue } from "../types";
import { LogTableTypeError } from "./errors";

function checkInteger(key: string, n: number): void {
  if (!Number.isSafeInteger(n)) {
    throw new RangeError(`LogTable key "${key}": ${n} is not a safe integer`);
  }
}

/** Copies array payloads so the table never aliases a caller's array. */
function snapshot(key: string, v: LogValue): LogValue {
  switch (v.type) {
    case "Integer":
      checkInteger(key, v.value);
      return { type: v.type, value: v.value };
    case "IntegerArray":
      for (const n of v.value) checkInteger(key, n);
      return { type: v.type, value: Object.freeze(v.value.slice()) };
    case "BooleanArray":
      return { type: v.type, value: Object.freeze(v.value.slice()) };
    case "DoubleArray":
      return { type: v.type, value: Object.freeze(v.value.slice()) };
    case "StringArray":
      return { type: v.type, value: Object.freeze(v.value.slice()) };
    default:
      return { ...v };
  }
}

function sameItems<T>(a: readonly T[], b: readonly T[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!Object.is(a[i], b[i])) return false;
  }
  return true;
}

/**
 * Bit-exact comparison: doubles compare with Object.is, so NaN equals NaN and
 * 0 does not equal -0.
 */
export function logValueEquals(a: LogValue, b: LogValue): boolean {
  if (a.type !== b.type) return false;
  if (Array.isArray(a.value) && Array.isArray(b.value)) return sameItems(a.value, b.value);
  return Object.is(a.value, b.value);
}

/**
 * Ordered string-keyed table of typed values. One instance carries a single
 * component's fields for a single cycle.
 *
 * Reads never throw for an absent key: the caller's default comes back
 * instead. Reading or overwriting a key with a different type throws
 * LogTableTypeError.
 */
export class LogTable {
  private readonly data = new Map<string, LogValue>();

  static fromEntries(entries: Iterable<readonly [string, LogValue]>): LogTable {
    const table = new LogTable();
    for (const [key, value] of entries) table.put(key, value);
    return table;
  }

  get size(): number {
    return this.data.size;
  }

  isEmpty(): boolean {
    return this.data.size === 0;
  }

  has(key: string): boolean {
    return this.data.has(key);
  }

  keys(): string[] {
    return [...this.data.keys()];
  }

  /** Entries in insertion order. Array payloads are frozen. */
  entries(): Array<[string, LogValue]> {
    return [...this.data.entries()];
  }

  getType(key: string): LogType | undefined {
    return this.data.get(key)?.type;
  }

  get(key: string): LogValue | undefined {
    return this.data.get(key);
  }

  put(key: string, value: LogValue): void {
    const prev = this.data.get(key);
    if (prev && prev.type !== value.type) {
      throw new LogTableTypeError(key, value.type, prev.type);
    }
    this.data.set(key, snapshot(key, value));
  }

  putBoolean(key: string, value: boolean): void {
    this.put(key, { type: "Boolean", value });
  }

  putInteger(key: string, value: number): void {
    this.put(key, { type: "Integer", value });
  }

  putDouble(key: string, value: number): void {
    this.put(key, { type: "Double", value });
  }

  putString(key: string, value: string): void {
    this.put(key, { type: "String", value });
  }

  putBooleanArray(key: string, value: readonly boolean[]): void {
    this.put(key, { type: "BooleanArray", value });
  }

  putIntegerArray(key: string, value: readonly number[]): void {
    this.put(key, { type: "IntegerArray", value });
  }

  putDoubleArray(key: string, value: readonly number[]): void {
    this.put(key, { type: "DoubleArray", value });
  }

  putStringArray(key: string, value: readonly string[]): void {
    this.put(key, { type: "StringArray", value });
  }

  private lookup(key: string, expected: LogType): LogValue | undefined {
    const v = this.data.get(key);
    if (v && v.type !== expected) {
      throw new LogTableTypeError(key, expected, v.type);
    }
    return v;
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    const v = this.lookup(key, "Boolean");
    return v?.type === "Boolean" ? v.value : defaultValue;
  }

  getInteger(key: string, defaultValue: number): number {
    const v = this.lookup(key, "Integer");
    return v?.type === "Integer" ? v.value : defaultValue;
  }

  getDouble(key: string, defaultValue: number): number {
    const v = this.lookup(key, "Double");
    return v?.type === "Double" ? v.value : defaultValue;
  }

  getString(key: string, defaultValue: string): string {
    const v = this.lookup(key, "String");
    return v?.type === "String" ? v.value : defaultValue;
  }

  // Array getters hand out fresh copies; the default is returned as given.

  getBooleanArray(key: string, defaultValue: boolean[]): boolean[] {
    const v = this.lookup(key, "BooleanArray");
    return v?.type === "BooleanArray" ? v.value.slice() : defaultValue;
  }

  getIntegerArray(key: string, defaultValue: number[]): number[] {
    const v = this.lookup(key, "IntegerArray");
    return v?.type === "IntegerArray" ? v.value.slice() : defaultValue;
  }

  getDoubleArray(key: string, defaultValue: number[]): number[] {
    const v = this.lookup(key, "DoubleArray");
    return v?.type === "DoubleArray" ? v.value.slice() : defaultValue;
  }

  getStringArray(key: string, defaultValue: string[]): string[] {
    const v = this.lookup(key, "StringArray");
    return v?.type === "StringArray" ? v.value.slice() : defaultValue;
  }

  equals(other: LogTable): boolean {
    if (other.size !== this.size) return false;
    for (const [key, value] of this.data) {
      const theirs = other.get(key);
      if (!theirs || !logValueEquals(value, theirs)) return false;
    }
    return true;
  }
}
