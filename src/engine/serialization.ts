import type { LogType, LogValue } from "../types";
import { LOG_TYPES } from "../types";
import { LogFormatError } from "./errors";
import { LogTable } from "./logTable";
import type { CycleRecord } from "./replay";
import type { EncodedCycle, EncodedDouble, EncodedEntry, EncodedValue } from "./replayFormat";

export function encodeDouble(n: number): EncodedDouble {
  if (Number.isNaN(n)) return "NaN";
  if (n === Infinity) return "Infinity";
  if (n === -Infinity) return "-Infinity";
  if (Object.is(n, -0)) return "-0";
  return n;
}

export function decodeDouble(x: unknown, where: string): number {
  if (typeof x === "number") return x;
  switch (x) {
    case "NaN":
      return NaN;
    case "Infinity":
      return Infinity;
    case "-Infinity":
      return -Infinity;
    case "-0":
      return -0;
    default:
      throw new LogFormatError(`${where}: expected a double, got ${JSON.stringify(x)}`);
  }
}

export function encodeValue(v: LogValue): EncodedValue {
  switch (v.type) {
    case "Double":
      return encodeDouble(v.value);
    case "DoubleArray":
      return v.value.map(encodeDouble);
    case "BooleanArray":
      return v.value.slice();
    case "IntegerArray":
      return v.value.slice();
    case "StringArray":
      return v.value.slice();
    default:
      return v.value;
  }
}

function isLogType(x: unknown): x is LogType {
  return typeof x === "string" && LOG_TYPES.some((t) => t === x);
}

function expectArray(raw: unknown, where: string): unknown[] {
  if (!Array.isArray(raw)) throw new LogFormatError(`${where}: expected an array`);
  return raw;
}

function expectBoolean(x: unknown, where: string): boolean {
  if (typeof x !== "boolean") throw new LogFormatError(`${where}: expected a boolean`);
  return x;
}

function expectInteger(x: unknown, where: string): number {
  if (typeof x !== "number" || !Number.isSafeInteger(x)) {
    throw new LogFormatError(`${where}: expected a safe integer`);
  }
  return x;
}

function expectString(x: unknown, where: string): string {
  if (typeof x !== "string") throw new LogFormatError(`${where}: expected a string`);
  return x;
}

export function decodeValue(type: LogType, raw: unknown, where: string): LogValue {
  switch (type) {
    case "Boolean":
      return { type, value: expectBoolean(raw, where) };
    case "Integer":
      return { type, value: expectInteger(raw, where) };
    case "Double":
      return { type, value: decodeDouble(raw, where) };
    case "String":
      return { type, value: expectString(raw, where) };
    case "BooleanArray":
      return { type, value: expectArray(raw, where).map((x, i) => expectBoolean(x, `${where}[${i}]`)) };
    case "IntegerArray":
      return { type, value: expectArray(raw, where).map((x, i) => expectInteger(x, `${where}[${i}]`)) };
    case "DoubleArray":
      return { type, value: expectArray(raw, where).map((x, i) => decodeDouble(x, `${where}[${i}]`)) };
    case "StringArray":
      return { type, value: expectArray(raw, where).map((x, i) => expectString(x, `${where}[${i}]`)) };
  }
}

export function encodeTable(table: LogTable): EncodedEntry[] {
  return table.entries().map(([key, value]): EncodedEntry => [key, value.type, encodeValue(value)]);
}

export function decodeTable(raw: unknown, where: string): LogTable {
  const table = new LogTable();
  const entries = expectArray(raw, where);

  for (let i = 0; i < entries.length; i++) {
    const at = `${where}[${i}]`;
    const e = expectArray(entries[i], at);
    if (e.length !== 3) throw new LogFormatError(`${at}: expected [key, type, value]`);

    const [rawKey, type, rawValue] = e;
    const key = expectString(rawKey, `${at}.key`);
    if (!isLogType(type)) throw new LogFormatError(`${at}.type: unknown type ${String(type)}`);
    if (table.has(key)) throw new LogFormatError(`${at}: duplicate key "${key}"`);

    table.put(key, decodeValue(type, rawValue, `${at}.value`));
  }
  return table;
}

export function encodeCycle(record: CycleRecord): EncodedCycle {
  return {
    cycle: record.cycle,
    tables: [...record.tables].map(([prefix, table]): [string, EncodedEntry[]] => [
      prefix,
      encodeTable(table),
    ]),
  };
}

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

export function decodeCycle(raw: unknown, where: string): CycleRecord {
  if (!isObject(raw)) throw new LogFormatError(`${where}: cycle record is not an object`);

  const cycle = raw["cycle"];
  if (typeof cycle !== "number" || !Number.isSafeInteger(cycle) || cycle < 0) {
    throw new LogFormatError(`${where}.cycle: invalid cycle index ${String(cycle)}`);
  }

  const tables = new Map<string, LogTable>();
  const pairs = expectArray(raw["tables"], `${where}.tables`);
  for (let i = 0; i < pairs.length; i++) {
    const at = `${where}.tables[${i}]`;
    const pair = expectArray(pairs[i], at);
    const prefix = expectString(pair[0], `${at}.prefix`);
    if (tables.has(prefix)) throw new LogFormatError(`${at}: duplicate prefix "${prefix}"`);
    tables.set(prefix, decodeTable(pair[1], `${at}.entries`));
  }

  return { cycle, tables };
}
