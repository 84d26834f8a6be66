import { describe, it, expect } from "vitest";
import { LOG_FORMAT_VERSION, LogFormatError, deserializeLog } from "../src/engine";

const header = JSON.stringify({
  formatVersion: LOG_FORMAT_VERSION,
  createdAt: "2026-01-11T00:00:00.000Z",
  metadata: {},
});

function withCycles(...cycles: unknown[]): string {
  return [header, ...cycles.map((c) => JSON.stringify(c))].join("\n");
}

describe("Log validation", () => {
  it("throws if the log is empty", () => {
    expect(() => deserializeLog("\n")).toThrow(/missing header/);
  });

  it("throws if formatVersion is wrong", () => {
    const bad = JSON.stringify({ formatVersion: 999, createdAt: "2026-01-11T00:00:00.000Z" });

    expect(() => deserializeLog(bad)).toThrow(/formatVersion/i);
  });

  it("throws if createdAt is not ISO", () => {
    const bad = JSON.stringify({ formatVersion: LOG_FORMAT_VERSION, createdAt: "2026-01-11" });

    expect(() => deserializeLog(bad)).toThrow(/createdAt/i);
  });

  it("defaults missing metadata to an empty object", () => {
    const noMeta = JSON.stringify({ formatVersion: LOG_FORMAT_VERSION, createdAt: "2026-01-11T00:00:00.000Z" });

    expect(deserializeLog(noMeta).header.metadata).toEqual({});
  });

  it("throws on a line that is not JSON before the last cycle", () => {
    const text = `${header}\n{oops\n${JSON.stringify({ cycle: 0, tables: [] })}`;

    expect(() => deserializeLog(text)).toThrow(/line 2: invalid JSON/);
  });

  it("drops a truncated final cycle line", () => {
    const text = `${withCycles({ cycle: 0, tables: [["P", [["k", "Integer", 7]]]] })}\n{"cycle":1,"tab`;
    const file = deserializeLog(text);

    expect(file.cycles).toHaveLength(1);
    expect(file.cycles[0].cycle).toBe(0);
  });

  it("still rejects a final cycle line that is JSON but malformed", () => {
    const text = withCycles({ cycle: 0, tables: [] }, { cycle: 1 });

    expect(() => deserializeLog(text)).toThrow(LogFormatError);
  });

  it("throws on an unknown value type", () => {
    const text = withCycles({ cycle: 0, tables: [["P", [["k", "Float", 1]]]] });

    expect(() => deserializeLog(text)).toThrow(LogFormatError);
    expect(() => deserializeLog(text)).toThrow(/unknown type Float/);
  });

  it("throws when a value does not match its declared type", () => {
    const text = withCycles({ cycle: 0, tables: [["P", [["k", "Integer", 1.5]]]] });

    expect(() => deserializeLog(text)).toThrow(/expected a safe integer/);
  });

  it("throws on a duplicate key within one table", () => {
    const text = withCycles({
      cycle: 0,
      tables: [["P", [["k", "Boolean", true], ["k", "Boolean", false]]]],
    });

    expect(() => deserializeLog(text)).toThrow(/duplicate key "k"/);
  });

  it("throws when cycles do not increase", () => {
    const text = withCycles({ cycle: 2, tables: [] }, { cycle: 2, tables: [] });

    expect(() => deserializeLog(text)).toThrow(/cycle 2 follows cycle 2/);
  });

  it("throws on an unknown double token", () => {
    const text = withCycles({ cycle: 0, tables: [["P", [["k", "Double", "inf"]]]] });

    expect(() => deserializeLog(text)).toThrow(/expected a double/);
  });
});
