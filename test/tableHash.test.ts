import { describe, it, expect } from "vitest";
import { LogTable, hashCycle, hashTable } from "../src/engine";
import { makeDriverStationInputs, serialized } from "./helpers";

describe("LogTable hash", () => {
  it("produces the same hash for identical tables", () => {
    const a = serialized(makeDriverStationInputs());
    const b = serialized(makeDriverStationInputs());

    expect(hashTable(a)).toBe(hashTable(b));
  });

  it("distinguishes 0 from -0", () => {
    const a = new LogTable();
    a.putDouble("x", 0);
    const b = new LogTable();
    b.putDouble("x", -0);

    expect(hashTable(a)).not.toBe(hashTable(b));
  });

  it("hashes a cycle by its index and tables", () => {
    const t = serialized(makeDriverStationInputs());
    const tables = new Map([["DriverStation", t]]);

    expect(hashCycle({ cycle: 0, tables })).toBe(hashCycle({ cycle: 0, tables }));
    expect(hashCycle({ cycle: 0, tables })).not.toBe(hashCycle({ cycle: 1, tables }));
  });
});
