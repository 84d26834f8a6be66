import { describe, it, expect } from "vitest";
import { LogTable } from "../src/engine";
import { DriverStationInputs } from "../src/inputs/driverStationInputs";
import { makeDriverStationInputs, serialized } from "./helpers";

describe("DriverStationInputs", () => {
  it("writes every field under its persisted key", () => {
    const t = serialized(makeDriverStationInputs());

    expect(t.keys()).toEqual([
      "AllianceStation",
      "EventName",
      "GameSpecificMessage",
      "MatchNumber",
      "ReplayNumber",
      "MatchType",
      "MatchTime",
      "Enabled",
      "Autonomous",
      "Test",
      "EmergencyStop",
      "FMSAttached",
      "DSAttached",
    ]);
    expect(t.getType("AllianceStation")).toBe("Integer");
    expect(t.getType("MatchTime")).toBe("Double");
    expect(t.getType("FMSAttached")).toBe("Boolean");
  });

  it("restores into a fresh bundle field for field", () => {
    const original = makeDriverStationInputs();
    const restored = new DriverStationInputs();

    restored.restore(serialized(original));

    expect({ ...restored }).toEqual({ ...original });
  });

  it("keeps current values for keys missing from the table", () => {
    const ds = makeDriverStationInputs();
    const partial = new LogTable();
    partial.putDouble("MatchTime", 3.5);
    partial.putBoolean("Enabled", false);

    ds.restore(partial);

    expect(ds.matchTime).toBe(3.5);
    expect(ds.enabled).toBe(false);
    expect(ds.allianceStation).toBe(4);
    expect(ds.eventName).toBe("TESTEVENT");
    expect(ds.test).toBe(true);
  });

  it("leaves every field untouched when restored from an empty table", () => {
    const ds = makeDriverStationInputs();
    const before = { ...ds };

    ds.restore(new LogTable());

    expect({ ...ds }).toEqual(before);
  });

  it("reset returns to never-connected defaults", () => {
    const ds = makeDriverStationInputs();
    ds.reset();

    expect({ ...ds }).toEqual({ ...new DriverStationInputs() });
  });
});
