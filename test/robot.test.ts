import { describe, it, expect } from "vitest";
import { InputLogger, MemoryLog, hashCycle } from "../src/engine";
import { SimulatedDriverStation } from "../src/hardware/simulatedDriverStation";
import { runFixedRate } from "../src/robot/loop";
import { DemoRobot } from "../src/robot/robot";
import { AUTO_SECONDS, setUpScenario } from "../src/robot/simScenario";

function record(cycles: number, periodMs = 20): MemoryLog {
  const memory = new MemoryLog();
  const sim = new SimulatedDriverStation();
  setUpScenario(sim);
  const robot = new DemoRobot(new InputLogger({ sinks: [memory] }), sim, { periodMs, maxCycles: cycles });
  while (robot.cycle()) {
    // run to maxCycles
  }
  return memory;
}

describe("DemoRobot", () => {
  it("stops after maxCycles in record mode", () => {
    expect(record(5).cycleCount).toBe(5);
  });

  it("records the scenario's match state", () => {
    const memory = record(2, 1000);

    const ds0 = memory.getTable("DriverStation", 0);
    expect(ds0.getString("EventName", "")).toBe("PRACTICE");
    expect(ds0.getDouble("MatchTime", -1)).toBe(AUTO_SECONDS);
    expect(ds0.getBoolean("Autonomous", false)).toBe(true);

    const ds1 = memory.getTable("DriverStation", 1);
    expect(ds1.getDouble("MatchTime", -1)).toBe(AUTO_SECONDS - 1);
    expect(memory.getTable("DriverStation/Joystick0", 1).getString("Name", "")).toBe("Xbox Controller");
  });

  it("replays a recording to byte-identical cycles", () => {
    const original = record(40);

    const relog = new MemoryLog();
    const robot = new DemoRobot(new InputLogger({ replaySource: original, sinks: [relog] }), undefined, {
      periodMs: 20,
    });
    while (robot.cycle()) {
      // replay to the end of the source
    }

    const a = original.records().map(hashCycle);
    const b = relog.records().map(hashCycle);
    expect(b).toHaveLength(40);
    expect(b).toEqual(a);
  });
});

describe("runFixedRate", () => {
  it("runs until the step returns false", async () => {
    let n = 0;
    const loop = runFixedRate(0, () => ++n < 3);

    await loop.done;
    expect(n).toBe(3);
  });

  it("rejects with the error thrown by a step", async () => {
    const loop = runFixedRate(0, () => {
      throw new Error("step failed");
    });

    await expect(loop.done).rejects.toThrow("step failed");
  });

  it("resolves when stopped", async () => {
    let n = 0;
    const loop = runFixedRate(1, () => {
      n++;
      return true;
    });
    loop.stop();

    await loop.done;
    expect(n).toBe(0);
  });
});
