// src/robot/simScenario.ts
//
// Deterministic driver station script for the demo loop: a 15 s autonomous
// period followed by teleop, one xbox controller on port 0.

import { makeSimJoystick, type SimulatedDriverStation } from "../hardware/simulatedDriverStation";

export const AUTO_SECONDS = 15;
export const TELEOP_SECONDS = 135;

export function setUpScenario(sim: SimulatedDriverStation): void {
  sim.match = {
    ...sim.match,
    allianceStation: 1,
    eventName: "PRACTICE",
    matchNumber: 1,
    matchType: 1,
  };
}

/** Drives the simulated hardware to its state at `cycle`. */
export function stepScenario(sim: SimulatedDriverStation, cycle: number, periodMs: number): void {
  const elapsed = (cycle * periodMs) / 1000;
  const autonomous = elapsed < AUTO_SECONDS;
  const remaining = autonomous ? AUTO_SECONDS - elapsed : AUTO_SECONDS + TELEOP_SECONDS - elapsed;

  sim.match.matchTime = Math.max(0, remaining);
  sim.setControlFlags({
    enabled: remaining > 0,
    autonomous,
    fmsAttached: true,
    dsAttached: true,
  });

  sim.connectJoystick(
    0,
    makeSimJoystick({
      name: "Xbox Controller",
      type: 1,
      xbox: true,
      axisTypes: [0, 1, 2, 3, 4, 5],
      axisValues: [Math.sin(elapsed), Math.cos(elapsed), 0, 0, 0, 0],
      povs: [cycle % 50 < 25 ? 0 : -1],
      buttons: Array.from({ length: 10 }, (_, i) => (cycle >> i) % 2 === 1),
    })
  );
}
