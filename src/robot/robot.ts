// src/robot/robot.ts

import type { InputLogger } from "../engine";
import type { SimulatedDriverStation } from "../hardware/simulatedDriverStation";
import { LoggedDriverStation } from "../inputs/loggedDriverStation";
import { stepScenario } from "./simScenario";

export type DemoRobotOptions = {
  periodMs: number;
  /** Stop after this many cycles in record mode; 0 means no limit. */
  maxCycles?: number;
};

/**
 * Minimal control program: one driver station subsystem processed through the
 * logger each cycle. `sim` is only consulted in record mode.
 */
export class DemoRobot {
  readonly driverStation: LoggedDriverStation;

  constructor(
    private readonly logger: InputLogger,
    private readonly sim: SimulatedDriverStation | undefined,
    private readonly opts: DemoRobotOptions
  ) {
    this.driverStation = new LoggedDriverStation(logger, sim);
  }

  /** Runs one cycle; returns false once there is nothing left to run. */
  cycle(): boolean {
    if (this.logger.replayActive) {
      if (this.logger.replayFinished()) return false;
    } else {
      const max = this.opts.maxCycles ?? 0;
      if (max > 0 && this.logger.cyclesCompleted >= max) return false;
    }

    this.logger.runCycle((cycle) => {
      if (this.sim && !this.logger.replayActive) {
        stepScenario(this.sim, cycle, this.opts.periodMs);
      }
      this.driverStation.periodic();
    });
    return true;
  }
}
