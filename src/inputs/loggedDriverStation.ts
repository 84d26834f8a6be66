// src/inputs/loggedDriverStation.ts

import type { InputLogger } from "../engine/inputLogger";
import { decodeButtons, decodeControlWord } from "../hardware/controlWord";
import type { DriverStationHardware } from "../hardware/driverStationHardware";
import { log } from "../util/log";
import { DriverStationInputs } from "./driverStationInputs";
import { JoystickInputs } from "./joystickInputs";

export const JOYSTICK_PORT_COUNT = 6;

export const DRIVER_STATION_PREFIX = "DriverStation";

export function joystickPrefix(id: number): string {
  return `${DRIVER_STATION_PREFIX}/Joystick${id}`;
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Captures and replays driver station state (robot state, joysticks).
 *
 * Call periodic() once per cycle, inside the logger's open cycle. In replay
 * mode the hardware source is never touched and may be omitted.
 */
export class LoggedDriverStation {
  private readonly dsInputs = new DriverStationInputs();
  private readonly joystickInputs: JoystickInputs[] = Array.from(
    { length: JOYSTICK_PORT_COUNT },
    () => new JoystickInputs()
  );

  // Ports currently failing; used to warn once per disconnect instead of every cycle.
  private readonly unreachable = new Set<number>();
  private dsUnreachable = false;

  constructor(
    private readonly logger: InputLogger,
    private readonly hardware?: DriverStationHardware
  ) {}

  get driverStation(): Readonly<DriverStationInputs> {
    return this.dsInputs;
  }

  joystick(id: number): Readonly<JoystickInputs> {
    const js = this.joystickInputs[id];
    if (!js) throw new RangeError(`joystick port ${id} out of range 0..${JOYSTICK_PORT_COUNT - 1}`);
    return js;
  }

  periodic(): void {
    this.logger.processInputs(DRIVER_STATION_PREFIX, this.dsInputs, () => this.captureDriverStation());
    for (let id = 0; id < JOYSTICK_PORT_COUNT; id++) {
      this.logger.processInputs(joystickPrefix(id), this.joystickInputs[id], () =>
        this.captureJoystick(id)
      );
    }
  }

  private captureDriverStation(): void {
    const hw = this.hardware;
    const ds = this.dsInputs;
    if (!hw) {
      ds.reset();
      return;
    }

    try {
      // Read everything first so a failing accessor cannot leave half a sample.
      const allianceStation = hw.getAllianceStation();
      const eventName = hw.getEventName();
      const gameSpecificMessage = hw.getGameSpecificMessage();
      const matchNumber = hw.getMatchNumber();
      const replayNumber = hw.getReplayNumber();
      const matchType = hw.getMatchType();
      const matchTime = hw.getMatchTime();
      const flags = decodeControlWord(hw.getControlWord());

      ds.allianceStation = allianceStation;
      ds.eventName = eventName;
      ds.gameSpecificMessage = gameSpecificMessage;
      ds.matchNumber = matchNumber;
      ds.replayNumber = replayNumber;
      ds.matchType = matchType;
      ds.matchTime = matchTime;
      ds.enabled = flags.enabled;
      ds.autonomous = flags.autonomous;
      ds.test = flags.test;
      ds.emergencyStop = flags.emergencyStop;
      ds.fmsAttached = flags.fmsAttached;
      ds.dsAttached = flags.dsAttached;

      if (this.dsUnreachable) {
        log.info("driver station reachable again");
        this.dsUnreachable = false;
      }
    } catch (err) {
      if (!this.dsUnreachable) {
        log.warn(`driver station read failed, logging defaults: ${reason(err)}`);
        this.dsUnreachable = true;
      }
      ds.reset();
    }
  }

  private captureJoystick(id: number): void {
    const hw = this.hardware;
    const js = this.joystickInputs[id];
    if (!hw) {
      js.reset();
      return;
    }

    try {
      const name = hw.getJoystickName(id);
      const type = hw.getJoystickType(id);
      const xbox = hw.isXbox(id);
      const axisTypes = hw.getAxisTypes(id);
      const povs = hw.getPovValues(id);
      // float32 -> float64 is exact, so the logged double equals the device value.
      const axisValues = Array.from(hw.getAxisValues(id));
      const buttons = decodeButtons(hw.getButtonValues(id), hw.getButtonCount(id));

      js.name = name;
      js.type = type;
      js.xbox = xbox;
      js.axisTypes = axisTypes;
      js.povs = povs;
      js.axisValues = axisValues;
      js.buttons = buttons;

      if (this.unreachable.delete(id)) {
        log.info(`joystick ${id} reachable again`);
      }
    } catch (err) {
      if (!this.unreachable.has(id)) {
        log.warn(`joystick ${id} read failed, logging empty inputs: ${reason(err)}`);
        this.unreachable.add(id);
      }
      js.reset();
    }
  }
}
