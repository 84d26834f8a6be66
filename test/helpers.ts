import { LogTable } from "../src/engine";
import { DriverStationInputs } from "../src/inputs/driverStationInputs";
import { JoystickInputs } from "../src/inputs/joystickInputs";

export function serialized(inputs: { serialize(t: LogTable): void }): LogTable {
  const t = new LogTable();
  inputs.serialize(t);
  return t;
}

export function makeDriverStationInputs(): DriverStationInputs {
  const ds = new DriverStationInputs();
  ds.allianceStation = 4;
  ds.eventName = "TESTEVENT";
  ds.gameSpecificMessage = "LRL";
  ds.matchNumber = 12;
  ds.replayNumber = 1;
  ds.matchType = 2;
  ds.matchTime = 87.125;
  ds.enabled = true;
  ds.autonomous = false;
  ds.test = true;
  ds.emergencyStop = false;
  ds.fmsAttached = true;
  ds.dsAttached = true;
  return ds;
}

export function makeJoystickInputs(buttonCount = 10): JoystickInputs {
  const js = new JoystickInputs();
  js.name = "Test Pad";
  js.type = 21;
  js.xbox = true;
  js.buttons = Array.from({ length: buttonCount }, (_, i) => i % 3 === 0);
  js.axisValues = [0.5, -0.25, Math.fround(0.1)];
  js.axisTypes = [0, 1, 2];
  js.povs = [90];
  return js;
}
