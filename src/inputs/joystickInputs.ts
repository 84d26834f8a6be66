// src/inputs/joystickInputs.ts

import type { LoggableInputs } from "../engine/loggableInputs";
import type { LogTable } from "../engine/logTable";

/**
 * Inputs of a single joystick port. Array lengths follow whatever device is
 * plugged in and may change between cycles.
 */
export class JoystickInputs implements LoggableInputs {
  name = "";
  type = 0;
  xbox = false;
  buttons: boolean[] = [];
  axisValues: number[] = [];
  axisTypes: number[] = [];
  povs: number[] = [];

  /** Back to the state of an empty port. */
  reset(): void {
    this.name = "";
    this.type = 0;
    this.xbox = false;
    this.buttons = [];
    this.axisValues = [];
    this.axisTypes = [];
    this.povs = [];
  }

  serialize(table: LogTable): void {
    table.putString("Name", this.name);
    table.putInteger("Type", this.type);
    table.putBoolean("Xbox", this.xbox);
    table.putBooleanArray("Buttons", this.buttons);
    table.putDoubleArray("AxisValues", this.axisValues);
    table.putIntegerArray("AxisTypes", this.axisTypes);
    table.putIntegerArray("POVs", this.povs);
  }

  restore(table: LogTable): void {
    this.name = table.getString("Name", this.name);
    this.type = table.getInteger("Type", this.type);
    this.xbox = table.getBoolean("Xbox", this.xbox);
    this.buttons = table.getBooleanArray("Buttons", this.buttons);
    this.axisValues = table.getDoubleArray("AxisValues", this.axisValues);
    this.axisTypes = table.getIntegerArray("AxisTypes", this.axisTypes);
    this.povs = table.getIntegerArray("POVs", this.povs);
  }
}
