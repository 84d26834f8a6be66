// src/hardware/simulatedDriverStation.ts

import type { DriverStationHardware } from "./driverStationHardware";
import { encodeButtons, encodeControlWord, type ControlWordFlags } from "./controlWord";

export type SimJoystick = {
  name: string;
  type: number;
  xbox: boolean;
  axisTypes: number[];
  povs: number[];
  axisValues: number[];
  buttons: boolean[];
};

export type SimMatchState = {
  allianceStation: number;
  eventName: string;
  gameSpecificMessage: string;
  matchNumber: number;
  replayNumber: number;
  matchType: number;
  matchTime: number;
  controlWord: number;
};

export function makeSimJoystick(partial: Partial<SimJoystick> = {}): SimJoystick {
  return {
    name: partial.name ?? "",
    type: partial.type ?? 0,
    xbox: partial.xbox ?? false,
    axisTypes: partial.axisTypes ?? [],
    povs: partial.povs ?? [],
    axisValues: partial.axisValues ?? [],
    buttons: partial.buttons ?? [],
  };
}

/**
 * In-memory hardware source for simulation and tests. Ports without a
 * connected joystick throw from every joystick accessor.
 */
export class SimulatedDriverStation implements DriverStationHardware {
  match: SimMatchState = {
    allianceStation: 0,
    eventName: "",
    gameSpecificMessage: "",
    matchNumber: 0,
    replayNumber: 0,
    matchType: 0,
    matchTime: 0,
    controlWord: 0,
  };

  private readonly joysticks = new Map<number, SimJoystick>();

  setControlFlags(flags: Partial<ControlWordFlags>): void {
    this.match.controlWord = encodeControlWord(flags);
  }

  connectJoystick(id: number, joystick: SimJoystick): void {
    this.joysticks.set(id, joystick);
  }

  disconnectJoystick(id: number): void {
    this.joysticks.delete(id);
  }

  private joystick(id: number): SimJoystick {
    const js = this.joysticks.get(id);
    if (!js) throw new Error(`joystick ${id} is not connected`);
    return js;
  }

  getAllianceStation(): number {
    return this.match.allianceStation;
  }

  getEventName(): string {
    return this.match.eventName;
  }

  getGameSpecificMessage(): string {
    return this.match.gameSpecificMessage;
  }

  getMatchNumber(): number {
    return this.match.matchNumber;
  }

  getReplayNumber(): number {
    return this.match.replayNumber;
  }

  getMatchType(): number {
    return this.match.matchType;
  }

  getMatchTime(): number {
    return this.match.matchTime;
  }

  getControlWord(): number {
    return this.match.controlWord;
  }

  getJoystickName(id: number): string {
    return this.joystick(id).name;
  }

  getJoystickType(id: number): number {
    return this.joystick(id).type;
  }

  isXbox(id: number): boolean {
    return this.joystick(id).xbox;
  }

  getAxisTypes(id: number): number[] {
    return this.joystick(id).axisTypes.slice();
  }

  getPovValues(id: number): number[] {
    return this.joystick(id).povs.slice();
  }

  getAxisValues(id: number): Float32Array {
    return Float32Array.from(this.joystick(id).axisValues);
  }

  getButtonValues(id: number): number {
    return encodeButtons(this.joystick(id).buttons);
  }

  getButtonCount(id: number): number {
    return this.joystick(id).buttons.length;
  }
}
