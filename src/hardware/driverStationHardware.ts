// src/hardware/driverStationHardware.ts

/**
 * Live driver station state for the current cycle. Read-only snapshot
 * accessors; implementations must not block.
 *
 * Joystick accessors may throw when the device at `id` is unreachable.
 * Callers reading them every cycle are expected to substitute defaults.
 */
export interface DriverStationHardware {
  getAllianceStation(): number;
  getEventName(): string;
  getGameSpecificMessage(): string;
  getMatchNumber(): number;
  getReplayNumber(): number;
  getMatchType(): number;
  /** Seconds remaining in the current match period. */
  getMatchTime(): number;
  /** Packed flags, see decodeControlWord. */
  getControlWord(): number;

  getJoystickName(id: number): string;
  getJoystickType(id: number): number;
  isXbox(id: number): boolean;
  getAxisTypes(id: number): number[];
  getPovValues(id: number): number[];
  /** Raw axis samples at single precision. */
  getAxisValues(id: number): Float32Array;
  /** Packed button bitmask, bit i is button i. */
  getButtonValues(id: number): number;
  getButtonCount(id: number): number;
}
