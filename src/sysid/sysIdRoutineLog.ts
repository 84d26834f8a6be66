// src/sysid/sysIdRoutineLog.ts

import type { DoubleStream, InstrumentationLog, StringStream } from "./dataLog";

/** State of a characterization routine; the strings are what gets logged. */
export const SysIdState = {
  QuasistaticForward: "quasistatic-forward",
  QuasistaticReverse: "quasistatic-reverse",
  DynamicForward: "dynamic-forward",
  DynamicReverse: "dynamic-reverse",
  None: "none",
} as const;

export type SysIdState = (typeof SysIdState)[keyof typeof SysIdState];

/** Unit labels attached to the typed MotorLog helpers. */
export const SysIdUnits = {
  voltage: "Volt",
  distance: "Meter",
  angle: "Rotation",
  linearVelocity: "Meter per Second",
  angularVelocity: "Rotation per Second",
  linearAcceleration: "Meter per Second per Second",
  angularAcceleration: "Rotation per Second per Second",
  current: "Amp",
} as const;

export function sysIdStreamName(field: string, motorName: string, logName: string): string {
  return `${field}-${motorName}-${logName}`;
}

export function sysIdStateStreamName(logName: string): string {
  return `sysid-test-state-${logName}`;
}

/**
 * Chainable handle for one motor's fields. Values must already be in the
 * unit named by each helper.
 */
export class MotorLog {
  constructor(
    private readonly routine: SysIdRoutineLog,
    readonly motorName: string
  ) {}

  value(name: string, value: number, unit: string): this {
    this.routine.record(this.motorName, name, value, unit);
    return this;
  }

  voltage(volts: number): this {
    return this.value("voltage", volts, SysIdUnits.voltage);
  }

  linearPosition(meters: number): this {
    return this.value("position", meters, SysIdUnits.distance);
  }

  angularPosition(rotations: number): this {
    return this.value("position", rotations, SysIdUnits.angle);
  }

  linearVelocity(metersPerSecond: number): this {
    return this.value("velocity", metersPerSecond, SysIdUnits.linearVelocity);
  }

  angularVelocity(rotationsPerSecond: number): this {
    return this.value("velocity", rotationsPerSecond, SysIdUnits.angularVelocity);
  }

  linearAcceleration(metersPerSecondSquared: number): this {
    return this.value("acceleration", metersPerSecondSquared, SysIdUnits.linearAcceleration);
  }

  angularAcceleration(rotationsPerSecondSquared: number): this {
    return this.value("acceleration", rotationsPerSecondSquared, SysIdUnits.angularAcceleration);
  }

  current(amps: number): this {
    return this.value("current", amps, SysIdUnits.current);
  }
}

/**
 * Logs data from one characterization routine. Give each complete routine
 * (quasistatic and dynamic, forward and reverse) its own instance with a
 * unique log name.
 *
 * Streams are opened lazily on first write and then reused for the rest of
 * the process; nothing is ever closed or reopened. A field's unit is fixed by
 * its first write.
 */
export class SysIdRoutineLog {
  // motor name -> field name -> stream
  private readonly streams = new Map<string, Map<string, DoubleStream>>();
  private readonly motors = new Map<string, MotorLog>();
  private stateStream: StringStream | null = null;

  constructor(
    readonly logName: string,
    private readonly dataLog: InstrumentationLog
  ) {}

  /** Handle for a motor; repeated calls share the same cached streams. */
  motor(motorName: string): MotorLog {
    let m = this.motors.get(motorName);
    if (!m) {
      m = new MotorLog(this, motorName);
      this.motors.set(motorName, m);
    }
    return m;
  }

  record(motorName: string, field: string, value: number, unit: string): void {
    let fields = this.streams.get(motorName);
    if (!fields) {
      fields = new Map();
      this.streams.set(motorName, fields);
    }

    // Lookup and insert run in one synchronous step, so a stream is opened at most once.
    let stream = fields.get(field);
    if (!stream) {
      stream = this.dataLog.openDoubleStream(sysIdStreamName(field, motorName, this.logName), unit);
      fields.set(field, stream);
    }

    stream.append(value);
  }

  /**
   * Call once per iteration with the running test, and once at test end with
   * SysIdState.None.
   */
  recordState(state: SysIdState): void {
    if (!this.stateStream) {
      this.stateStream = this.dataLog.openStringStream(sysIdStateStreamName(this.logName));
    }
    this.stateStream.append(state);
  }
}

/**
 * One SysIdRoutineLog per group, for call sites that address streams by
 * (group, instance, field) directly.
 */
export class SysIdRegistry {
  private readonly routines = new Map<string, SysIdRoutineLog>();

  constructor(private readonly dataLog: InstrumentationLog) {}

  routine(group: string): SysIdRoutineLog {
    let r = this.routines.get(group);
    if (!r) {
      r = new SysIdRoutineLog(group, this.dataLog);
      this.routines.set(group, r);
    }
    return r;
  }

  record(group: string, instance: string, field: string, value: number, unit: string): void {
    this.routine(group).record(instance, field, value, unit);
  }

  recordState(group: string, state: SysIdState): void {
    this.routine(group).recordState(state);
  }
}
