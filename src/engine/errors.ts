import type { LogType } from "../types";

/**
 * A key was written or read with a type other than the one it holds.
 * Always an authoring defect in a LoggableInputs implementation; never caught
 * by the logger.
 */
export class LogTableTypeError extends Error {
  constructor(
    readonly key: string,
    readonly expected: LogType,
    readonly actual: LogType
  ) {
    super(`LogTable key "${key}" holds ${actual}, accessed as ${expected}`);
    this.name = "LogTableTypeError";
  }
}

/** A durable log could not be parsed or failed validation. */
export class LogFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LogFormatError";
  }
}

/** The cycle lifecycle was driven out of order (e.g. processInputs outside a cycle). */
export class CycleStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CycleStateError";
  }
}
