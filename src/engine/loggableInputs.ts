import type { LogTable } from "./logTable";

/**
 * A subsystem-owned bundle of observed inputs that can be captured into a
 * LogTable and restored from one.
 *
 * Contract:
 * - serialize writes every field under a stable key. Keys are part of the
 *   persisted format.
 * - restore reads every field with the field's current value as default, so a
 *   table missing a key leaves that field unchanged.
 * - restore after serialize on the same table is the identity on every field.
 */
export interface LoggableInputs {
  serialize(table: LogTable): void;
  restore(table: LogTable): void;
}
