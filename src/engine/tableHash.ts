import type { LogTable } from "./logTable";
import type { CycleRecord } from "./replay";
import { encodeCycle, encodeTable } from "./serialization";

/**
 * Deterministic hash of a LogTable.
 * Two tables hash equal iff they hold the same keys, in the same order,
 * with bit-identical values.
 */
export function hashTable(table: LogTable): string {
  // Builds on the persisted encoding, which is already bit-exact for doubles.
  return JSON.stringify(encodeTable(table));
}

export function hashCycle(record: CycleRecord): string {
  return JSON.stringify(encodeCycle(record));
}
