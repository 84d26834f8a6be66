import type { CycleIndex, Prefix } from "../types";
import type { LogTable } from "./logTable";

/**
 * Everything committed during one control cycle, keyed by prefix in the order
 * the components were processed.
 */
export type CycleRecord = {
  cycle: CycleIndex;
  tables: ReadonlyMap<Prefix, LogTable>;
};

/**
 * Receives committed cycles. A sink never sees a partial cycle: tables of an
 * aborted cycle are dropped before reaching it. A sink that throws does not
 * keep the cycle from the sinks after it.
 */
export interface LogSink {
  writeCycle(record: CycleRecord): void;
  close?(): void | Promise<void>;
}

/**
 * Previously recorded tables, addressed purely by (prefix, cycle).
 * Must answer identically for repeated queries of the same address, and
 * return an empty table when nothing was recorded there.
 */
export interface ReplaySource {
  getTable(prefix: Prefix, cycle: CycleIndex): LogTable;

  /** True while the recording has data at or beyond `cycle`. */
  hasCycle(cycle: CycleIndex): boolean;
}
