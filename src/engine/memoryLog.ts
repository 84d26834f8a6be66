import type { CycleIndex, Prefix } from "../types";
import { CycleStateError } from "./errors";
import { LogTable } from "./logTable";
import type { CycleRecord, LogSink, ReplaySource } from "./replay";
import type { LogFile, LogHeader } from "./replayFormat";

/**
 * In-process log: records committed cycles as a sink and serves them back as
 * a replay source. Lookups return copies, so callers cannot alter what later
 * queries of the same address see.
 */
export class MemoryLog implements LogSink, ReplaySource {
  private readonly cycles = new Map<CycleIndex, ReadonlyMap<Prefix, LogTable>>();
  private lastCycle: CycleIndex = -1;

  static fromRecords(records: Iterable<CycleRecord>): MemoryLog {
    const memory = new MemoryLog();
    for (const r of records) memory.writeCycle(r);
    return memory;
  }

  static fromFile(file: LogFile): MemoryLog {
    return MemoryLog.fromRecords(file.cycles);
  }

  writeCycle(record: CycleRecord): void {
    if (record.cycle <= this.lastCycle) {
      throw new CycleStateError(
        `cycle ${record.cycle} written after cycle ${this.lastCycle}; cycles must increase`
      );
    }
    const copy = new Map<Prefix, LogTable>();
    for (const [prefix, table] of record.tables) {
      copy.set(prefix, LogTable.fromEntries(table.entries()));
    }
    this.cycles.set(record.cycle, copy);
    this.lastCycle = record.cycle;
  }

  getTable(prefix: Prefix, cycle: CycleIndex): LogTable {
    const table = this.cycles.get(cycle)?.get(prefix);
    return table ? LogTable.fromEntries(table.entries()) : new LogTable();
  }

  hasCycle(cycle: CycleIndex): boolean {
    return cycle <= this.lastCycle;
  }

  get cycleCount(): number {
    return this.cycles.size;
  }

  /** Recorded cycles in increasing order. */
  records(): CycleRecord[] {
    return [...this.cycles.entries()].map(([cycle, tables]) => ({ cycle, tables }));
  }

  toLogFile(header: LogHeader): LogFile {
    return { header, cycles: this.records() };
  }
}
