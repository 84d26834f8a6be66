import type { CycleIndex, Prefix } from "../types";
import { CycleStateError } from "./errors";
import type { LoggableInputs } from "./loggableInputs";
import { LogTable } from "./logTable";
import type { CycleRecord, LogSink, ReplaySource } from "./replay";
import { log } from "../util/log";

export type InputLoggerOptions = {
  /** Present => replay mode for the whole run. */
  replaySource?: ReplaySource;
  sinks?: readonly LogSink[];
};

type OpenCycle = {
  cycle: CycleIndex;
  tables: Map<Prefix, LogTable>;
};

/**
 * Decides, per cycle and per component, whether inputs come from hardware
 * (record mode) or from a previous recording (replay mode).
 *
 * The mode is fixed at construction. Switching modes mid-run is not
 * supported; build a new logger instead.
 *
 * One instance is created at startup and passed to every subsystem that
 * owns LoggableInputs.
 */
export class InputLogger {
  readonly replayActive: boolean;

  private readonly replaySource: ReplaySource | undefined;
  private readonly sinks: readonly LogSink[];
  private nextCycle: CycleIndex = 0;
  private open: OpenCycle | null = null;

  constructor(opts: InputLoggerOptions = {}) {
    this.replaySource = opts.replaySource;
    this.replayActive = opts.replaySource !== undefined;
    this.sinks = opts.sinks ?? [];
  }

  hasReplaySource(): boolean {
    return this.replayActive;
  }

  /** Index of the cycle in progress, or null between cycles. */
  get currentCycle(): CycleIndex | null {
    return this.open?.cycle ?? null;
  }

  get cyclesCompleted(): number {
    return this.nextCycle;
  }

  /** Replay mode only: true once the source has nothing at the next cycle. */
  replayFinished(): boolean {
    if (!this.replaySource) return false;
    return !this.replaySource.hasCycle(this.nextCycle);
  }

  beginCycle(): CycleIndex {
    if (this.open) {
      throw new CycleStateError(`beginCycle called while cycle ${this.open.cycle} is open`);
    }
    this.open = { cycle: this.nextCycle, tables: new Map() };
    return this.open.cycle;
  }

  /**
   * Hands the cycle's tables to every sink and advances the cycle index.
   * A failing sink does not stop the others; the first failure is rethrown
   * once all of them have run.
   */
  endCycle(): void {
    const open = this.requireOpen("endCycle");
    const record: CycleRecord = { cycle: open.cycle, tables: open.tables };

    this.open = null;
    this.nextCycle = open.cycle + 1;

    const failures: unknown[] = [];
    for (const sink of this.sinks) {
      try {
        sink.writeCycle(record);
      } catch (err) {
        failures.push(err);
      }
    }

    if (failures.length === 0) return;
    for (const err of failures.slice(1)) {
      log.error(`another sink failed on cycle ${record.cycle}: ${err instanceof Error ? err.message : String(err)}`);
    }
    throw failures[0];
  }

  /**
   * Drops everything buffered in the open cycle. The cycle index is not
   * consumed, so the next beginCycle reuses it.
   */
  abortCycle(): void {
    const open = this.requireOpen("abortCycle");
    log.warn(`cycle ${open.cycle} aborted; ${open.tables.size} table(s) discarded`);
    this.open = null;
  }

  /**
   * Runs one complete cycle. If `body` throws, the cycle is aborted and no
   * sink sees any of its tables.
   */
  runCycle<T>(body: (cycle: CycleIndex) => T): T {
    const cycle = this.beginCycle();
    let result: T;
    try {
      result = body(cycle);
    } catch (err) {
      this.abortCycle();
      throw err;
    }
    this.endCycle();
    return result;
  }

  /**
   * Record mode: runs `capture` (the subsystem's hardware read), then
   * serializes `inputs` into a fresh table.
   *
   * Replay mode: restores `inputs` from the recorded table for
   * (prefix, current cycle). `capture` is never called.
   *
   * In both modes the component's resulting state is serialized into the
   * cycle buffer, so a replay can be re-recorded and compared.
   */
  processInputs(prefix: Prefix, inputs: LoggableInputs, capture?: () => void): void {
    const open = this.requireOpen(`processInputs("${prefix}")`);
    if (open.tables.has(prefix)) {
      throw new CycleStateError(`prefix "${prefix}" processed twice in cycle ${open.cycle}`);
    }

    if (this.replaySource) {
      const recorded = this.replaySource.getTable(prefix, open.cycle);
      if (recorded.isEmpty()) {
        log.debug(`no record for "${prefix}" at cycle ${open.cycle}; keeping previous values`);
      }
      restoreAtomically(inputs, recorded);
    } else if (capture) {
      capture();
    }

    const table = new LogTable();
    inputs.serialize(table);
    open.tables.set(prefix, table);
  }

  async close(): Promise<void> {
    if (this.open) this.abortCycle();
    for (const sink of this.sinks) {
      await sink.close?.();
    }
  }

  private requireOpen(where: string): OpenCycle {
    if (!this.open) {
      throw new CycleStateError(`${where} called outside of a cycle`);
    }
    return this.open;
  }
}

/**
 * Restores `inputs` from `table`; if restore throws part way, the fields are
 * put back to their values from before the call and the error is rethrown.
 */
function restoreAtomically(inputs: LoggableInputs, table: LogTable): void {
  const before = new LogTable();
  inputs.serialize(before);
  try {
    inputs.restore(table);
  } catch (err) {
    inputs.restore(before);
    throw err;
  }
}
