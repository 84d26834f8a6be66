import fs from "node:fs";
import path from "node:path";
import type { CycleIndex, Prefix } from "../types";
import {
  MemoryLog,
  makeLogHeader,
  serializeCycle,
  serializeLogHeader,
  deserializeLog,
  type CycleRecord,
  type LogFile,
  type LogHeader,
  type LogSink,
  type LogTable,
  type ReplaySource,
} from "../engine";
import { log } from "../util/log";

export type FileLogOptions = {
  /** Full path to the JSON Lines log file. */
  filePath: string;
  metadata?: Record<string, string>;
  /** Replace an existing file instead of refusing to start. */
  overwrite?: boolean;
};

function ensureDirForFile(filePath: string) {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
}

/**
 * Durable sink: writes the header when opened and appends one line per
 * committed cycle. A crash loses at most the cycle being appended; loading
 * drops that partial last line.
 */
export class FileLogSink implements LogSink {
  readonly filePath: string;
  readonly header: LogHeader;
  private closed = false;
  private written = 0;

  constructor(opts: FileLogOptions) {
    this.filePath = opts.filePath;
    if (!opts.overwrite && fs.existsSync(opts.filePath)) {
      throw new Error(`Log file already exists: ${opts.filePath}`);
    }

    this.header = makeLogHeader(opts.metadata);
    ensureDirForFile(opts.filePath);
    fs.writeFileSync(opts.filePath, serializeLogHeader(this.header) + "\n", "utf8");
    log.info(`recording to ${opts.filePath}`);
  }

  get cyclesWritten(): number {
    return this.written;
  }

  writeCycle(record: CycleRecord): void {
    if (this.closed) {
      throw new Error(`Log file ${this.filePath} is closed`);
    }
    fs.appendFileSync(this.filePath, serializeCycle(record) + "\n", "utf8");
    this.written++;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    log.info(`closed ${this.filePath} after ${this.written} cycle(s)`);
  }
}

export function loadLogFile(filePath: string): LogFile {
  const raw = fs.readFileSync(filePath, "utf8");
  return deserializeLog(raw);
}

/**
 * Replay source backed by a validated log file, read fully at load time.
 */
export class FileReplaySource implements ReplaySource {
  private constructor(
    readonly filePath: string,
    readonly header: LogHeader,
    private readonly memory: MemoryLog
  ) {}

  static load(filePath: string): FileReplaySource {
    const file = loadLogFile(filePath);
    log.info(`replaying ${filePath}: ${file.cycles.length} cycle(s), recorded ${file.header.createdAt}`);
    return new FileReplaySource(filePath, file.header, MemoryLog.fromFile(file));
  }

  get cycleCount(): number {
    return this.memory.cycleCount;
  }

  getTable(prefix: Prefix, cycle: CycleIndex): LogTable {
    return this.memory.getTable(prefix, cycle);
  }

  hasCycle(cycle: CycleIndex): boolean {
    return this.memory.hasCycle(cycle);
  }
}

/**
 * Utility: return true if the log file exists.
 */
export function hasLogFile(filePath: string): boolean {
  return fs.existsSync(filePath);
}
