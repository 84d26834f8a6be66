import type { CycleRecord } from "./replay";
import type { LogFile, LogHeader } from "./replayFormat";
import { LOG_FORMAT_VERSION } from "./replayFormat";
import { validateCycleOrder, validateLogHeader } from "./replayValidate";
import { decodeCycle, encodeCycle } from "./serialization";
import { LogFormatError } from "./errors";
import { log } from "../util/log";

export function makeLogHeader(metadata: Record<string, string> = {}, now = new Date()): LogHeader {
  return {
    formatVersion: LOG_FORMAT_VERSION,
    createdAt: now.toISOString(),
    metadata: { ...metadata },
  };
}

/** One line, without the trailing newline. */
export function serializeLogHeader(header: LogHeader): string {
  return JSON.stringify(header);
}

/** One line, without the trailing newline. */
export function serializeCycle(record: CycleRecord): string {
  return JSON.stringify(encodeCycle(record));
}

/**
 * Serialize a whole log to JSON Lines.
 */
export function serializeLog(file: LogFile): string {
  const lines = [serializeLogHeader(file.header), ...file.cycles.map(serializeCycle)];
  return lines.join("\n") + "\n";
}

type Line = { text: string; lineNo: number };

function parseLine(line: string, lineNo: number): unknown {
  try {
    return JSON.parse(line);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LogFormatError(`line ${lineNo}: invalid JSON (${reason})`);
  }
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

// A crash during an append leaves the last line cut short.
function dropTruncatedTail(lines: readonly Line[]): readonly Line[] {
  const last = lines[lines.length - 1];
  if (last === undefined || isJson(last.text)) return lines;
  log.warn(`line ${last.lineNo}: final cycle is truncated; dropping it`);
  return lines.slice(0, -1);
}

/**
 * Deserialize JSON Lines into a log file and validate it. Blank lines are
 * ignored, so a file ending in a newline parses the same as one that does not.
 * A final cycle line that is not JSON is dropped with a warning; a bad line
 * anywhere else is an error.
 */
export function deserializeLog(text: string): LogFile {
  const lines: Line[] = text.split("\n").map((l, i) => ({ text: l.trim(), lineNo: i + 1 }));
  const nonEmpty = lines.filter((l) => l.text !== "");

  if (nonEmpty.length === 0) {
    throw new LogFormatError("Empty log: missing header line");
  }

  const [first, ...rest] = nonEmpty;
  const header = validateLogHeader(parseLine(first.text, first.lineNo));
  const cycles = dropTruncatedTail(rest).map((l) => decodeCycle(parseLine(l.text, l.lineNo), `line ${l.lineNo}`));
  validateCycleOrder(cycles);

  return { header, cycles };
}
