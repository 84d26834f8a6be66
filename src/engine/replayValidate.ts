import type { CycleRecord } from "./replay";
import type { LogHeader } from "./replayFormat";
import { LOG_FORMAT_VERSION } from "./replayFormat";
import { LogFormatError } from "./errors";

function isIsoDateString(s: unknown): s is string {
  if (typeof s !== "string") return false;
  const t = Date.parse(s);
  return Number.isFinite(t) && new Date(t).toISOString() === s;
}

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

export function validateLogHeader(raw: unknown): LogHeader {
  if (!isObject(raw)) {
    throw new LogFormatError("Invalid log header: not an object");
  }

  if (raw["formatVersion"] !== LOG_FORMAT_VERSION) {
    throw new LogFormatError(`Invalid log formatVersion: ${String(raw["formatVersion"])}`);
  }

  const createdAt = raw["createdAt"];
  if (!isIsoDateString(createdAt)) {
    throw new LogFormatError(`Invalid log createdAt: ${String(createdAt)}`);
  }

  const rawMetadata = raw["metadata"] ?? {};
  if (!isObject(rawMetadata)) {
    throw new LogFormatError("Invalid log metadata");
  }
  const metadata: Record<string, string> = {};
  for (const [k, v] of Object.entries(rawMetadata)) {
    if (typeof v !== "string") {
      throw new LogFormatError(`Invalid log metadata.${k}: expected a string`);
    }
    metadata[k] = v;
  }

  return { formatVersion: LOG_FORMAT_VERSION, createdAt, metadata };
}

/** Cycle indices must strictly increase; gaps are allowed. */
export function validateCycleOrder(cycles: readonly CycleRecord[]): void {
  for (let i = 1; i < cycles.length; i++) {
    if (cycles[i].cycle <= cycles[i - 1].cycle) {
      throw new LogFormatError(
        `Invalid log: cycle ${cycles[i].cycle} follows cycle ${cycles[i - 1].cycle}`
      );
    }
  }
}
