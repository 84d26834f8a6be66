// Public engine surface

export type { LogType, LogValue, Prefix, CycleIndex } from "../types";
export { LOG_TYPES } from "../types";

// Typed table
export { LogTable, logValueEquals } from "./logTable";

// Capture/restore contract
export type { LoggableInputs } from "./loggableInputs";

// Dispatcher
export { InputLogger } from "./inputLogger";
export type { InputLoggerOptions } from "./inputLogger";

// Sinks and sources
export type { CycleRecord, LogSink, ReplaySource } from "./replay";
export { MemoryLog } from "./memoryLog";

// Durable log format + IO
export { LOG_FORMAT_VERSION } from "./replayFormat";
export type {
  LogFile,
  LogHeader,
  EncodedCycle,
  EncodedEntry,
  EncodedValue,
  EncodedDouble,
} from "./replayFormat";
export {
  makeLogHeader,
  serializeLog,
  deserializeLog,
  serializeLogHeader,
  serializeCycle,
} from "./replayIO";
export { validateLogHeader, validateCycleOrder } from "./replayValidate";
export {
  encodeTable,
  decodeTable,
  encodeCycle,
  decodeCycle,
  encodeValue,
  decodeValue,
  encodeDouble,
  decodeDouble,
} from "./serialization";

// Deterministic hashes
export { hashTable, hashCycle } from "./tableHash";

// Errors
export { LogTableTypeError, LogFormatError, CycleStateError } from "./errors";
