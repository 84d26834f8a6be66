// src/sysid/dataLog.ts

export interface DoubleStream {
  readonly name: string;
  readonly unit: string;
  append(value: number): void;
}

export interface StringStream {
  readonly name: string;
  append(value: string): void;
}

/**
 * Where instrumentation streams live. Opening a stream registers a new entry
 * in the underlying log, so callers cache the handles they get back.
 */
export interface InstrumentationLog {
  openDoubleStream(name: string, unit: string): DoubleStream;
  openStringStream(name: string): StringStream;
}

type StreamEntry =
  | { kind: "double"; name: string; unit: string; values: number[] }
  | { kind: "string"; name: string; values: string[] };

/**
 * In-memory InstrumentationLog. Keeps every opened entry, so a stream opened
 * twice under one name shows up as two entries.
 */
export class DataLog implements InstrumentationLog {
  private readonly entries: StreamEntry[] = [];

  openDoubleStream(name: string, unit: string): DoubleStream {
    const values: number[] = [];
    this.entries.push({ kind: "double", name, unit, values });
    return {
      name,
      unit,
      append: (value: number) => {
        values.push(value);
      },
    };
  }

  openStringStream(name: string): StringStream {
    const values: string[] = [];
    this.entries.push({ kind: "string", name, values });
    return {
      name,
      append: (value: string) => {
        values.push(value);
      },
    };
  }

  /** Entry names in the order they were opened, duplicates included. */
  streamNames(): string[] {
    return this.entries.map((e) => e.name);
  }

  openCount(name: string): number {
    return this.entries.filter((e) => e.name === name).length;
  }

  unitOf(name: string): string | undefined {
    for (const e of this.entries) {
      if (e.name === name && e.kind === "double") return e.unit;
    }
    return undefined;
  }

  doubleValues(name: string): number[] {
    const out: number[] = [];
    for (const e of this.entries) {
      if (e.name === name && e.kind === "double") out.push(...e.values);
    }
    return out;
  }

  stringValues(name: string): string[] {
    const out: string[] = [];
    for (const e of this.entries) {
      if (e.name === name && e.kind === "string") out.push(...e.values);
    }
    return out;
  }
}
