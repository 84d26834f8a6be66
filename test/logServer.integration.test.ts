import { describe, it, expect, afterEach } from "vitest";
import WebSocket from "ws";
import { LogTable } from "../src/engine";
import { matchesPrefix, rawDataToString, startLogServer, type LogServer } from "../src/server/logServer";

function makeQueue(ws: WebSocket) {
  const q: string[] = [];
  let resolve: ((s: string) => void) | null = null;

  ws.on("message", (d) => {
    const s = d.toString();
    if (resolve) {
      const r = resolve;
      resolve = null;
      r(s);
    } else {
      q.push(s);
    }
  });

  return async () => {
    const head = q.shift();
    if (head !== undefined) return head;
    return await new Promise<string>((r) => (resolve = r));
  };
}

async function nextWithTimeout(next: () => Promise<string>, label: string, ms = 2000): Promise<unknown> {
  const raw = await Promise.race([
    next(),
    new Promise<string>((_, reject) =>
      setTimeout(() => reject(new Error(`Timeout waiting for message (${label}) after ${ms}ms`)), ms)
    ),
  ]);
  return JSON.parse(raw);
}

async function connect(port: number) {
  const ws = new WebSocket(`ws://localhost:${port}`);
  const next = makeQueue(ws);
  await new Promise<void>((resolve, reject) => {
    ws.on("open", () => resolve());
    ws.on("error", (e) => reject(e));
  });
  return { ws, next };
}

function table(key: string, value: number): LogTable {
  const t = new LogTable();
  t.putInteger(key, value);
  return t;
}

let server: LogServer | null = null;
const sockets: WebSocket[] = [];

afterEach(async () => {
  for (const ws of sockets.splice(0)) ws.close();
  if (server) await server.close();
  server = null;
});

describe("live log server", () => {
  it("welcomes a viewer and streams committed cycles", async () => {
    server = await startLogServer({ port: 0 });
    const { ws, next } = await connect(server.port);
    sockets.push(ws);

    expect(await nextWithTimeout(next, "welcome")).toEqual({
      type: "welcome",
      formatVersion: 1,
      replayActive: false,
    });
    expect(server.clientCount()).toBe(1);

    server.writeCycle({ cycle: 4, tables: new Map([["DriverStation", table("MatchNumber", 9)]]) });

    expect(await nextWithTimeout(next, "cycle")).toEqual({
      type: "cycle",
      cycle: {
        cycle: 4,
        tables: [["DriverStation", [["MatchNumber", "Integer", 9]]]],
      },
    });
  });

  it("filters cycles by subscribed prefix", async () => {
    server = await startLogServer({ port: 0, replayActive: true });
    const { ws, next } = await connect(server.port);
    sockets.push(ws);

    const welcome = await nextWithTimeout(next, "welcome");
    expect(welcome).toMatchObject({ type: "welcome", replayActive: true });

    ws.send(JSON.stringify({ type: "subscribe", prefixes: ["DriverStation/Joystick0"], reqId: "s1" }));
    expect(await nextWithTimeout(next, "subscribed")).toEqual({
      type: "subscribed",
      prefixes: ["DriverStation/Joystick0"],
      reqId: "s1",
    });

    // Nothing matches: no message for this cycle.
    server.writeCycle({ cycle: 0, tables: new Map([["DriverStation", table("A", 1)]]) });
    server.writeCycle({
      cycle: 1,
      tables: new Map([
        ["DriverStation", table("A", 2)],
        ["DriverStation/Joystick0", table("Type", 3)],
        ["DriverStation/Joystick1", table("Type", 4)],
      ]),
    });

    expect(await nextWithTimeout(next, "filtered cycle")).toEqual({
      type: "cycle",
      cycle: { cycle: 1, tables: [["DriverStation/Joystick0", [["Type", "Integer", 3]]]] },
    });
  });

  it("answers malformed messages with an error", async () => {
    server = await startLogServer({ port: 0 });
    const { ws, next } = await connect(server.port);
    sockets.push(ws);
    await nextWithTimeout(next, "welcome");

    ws.send("{not json");
    expect(await nextWithTimeout(next, "bad json")).toEqual({
      type: "error",
      error: { code: "BAD_JSON", message: "Message is not valid JSON." },
    });

    ws.send(JSON.stringify({ type: "launch", reqId: "r1" }));
    expect(await nextWithTimeout(next, "bad message")).toEqual({
      type: "error",
      error: { code: "BAD_MESSAGE", message: "Unknown or malformed message." },
      reqId: "r1",
    });

    ws.send(JSON.stringify({ type: "subscribe", prefixes: [1, 2] }));
    expect(await nextWithTimeout(next, "bad prefixes")).toMatchObject({
      type: "error",
      error: { code: "BAD_MESSAGE" },
    });
  });

  it("echoes hello with the client id", async () => {
    server = await startLogServer({ port: 0 });
    const { ws, next } = await connect(server.port);
    sockets.push(ws);
    await nextWithTimeout(next, "welcome");

    ws.send(JSON.stringify({ type: "hello", clientId: "viewer-1", reqId: "h1" }));
    expect(await nextWithTimeout(next, "hello")).toEqual({
      type: "welcome",
      formatVersion: 1,
      replayActive: false,
      clientId: "viewer-1",
      reqId: "h1",
    });
  });

  it("skips cycles for a viewer with too much unsent data", async () => {
    // A negative limit puts every viewer over it.
    server = await startLogServer({ port: 0, maxBufferedBytes: -1 });
    const { ws, next } = await connect(server.port);
    sockets.push(ws);
    await nextWithTimeout(next, "welcome");

    server.writeCycle({ cycle: 0, tables: new Map([["DriverStation", table("A", 1)]]) });
    ws.send(JSON.stringify({ type: "hello", reqId: "h2" }));

    expect(await nextWithTimeout(next, "hello after skipped cycle")).toMatchObject({
      type: "welcome",
      reqId: "h2",
    });
    expect(server.clientCount()).toBe(1);
  });
});

describe("raw frame decoding", () => {
  it("joins fragmented frames without separators", () => {
    const parts = [Buffer.from('{"type":'), Buffer.from('"hello"}')];

    expect(rawDataToString(parts)).toBe('{"type":"hello"}');
    expect(rawDataToString(Buffer.from("abc"))).toBe("abc");

    const arrayBuffer = new ArrayBuffer(3);
    new Uint8Array(arrayBuffer).set([0x78, 0x79, 0x7a]);
    expect(rawDataToString(arrayBuffer)).toBe("xyz");
  });
});

describe("prefix matching", () => {
  it("matches a prefix and everything nested under it", () => {
    expect(matchesPrefix("DriverStation", null)).toBe(true);
    expect(matchesPrefix("DriverStation", ["DriverStation"])).toBe(true);
    expect(matchesPrefix("DriverStation/Joystick2", ["DriverStation"])).toBe(true);
    expect(matchesPrefix("DriverStationX", ["DriverStation"])).toBe(false);
    expect(matchesPrefix("Drive", [])).toBe(false);
  });
});
