import { WebSocketServer, type RawData, type WebSocket } from "ws";
import { LOG_FORMAT_VERSION, encodeCycle, type CycleRecord, type LogSink } from "../engine";
import type { ClientMessage, ServerErrorCode, ServerMessage } from "./protocol";
import { log } from "../util/log";

export type LogServerOptions = {
  /** 0 picks a free port. */
  port: number;
  host?: string;
  replayActive?: boolean;
  /** Cycles are skipped for a viewer whose unsent data exceeds this. Default 1 MiB. */
  maxBufferedBytes?: number;
};

export const DEFAULT_MAX_BUFFERED_BYTES = 1024 * 1024;

export type LogServer = LogSink & {
  port: number;
  clientCount(): number;
  close(): Promise<void>;
};

type Viewer = {
  clientId?: string;
  prefixes: string[] | null;
  behind: boolean;
};

function safeParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function optionalString(x: Record<string, unknown>, key: string): boolean {
  return !(key in x) || typeof x[key] === "string";
}

function isClientMessage(x: unknown): x is ClientMessage {
  if (!isPlainObject(x)) return false;
  if (!optionalString(x, "reqId")) return false;

  switch (x.type) {
    case "hello":
      return optionalString(x, "clientId");

    case "subscribe": {
      if (!("prefixes" in x)) return true;
      const p = x.prefixes;
      return Array.isArray(p) && p.every((s) => typeof s === "string");
    }

    default:
      return false;
  }
}

function getReqId(x: unknown): string | undefined {
  if (!isPlainObject(x)) return undefined;
  return typeof x.reqId === "string" ? x.reqId : undefined;
}

export function matchesPrefix(prefix: string, subscriptions: readonly string[] | null): boolean {
  if (subscriptions === null) return true;
  return subscriptions.some((s) => prefix === s || prefix.startsWith(`${s}/`));
}

function send(ws: WebSocket, msg: ServerMessage) {
  ws.send(JSON.stringify(msg));
}

function makeError(code: ServerErrorCode, message: string, reqId?: string): ServerMessage {
  return reqId ? { type: "error", error: { code, message }, reqId } : { type: "error", error: { code, message } };
}

/**
 * Streams committed cycles to connected viewers over WebSocket. Register the
 * returned server as one of the InputLogger's sinks.
 */
export async function startLogServer(opts: LogServerOptions): Promise<LogServer> {
  const wss = new WebSocketServer({ port: opts.port, host: opts.host });
  const viewers = new Map<WebSocket, Viewer>();
  const replayActive = opts.replayActive ?? false;
  const maxBufferedBytes = opts.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;

  await new Promise<void>((resolve, reject) => {
    wss.once("listening", () => resolve());
    wss.once("error", (err) => reject(err));
  });

  wss.on("error", (err) => {
    log.error(`live log server error: ${err.message}`);
  });

  wss.on("connection", (ws) => {
    viewers.set(ws, { prefixes: null, behind: false });
    send(ws, { type: "welcome", formatVersion: LOG_FORMAT_VERSION, replayActive });

    ws.on("message", (data) => {
      const raw = rawDataToString(data);
      const parsed = safeParseJson(raw);
      const reqId = getReqId(parsed);

      if (parsed === undefined) {
        send(ws, makeError("BAD_JSON", "Message is not valid JSON."));
        return;
      }
      if (!isClientMessage(parsed)) {
        send(ws, makeError("BAD_MESSAGE", "Unknown or malformed message.", reqId));
        return;
      }

      const viewer = viewers.get(ws);
      if (!viewer) return;

      if (parsed.type === "hello") {
        viewer.clientId = parsed.clientId;
        send(ws, {
          type: "welcome",
          formatVersion: LOG_FORMAT_VERSION,
          replayActive,
          clientId: parsed.clientId,
          reqId: parsed.reqId,
        });
        return;
      }

      viewer.prefixes = parsed.prefixes ? parsed.prefixes.slice() : null;
      send(ws, { type: "subscribed", prefixes: viewer.prefixes, reqId: parsed.reqId });
    });

    ws.on("close", () => {
      viewers.delete(ws);
    });

    ws.on("error", (err) => {
      log.warn(`log viewer socket error: ${err.message}`);
    });
  });

  const addr = wss.address();
  const port = typeof addr === "object" && addr !== null ? addr.port : opts.port;
  log.info(`live log server listening on ws://localhost:${port}`);

  return {
    port,

    clientCount: () => viewers.size,

    writeCycle(record: CycleRecord) {
      if (viewers.size === 0) return;
      const encoded = encodeCycle(record);

      for (const [ws, viewer] of viewers) {
        const tables = encoded.tables.filter(([prefix]) => matchesPrefix(prefix, viewer.prefixes));
        if (tables.length === 0) continue;

        const name = viewer.clientId ?? "anonymous";
        if (ws.bufferedAmount > maxBufferedBytes) {
          if (!viewer.behind) {
            viewer.behind = true;
            log.warn(`log viewer ${name} is behind (${ws.bufferedAmount} bytes queued); skipping cycles`);
          }
          continue;
        }
        if (viewer.behind) {
          viewer.behind = false;
          log.info(`log viewer ${name} caught up at cycle ${encoded.cycle}`);
        }
        send(ws, { type: "cycle", cycle: { cycle: encoded.cycle, tables } });
      }
    },

    close: async () => {
      for (const ws of viewers.keys()) {
        ws.terminate();
      }
      await new Promise<void>((resolve, reject) =>
        wss.close((err) => (err ? reject(err) : resolve()))
      );
    },
  };
}
