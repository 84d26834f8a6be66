// src/server/protocol.ts

import type { EncodedCycle } from "../engine";

/* =========================
 * Client → Server messages
 * ========================= */

export type ClientMessage = HelloMessage | SubscribeMessage;

export interface HelloMessage {
  type: "hello";
  clientId?: string;
  reqId?: string;
}

/**
 * Restrict the cycles a viewer receives to the given prefixes. A prefix
 * matches itself and everything nested under it ("DriverStation" matches
 * "DriverStation/Joystick0"). Omitting `prefixes` subscribes to everything.
 */
export interface SubscribeMessage {
  type: "subscribe";
  prefixes?: string[];
  reqId?: string;
}

/* =========================
 * Server → Client messages
 * ========================= */

export type ServerMessage = WelcomeMessage | SubscribedMessage | CycleMessage | ErrorMessage;

export interface WelcomeMessage {
  type: "welcome";
  formatVersion: number;
  replayActive: boolean;
  clientId?: string;
  reqId?: string;
}

export interface SubscribedMessage {
  type: "subscribed";
  /** null means all prefixes. */
  prefixes: string[] | null;
  reqId?: string;
}

export interface CycleMessage {
  type: "cycle";
  cycle: EncodedCycle;
}

export type ServerErrorCode = "BAD_JSON" | "BAD_MESSAGE";

export interface ErrorMessage {
  type: "error";
  error: {
    code: ServerErrorCode;
    message: string;
  };
  reqId?: string;
}
