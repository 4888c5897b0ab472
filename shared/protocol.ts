// WS protocol message types between layout clients and the server (/ws/layout)

import type { LayoutDocument, LayoutEvent, PanelSpec } from "./types";

// --- Client → Server ---

export interface AddRequest {
  type: "add";
  id: string;
  panel: PanelSpec;
  targetId?: string;
  direction?: string;
}

export interface RemoveRequest {
  type: "remove";
  id: string;
  panelId: string;
}

export interface SetRatioRequest {
  type: "set_ratio";
  id: string;
  splitId: string;
  ratio: number;
}

export interface ClearRequest {
  type: "clear";
  id: string;
}

export interface ValidateRequest {
  type: "validate";
  id: string;
}

export interface SnapshotRequest {
  type: "snapshot";
  id: string;
}

export type ClientMessage =
  | AddRequest
  | RemoveRequest
  | SetRatioRequest
  | ClearRequest
  | ValidateRequest
  | SnapshotRequest;

// --- Server → Client ---

export interface StateMessage {
  type: "state";
  layout: LayoutDocument;
}

export interface EventsMessage {
  type: "events";
  events: LayoutEvent[];
}

export interface ResponseMessage {
  type: "response";
  id: string;
  ok: boolean;
  data?: unknown;
  error?: string;
  code?: string;
}

export type ServerMessage = StateMessage | EventsMessage | ResponseMessage;

// --- Parsing ---

export type ParsedClientMessage =
  | { ok: true; message: ClientMessage }
  | { ok: false; id?: string; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === "string";
}

function parsePanelSpec(value: unknown): PanelSpec | undefined {
  if (!isRecord(value) || typeof value.id !== "string") return undefined;
  const { id, title, contentRef, minSize, closable } = value;
  if (!optionalString(title) || !optionalString(contentRef)) return undefined;
  if (minSize !== undefined && typeof minSize !== "number") return undefined;
  if (closable !== undefined && typeof closable !== "boolean") return undefined;
  return { id, title, contentRef, minSize, closable };
}

/** Decode one text frame. Anything not matching a known request shape is rejected. */
export function parseClientMessage(raw: string): ParsedClientMessage {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return { ok: false, error: "Malformed JSON" };
  }
  if (!isRecord(value)) return { ok: false, error: "Message is not an object" };

  const { id } = value;
  if (typeof id !== "string" || id === "") return { ok: false, error: "Message has no request id" };
  const reject = (error: string): ParsedClientMessage => ({ ok: false, id, error });

  switch (value.type) {
    case "add": {
      const panel = parsePanelSpec(value.panel);
      if (!panel) return reject("add requires a panel with a string id");
      const { targetId, direction } = value;
      if (!optionalString(targetId) || !optionalString(direction)) {
        return reject("add targetId and direction must be strings");
      }
      return { ok: true, message: { type: "add", id, panel, targetId, direction } };
    }
    case "remove": {
      const { panelId } = value;
      if (typeof panelId !== "string") return reject("remove requires panelId");
      return { ok: true, message: { type: "remove", id, panelId } };
    }
    case "set_ratio": {
      const { splitId, ratio } = value;
      if (typeof splitId !== "string" || typeof ratio !== "number") {
        return reject("set_ratio requires splitId and a numeric ratio");
      }
      return { ok: true, message: { type: "set_ratio", id, splitId, ratio } };
    }
    case "clear":
      return { ok: true, message: { type: "clear", id } };
    case "validate":
      return { ok: true, message: { type: "validate", id } };
    case "snapshot":
      return { ok: true, message: { type: "snapshot", id } };
    default:
      return reject(`Unknown message type: ${String(value.type)}`);
  }
}
