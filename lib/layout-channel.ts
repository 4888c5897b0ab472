import { WebSocket } from "ws";
import type { ClientMessage, ServerMessage } from "../shared/protocol";
import { parseClientMessage } from "../shared/protocol";
import type { DockManager, MutationResult } from "./dock-manager";
import { createLogger, type Logger } from "./log";

/** The part of a `ws` WebSocket the channel uses */
export interface LayoutSocket {
  readonly readyState: number;
  send(data: string): void;
  on(event: "message", listener: (data: { toString(): string }) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export interface LayoutChannelOptions {
  /** Layout file rewritten after every successful mutation */
  layoutFile?: string;
  logger?: Logger;
}

/**
 * Serves one DockManager to any number of WebSocket clients. Each client
 * gets the full layout on connect, then an `events` frame after every
 * successful mutation, whoever requested it.
 */
export class LayoutChannel {
  private clients = new Set<LayoutSocket>();
  private log: Logger;

  constructor(
    private manager: DockManager,
    private opts: LayoutChannelOptions = {},
  ) {
    this.log = opts.logger ?? createLogger("channel");
  }

  get clientCount(): number {
    return this.clients.size;
  }

  handleConnection(ws: LayoutSocket): void {
    this.clients.add(ws);
    this.log.info("Client connected", { clients: this.clients.size });
    send(ws, { type: "state", layout: this.manager.save() });

    ws.on("message", (raw) => {
      const parsed = parseClientMessage(raw.toString());
      if (!parsed.ok) {
        this.log.warn("Rejected message", { reason: parsed.error });
        if (parsed.id !== undefined) {
          send(ws, { type: "response", id: parsed.id, ok: false, code: "InvalidArgument", error: parsed.error });
        }
        return;
      }
      this.handleRequest(ws, parsed.message);
    });

    ws.on("close", () => {
      this.clients.delete(ws);
      this.log.info("Client disconnected", { clients: this.clients.size });
    });

    ws.on("error", (err) => {
      this.clients.delete(ws);
      this.log.warn("Client socket error", { error: err.message });
    });
  }

  private handleRequest(ws: LayoutSocket, msg: ClientMessage): void {
    switch (msg.type) {
      case "add":
        this.applyMutation(
          ws,
          msg.id,
          msg.targetId === undefined
            ? this.manager.addPanel(msg.panel, msg.direction)
            : this.manager.addPanelAt(msg.panel, msg.targetId, msg.direction ?? "right"),
        );
        break;
      case "remove":
        this.applyMutation(ws, msg.id, this.manager.remove(msg.panelId));
        break;
      case "set_ratio":
        this.applyMutation(ws, msg.id, this.manager.updateSplitRatio(msg.splitId, msg.ratio));
        break;
      case "clear":
        this.applyMutation(ws, msg.id, this.manager.clear());
        break;
      case "validate":
        send(ws, { type: "response", id: msg.id, ok: true, data: this.manager.validate() });
        break;
      case "snapshot":
        send(ws, { type: "response", id: msg.id, ok: true, data: this.manager.save() });
        break;
    }
  }

  private applyMutation(ws: LayoutSocket, requestId: string, result: MutationResult): void {
    if (!result.ok) {
      send(ws, { type: "response", id: requestId, ok: false, code: result.error.code, error: result.error.message });
      return;
    }
    this.persist();
    send(ws, { type: "response", id: requestId, ok: true, data: { panelCount: this.manager.panelCount } });
    this.broadcast({ type: "events", events: result.events });
  }

  private persist(): void {
    if (!this.opts.layoutFile) return;
    const saved = this.manager.saveToFile(this.opts.layoutFile);
    if (!saved.ok) {
      this.log.error("Failed to persist layout", { reason: saved.error.message });
    }
  }

  private broadcast(msg: ServerMessage): void {
    const json = JSON.stringify(msg);
    for (const ws of this.clients) {
      if (ws.readyState === WebSocket.OPEN) ws.send(json);
    }
  }
}

function send(ws: LayoutSocket, msg: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(msg));
  }
}
