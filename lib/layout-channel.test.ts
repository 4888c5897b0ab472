import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { EventEmitter } from "events";
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { DockManager } from "./dock-manager";
import { LayoutChannel } from "./layout-channel";
import { loadLayoutFile } from "./layout-file";

class FakeSocket extends EventEmitter {
  readyState = 1; // WebSocket.OPEN
  sent: unknown[] = [];

  send(data: string) {
    this.sent.push(JSON.parse(data));
  }

  request(message: object) {
    this.emit("message", Buffer.from(JSON.stringify(message)));
  }
}

describe("LayoutChannel", () => {
  let manager: DockManager;
  let channel: LayoutChannel;

  beforeEach(() => {
    manager = new DockManager({ minPanelSize: 150 });
    channel = new LayoutChannel(manager);
  });

  it("sends the current layout on connect", () => {
    const ws = new FakeSocket();
    channel.handleConnection(ws);
    expect(ws.sent).toEqual([{ type: "state", layout: { version: "2.0", minPanelSize: 150 } }]);
    expect(channel.clientCount).toBe(1);
  });

  it("answers a mutation and broadcasts its events to every client", () => {
    const a = new FakeSocket();
    const b = new FakeSocket();
    channel.handleConnection(a);
    channel.handleConnection(b);

    a.request({ type: "add", id: "r1", panel: { id: "p1", title: "Editor" } });

    const events = {
      type: "events",
      events: [
        { type: "root_changed" },
        { type: "panel_count_changed", count: 1 },
        { type: "panel_added", panelId: "p1" },
        { type: "layout_changed" },
      ],
    };
    expect(a.sent.slice(1)).toEqual([{ type: "response", id: "r1", ok: true, data: { panelCount: 1 } }, events]);
    expect(b.sent.slice(1)).toEqual([events]);
    expect(manager.findPanel("p1")?.title).toBe("Editor");
  });

  it("places a panel relative to a target", () => {
    const ws = new FakeSocket();
    channel.handleConnection(ws);
    ws.request({ type: "add", id: "r1", panel: { id: "a" } });
    ws.request({ type: "add", id: "r2", panel: { id: "b" }, targetId: "a", direction: "bottom" });
    ws.request({ type: "set_ratio", id: "r3", splitId: "node_1", ratio: 0.25 });
    expect(manager.dumpTree()).toBe(["Split[node_1]: H (ratio: 0.25)", "  Panel[a]: ", "  Panel[b]: "].join("\n"));
  });

  it("honours a direction sent without a target", () => {
    const ws = new FakeSocket();
    channel.handleConnection(ws);
    ws.request({ type: "add", id: "r1", panel: { id: "a" } });
    ws.request({ type: "add", id: "r2", panel: { id: "b" }, direction: "left" });
    expect(manager.dumpTree()).toBe(["Split[node_1]: V (ratio: 0.5)", "  Panel[b]: ", "  Panel[a]: "].join("\n"));
  });

  it("reports failed mutations to the requester only", () => {
    const a = new FakeSocket();
    const b = new FakeSocket();
    channel.handleConnection(a);
    channel.handleConnection(b);

    a.request({ type: "remove", id: "r2", panelId: "zzz" });

    expect(a.sent.slice(1)).toEqual([
      { type: "response", id: "r2", ok: false, code: "NotFound", error: "Node not found: zzz" },
    ]);
    expect(b.sent.slice(1)).toEqual([]);
  });

  it("rejects malformed frames", () => {
    const ws = new FakeSocket();
    channel.handleConnection(ws);
    ws.emit("message", Buffer.from("garbage"));
    ws.request({ type: "resize", id: "r3" });
    expect(ws.sent.slice(1)).toEqual([
      { type: "response", id: "r3", ok: false, code: "InvalidArgument", error: "Unknown message type: resize" },
    ]);
  });

  it("answers validate and snapshot requests without broadcasting", () => {
    const ws = new FakeSocket();
    const other = new FakeSocket();
    channel.handleConnection(ws);
    channel.handleConnection(other);
    manager.addPanel({ id: "a", title: "A", contentRef: "doc" });

    ws.request({ type: "validate", id: "v" });
    ws.request({ type: "snapshot", id: "s" });

    expect(ws.sent.slice(1)).toEqual([
      { type: "response", id: "v", ok: true, data: { isValid: true, errors: [], warnings: [] } },
      { type: "response", id: "s", ok: true, data: manager.save() },
    ]);
    expect(other.sent.slice(1)).toEqual([]);
  });

  it("stops sending to closed clients", () => {
    const a = new FakeSocket();
    const b = new FakeSocket();
    channel.handleConnection(a);
    channel.handleConnection(b);

    b.emit("close");
    expect(channel.clientCount).toBe(1);

    a.request({ type: "clear", id: "c" });
    expect(b.sent).toHaveLength(1);
    expect(a.sent).toHaveLength(3);
  });

  it("skips sockets that are no longer open", () => {
    const a = new FakeSocket();
    const b = new FakeSocket();
    channel.handleConnection(a);
    channel.handleConnection(b);
    b.readyState = 3; // CLOSED

    a.request({ type: "clear", id: "c" });
    expect(b.sent).toHaveLength(1);
  });

  describe("persistence", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "layout-channel-test-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("writes the layout file after each successful mutation", () => {
      const layoutFile = join(dir, "layout.json");
      const persisted = new LayoutChannel(manager, { layoutFile });
      const ws = new FakeSocket();
      persisted.handleConnection(ws);

      ws.request({ type: "add", id: "r1", panel: { id: "p1" } });

      const file = loadLayoutFile(layoutFile);
      expect(file.ok && file.document).toEqual(manager.save());
    });

    it("leaves the file alone when a mutation fails", () => {
      const layoutFile = join(dir, "layout.json");
      const persisted = new LayoutChannel(manager, { layoutFile });
      const ws = new FakeSocket();
      persisted.handleConnection(ws);

      ws.request({ type: "remove", id: "r1", panelId: "missing" });

      expect(loadLayoutFile(layoutFile).ok).toBe(false);
    });
  });
});
