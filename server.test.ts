import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, type Mock } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

// --- Mock setup (must come before any imports that trigger server.ts) ---

interface FakeRequest {
  method?: string;
  url?: string;
}

interface FakeResponse {
  writeHead: Mock;
  end: Mock;
}

interface FakeUpgradeSocket {
  write: Mock;
  destroy: Mock;
}

type RequestHandler = (req: FakeRequest, res: FakeResponse) => void;
type UpgradeHandler = (req: FakeRequest, socket: FakeUpgradeSocket, head: Buffer) => void;

// Capture the request and upgrade handlers
let requestHandler: RequestHandler | undefined;
let upgradeHandler: UpgradeHandler | undefined;
const mockServer = {
  on: vi.fn((event: string, handler: UpgradeHandler) => {
    if (event === "upgrade") upgradeHandler = handler;
  }),
  listen: vi.fn((_port: number, cb?: () => void) => {
    cb?.();
  }),
};

vi.mock("http", () => ({
  createServer: vi.fn((handler: RequestHandler) => {
    requestHandler = handler;
    return mockServer;
  }),
}));

const fakeWs = { readyState: 1, send: vi.fn(), on: vi.fn() };
const mockHandleUpgrade = vi.fn();

vi.mock("ws", () => ({
  WebSocket: { OPEN: 1 },
  // WebSocketServer must be a constructor (used with `new`)
  WebSocketServer: class MockWebSocketServer {
    handleUpgrade = mockHandleUpgrade;
  },
}));

const layout = {
  version: "2.0",
  minPanelSize: 150,
  root: { type: "panel", id: "a", title: "A", contentRef: "doc://a", minSize: 150, closable: true },
};

let dataDir: string;

beforeAll(async () => {
  dataDir = mkdtempSync(join(tmpdir(), "server-test-"));
  writeFileSync(join(dataDir, "layout.json"), JSON.stringify(layout));
  vi.stubEnv("DATA_DIR", dataDir);
  vi.stubEnv("LAYOUT_FILE", "");
  vi.stubEnv("MIN_PANEL_SIZE", "150");
  vi.stubEnv("PORT", "4123");
  // Import server: triggers top-level side effects.
  await import("./server");
});

afterAll(() => {
  vi.unstubAllEnvs();
  rmSync(dataDir, { recursive: true, force: true });
});

beforeEach(() => {
  fakeWs.send.mockReset();
  fakeWs.on.mockReset();
  mockHandleUpgrade.mockReset();
  mockHandleUpgrade.mockImplementation((_req: FakeRequest, _socket: FakeUpgradeSocket, _head: Buffer, cb: (ws: typeof fakeWs) => void) => {
    cb(fakeWs);
  });
});

function fakeResponse(): FakeResponse {
  return { writeHead: vi.fn(), end: vi.fn() };
}

describe("server", () => {
  it("listens on the configured port", () => {
    expect(mockServer.listen).toHaveBeenCalledWith(4123, expect.any(Function));
  });

  it("registers an upgrade handler on the HTTP server", () => {
    expect(upgradeHandler).toBeTypeOf("function");
  });

  it("hands /ws/layout upgrades to the layout channel", () => {
    const socket = { write: vi.fn(), destroy: vi.fn() };
    const req = { url: "/ws/layout" };
    const head = Buffer.alloc(0);

    upgradeHandler?.(req, socket, head);

    expect(mockHandleUpgrade).toHaveBeenCalledWith(req, socket, head, expect.any(Function));
    expect(fakeWs.send).toHaveBeenCalledWith(JSON.stringify({ type: "state", layout }));
    expect(fakeWs.on).toHaveBeenCalledWith("message", expect.any(Function));
    expect(socket.destroy).not.toHaveBeenCalled();
  });

  it("refuses upgrades on other paths", () => {
    const socket = { write: vi.fn(), destroy: vi.fn() };

    upgradeHandler?.({ url: "/ws/sessions/x" }, socket, Buffer.alloc(0));

    expect(mockHandleUpgrade).not.toHaveBeenCalled();
    expect(socket.write).toHaveBeenCalledWith("HTTP/1.1 404 Not Found\r\n\r\n");
    expect(socket.destroy).toHaveBeenCalled();
  });

  it("serves the loaded layout at /api/layout", () => {
    const res = fakeResponse();
    requestHandler?.({ method: "GET", url: "/api/layout" }, res);
    expect(res.writeHead).toHaveBeenCalledWith(200, { "Content-Type": "application/json" });
    expect(res.end).toHaveBeenCalledWith(JSON.stringify(layout));
  });

  it("answers 404 for other routes", () => {
    const res = fakeResponse();
    requestHandler?.({ method: "GET", url: "/nowhere" }, res);
    expect(res.writeHead).toHaveBeenCalledWith(404, { "Content-Type": "text/plain" });
    expect(res.end).toHaveBeenCalledWith("Not found");
  });
});
