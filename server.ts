import { createServer } from "http";
import { existsSync } from "fs";
import { WebSocketServer } from "ws";
import { getConfig } from "./lib/config";
import { DockManager } from "./lib/dock-manager";
import { LayoutChannel } from "./lib/layout-channel";
import { getDefaultLayoutPath } from "./lib/layout-file";
import { createLogger } from "./lib/log";

const log = createLogger("server");
const config = getConfig();

// Support --port <n> CLI flag, falling back to PORT env, then 3000
function resolvePort(): number {
  const idx = process.argv.indexOf("--port");
  if (idx !== -1 && process.argv[idx + 1]) {
    const n = parseInt(process.argv[idx + 1]);
    if (n > 0) return n;
  }
  return config.port;
}
const port = resolvePort();

const layoutFile = getDefaultLayoutPath(config);
const manager = new DockManager({ minPanelSize: config.minPanelSize });
if (existsSync(layoutFile)) {
  const loaded = manager.loadFromFile(layoutFile);
  if (!loaded.ok) {
    log.warn("Starting with an empty layout", { path: layoutFile, reason: loaded.error.message });
  }
}
const channel = new LayoutChannel(manager, { layoutFile });

const server = createServer((req, res) => {
  const { pathname } = new URL(req.url ?? "/", "http://localhost");
  if (req.method === "GET" && pathname === "/api/layout") {
    res.writeHead(200, { "Content-Type": "application/json" });
    res.end(JSON.stringify(manager.save()));
    return;
  }
  res.writeHead(404, { "Content-Type": "text/plain" });
  res.end("Not found");
});

const wss = new WebSocketServer({ noServer: true });

server.on("upgrade", (req, socket, head) => {
  const { pathname } = new URL(req.url ?? "/", "http://localhost");

  // --- Layout channel: /ws/layout ---
  if (pathname === "/ws/layout") {
    wss.handleUpgrade(req, socket, head, (ws) => {
      channel.handleConnection(ws);
    });
    return;
  }

  socket.write("HTTP/1.1 404 Not Found\r\n\r\n");
  socket.destroy();
});

server.listen(port, () => {
  log.info(`Layout server running at http://localhost:${port}`, { layoutFile, panels: manager.panelCount });
});
