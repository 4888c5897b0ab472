import { existsSync } from "fs";
import { dirname, join, resolve } from "path";

export interface DockConfig {
  dataDir: string;
  layoutFile: string;
  minPanelSize: number;
  port: number;
  strictSave: boolean;
}

export const DEFAULT_MIN_PANEL_SIZE = 150;
const DEFAULT_PORT = 3000;

/** Walk up from `startPath` looking for `marker`; falls back to `startPath` */
export function findProjectRoot(startPath: string, marker = "package.json", maxLevels = 5): string {
  let dir = resolve(startPath);
  for (let i = 0; i < maxLevels; i++) {
    if (existsSync(join(dir, marker))) return dir;
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return resolve(startPath);
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const n = Number(value);
  return Number.isFinite(n) ? n : fallback;
}

/** Read configuration from the environment. Not cached, so tests can swap env vars. */
export function getConfig(env: NodeJS.ProcessEnv = process.env): DockConfig {
  const dataDir = env.DATA_DIR || join(findProjectRoot(process.cwd()), "data");
  const port = parseInt(env.PORT || "");
  return {
    dataDir,
    layoutFile: env.LAYOUT_FILE || join(dataDir, "layout.json"),
    minPanelSize: parseNumber(env.MIN_PANEL_SIZE, DEFAULT_MIN_PANEL_SIZE),
    port: port > 0 ? port : DEFAULT_PORT,
    strictSave: env.STRICT_SAVE === "1" || env.STRICT_SAVE === "true",
  };
}
