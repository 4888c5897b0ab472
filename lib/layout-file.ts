import { closeSync, existsSync, mkdirSync, openSync, readFileSync, writeSync } from "fs";
import { dirname } from "path";
import type { LayoutDocument } from "../shared/types";
import { getConfig, type DockConfig } from "./config";
import { describeError, invalidArgument, ioFailure, type Result } from "./errors";
import { isRecord } from "./layout-codec";

/** Write a layout document as pretty-printed JSON */
export function saveLayoutFile(path: string, document: LayoutDocument): Result<{ bytes: number }> {
  const json = JSON.stringify(document, null, 2) + "\n";
  let bytes = 0;
  try {
    mkdirSync(dirname(path), { recursive: true });
    const fd = openSync(path, "w");
    try {
      bytes = writeSync(fd, json);
    } finally {
      closeSync(fd);
    }
  } catch (err) {
    return { ok: false, error: ioFailure(path, `Failed to write layout file (${describeError(err)})`) };
  }
  if (bytes === 0) {
    return { ok: false, error: ioFailure(path, "No bytes written to layout file") };
  }
  return { ok: true, bytes };
}

/**
 * Read and parse a layout file. Only the JSON shape is checked here; the
 * version tag and node structure are the codec's job.
 */
export function loadLayoutFile(path: string): Result<{ document: Record<string, unknown> }> {
  if (!existsSync(path)) {
    return { ok: false, error: ioFailure(path, "File does not exist") };
  }

  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    return { ok: false, error: ioFailure(path, `Failed to open file (${describeError(err)})`) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: invalidArgument(`Malformed JSON in ${path}: ${describeError(err)}`, { path }) };
  }

  if (!isRecord(parsed)) {
    return { ok: false, error: invalidArgument(`JSON root is not an object: ${path}`, { path }) };
  }
  return { ok: true, document: parsed };
}

/** LAYOUT_FILE, or layout.json inside DATA_DIR. The parent directory is created if missing. */
export function getDefaultLayoutPath(config: DockConfig = getConfig()): string {
  mkdirSync(dirname(config.layoutFile), { recursive: true });
  return config.layoutFile;
}
