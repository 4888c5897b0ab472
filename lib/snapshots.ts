import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";
import type { LayoutDocument, NodeDocument } from "../shared/types";
import { getConfig } from "./config";
import { invalidArgument, type Result } from "./errors";

export const VALID_SNAPSHOT_NAME = /^[a-zA-Z0-9_-]+$/;

export interface SnapshotInfo {
  name: string;
  panelCount: number;
  updatedAt: number;
}

interface SnapshotRow {
  name: string;
  document: string;
  panel_count: number;
  updated_at: number;
}

function countPanels(node: NodeDocument | undefined): number {
  if (!node) return 0;
  if (node.type === "panel") return 1;
  return countPanels(node.first) + countPanels(node.second);
}

/** Named layout documents kept in SQLite */
export class SnapshotStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS snapshots (
        name TEXT PRIMARY KEY,
        document TEXT NOT NULL,
        panel_count INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);
  }

  save(name: string, document: LayoutDocument): Result<{ panelCount: number }> {
    if (!VALID_SNAPSHOT_NAME.test(name)) {
      return { ok: false, error: invalidArgument(`Invalid snapshot name: ${name}`, { name }) };
    }
    const panelCount = countPanels(document.root);
    this.db
      .prepare("INSERT OR REPLACE INTO snapshots (name, document, panel_count, updated_at) VALUES (?, ?, ?, ?)")
      .run(name, JSON.stringify(document), panelCount, Date.now());
    return { ok: true, panelCount };
  }

  /** The stored document, still to be checked by the codec, or undefined */
  load(name: string): unknown {
    const row = this.db
      .prepare<[string], Pick<SnapshotRow, "document">>("SELECT document FROM snapshots WHERE name = ?")
      .get(name);
    return row ? JSON.parse(row.document) : undefined;
  }

  list(): SnapshotInfo[] {
    return this.db
      .prepare<[], Omit<SnapshotRow, "document">>(
        "SELECT name, panel_count, updated_at FROM snapshots ORDER BY updated_at DESC, name ASC",
      )
      .all()
      .map((row) => ({ name: row.name, panelCount: row.panel_count, updatedAt: row.updated_at }));
  }

  delete(name: string): boolean {
    return this.db.prepare("DELETE FROM snapshots WHERE name = ?").run(name).changes > 0;
  }

  close(): void {
    this.db.close();
  }
}

let store: SnapshotStore | null = null;

export function getSnapshotStore(): SnapshotStore {
  if (!store) {
    store = new SnapshotStore(join(getConfig().dataDir, "snapshots.db"));
  }
  return store;
}

export function closeSnapshotStore(): void {
  store?.close();
  store = null;
}
