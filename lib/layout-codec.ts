/**
 * Layout tree ⇄ versioned document conversion.
 *
 * Decoding is strict: an unknown type tag, a split missing a child, a
 * missing/empty/duplicate id or an unknown orientation rejects the whole
 * document, as does nesting deeper than MAX_DECODE_DEPTH. The tree being
 * decoded is built separately from any live tree, so a rejected document
 * never affects the caller's state.
 */

import {
  LAYOUT_VERSION,
  type LayoutDocument,
  type Orientation,
} from "../shared/types";
import { DEFAULT_MIN_PANEL_SIZE } from "./config";
import { LayoutError, invalidArgument, versionMismatch, type Result } from "./errors";
import { DEFAULT_RATIO, LeafNode, SplitNode, clampMinSize, type DockNode } from "./layout";
import { PanelRegistry } from "./panel-registry";

export interface DecodedLayout {
  root: DockNode | null;
  registry: PanelRegistry;
  minPanelSize: number;
}

/** Deepest nesting accepted from a document; a single panel root is depth 1 */
export const MAX_DECODE_DEPTH = 1000;

interface DecodeContext {
  registry: PanelRegistry;
  seen: Set<string>;
  minPanelSize: number;
}

export function encodeLayout(root: DockNode | null, minPanelSize: number): LayoutDocument {
  const doc: LayoutDocument = { version: LAYOUT_VERSION, minPanelSize };
  if (root) doc.root = root.toDocument();
  return doc;
}

export function decodeLayout(value: unknown): Result<DecodedLayout> {
  if (!isRecord(value)) {
    return { ok: false, error: invalidArgument("Layout document is not an object") };
  }
  if (value.version !== LAYOUT_VERSION) {
    return { ok: false, error: versionMismatch(String(value.version), LAYOUT_VERSION) };
  }

  const minPanelSize = clampMinSize(
    typeof value.minPanelSize === "number" ? value.minPanelSize : DEFAULT_MIN_PANEL_SIZE,
  );
  const ctx: DecodeContext = { registry: new PanelRegistry(), seen: new Set(), minPanelSize };

  if (value.root === undefined || value.root === null) {
    return { ok: true, root: null, registry: ctx.registry, minPanelSize };
  }

  try {
    const root = decodeNode(value.root, "root", 1, ctx);
    return { ok: true, root, registry: ctx.registry, minPanelSize };
  } catch (err) {
    if (err instanceof LayoutError) return { ok: false, error: err };
    throw err;
  }
}

function decodeNode(value: unknown, path: string, depth: number, ctx: DecodeContext): DockNode {
  if (depth > MAX_DECODE_DEPTH) {
    throw invalidArgument(`Layout is nested deeper than ${MAX_DECODE_DEPTH} levels`);
  }
  if (!isRecord(value)) {
    throw invalidArgument(`${path} is not an object`, { path });
  }

  const id = value.id;
  if (typeof id !== "string" || id === "") {
    throw invalidArgument(`${path} has no id`, { path });
  }
  if (ctx.seen.has(id)) {
    throw invalidArgument(`Duplicate node id "${id}" at ${path}`, { path, id });
  }
  ctx.seen.add(id);

  const minSize = typeof value.minSize === "number" ? value.minSize : ctx.minPanelSize;

  if (value.type === "panel") {
    const leaf = new LeafNode(id, {
      title: typeof value.title === "string" ? value.title : "",
      contentRef: typeof value.contentRef === "string" ? value.contentRef : "",
      minSize,
      closable: typeof value.closable === "boolean" ? value.closable : true,
    });
    ctx.registry.register(leaf);
    return leaf;
  }

  if (value.type === "split") {
    const orientation = parseOrientation(value.orientation);
    if (!orientation) {
      throw invalidArgument(`${path} has invalid orientation "${String(value.orientation)}"`, { path });
    }
    if (value.first === undefined || value.second === undefined) {
      throw invalidArgument(`Split ${id} at ${path} is missing a child`, { path, id });
    }

    const split = new SplitNode(id, orientation, {
      ratio: typeof value.splitRatio === "number" ? value.splitRatio : DEFAULT_RATIO,
      minSize,
    });
    split.setChild("first", decodeNode(value.first, `${path}.first`, depth + 1, ctx));
    split.setChild("second", decodeNode(value.second, `${path}.second`, depth + 1, ctx));
    return split;
  }

  throw invalidArgument(`${path} has unknown type "${String(value.type)}"`, { path, id });
}

function parseOrientation(value: unknown): Orientation | undefined {
  return value === "horizontal" || value === "vertical" ? value : undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
