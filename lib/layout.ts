/** Binary layout tree for panel docking: node model and pure tree helpers */

import type {
  Direction,
  Orientation,
  PanelDocument,
  SplitDocument,
} from "../shared/types";

export const RATIO_MIN = 0.1;
export const RATIO_MAX = 0.9;
export const DEFAULT_RATIO = 0.5;
export const MIN_SIZE_MIN = 50;
export const MIN_SIZE_MAX = 1000;

export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

export function clampRatio(ratio: number): number {
  return clamp(ratio, RATIO_MIN, RATIO_MAX);
}

export function clampMinSize(size: number): number {
  return clamp(size, MIN_SIZE_MIN, MIN_SIZE_MAX);
}

export type Slot = "first" | "second";

export type DockNode = LeafNode | SplitNode;

// Non-owning back-references. Only SplitNode's slot mutators write here.
const parents = new WeakMap<DockNode, SplitNode>();

/** The split currently holding `node`, or null for the root and detached nodes */
export function parentOf(node: DockNode): SplitNode | null {
  return parents.get(node) ?? null;
}

/** Which slot of `parent` holds `node`, or null if it is not a direct child */
export function slotOf(parent: SplitNode, node: DockNode): Slot | null {
  if (parent.first === node) return "first";
  if (parent.second === node) return "second";
  return null;
}

export function otherSlot(slot: Slot): Slot {
  return slot === "first" ? "second" : "first";
}

// --- Leaf ---

export interface LeafOptions {
  title?: string;
  contentRef?: string;
  minSize?: number;
  closable?: boolean;
}

export class LeafNode {
  readonly kind = "panel";
  title: string;
  contentRef: string;
  closable: boolean;
  private _minSize: number;

  constructor(
    readonly id: string,
    opts: LeafOptions = {},
  ) {
    this.title = opts.title ?? "";
    this.contentRef = opts.contentRef ?? "";
    this.closable = opts.closable ?? true;
    this._minSize = clampMinSize(opts.minSize ?? MIN_SIZE_MIN);
  }

  get minSize(): number {
    return this._minSize;
  }

  set minSize(value: number) {
    this._minSize = clampMinSize(value);
  }

  toDocument(): PanelDocument {
    return {
      type: "panel",
      id: this.id,
      title: this.title,
      contentRef: this.contentRef,
      minSize: this._minSize,
      closable: this.closable,
    };
  }
}

// --- Split ---

export interface SplitOptions {
  ratio?: number;
  minSize?: number;
}

export class SplitNode {
  readonly kind = "split";
  orientation: Orientation;
  private _ratio: number;
  private _minSize: number;
  private _first: DockNode | null = null;
  private _second: DockNode | null = null;

  constructor(
    readonly id: string,
    orientation: Orientation,
    opts: SplitOptions = {},
  ) {
    this.orientation = orientation;
    this._ratio = clampRatio(opts.ratio ?? DEFAULT_RATIO);
    this._minSize = clampMinSize(opts.minSize ?? MIN_SIZE_MIN);
  }

  get ratio(): number {
    return this._ratio;
  }

  set ratio(value: number) {
    this._ratio = clampRatio(value);
  }

  get minSize(): number {
    return this._minSize;
  }

  set minSize(value: number) {
    this._minSize = clampMinSize(value);
  }

  get first(): DockNode | null {
    return this._first;
  }

  get second(): DockNode | null {
    return this._second;
  }

  child(slot: Slot): DockNode | null {
    return slot === "first" ? this._first : this._second;
  }

  /**
   * Move `node` into `slot`. The node is detached from wherever it was, and
   * the slot's previous occupant is severed and handed back to the caller.
   */
  setChild(slot: Slot, node: DockNode): DockNode | null {
    if (this.child(slot) === node) return null;
    for (let cur: SplitNode | null = this; cur; cur = parentOf(cur)) {
      if (cur === node) throw new Error(`Cannot attach ${node.id} beneath itself`);
    }

    const oldParent = parentOf(node);
    if (oldParent) {
      const oldSlot = slotOf(oldParent, node);
      if (oldSlot) oldParent.takeChild(oldSlot);
    }

    const previous = this.takeChild(slot);
    this.assign(slot, node);
    parents.set(node, this);
    return previous;
  }

  /** Detach and return the child in `slot`, leaving the slot empty */
  takeChild(slot: Slot): DockNode | null {
    const node = this.child(slot);
    if (!node) return null;
    this.assign(slot, null);
    if (parents.get(node) === this) parents.delete(node);
    return node;
  }

  toDocument(): SplitDocument {
    const doc: SplitDocument = {
      type: "split",
      id: this.id,
      orientation: this.orientation,
      splitRatio: this._ratio,
      minSize: this._minSize,
    };
    if (this._first) doc.first = this._first.toDocument();
    if (this._second) doc.second = this._second.toDocument();
    return doc;
  }

  private assign(slot: Slot, node: DockNode | null): void {
    if (slot === "first") this._first = node;
    else this._second = node;
  }
}

// --- Tree helpers ---

/** Find a node by id anywhere in the tree */
export function findNode(root: DockNode | null, id: string): DockNode | null {
  if (!root) return null;
  if (root.id === id) return root;
  if (root.kind === "split") {
    return findNode(root.first, id) ?? findNode(root.second, id);
  }
  return null;
}

/** Collect every leaf in first-to-second order */
export function getAllLeaves(root: DockNode | null): LeafNode[] {
  if (!root) return [];
  if (root.kind === "panel") return [root];
  return [...getAllLeaves(root.first), ...getAllLeaves(root.second)];
}

export function getLeafCount(root: DockNode | null): number {
  if (!root) return 0;
  if (root.kind === "panel") return 1;
  return getLeafCount(root.first) + getLeafCount(root.second);
}

/** Leaves and splits together */
export function countNodes(root: DockNode | null): number {
  if (!root) return 0;
  if (root.kind === "panel") return 1;
  return 1 + countNodes(root.first) + countNodes(root.second);
}

/** Number of levels; a single leaf is depth 1, an empty tree depth 0 */
export function treeDepth(root: DockNode | null): number {
  if (!root) return 0;
  if (root.kind === "panel") return 1;
  return 1 + Math.max(treeDepth(root.first), treeDepth(root.second));
}

/**
 * Descend preferring `second` children until a leaf is reached. A heuristic
 * for "the rightmost panel", not a geometric guarantee.
 */
export function findRightmostLeaf(root: DockNode | null): LeafNode | null {
  if (!root) return null;
  if (root.kind === "panel") return root;
  return findRightmostLeaf(root.second) ?? findRightmostLeaf(root.first);
}

/** Indented text dump for debugging and the CLI */
export function dumpTree(root: DockNode | null): string {
  if (!root) return "Empty tree";
  const lines: string[] = [];
  const walk = (node: DockNode | null, indent: number) => {
    if (!node) return;
    const pad = "  ".repeat(indent);
    if (node.kind === "panel") {
      lines.push(`${pad}Panel[${node.id}]: ${node.title}`);
      return;
    }
    const dir = node.orientation === "horizontal" ? "H" : "V";
    lines.push(`${pad}Split[${node.id}]: ${dir} (ratio: ${node.ratio})`);
    walk(node.first, indent + 1);
    walk(node.second, indent + 1);
  };
  walk(root, 0);
  return lines.join("\n");
}

/** Geometric neighbor finding: assign rects on the unit square, then find the nearest pane in a direction */
export function findNeighbor(
  root: DockNode | null,
  panelId: string,
  direction: Direction,
): string | null {
  interface Rect { x: number; y: number; w: number; h: number; }
  const rects = new Map<string, Rect>();

  function layout(node: DockNode | null, rect: Rect) {
    if (!node) return;
    if (node.kind === "panel") {
      rects.set(node.id, rect);
      return;
    }
    const { ratio } = node;
    if (node.orientation === "vertical") {
      layout(node.first, { ...rect, w: rect.w * ratio });
      layout(node.second, { x: rect.x + rect.w * ratio, y: rect.y, w: rect.w * (1 - ratio), h: rect.h });
    } else {
      layout(node.first, { ...rect, h: rect.h * ratio });
      layout(node.second, { x: rect.x, y: rect.y + rect.h * ratio, w: rect.w, h: rect.h * (1 - ratio) });
    }
  }

  layout(root, { x: 0, y: 0, w: 1, h: 1 });

  const src = rects.get(panelId);
  if (!src) return null;

  const cx = src.x + src.w / 2;
  const cy = src.y + src.h / 2;

  let best: string | null = null;
  let bestDist = Infinity;

  for (const [id, r] of rects) {
    if (id === panelId) continue;
    const rx = r.x + r.w / 2;
    const ry = r.y + r.h / 2;
    let valid = false;
    let dist = 0;

    switch (direction) {
      case "left":
        valid = rx < cx;
        dist = cx - rx;
        break;
      case "right":
        valid = rx > cx;
        dist = rx - cx;
        break;
      case "top":
        valid = ry < cy;
        dist = cy - ry;
        break;
      case "bottom":
        valid = ry > cy;
        dist = ry - cy;
        break;
    }

    if (valid && dist < bestDist) {
      bestDist = dist;
      best = id;
    }
  }

  return best;
}
