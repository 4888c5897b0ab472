/**
 * DockManager: owns the layout tree and the panel registry, and performs
 * every structural mutation on them.
 *
 * Mutations validate their preconditions before touching the tree, so a
 * failed call leaves the layout exactly as it was. Successful calls return
 * the ordered list of change events and then deliver the same events to
 * subscribers, after the structure is consistent again.
 */

import {
  parseDirection,
  type LayoutDocument,
  type LayoutEvent,
  type Orientation,
  type PanelSpec,
  type PanelSummary,
  type ValidationReport,
} from "../shared/types";
import { getConfig } from "./config";
import {
  describeError,
  invalidArgument,
  notFound,
  duplicate,
  removalInProgress,
  type LayoutError,
  type Result,
} from "./errors";
import {
  LeafNode,
  SplitNode,
  clampMinSize,
  dumpTree,
  findNeighbor,
  findNode,
  findRightmostLeaf,
  getAllLeaves,
  otherSlot,
  parentOf,
  slotOf,
  type DockNode,
  type Slot,
} from "./layout";
import { decodeLayout, encodeLayout } from "./layout-codec";
import { loadLayoutFile, saveLayoutFile } from "./layout-file";
import { validateLayout } from "./layout-validator";
import { createLogger, type Logger } from "./log";
import { PanelRegistry } from "./panel-registry";

export type MutationResult = Result<{ events: LayoutEvent[] }>;

export type LayoutListener = (event: LayoutEvent) => void;

export interface DockManagerOptions {
  minPanelSize?: number;
  logger?: Logger;
  /** Refuse to write a layout file that fails validation */
  strictSave?: boolean;
}

const GENERATED_ID = /^node_(\d+)$/;

function fail(error: LayoutError): MutationResult {
  return { ok: false, error };
}

export class DockManager {
  private tree: DockNode | null = null;
  private registry = new PanelRegistry();
  private listeners = new Set<LayoutListener>();
  private removing = new Set<string>();
  private nodeIdCounter = 0;
  private _minPanelSize: number;
  private strictSave: boolean;
  private log: Logger;

  constructor(opts: DockManagerOptions = {}) {
    this._minPanelSize = clampMinSize(opts.minPanelSize ?? getConfig().minPanelSize);
    this.strictSave = opts.strictSave ?? getConfig().strictSave;
    this.log = opts.logger ?? createLogger("dock");
  }

  get root(): DockNode | null {
    return this.tree;
  }

  get panelCount(): number {
    return this.registry.size;
  }

  get minPanelSize(): number {
    return this._minPanelSize;
  }

  /** Subscribe to change events. Returns an unsubscribe function. */
  onEvent(listener: LayoutListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // --- Lookup ---

  findPanel(panelId: string): LeafNode | undefined {
    return this.registry.get(panelId);
  }

  findNode(id: string): DockNode | null {
    return this.registry.get(id) ?? findNode(this.tree, id);
  }

  listPanels(): PanelSummary[] {
    return getAllLeaves(this.tree).map((leaf) => ({
      id: leaf.id,
      title: leaf.title,
      contentRef: leaf.contentRef,
      minSize: leaf.minSize,
      closable: leaf.closable,
    }));
  }

  neighborOf(panelId: string, direction: string): string | null {
    const dir = parseDirection(direction);
    return dir ? findNeighbor(this.tree, panelId, dir) : null;
  }

  dumpTree(): string {
    return dumpTree(this.tree);
  }

  validate(): ValidationReport {
    return validateLayout(this.tree);
  }

  // --- Insert ---

  /** Add a panel beside the rightmost panel, or as the root of an empty tree */
  addPanel(spec: PanelSpec, direction: string = "right"): MutationResult {
    return this.insert(this.buildLeaf(spec), undefined, direction);
  }

  addPanelAt(spec: PanelSpec, targetId: string, direction: string): MutationResult {
    return this.insert(this.buildLeaf(spec), targetId, direction);
  }

  /** Add a panel under a freshly generated id */
  createPanel(title: string, contentRef = ""): Result<{ panelId: string; events: LayoutEvent[] }> {
    const panelId = this.nextNodeId();
    const result = this.addPanel({ id: panelId, title, contentRef });
    return result.ok ? { ok: true, panelId, events: result.events } : result;
  }

  /**
   * Insert `leaf` beside the node `targetId` (any leaf or split). Without a
   * target the leaf becomes the root of an empty tree, or the sibling of the
   * rightmost panel.
   */
  insert(leaf: LeafNode, targetId?: string, direction: string = "right"): MutationResult {
    if (leaf.id === "") {
      return fail(invalidArgument("Panel id must not be empty"));
    }
    if (this.idInUse(leaf.id)) {
      this.log.error("Duplicate panel id", { panelId: leaf.id });
      return fail(duplicate(leaf.id));
    }
    const dir = parseDirection(direction);
    if (!dir) {
      return fail(invalidArgument(`Invalid direction: ${direction}`, { direction }));
    }

    if (targetId === undefined && !this.tree) {
      this.tree = leaf;
      this.registry.register(leaf);
      this.log.info("Panel set as root", { panelId: leaf.id });
      return this.commit([
        { type: "root_changed" },
        { type: "panel_count_changed", count: this.registry.size },
        { type: "panel_added", panelId: leaf.id },
        { type: "layout_changed" },
      ]);
    }

    const target = targetId === undefined ? findRightmostLeaf(this.tree) : this.findNode(targetId);
    if (!target) {
      this.log.error("Target panel not found", { targetId: targetId ?? "(rightmost)" });
      return fail(notFound(targetId ?? "(rightmost panel)"));
    }

    let attachment: { parent: SplitNode; slot: Slot } | null = null;
    if (target !== this.tree) {
      const parent = parentOf(target);
      const slot = parent && slotOf(parent, target);
      if (!parent || !slot) {
        this.log.error("Target has no valid parent split", { targetId: target.id });
        return fail(invalidArgument(`Node ${target.id} is detached from the tree`, { id: target.id }));
      }
      attachment = { parent, slot };
    }

    const orientation: Orientation = dir === "left" || dir === "right" ? "vertical" : "horizontal";
    const leafSlot: Slot = dir === "left" || dir === "top" ? "first" : "second";
    const split = new SplitNode(this.nextNodeId(leaf.id), orientation, { minSize: this._minPanelSize });

    if (attachment) {
      attachment.parent.takeChild(attachment.slot);
      split.setChild(otherSlot(leafSlot), target);
      split.setChild(leafSlot, leaf);
      attachment.parent.setChild(attachment.slot, split);
    } else {
      split.setChild(otherSlot(leafSlot), target);
      split.setChild(leafSlot, leaf);
      this.tree = split;
    }

    this.registry.register(leaf);
    this.log.info("Panel added", { panelId: leaf.id, target: target.id, direction: dir });

    const events: LayoutEvent[] = [];
    if (!attachment) events.push({ type: "root_changed" });
    events.push(
      { type: "panel_count_changed", count: this.registry.size },
      { type: "panel_added", panelId: leaf.id },
      { type: "layout_changed" },
    );
    return this.commit(events);
  }

  // --- Remove ---

  /**
   * Remove a panel and promote its sibling into the parent split's place.
   * A nested call for an id that is already being removed is rejected.
   */
  remove(panelId: string): MutationResult {
    if (this.removing.has(panelId)) {
      this.log.debug("Panel removal already in progress, ignoring", { panelId });
      return fail(removalInProgress(panelId));
    }

    const leaf = this.registry.get(panelId);
    if (!leaf) {
      this.log.error("Panel not found", { panelId });
      return fail(notFound(panelId));
    }

    this.removing.add(panelId);
    try {
      const previousRoot = this.tree;

      if (leaf === this.tree) {
        this.tree = null;
      } else {
        const parent = parentOf(leaf);
        const slot = parent && slotOf(parent, leaf);
        const sibling = parent && slot ? parent.child(otherSlot(slot)) : null;
        if (!parent || !slot || !sibling) {
          this.log.error("Panel has no valid parent split", { panelId });
          return fail(invalidArgument(`Panel ${panelId} is detached from the tree`, { id: panelId }));
        }

        let grandSlot: Slot | null = null;
        const grandParent = parent === this.tree ? null : parentOf(parent);
        if (parent !== this.tree) {
          grandSlot = grandParent && slotOf(grandParent, parent);
          if (!grandParent || !grandSlot) {
            this.log.error("Parent split has no grandparent", { panelId, parentId: parent.id });
            return fail(invalidArgument(`Split ${parent.id} is detached from the tree`, { id: parent.id }));
          }
        }

        parent.takeChild(otherSlot(slot));
        parent.takeChild(slot);
        if (grandParent && grandSlot) {
          grandParent.setChild(grandSlot, sibling);
        } else {
          this.tree = sibling;
        }
      }

      this.registry.unregister(panelId);
      this.log.info("Panel removed", { panelId, panelCount: this.registry.size });

      const events: LayoutEvent[] = [];
      if (this.tree !== previousRoot) events.push({ type: "root_changed" });
      events.push(
        { type: "panel_count_changed", count: this.registry.size },
        { type: "panel_removed", panelId },
        { type: "layout_changed" },
      );
      return this.commit(events);
    } finally {
      this.removing.delete(panelId);
    }
  }

  // --- Attributes ---

  updateSplitRatio(splitId: string, ratio: number): MutationResult {
    const node = findNode(this.tree, splitId);
    if (!node || node.kind !== "split") {
      return fail(notFound(splitId));
    }
    if (Number.isNaN(ratio)) {
      return fail(invalidArgument("Split ratio must be a number", { splitId }));
    }
    node.ratio = ratio;
    return this.commit([
      { type: "ratio_changed", splitId, ratio: node.ratio },
      { type: "layout_changed" },
    ]);
  }

  setMinPanelSize(size: number): MutationResult {
    const clamped = clampMinSize(size);
    if (clamped === this._minPanelSize) return { ok: true, events: [] };
    this._minPanelSize = clamped;
    return this.commit([{ type: "min_panel_size_changed", minPanelSize: clamped }]);
  }

  clear(): MutationResult {
    this.tree = null;
    this.registry.clear();
    this.log.info("Layout cleared");
    return this.commit([
      { type: "layout_cleared" },
      { type: "root_changed" },
      { type: "panel_count_changed", count: 0 },
      { type: "layout_changed" },
    ]);
  }

  // --- Persistence ---

  save(): LayoutDocument {
    return encodeLayout(this.tree, this._minPanelSize);
  }

  /** Replace the whole layout. A rejected document leaves the current tree untouched. */
  load(document: unknown): MutationResult {
    const decoded = decodeLayout(document);
    if (!decoded.ok) {
      this.log.warn("Layout rejected", { code: decoded.error.code, reason: decoded.error.message });
      return decoded;
    }

    const minSizeChanged = decoded.minPanelSize !== this._minPanelSize;
    this.tree = decoded.root;
    this.registry = decoded.registry;
    this._minPanelSize = decoded.minPanelSize;
    this.bumpNodeIdCounter(decoded.root);
    this.log.info("Layout loaded", { panelCount: this.registry.size });

    const events: LayoutEvent[] = [{ type: "layout_loaded" }];
    if (minSizeChanged) events.push({ type: "min_panel_size_changed", minPanelSize: this._minPanelSize });
    events.push(
      { type: "root_changed" },
      { type: "panel_count_changed", count: this.registry.size },
      { type: "layout_changed" },
    );
    return this.commit(events);
  }

  saveToFile(path: string): Result<{ bytes: number }> {
    if (this.strictSave) {
      const report = validateLayout(this.tree);
      if (!report.isValid) {
        this.log.error("Refusing to save invalid layout", { path, reason: report.errors[0] });
        return { ok: false, error: invalidArgument(`Layout is invalid: ${report.errors.join("; ")}`, { path }) };
      }
    }
    const result = saveLayoutFile(path, this.save());
    if (result.ok) {
      this.log.info("Layout saved to file", { path, panelCount: this.registry.size });
    } else {
      this.log.error("Failed to write layout to file", { path, reason: result.error.message });
    }
    return result;
  }

  loadFromFile(path: string): MutationResult {
    const file = loadLayoutFile(path);
    if (!file.ok) {
      this.log.error("Failed to read layout file", { path, reason: file.error.message });
      return file;
    }
    return this.load(file.document);
  }

  // --- Private helpers ---

  private buildLeaf(spec: PanelSpec): LeafNode {
    return new LeafNode(spec.id, {
      title: spec.title,
      contentRef: spec.contentRef,
      minSize: spec.minSize ?? this._minPanelSize,
      closable: spec.closable,
    });
  }

  private idInUse(id: string): boolean {
    return this.registry.has(id) || findNode(this.tree, id) !== null;
  }

  /** Generate `node_<n>`, skipping ids already in the tree and any `reserved` id */
  private nextNodeId(reserved?: string): string {
    let id: string;
    do {
      id = `node_${++this.nodeIdCounter}`;
    } while (id === reserved || this.idInUse(id));
    return id;
  }

  private bumpNodeIdCounter(node: DockNode | null): void {
    if (!node) return;
    const match = GENERATED_ID.exec(node.id);
    if (match) this.nodeIdCounter = Math.max(this.nodeIdCounter, Number(match[1]));
    if (node.kind === "split") {
      this.bumpNodeIdCounter(node.first);
      this.bumpNodeIdCounter(node.second);
    }
  }

  /** Deliver events in order once the structure is final */
  private commit(events: LayoutEvent[]): MutationResult {
    for (const event of events) {
      for (const listener of [...this.listeners]) {
        try {
          listener(event);
        } catch (err) {
          this.log.warn("Layout listener failed", { event: event.type, error: describeError(err) });
        }
      }
    }
    return { ok: true, events };
  }
}
