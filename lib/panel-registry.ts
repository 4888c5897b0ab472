import type { LeafNode } from "./layout";

/** Panel id → leaf lookup, maintained incrementally alongside the tree */
export class PanelRegistry {
  private panels = new Map<string, LeafNode>();

  get size(): number {
    return this.panels.size;
  }

  register(leaf: LeafNode): void {
    if (this.panels.has(leaf.id)) {
      throw new Error(`Panel "${leaf.id}" already registered`);
    }
    this.panels.set(leaf.id, leaf);
  }

  unregister(id: string): boolean {
    return this.panels.delete(id);
  }

  get(id: string): LeafNode | undefined {
    return this.panels.get(id);
  }

  has(id: string): boolean {
    return this.panels.has(id);
  }

  ids(): string[] {
    return [...this.panels.keys()];
  }

  clear(): void {
    this.panels.clear();
  }
}
