import { describe, it, expect } from "vitest";
import { LeafNode } from "./layout";
import { PanelRegistry } from "./panel-registry";

describe("PanelRegistry", () => {
  it("registers and looks up leaves", () => {
    const registry = new PanelRegistry();
    const leaf = new LeafNode("p1");
    registry.register(leaf);
    expect(registry.get("p1")).toBe(leaf);
    expect(registry.has("p1")).toBe(true);
    expect(registry.size).toBe(1);
    expect(registry.ids()).toEqual(["p1"]);
  });

  it("rejects a second leaf with the same id", () => {
    const registry = new PanelRegistry();
    registry.register(new LeafNode("p1"));
    expect(() => registry.register(new LeafNode("p1"))).toThrow('Panel "p1" already registered');
  });

  it("unregisters and clears", () => {
    const registry = new PanelRegistry();
    registry.register(new LeafNode("p1"));
    registry.register(new LeafNode("p2"));
    expect(registry.unregister("p1")).toBe(true);
    expect(registry.unregister("p1")).toBe(false);
    expect(registry.get("p1")).toBeUndefined();
    registry.clear();
    expect(registry.size).toBe(0);
  });
});
