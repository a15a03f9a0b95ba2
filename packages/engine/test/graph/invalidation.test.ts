/**
 * Invalidation engine in isolation: a hand-built store and edge set, no
 * evaluator involved.
 */
import { describe, expect, it } from "vitest";
import { createDependencyGraph } from "../../src/graph/dependencies.js";
import { invalidateTransitively } from "../../src/graph/invalidation.js";
import { createValueStore } from "../../src/graph/store.js";
import { createIdentity, type NodeIdentity } from "../../src/model/identity.js";
import { formatIdentity } from "../../src/model/format.js";

const id = (name: string) => createIdentity(name);
const names = (identities: readonly NodeIdentity[]) => identities.map(formatIdentity);

/** Build a store where every listed identity is fresh, plus the given edges. */
function setup(edges: Record<string, string[]>) {
  const store = createValueStore({ onEffectiveChange: () => {} });
  const graph = createDependencyGraph();
  for (const [reader, deps] of Object.entries(edges)) {
    graph.replaceDeps(id(reader), deps.map(id));
    store.setCache(id(reader), reader);
    for (const dep of deps) store.setCache(id(dep), dep);
  }
  return { store, graph };
}

describe("invalidateTransitively", () => {
  it("marks the root and every transitive reader stale", () => {
    const { store, graph } = setup({ b: ["a"], c: ["b"] });
    const stale = invalidateTransitively(id("a"), store, graph);

    expect(names(stale)).toEqual(["a", "b", "c"]);
    expect(store.freshness(id("c"))).toBe("stale");
  });

  it("leaves unrelated identities fresh", () => {
    const { store, graph } = setup({ b: ["a"], y: ["x"] });
    invalidateTransitively(id("a"), store, graph);

    expect(store.freshness(id("x"))).toBe("fresh");
    expect(store.freshness(id("y"))).toBe("fresh");
  });

  it("visits a diamond's join once", () => {
    const { store, graph } = setup({ left: ["top"], right: ["top"], bottom: ["left", "right"] });
    const stale = invalidateTransitively(id("top"), store, graph);

    expect(names(stale).sort()).toEqual(["bottom", "left", "right", "top"]);
    expect(stale).toHaveLength(4);
  });

  it("is idempotent", () => {
    const { store, graph } = setup({ b: ["a"], c: ["a", "b"] });
    invalidateTransitively(id("a"), store, graph);
    const snapshot = ["a", "b", "c"].map((n) => store.freshness(id(n)));

    const second = invalidateTransitively(id("a"), store, graph);

    expect(second).toEqual([]);
    expect(["a", "b", "c"].map((n) => store.freshness(id(n)))).toEqual(snapshot);
    expect(graph.edgeCount).toBe(3);
  });

  it("expands the root even when its own cache is already stale", () => {
    const { store, graph } = setup({ b: ["a"] });
    store.invalidate(id("a"));

    expect(names(invalidateTransitively(id("a"), store, graph))).toEqual(["b"]);
  });

  it("expands a stale identity whose last recomputation failed, once", () => {
    const { store, graph } = setup({ x: ["v"], d: ["x"] });
    store.invalidate(id("x"));
    store.markFailed(id("x"));

    expect(names(invalidateTransitively(id("v"), store, graph))).toEqual(["v", "d"]);
    expect(store.freshness(id("d"))).toBe("stale");

    store.setCache(id("d"), "d");
    expect(invalidateTransitively(id("v"), store, graph)).toEqual([]);
    expect(store.freshness(id("d"))).toBe("fresh");
  });

  it("stops at overridden identities below the root", () => {
    const { store, graph } = setup({ m: ["u"], top: ["m"] });
    store.setOverride(id("m"), 50);

    const stale = invalidateTransitively(id("u"), store, graph);

    expect(names(stale)).toEqual(["u", "m"]);
    expect(store.freshness(id("top"))).toBe("fresh");
  });

  it("propagates from an overridden root", () => {
    const { store, graph } = setup({ top: ["m"] });
    store.setOverride(id("m"), 50);

    expect(names(invalidateTransitively(id("m"), store, graph))).toEqual(["m", "top"]);
  });
});
