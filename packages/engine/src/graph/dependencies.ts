/**
 * Dependency Graph
 *
 * Forward edges: identity → identities it read during its last successful
 * computation. Reverse edges: identity → identities that read it.
 *
 * Edges are never declared. They are replaced wholesale after each successful
 * recomputation, so a node whose branch changed drops the edges it no longer
 * follows; a failed recomputation only adds the reads it made. `dependents` is
 * always exactly the inverse of `deps`.
 */

import type { IdentityKey, NodeIdentity } from "../model/identity.js";

export interface DependencyGraph {
  /** Replace the recorded reads of `identity` and patch the reverse edges. */
  replaceDeps(identity: NodeIdentity, next: Iterable<NodeIdentity>): void;
  dependenciesOf(identity: NodeIdentity): readonly NodeIdentity[];
  dependentsOf(identity: NodeIdentity): readonly NodeIdentity[];
  readonly edgeCount: number;
}

export function createDependencyGraph(): DependencyGraph {
  const deps = new Map<IdentityKey, Set<IdentityKey>>();
  const dependents = new Map<IdentityKey, Set<IdentityKey>>();
  // Every identity that appears on either side of an edge.
  const known = new Map<IdentityKey, NodeIdentity>();
  let totalEdges = 0;

  function resolve(keys: Set<IdentityKey> | undefined): readonly NodeIdentity[] {
    if (!keys) return [];
    const result: NodeIdentity[] = [];
    for (const key of keys) {
      const identity = known.get(key);
      if (identity) result.push(identity);
    }
    return result;
  }

  function replaceDeps(identity: NodeIdentity, next: Iterable<NodeIdentity>): void {
    const oldSet = deps.get(identity.key) ?? new Set<IdentityKey>();
    const newSet = new Set<IdentityKey>();
    for (const dep of next) {
      known.set(dep.key, dep);
      newSet.add(dep.key);
    }
    known.set(identity.key, identity);

    for (const key of oldSet) {
      if (newSet.has(key)) continue;
      const readers = dependents.get(key);
      if (readers) {
        readers.delete(identity.key);
        if (readers.size === 0) dependents.delete(key);
      }
      totalEdges--;
    }

    for (const key of newSet) {
      if (oldSet.has(key)) continue;
      let readers = dependents.get(key);
      if (!readers) { readers = new Set(); dependents.set(key, readers); }
      readers.add(identity.key);
      totalEdges++;
    }

    if (newSet.size === 0) {
      deps.delete(identity.key);
    } else {
      deps.set(identity.key, newSet);
    }
  }

  return {
    replaceDeps,
    dependenciesOf: (identity) => resolve(deps.get(identity.key)),
    dependentsOf: (identity) => resolve(dependents.get(identity.key)),
    get edgeCount() { return totalEdges; },
  };
}
