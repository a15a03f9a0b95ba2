/**
 * Invalidation Engine
 *
 * Push invalidation, pull recomputation: marking an identity stale walks the
 * reverse edges and marks every transitive reader stale. Nothing is
 * recomputed here.
 *
 * Each identity is visited at most once per pass, so diamonds terminate and a
 * repeated call on an already-stale root changes nothing. An already-stale
 * identity is not expanded again, unless its last recomputation failed: a
 * reader may have caught that failure and committed a value since.
 *
 * An overridden identity reached during the walk has its own cache marked
 * stale, but the walk does not continue past it: its readers see the override,
 * which has not changed. The root is always expanded, since callers invalidate
 * a root precisely because the value it presents changed.
 */

import type { IdentityKey, NodeIdentity } from "../model/identity.js";
import type { DependencyGraph } from "./dependencies.js";
import type { ValueStore } from "./store.js";

/** Returns the identities whose cached value went from valid to stale. */
export function invalidateTransitively(
  root: NodeIdentity,
  store: ValueStore,
  graph: DependencyGraph,
): readonly NodeIdentity[] {
  const stale: NodeIdentity[] = [];
  const visited = new Set<IdentityKey>([root.key]);

  if (store.invalidate(root)) stale.push(root);
  store.clearFailure(root);

  const pending: NodeIdentity[] = [...graph.dependentsOf(root)];
  for (let current = pending.pop(); current !== undefined; current = pending.pop()) {
    if (visited.has(current.key)) continue;
    visited.add(current.key);

    if (store.invalidate(current)) {
      stale.push(current);
    } else if (!store.clearFailure(current)) {
      // Already stale: its readers were reached when it went stale.
      continue;
    }

    if (store.getOverride(current).active) continue;
    for (const reader of graph.dependentsOf(current)) pending.push(reader);
  }

  return stale;
}
