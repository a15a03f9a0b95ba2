/**
 * Node Registry
 *
 * Owns the name → node mapping for one graph. One definition per name, for
 * the lifetime of the graph; there is no unregister.
 */

import { nodeKindOf, type GraphNode } from "../model/node.js";
import { debug } from "../shared/debug.js";
import { DuplicateNameError, InvalidArgumentError, UnknownNodeError } from "../shared/errors.js";

export interface NodeRegistry {
  register(node: GraphNode): void;
  /** Throws UnknownNodeError when absent. */
  lookup(name: string): GraphNode;
  has(name: string): boolean;
  names(): readonly string[];
  readonly size: number;
}

export function createNodeRegistry(): NodeRegistry {
  const nodes = new Map<string, GraphNode>();

  return {
    register(node: GraphNode): void {
      const name = node.name;
      if (typeof name !== "string" || name.length === 0) {
        throw new InvalidArgumentError("Node name must be a non-empty string", String(name));
      }
      if (nodes.has(name)) {
        throw new DuplicateNameError(name);
      }
      nodes.set(name, node);
      debug.registry("register", { name, kind: nodeKindOf(node) });
    },

    lookup(name: string): GraphNode {
      const node = nodes.get(name);
      if (!node) throw new UnknownNodeError(name);
      return node;
    },

    has(name: string): boolean {
      return nodes.has(name);
    },

    names(): readonly string[] {
      return [...nodes.keys()];
    },

    get size() {
      return nodes.size;
    },
  };
}
