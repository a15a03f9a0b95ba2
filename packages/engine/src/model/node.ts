/**
 * Node capability contract
 *
 * A node is anything with a stable name and a compute() entry point. The
 * engine is opaque to what compute() does; it only records which identities
 * the body reads through its context.
 */

import type { ArgValue, NodeIdentity } from "./identity.js";

/**
 * Open enumeration. Built-in kinds are listed for completion; custom nodes
 * may report any string, or none (reported as "custom").
 */
export type NodeKind = "constant" | "variable" | "calculated" | (string & {});

/**
 * The only surface a node body sees while it computes.
 */
export interface EvaluationContext {
  /** Identity currently being computed. */
  readonly identity: NodeIdentity;

  /**
   * Read another identity on behalf of the running computation. The read is
   * recorded as a dependency of `identity`; reads in branches that do not run
   * are never recorded.
   */
  evaluate(name: string, ...args: ArgValue[]): unknown;
}

export interface GraphNode {
  readonly name: string;
  readonly kind?: NodeKind;
  compute(ctx: EvaluationContext, ...args: ArgValue[]): unknown;
}

export function nodeKindOf(node: GraphNode): NodeKind {
  return node.kind ?? "custom";
}
