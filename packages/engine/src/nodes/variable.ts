import type { ArgValue } from "../model/identity.js";
import type { EvaluationContext, GraphNode } from "../model/node.js";
import { InvalidArgumentError } from "../shared/errors.js";

/**
 * A node whose value is set from outside the graph through
 * `CalcGraph.setValue`. Variables are not parameterized: reading one with
 * arguments fails instead of silently dropping them.
 */
export class VariableNode<T = unknown> implements GraphNode {
  readonly kind = "variable";
  private current: T;

  constructor(
    public readonly name: string,
    initial: T,
  ) {
    this.current = initial;
  }

  get value(): T {
    return this.current;
  }

  /**
   * Replace the stored value. Does not invalidate anything by itself; go
   * through `CalcGraph.setValue` so dependents are marked stale.
   */
  set(value: T): void {
    this.current = value;
  }

  compute(_ctx: EvaluationContext, ...args: ArgValue[]): T {
    if (args.length > 0) {
      throw new InvalidArgumentError(
        `Variable "${this.name}" takes no arguments (got ${args.length})`,
        this.name,
      );
    }
    return this.current;
  }
}

export function isVariableNode(node: GraphNode): node is VariableNode {
  return node instanceof VariableNode;
}
