import type { ArgValue } from "../model/identity.js";
import type { EvaluationContext, GraphNode } from "../model/node.js";

/** A node with a fixed value. Arguments are accepted and ignored. */
export class ConstantNode<T = unknown> implements GraphNode {
  readonly kind = "constant";

  constructor(
    public readonly name: string,
    public readonly value: T,
  ) {}

  compute(_ctx: EvaluationContext, ..._args: ArgValue[]): T {
    return this.value;
  }
}
