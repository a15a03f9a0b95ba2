import type { ArgValue } from "../model/identity.js";
import type { EvaluationContext, GraphNode } from "../model/node.js";

/**
 * Calculation body. Reads other identities through `ctx.evaluate`; the
 * engine caches the result per argument tuple.
 */
export type CalculationBody<T = unknown> = (ctx: EvaluationContext, ...args: ArgValue[]) => T;

export class CalculatedNode<T = unknown> implements GraphNode {
  readonly kind = "calculated";

  constructor(
    public readonly name: string,
    private readonly body: CalculationBody<T>,
  ) {}

  compute(ctx: EvaluationContext, ...args: ArgValue[]): T {
    return this.body(ctx, ...args);
  }
}
