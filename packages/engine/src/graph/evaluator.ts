/**
 * Evaluator: the call protocol
 *
 * Resolves an identity to a value:
 *   1. Identity already on the evaluation stack → CycleError.
 *   2. Caller given → the read joins the caller's discovered dependencies.
 *   3. Active override → override value; cache untouched.
 *   4. Valid cache entry → cached value.
 *   5. Miss → push a frame, run the node body, then commit the discovered
 *      dependencies and the value, in that order, and pop.
 *
 * A body that throws writes no cache value, but the reads it made before
 * failing are added to the identity's edges and the failure is recorded in
 * the store. A reader that caught the error still hears about later changes
 * to those reads. The frame is popped either way, so the stack is empty
 * again between top-level calls.
 *
 * Node bodies re-enter through their EvaluationContext, which always passes
 * the identity it was created for as the caller.
 */

import { createIdentity, type IdentityKey, type NodeIdentity } from "../model/identity.js";
import { formatIdentity } from "../model/format.js";
import { nodeKindOf, type EvaluationContext } from "../model/node.js";
import { debug, isDebugEnabled } from "../shared/debug.js";
import { CycleError, ExpiredContextError } from "../shared/errors.js";
import { EngineAttributes, type EngineTrace } from "../shared/trace.js";
import type { DependencyGraph } from "./dependencies.js";
import type { NodeRegistry } from "./registry.js";
import type { ValueStore } from "./store.js";

export interface Evaluator {
  /** `caller` is null for top-level requests. */
  evaluate(identity: NodeIdentity, caller: NodeIdentity | null): unknown;
  /** Identities currently being computed, outermost first. */
  stack(): readonly NodeIdentity[];
}

export interface EvaluatorParts {
  readonly registry: NodeRegistry;
  readonly store: ValueStore;
  readonly graph: DependencyGraph;
  readonly trace: EngineTrace;
}

interface Frame {
  readonly identity: NodeIdentity;
  /** Reads made by this computation so far, in first-read order. */
  readonly discovered: Map<IdentityKey, NodeIdentity>;
}

export function createEvaluator({ registry, store, graph, trace }: EvaluatorParts): Evaluator {
  const frames: Frame[] = [];

  function topFrame(): Frame | undefined {
    return frames[frames.length - 1];
  }

  function recordRead(identity: NodeIdentity, caller: NodeIdentity): void {
    const frame = topFrame();
    // Contexts are only valid while their own computation is innermost.
    if (!frame || frame.identity.key !== caller.key) {
      throw new ExpiredContextError(caller);
    }
    frame.discovered.set(identity.key, identity);
  }

  function cycleFrom(identity: NodeIdentity): CycleError {
    const start = frames.findIndex((frame) => frame.identity.key === identity.key);
    const cycle = frames.slice(start).map((frame) => frame.identity);
    cycle.push(identity);
    return new CycleError(cycle);
  }

  function evaluate(identity: NodeIdentity, caller: NodeIdentity | null): unknown {
    if (frames.some((frame) => frame.identity.key === identity.key)) {
      throw cycleFrom(identity);
    }

    if (caller !== null) recordRead(identity, caller);

    const override = store.getOverride(identity);
    if (override.active) {
      trace.event("override.hit", { [EngineAttributes.IDENTITY]: formatIdentity(identity) });
      return override.value;
    }

    const cached = store.getCache(identity);
    if (cached.valid) {
      trace.event("cache.hit", { [EngineAttributes.IDENTITY]: formatIdentity(identity) });
      return cached.value;
    }

    return recompute(identity);
  }

  function recompute(identity: NodeIdentity): unknown {
    const node = registry.lookup(identity.name);
    const label = formatIdentity(identity);
    const frame: Frame = { identity, discovered: new Map() };

    const ctx: EvaluationContext = {
      identity,
      evaluate: (name, ...args) => evaluate(createIdentity(name, args), identity),
    };

    frames.push(frame);
    let value: unknown;
    try {
      value = trace.span(`evaluate:${label}`, () => {
        trace.setAttributes({
          [EngineAttributes.IDENTITY]: label,
          [EngineAttributes.NODE]: node.name,
          [EngineAttributes.KIND]: nodeKindOf(node),
        });
        const result = node.compute(ctx, ...identity.args);
        trace.setAttribute(EngineAttributes.DEPENDENCY_COUNT, frame.discovered.size);
        return result;
      });
    } catch (error) {
      graph.replaceDeps(identity, [...graph.dependenciesOf(identity), ...frame.discovered.values()]);
      store.markFailed(identity);
      if (isDebugEnabled("evaluate")) {
        debug.evaluate("failed", {
          identity: label,
          deps: [...frame.discovered.values()].map(formatIdentity),
        });
      }
      throw error;
    } finally {
      frames.pop();
    }

    graph.replaceDeps(identity, frame.discovered.values());
    store.setCache(identity, value);
    if (isDebugEnabled("evaluate")) {
      debug.evaluate("recompute", {
        identity: label,
        deps: [...frame.discovered.values()].map(formatIdentity),
        depth: frames.length,
      });
    }
    return value;
  }

  return {
    evaluate,
    stack: () => frames.map((frame) => frame.identity),
  };
}
