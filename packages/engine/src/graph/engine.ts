/**
 * CalcGraph: the public engine surface
 *
 * One instance owns one registry, one value/override store, one dependency
 * graph and one evaluation stack. Nothing is shared between instances.
 *
 * Mutations (setValue, override, removeOverride, invalidate) only mark
 * identities stale; values are recomputed the next time they are read.
 */

import { createIdentity, type ArgValue, type NodeIdentity } from "../model/identity.js";
import { formatIdentity } from "../model/format.js";
import { nodeKindOf, type GraphNode } from "../model/node.js";
import { isVariableNode } from "../nodes/variable.js";
import { debug } from "../shared/debug.js";
import { InvalidArgumentError, NotVariableError, ReentrantMutationError } from "../shared/errors.js";
import { EngineAttributes, NOOP_TRACE, type EngineTrace } from "../shared/trace.js";
import { createDependencyGraph } from "./dependencies.js";
import { createEvaluator } from "./evaluator.js";
import { invalidateTransitively } from "./invalidation.js";
import { createNodeRegistry } from "./registry.js";
import { createValueStore, type Freshness } from "./store.js";

// =============================================================================
// Types
// =============================================================================

export interface CalcGraphOptions {
  /** Spans per recomputation, events per cache/override hit. Default: NOOP_TRACE */
  trace?: EngineTrace;
}

/** `[value]` targets the argument-less identity, `[args, value]` a parameterized one. */
export type OverrideParams = [value: unknown] | [args: readonly ArgValue[], value: unknown];

export interface IdentityState {
  readonly identity: NodeIdentity;
  readonly freshness: Freshness;
  readonly overridden: boolean;
  /** Override value when overridden, cached value when fresh, otherwise undefined. */
  readonly value: unknown;
}

/**
 * When identities become stale, the caller decides WHEN to pull.
 * The graph only reports WHAT went stale.
 */
export interface StalenessHandler {
  onNodesStale(identities: readonly NodeIdentity[]): void;
}

export interface CalcGraph {
  // --- Definition ---

  /** Throws DuplicateNameError when the name is taken. */
  register(node: GraphNode): void;
  has(name: string): boolean;
  /** Throws UnknownNodeError when absent. */
  getNode(name: string): GraphNode;

  // --- Evaluation ---

  /** Top-level read: no caller, so no dependency edge is recorded. */
  evaluate(name: string, ...args: ArgValue[]): unknown;

  // --- Mutation ---

  /** Variables only; throws NotVariableError otherwise. */
  setValue(name: string, value: unknown): void;
  override(name: string, ...params: OverrideParams): void;
  /** Returns false when no override was active (nothing is invalidated then). */
  removeOverride(name: string, ...args: ArgValue[]): boolean;
  /** Marks the identity and its transitive readers stale; returns those that were fresh. */
  invalidate(name: string, ...args: ArgValue[]): readonly NodeIdentity[];

  // --- Observation ---

  getState(name: string, ...args: ArgValue[]): IdentityState;
  dependenciesOf(name: string, ...args: ArgValue[]): readonly NodeIdentity[];
  dependentsOf(name: string, ...args: ArgValue[]): readonly NodeIdentity[];
  /** Snapshot of the evaluation stack, outermost first. Empty between calls. */
  activeEvaluations(): readonly NodeIdentity[];
  readonly nodeCount: number;
  /** Identities with a cache entry (fresh or stale). */
  readonly identityCount: number;
  readonly edgeCount: number;
  readonly staleCount: number;

  // --- Lifecycle ---

  onStale(handler: StalenessHandler): void;
}

// =============================================================================
// Implementation
// =============================================================================

export function createCalcGraph(options: CalcGraphOptions = {}): CalcGraph {
  const trace = options.trace ?? NOOP_TRACE;
  const registry = createNodeRegistry();
  const graph = createDependencyGraph();
  const store = createValueStore({
    onEffectiveChange: (identity) => propagate(identity),
  });
  const evaluator = createEvaluator({ registry, store, graph, trace });
  let staleHandler: StalenessHandler | null = null;

  function propagate(root: NodeIdentity): readonly NodeIdentity[] {
    const stale = invalidateTransitively(root, store, graph);
    trace.event("invalidate", {
      [EngineAttributes.IDENTITY]: formatIdentity(root),
      [EngineAttributes.STALE_COUNT]: stale.length,
    });
    debug.invalidate("propagate", {
      root: formatIdentity(root),
      stale: stale.map(formatIdentity),
    });
    if (stale.length > 0 && staleHandler) {
      staleHandler.onNodesStale(stale);
    }
    return stale;
  }

  function assertIdle(operation: string): void {
    const active = evaluator.stack()[0];
    if (active) throw new ReentrantMutationError(operation, active);
  }

  /** Overrides address registered nodes only; variables stay unparameterized. */
  function overridable(name: string, args: readonly ArgValue[]): NodeIdentity {
    const node = registry.lookup(name);
    if (isVariableNode(node) && args.length > 0) {
      throw new InvalidArgumentError(`Variable "${name}" takes no arguments (got ${args.length})`, name);
    }
    return createIdentity(name, args);
  }

  return {
    register: (node) => registry.register(node),
    has: (name) => registry.has(name),
    getNode: (name) => registry.lookup(name),

    evaluate(name: string, ...args: ArgValue[]): unknown {
      return evaluator.evaluate(createIdentity(name, args), null);
    },

    setValue(name: string, value: unknown): void {
      assertIdle("setValue");
      const node = registry.lookup(name);
      if (!isVariableNode(node)) {
        throw new NotVariableError(name, nodeKindOf(node));
      }
      node.set(value);
      propagate(createIdentity(name));
    },

    override(name: string, ...params: OverrideParams): void {
      assertIdle("override");
      const [args, value]: [readonly ArgValue[], unknown] = params.length === 1 ? [[], params[0]] : params;
      const identity = overridable(name, args);
      debug.override("set", { identity: formatIdentity(identity) });
      store.setOverride(identity, value);
    },

    removeOverride(name: string, ...args: ArgValue[]): boolean {
      assertIdle("removeOverride");
      const identity = overridable(name, args);
      const removed = store.clearOverride(identity);
      debug.override("remove", { identity: formatIdentity(identity), removed });
      return removed;
    },

    invalidate(name: string, ...args: ArgValue[]): readonly NodeIdentity[] {
      assertIdle("invalidate");
      return propagate(createIdentity(name, args));
    },

    getState(name: string, ...args: ArgValue[]): IdentityState {
      const identity = createIdentity(name, args);
      const override = store.getOverride(identity);
      const freshness = store.freshness(identity);
      return {
        identity,
        freshness,
        overridden: override.active,
        value: override.active ? override.value : store.getCache(identity).value,
      };
    },

    dependenciesOf: (name, ...args) => graph.dependenciesOf(createIdentity(name, args)),
    dependentsOf: (name, ...args) => graph.dependentsOf(createIdentity(name, args)),
    activeEvaluations: () => evaluator.stack(),

    get nodeCount() { return registry.size; },
    get identityCount() { return store.entryCount; },
    get edgeCount() { return graph.edgeCount; },
    get staleCount() { return store.staleCount; },

    onStale(handler: StalenessHandler): void {
      staleHandler = handler;
    },
  };
}
