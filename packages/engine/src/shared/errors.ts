/* =============================================================================
 * ENGINE ERRORS
 * -----------------------------------------------------------------------------
 * Every failure the engine raises on its own account. Errors thrown from a
 * node body are never wrapped: they reach the caller of evaluate() unchanged.
 * ============================================================================= */

import type { NodeIdentity } from "../model/identity.js";
import { formatIdentity } from "../model/format.js";

/** Error codes */
export const CalcGraphErrorCode = {
  UNKNOWN_NODE: "CALCGRAPH_UNKNOWN_NODE",
  DUPLICATE_NAME: "CALCGRAPH_DUPLICATE_NAME",
  NOT_VARIABLE: "CALCGRAPH_NOT_VARIABLE",
  CYCLE: "CALCGRAPH_CYCLE",
  INVALID_ARGUMENT: "CALCGRAPH_INVALID_ARGUMENT",
  EXPIRED_CONTEXT: "CALCGRAPH_EXPIRED_CONTEXT",
  REENTRANT_MUTATION: "CALCGRAPH_REENTRANT_MUTATION",
} as const;

export type CalcGraphErrorCodeType = (typeof CalcGraphErrorCode)[keyof typeof CalcGraphErrorCode];

/**
 * Base class for engine errors.
 */
export class CalcGraphError extends Error {
  constructor(
    message: string,
    public readonly code: CalcGraphErrorCodeType,
  ) {
    super(message);
    this.name = "CalcGraphError";
  }
}

/** An identity names a node that was never registered. */
export class UnknownNodeError extends CalcGraphError {
  constructor(public readonly nodeName: string) {
    super(`No node named "${nodeName}" is registered`, CalcGraphErrorCode.UNKNOWN_NODE);
    this.name = "UnknownNodeError";
  }
}

export class DuplicateNameError extends CalcGraphError {
  constructor(public readonly nodeName: string) {
    super(`A node named "${nodeName}" is already registered`, CalcGraphErrorCode.DUPLICATE_NAME);
    this.name = "DuplicateNameError";
  }
}

export class NotVariableError extends CalcGraphError {
  constructor(
    public readonly nodeName: string,
    public readonly kind: string,
  ) {
    super(`Node "${nodeName}" is a ${kind} node; only variable nodes accept setValue`, CalcGraphErrorCode.NOT_VARIABLE);
    this.name = "NotVariableError";
  }
}

/**
 * An identity was requested while it was still being computed.
 * `cycle` runs from the first occurrence on the evaluation stack back to
 * the same identity, e.g. `x -> y -> x`.
 */
export class CycleError extends CalcGraphError {
  constructor(public readonly cycle: readonly NodeIdentity[]) {
    super(`Dependency cycle detected: ${cycle.map(formatIdentity).join(" -> ")}`, CalcGraphErrorCode.CYCLE);
    this.name = "CycleError";
  }
}

export class InvalidArgumentError extends CalcGraphError {
  constructor(
    message: string,
    public readonly nodeName: string,
  ) {
    super(message, CalcGraphErrorCode.INVALID_ARGUMENT);
    this.name = "InvalidArgumentError";
  }
}

/** A node body kept its evaluation context and used it after returning. */
export class ExpiredContextError extends CalcGraphError {
  constructor(public readonly identity: NodeIdentity) {
    super(
      `Evaluation context of ${formatIdentity(identity)} used after its computation finished`,
      CalcGraphErrorCode.EXPIRED_CONTEXT,
    );
    this.name = "ExpiredContextError";
  }
}

/** An input was mutated while an evaluation was in flight. */
export class ReentrantMutationError extends CalcGraphError {
  constructor(
    public readonly operation: string,
    public readonly active: NodeIdentity,
  ) {
    super(
      `${operation}() called while ${formatIdentity(active)} is being computed`,
      CalcGraphErrorCode.REENTRANT_MUTATION,
    );
    this.name = "ReentrantMutationError";
  }
}
