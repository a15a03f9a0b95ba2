/**
 * Node Identity
 *
 * A node identity is the pair (node name, argument tuple) that addresses one
 * cached slot. Arguments belong to the cache key, not to the node definition,
 * so a single node services any number of identities.
 *
 * Identities compare through their canonical `key`: a type-tagged encoding in
 * which `1` and `"1"` differ, `0` and `-0` coincide and `NaN` equals itself.
 */

import { InvalidArgumentError } from "../shared/errors.js";
import { isArgTuple } from "./format.js";

// =============================================================================
// Argument Values
// =============================================================================

/** Values that may appear in an argument tuple. Tuples nest through arrays. */
export type ArgValue =
  | string
  | number
  | boolean
  | bigint
  | null
  | undefined
  | readonly ArgValue[];

export type NodeArgs = readonly ArgValue[];

// =============================================================================
// Identity
// =============================================================================

/** Branded string for identity comparison. */
export type IdentityKey = string & { readonly __brand: "IdentityKey" };

export interface NodeIdentity {
  readonly name: string;
  readonly args: NodeArgs;
  readonly key: IdentityKey;
}

export function createIdentity(name: string, args: readonly unknown[] = []): NodeIdentity {
  const encoded: string[] = [];
  const copy: ArgValue[] = [];
  args.forEach((arg, index) => {
    const checked = checkArg(name, arg, `${index}`);
    encoded.push(encodeArg(checked));
    copy.push(checked);
  });
  return {
    name,
    args: Object.freeze(copy),
    key: `${JSON.stringify(name)}(${encoded.join(",")})` as IdentityKey,
  };
}

export function identityKey(name: string, args: readonly unknown[] = []): IdentityKey {
  return createIdentity(name, args).key;
}

export function sameIdentity(a: NodeIdentity, b: NodeIdentity): boolean {
  return a.key === b.key;
}

// =============================================================================
// Validation & Encoding
// =============================================================================

function checkArg(name: string, value: unknown, path: string): ArgValue {
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
    case "bigint":
    case "undefined":
      return value;
  }
  if (value === null) return null;
  if (Array.isArray(value)) {
    return Object.freeze(value.map((item: unknown, i) => checkArg(name, item, `${path}.${i}`)));
  }
  throw new InvalidArgumentError(
    `Argument ${path} of "${name}" has type ${typeof value}; arguments must be primitives or arrays of primitives`,
    name,
  );
}

function encodeArg(value: ArgValue): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (isArgTuple(value)) return `[${value.map(encodeArg).join(",")}]`;
  switch (typeof value) {
    case "string":
      return `s${JSON.stringify(value)}`;
    case "number":
      // String(-0) === "0" and String(NaN) === "NaN"
      return `n${String(value)}`;
    case "boolean":
      return `b${String(value)}`;
    default:
      return `i${value.toString()}`;
  }
}
