import type { ArgValue, NodeIdentity } from "./identity.js";

/** Human-readable identity: `name` without arguments, `name(a, b)` with. */
export function formatIdentity(identity: NodeIdentity): string {
  if (identity.args.length === 0) return identity.name;
  return `${identity.name}(${identity.args.map(formatArg).join(", ")})`;
}

export function formatArg(value: ArgValue): string {
  if (isArgTuple(value)) return `[${value.map(formatArg).join(", ")}]`;
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  return String(value);
}

export function isArgTuple(value: ArgValue): value is readonly ArgValue[] {
  return Array.isArray(value);
}
