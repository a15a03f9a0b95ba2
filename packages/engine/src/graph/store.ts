/**
 * Value / Override Store
 *
 * Two independent slots per identity:
 *   - cache: the last computed value and whether it is still valid
 *   - override: a forced value that takes precedence while active
 *
 * Cache entries are created lazily on first write. Invalidation discards the
 * value and keeps the entry, so an identity can be reported as "stale" rather
 * than "unevaluated". Readers never see a discarded value.
 *
 * Changing or clearing an override changes the value the identity presents to
 * its dependents, so both notify `onEffectiveChange` after the mutation.
 */

import type { IdentityKey, NodeIdentity } from "../model/identity.js";

export type Freshness = "fresh" | "stale" | "unevaluated";

export interface CacheSlot {
  readonly value: unknown;
  readonly valid: boolean;
}

export interface OverrideSlot {
  readonly value: unknown;
  readonly active: boolean;
}

export interface ValueStoreOptions {
  /** Called after setOverride, and after clearOverride removed something. */
  onEffectiveChange(identity: NodeIdentity): void;
}

export interface ValueStore {
  getCache(identity: NodeIdentity): CacheSlot;
  /** Stores the value and marks it valid. */
  setCache(identity: NodeIdentity, value: unknown): void;
  /** Returns true when a valid value was discarded. */
  invalidate(identity: NodeIdentity): boolean;
  freshness(identity: NodeIdentity): Freshness;
  /** Records that a recomputation threw. Cleared by setCache. */
  markFailed(identity: NodeIdentity): void;
  /** Returns true when a failure was recorded since the last clear. */
  clearFailure(identity: NodeIdentity): boolean;

  getOverride(identity: NodeIdentity): OverrideSlot;
  setOverride(identity: NodeIdentity, value: unknown): void;
  /** Returns true when an active override was removed. */
  clearOverride(identity: NodeIdentity): boolean;

  readonly entryCount: number;
  readonly staleCount: number;
}

interface CacheEntry {
  valid: boolean;
  value: unknown;
}

const MISS: CacheSlot = { value: undefined, valid: false };
const NO_OVERRIDE: OverrideSlot = { value: undefined, active: false };

export function createValueStore(options: ValueStoreOptions): ValueStore {
  const cache = new Map<IdentityKey, CacheEntry>();
  // Presence in the map means the override is active; the value may be undefined.
  const overrides = new Map<IdentityKey, unknown>();
  const failed = new Set<IdentityKey>();

  return {
    getCache(identity: NodeIdentity): CacheSlot {
      const entry = cache.get(identity.key);
      if (!entry || !entry.valid) return MISS;
      return { value: entry.value, valid: true };
    },

    setCache(identity: NodeIdentity, value: unknown): void {
      failed.delete(identity.key);
      const entry = cache.get(identity.key);
      if (entry) {
        entry.valid = true;
        entry.value = value;
      } else {
        cache.set(identity.key, { valid: true, value });
      }
    },

    invalidate(identity: NodeIdentity): boolean {
      const entry = cache.get(identity.key);
      if (!entry || !entry.valid) return false;
      entry.valid = false;
      entry.value = undefined;
      return true;
    },

    freshness(identity: NodeIdentity): Freshness {
      const entry = cache.get(identity.key);
      if (!entry) return "unevaluated";
      return entry.valid ? "fresh" : "stale";
    },

    markFailed(identity: NodeIdentity): void {
      failed.add(identity.key);
    },

    clearFailure(identity: NodeIdentity): boolean {
      return failed.delete(identity.key);
    },

    getOverride(identity: NodeIdentity): OverrideSlot {
      if (!overrides.has(identity.key)) return NO_OVERRIDE;
      return { value: overrides.get(identity.key), active: true };
    },

    setOverride(identity: NodeIdentity, value: unknown): void {
      overrides.set(identity.key, value);
      options.onEffectiveChange(identity);
    },

    clearOverride(identity: NodeIdentity): boolean {
      if (!overrides.delete(identity.key)) return false;
      options.onEffectiveChange(identity);
      return true;
    },

    get entryCount() {
      return cache.size;
    },

    get staleCount() {
      let count = 0;
      for (const entry of cache.values()) {
        if (!entry.valid) count++;
      }
      return count;
    },
  };
}
