/**
 * Debug Channels
 *
 * Targeted logging for following what the engine does: which identities are
 * recomputed, which reads hit the cache, how far an invalidation spreads.
 * Complementary to EngineTrace (timing and hierarchy), debug channels report
 * *what* happened and *why*.
 *
 * ## Usage
 *
 * Enable via environment variable:
 * ```bash
 * CALCGRAPH_DEBUG=evaluate npm test             # Just evaluation
 * CALCGRAPH_DEBUG=evaluate,invalidate npm test  # Several channels
 * CALCGRAPH_DEBUG=* npm test                    # Everything
 * ```
 *
 * In code (always present, no-op when disabled):
 * ```typescript
 * debug.evaluate('recompute', { identity: 'square(3)', deps: 1 });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  timestamps: boolean;
  /** Custom output function (defaults to console.log) */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.log,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env["CALCGRAPH_DEBUG"] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

/** Enabled channels (parsed once at module load, can be refreshed) */
let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(
  channel: string,
  point: string,
  data: DebugData | undefined,
): string {
  const prefix = config.timestamps
    ? `[${new Date().toISOString()}] `
    : "";

  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData): string {
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `{ ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (typeof value === "bigint") return `${value}n`;
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3) {
      const inline = `[${value.map((v: unknown) => formatValue(v)).join(", ")}]`;
      if (inline.length <= 50) return inline;
    }
    return `[${value.length} items]`;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/**
 * Refresh debug channels (re-reads CALCGRAPH_DEBUG).
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.registry = createChannel("registry");
  debug.evaluate = createChannel("evaluate");
  debug.invalidate = createChannel("invalidate");
  debug.override = createChannel("override");
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/**
 * Check if any debug channel is enabled.
 * Useful for skipping expensive formatting.
 */
export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

/**
 * Debug channels for each engine subsystem.
 */
export const debug = {
  /** Node registration */
  registry: createChannel("registry"),

  /** Cache hits, recomputations, dependency discovery */
  evaluate: createChannel("evaluate"),

  /** Staleness propagation */
  invalidate: createChannel("invalidate"),

  /** Override set / removed */
  override: createChannel("override"),
};

export type Debug = typeof debug;
