/* =======================================================================================
 * ENGINE TRACE - Instrumentation primitives for evaluation observability
 * ---------------------------------------------------------------------------------------
 * A hierarchical tracing system for profiling recomputation.
 *
 * Core concepts:
 * - Span: Unit of work with timing, hierarchy, attributes, and events
 * - EngineTrace: Main API for instrumentation (span, event, setAttribute)
 * - TraceExporter: Pluggable backend for trace data (console, collecting)
 * - NOOP_TRACE: No-op when tracing is disabled (the engine default)
 *
 * Span nesting follows evaluation nesting: a recomputation that reads a stale
 * dependency opens the dependency's span inside its own.
 * ======================================================================================= */

// =============================================================================
// Attribute Types
// =============================================================================

/**
 * Values that can be attached to spans and events as structured context.
 * Follows OpenTelemetry attribute value conventions.
 */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | readonly AttributeValue[];

export type AttributeMap = Map<string, AttributeValue>;

export type ReadonlyAttributeMap = ReadonlyMap<string, AttributeValue>;

// =============================================================================
// Span Event
// =============================================================================

/**
 * A point-in-time marker within a span.
 *
 * @example
 * trace.event("cache.hit", { identity: "square(3)" });
 */
export interface SpanEvent {
  readonly name: string;

  /** Timestamp in nanoseconds */
  readonly timestamp: bigint;

  readonly attributes: ReadonlyAttributeMap;
}

// =============================================================================
// Span Interface
// =============================================================================

export interface Span {
  /** Human-readable name (e.g., "evaluate:square(3)") */
  readonly name: string;

  readonly spanId: string;

  /** Trace-wide identifier (same for all spans in a trace tree) */
  readonly traceId: string;

  readonly parent: Span | null;
  readonly children: readonly Span[];

  /** Start time in nanoseconds */
  readonly startTime: bigint;

  /** End time in nanoseconds, or null if still running */
  readonly endTime: bigint | null;

  readonly duration: bigint | null;

  readonly attributes: ReadonlyAttributeMap;
  readonly events: readonly SpanEvent[];

  /** Mark this span as complete, recording end time */
  end(): void;

  setAttribute(key: string, value: AttributeValue): void;
  setAttributes(attrs: Record<string, AttributeValue>): void;
  addEvent(name: string, attributes?: Record<string, AttributeValue>): void;
}

// =============================================================================
// Trace Exporter Interface
// =============================================================================

export interface TraceExporter {
  onSpanStart(span: Span): void;
  onSpanEnd(span: Span): void;
  onEvent(span: Span, event: SpanEvent): void;
  flush(): Promise<void>;
  shutdown(): Promise<void>;
}

// =============================================================================
// Engine Trace Interface
// =============================================================================

/**
 * Main API for engine instrumentation.
 *
 * Usage patterns:
 *
 * 1. Wrap work:
 *    const value = trace.span("evaluate:d1", () => node.compute(ctx));
 *
 * 2. Record events:
 *    trace.event("cache.hit", { identity: "d1" });
 *
 * 3. Add context:
 *    trace.setAttribute("calc.node", "d1");
 */
export interface EngineTrace {
  /**
   * Execute a function within a named span, returning the function's result.
   * The span is ended when the function returns or throws.
   */
  span<T>(name: string, fn: () => T): T;

  /** Record a point-in-time event in the current span */
  event(name: string, attributes?: Record<string, AttributeValue>): void;

  setAttribute(key: string, value: AttributeValue): void;
  setAttributes(attrs: Record<string, AttributeValue>): void;

  /**
   * Start a span manually.
   * Caller is responsible for calling span.end().
   */
  startSpan(name: string): Span;

  currentSpan(): Span | undefined;
  rootSpan(): Span;

  /** Flush pending data to exporters */
  flush(): Promise<void>;
}

// =============================================================================
// Semantic Attribute Keys
// =============================================================================

export const EngineAttributes = {
  IDENTITY: "calc.identity",
  NODE: "calc.node",
  KIND: "calc.kind",
  DEPENDENCY_COUNT: "calc.deps",
  STALE_COUNT: "calc.stale",
} as const;

// =============================================================================
// No-Op Implementation
// =============================================================================

export const NOOP_SPAN: Span = {
  name: "",
  spanId: "",
  traceId: "",
  parent: null,
  children: [],
  startTime: 0n,
  endTime: null,
  duration: null,
  attributes: new Map(),
  events: [],
  end: () => {},
  setAttribute: () => {},
  setAttributes: () => {},
  addEvent: () => {},
};

/**
 * No-op trace that executes functions without instrumentation.
 *
 * @example
 * const trace = options.trace ?? NOOP_TRACE;
 */
export const NOOP_TRACE: EngineTrace = {
  span: <T>(_name: string, fn: () => T): T => fn(),
  event: () => {},
  setAttribute: () => {},
  setAttributes: () => {},
  startSpan: () => NOOP_SPAN,
  currentSpan: () => undefined,
  rootSpan: () => NOOP_SPAN,
  flush: () => Promise.resolve(),
};

// =============================================================================
// Timing Utilities
// =============================================================================

export function nowNanos(): bigint {
  return process.hrtime.bigint();
}

/**
 * Format nanoseconds as human-readable duration.
 */
export function formatDuration(nanos: bigint): string {
  const ns = Number(nanos);
  if (ns < 1_000) return `${ns}ns`;
  if (ns < 1_000_000) return `${(ns / 1_000).toFixed(2)}µs`;
  if (ns < 1_000_000_000) return `${(ns / 1_000_000).toFixed(2)}ms`;
  return `${(ns / 1_000_000_000).toFixed(2)}s`;
}

// =============================================================================
// Span Implementation
// =============================================================================

let spanIdCounter = 0;

function generateSpanId(): string {
  return `span_${++spanIdCounter}`;
}

function generateTraceId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).slice(2, 8);
  return `trace_${timestamp}_${random}`;
}

class SpanImpl implements Span {
  readonly name: string;
  readonly spanId: string;
  readonly traceId: string;
  readonly parent: Span | null;
  readonly startTime: bigint;

  private _endTime: bigint | null = null;
  private readonly _children: Span[] = [];
  private readonly _attributes: AttributeMap = new Map();
  private readonly _events: SpanEvent[] = [];
  private readonly _exporter: TraceExporter | null;

  constructor(
    name: string,
    traceId: string,
    parent: SpanImpl | null,
    exporter: TraceExporter | null,
  ) {
    this.name = name;
    this.spanId = generateSpanId();
    this.traceId = traceId;
    this.parent = parent;
    this.startTime = nowNanos();
    this._exporter = exporter;

    parent?._children.push(this);
    this._exporter?.onSpanStart(this);
  }

  get endTime(): bigint | null {
    return this._endTime;
  }

  get duration(): bigint | null {
    return this._endTime !== null ? this._endTime - this.startTime : null;
  }

  get children(): readonly Span[] {
    return this._children;
  }

  get attributes(): ReadonlyAttributeMap {
    return this._attributes;
  }

  get events(): readonly SpanEvent[] {
    return this._events;
  }

  end(): void {
    if (this._endTime !== null) return;
    this._endTime = nowNanos();
    this._exporter?.onSpanEnd(this);
  }

  setAttribute(key: string, value: AttributeValue): void {
    this._attributes.set(key, value);
  }

  setAttributes(attrs: Record<string, AttributeValue>): void {
    for (const [key, value] of Object.entries(attrs)) {
      this._attributes.set(key, value);
    }
  }

  addEvent(name: string, attributes?: Record<string, AttributeValue>): void {
    const event: SpanEvent = {
      name,
      timestamp: nowNanos(),
      attributes: new Map(Object.entries(attributes ?? {})),
    };
    this._events.push(event);
    this._exporter?.onEvent(this, event);
  }
}

// =============================================================================
// Engine Trace Implementation
// =============================================================================

export interface CreateTraceOptions {
  /** Name for the root span */
  name?: string;

  exporter?: TraceExporter;

  /** Pre-generated trace ID */
  traceId?: string;
}

class EngineTraceImpl implements EngineTrace {
  private readonly _traceId: string;
  private readonly _rootSpan: SpanImpl;
  private readonly _exporter: TraceExporter | null;
  private readonly _open: SpanImpl[] = [];

  constructor(options: CreateTraceOptions = {}) {
    this._traceId = options.traceId ?? generateTraceId();
    this._exporter = options.exporter ?? null;
    this._rootSpan = new SpanImpl(
      options.name ?? "trace",
      this._traceId,
      null,
      this._exporter,
    );
  }

  private get _current(): SpanImpl {
    return this._open[this._open.length - 1] ?? this._rootSpan;
  }

  span<T>(name: string, fn: () => T): T {
    const span = this.startSpan(name);
    try {
      return fn();
    } catch (error) {
      span.setAttribute("error", true);
      span.setAttribute("error.message", error instanceof Error ? error.message : String(error));
      throw error;
    } finally {
      span.end();
    }
  }

  event(name: string, attributes?: Record<string, AttributeValue>): void {
    this._current.addEvent(name, attributes);
  }

  setAttribute(key: string, value: AttributeValue): void {
    this._current.setAttribute(key, value);
  }

  setAttributes(attrs: Record<string, AttributeValue>): void {
    this._current.setAttributes(attrs);
  }

  startSpan(name: string): Span {
    const span = new SpanImpl(name, this._traceId, this._current, this._exporter);
    this._open.push(span);

    // Ending the span restores its parent as current
    const end = span.end.bind(span);
    span.end = () => {
      end();
      const index = this._open.lastIndexOf(span);
      if (index !== -1) this._open.splice(index, 1);
    };

    return span;
  }

  currentSpan(): Span | undefined {
    return this._current;
  }

  rootSpan(): Span {
    return this._rootSpan;
  }

  async flush(): Promise<void> {
    await this._exporter?.flush();
  }
}

/**
 * Create a new EngineTrace.
 *
 * @example
 * const trace = createTrace({ name: "pricing", exporter: createConsoleExporter() });
 * const graph = createCalcGraph({ trace });
 */
export function createTrace(options?: CreateTraceOptions): EngineTrace {
  return new EngineTraceImpl(options);
}
