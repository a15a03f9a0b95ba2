/* =======================================================================================
 * TRACE EXPORTERS - Pluggable backends for trace data
 * ---------------------------------------------------------------------------------------
 * - ConsoleExporter: Human-readable recomputation tree for dev debugging
 * - CollectingExporter: Keeps every span and event in memory for assertions
 * ======================================================================================= */

import type { AttributeValue, Span, SpanEvent, TraceExporter } from "./trace.js";
import { formatDuration } from "./trace.js";

// =============================================================================
// Console Exporter
// =============================================================================

export interface ConsoleExporterOptions {
  /**
   * Minimum span duration to log (in nanoseconds).
   * Default: 0 (log all spans)
   */
  minDuration?: bigint;

  /** Default: true */
  logEvents?: boolean;

  /** Default: true */
  logAttributes?: boolean;

  /**
   * Whether to use colors in output.
   * Default: true when stdout is a TTY and NO_COLOR is unset
   */
  colors?: boolean;

  /** Default: console.log */
  log?: (message: string) => void;

  /** Default: "[trace]" */
  prefix?: string;
}

/**
 * Logs spans as an indented tree, one line per start, end and event.
 *
 * @example
 * const exporter = createConsoleExporter({ minDuration: 1_000_000n }); // 1ms
 * const trace = createTrace({ name: "pricing", exporter });
 */
export class ConsoleExporter implements TraceExporter {
  private readonly options: Required<ConsoleExporterOptions>;
  private depth = 0;

  constructor(options: ConsoleExporterOptions = {}) {
    const supportsColor = process.stdout.isTTY === true && process.env["NO_COLOR"] === undefined;

    this.options = {
      minDuration: options.minDuration ?? 0n,
      logEvents: options.logEvents ?? true,
      logAttributes: options.logAttributes ?? true,
      colors: options.colors ?? supportsColor,
      log: options.log ?? console.log,
      prefix: options.prefix ?? "[trace]",
    };
  }

  onSpanStart(span: Span): void {
    const indent = "  ".repeat(this.depth);
    this.options.log(`${this.formatPrefix()} ${indent}${this.paint("1", span.name)} started`);
    this.depth++;
  }

  onSpanEnd(span: Span): void {
    this.depth = Math.max(0, this.depth - 1);

    if (span.duration !== null && span.duration < this.options.minDuration) {
      return;
    }

    const indent = "  ".repeat(this.depth);
    const duration = span.duration !== null ? formatDuration(span.duration) : "?";
    let line = `${this.formatPrefix()} ${indent}${this.paint("1", span.name)} ${this.paint("32", `(${duration})`)}`;

    if (this.options.logAttributes && span.attributes.size > 0) {
      line += ` ${this.formatAttributes(span.attributes)}`;
    }

    this.options.log(line);
  }

  onEvent(_span: Span, event: SpanEvent): void {
    if (!this.options.logEvents) return;

    const indent = "  ".repeat(this.depth);
    let line = `${this.formatPrefix()} ${indent}  ${this.paint("33", `[${event.name}]`)}`;

    if (this.options.logAttributes && event.attributes.size > 0) {
      line += ` ${this.formatAttributes(event.attributes)}`;
    }

    this.options.log(line);
  }

  async flush(): Promise<void> {
    // Console output is synchronous, nothing to flush
  }

  async shutdown(): Promise<void> {
    // No resources to clean up
  }

  private formatPrefix(): string {
    return this.paint("90", this.options.prefix);
  }

  private paint(code: string, text: string): string {
    return this.options.colors ? `\x1b[${code}m${text}\x1b[0m` : text;
  }

  private formatAttributes(attrs: ReadonlyMap<string, AttributeValue>): string {
    const pairs: string[] = [];
    for (const [key, value] of attrs) {
      if (key === "error.message") continue;
      const shortKey = key.split(".").pop() ?? key;
      pairs.push(`${shortKey}=${formatAttributeValue(value)}`);
    }
    return this.paint("90", `{${pairs.join(" ")}}`);
  }
}

function formatAttributeValue(value: AttributeValue): string {
  if (typeof value === "string") {
    return value.length > 40 ? `"${value.slice(0, 37)}..."` : `"${value}"`;
  }
  if (Array.isArray(value)) return `[${value.length}]`;
  return String(value);
}

export function createConsoleExporter(options?: ConsoleExporterOptions): ConsoleExporter {
  return new ConsoleExporter(options);
}

// =============================================================================
// Collecting Exporter (for testing)
// =============================================================================

export class CollectingExporter implements TraceExporter {
  /** Ended spans, in end order (innermost first for nested work). */
  readonly spans: Span[] = [];
  readonly events: Array<{ span: Span; event: SpanEvent }> = [];
  readonly startedSpans: Span[] = [];

  onSpanStart(span: Span): void {
    this.startedSpans.push(span);
  }

  onSpanEnd(span: Span): void {
    this.spans.push(span);
  }

  onEvent(span: Span, event: SpanEvent): void {
    this.events.push({ span, event });
  }

  flush(): Promise<void> {
    return Promise.resolve();
  }

  shutdown(): Promise<void> {
    this.clear();
    return Promise.resolve();
  }

  clear(): void {
    this.spans.length = 0;
    this.events.length = 0;
    this.startedSpans.length = 0;
  }

  findSpans(name: string): Span[] {
    return this.spans.filter(s => s.name === name);
  }

  findEvents(name: string): Array<{ span: Span; event: SpanEvent }> {
    return this.events.filter(e => e.event.name === name);
  }
}

export function createCollectingExporter(): CollectingExporter {
  return new CollectingExporter();
}
