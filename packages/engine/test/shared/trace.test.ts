import { describe, expect, it } from "vitest";
import { createTrace, formatDuration, NOOP_SPAN, NOOP_TRACE } from "../../src/shared/trace.js";
import { createCollectingExporter, createConsoleExporter } from "../../src/shared/trace-exporters.js";

// =============================================================================
// formatDuration
// =============================================================================

describe("formatDuration", () => {
  it("picks the largest unit below the value", () => {
    expect(formatDuration(500n)).toBe("500ns");
    expect(formatDuration(1_500n)).toBe("1.50µs");
    expect(formatDuration(2_500_000n)).toBe("2.50ms");
    expect(formatDuration(3_000_000_000n)).toBe("3.00s");
  });
});

// =============================================================================
// EngineTrace
// =============================================================================

describe("createTrace", () => {
  it("nests spans and restores the parent when they end", () => {
    const trace = createTrace({ name: "root" });

    const seen = trace.span("outer", () => trace.span("inner", () => trace.currentSpan()?.name));

    expect(seen).toBe("inner");
    expect(trace.currentSpan()).toBe(trace.rootSpan());
    const [outer] = trace.rootSpan().children;
    expect(outer?.name).toBe("outer");
    expect(outer?.children.map((s) => s.name)).toEqual(["inner"]);
    expect(outer?.children[0]?.parent).toBe(outer);
  });

  it("returns the wrapped function's result", () => {
    const trace = createTrace();
    expect(trace.span("work", () => 42)).toBe(42);
  });

  it("tags the span with the error and rethrows", () => {
    const exporter = createCollectingExporter();
    const trace = createTrace({ exporter });
    const failure = new Error("boom");

    expect(() =>
      trace.span("failing", () => {
        throw failure;
      }),
    ).toThrow(failure);

    const [span] = exporter.findSpans("failing");
    expect(span?.attributes.get("error")).toBe(true);
    expect(span?.attributes.get("error.message")).toBe("boom");
    expect(span?.endTime).not.toBeNull();
    expect(trace.currentSpan()).toBe(trace.rootSpan());
  });

  it("attaches attributes and events to the current span", () => {
    const exporter = createCollectingExporter();
    const trace = createTrace({ exporter });

    trace.span("work", () => {
      trace.setAttribute("calc.node", "a");
      trace.setAttributes({ "calc.deps": 2, "calc.kind": "calculated" });
      trace.event("cache.hit", { "calc.identity": "b" });
    });

    const [span] = exporter.findSpans("work");
    expect(span?.attributes.get("calc.node")).toBe("a");
    expect(span?.attributes.get("calc.deps")).toBe(2);
    expect(span?.events.map((e) => e.name)).toEqual(["cache.hit"]);
    expect(exporter.findEvents("cache.hit")[0]?.span).toBe(span);
  });

  it("ends a manual span once", () => {
    const exporter = createCollectingExporter();
    const trace = createTrace({ exporter });

    const span = trace.startSpan("manual");
    expect(trace.currentSpan()).toBe(span);
    span.end();
    span.end();

    expect(exporter.startedSpans.map((s) => s.name)).toEqual(["trace", "manual"]);
    expect(exporter.spans).toHaveLength(1);
    expect(span.duration).not.toBeNull();
    expect(trace.currentSpan()).toBe(trace.rootSpan());
  });

  it("shares one trace id across the tree", () => {
    const trace = createTrace({ traceId: "trace_test" });
    const id = trace.span("child", () => trace.currentSpan()?.traceId);
    expect(id).toBe("trace_test");
    expect(trace.rootSpan().traceId).toBe("trace_test");
  });
});

describe("NOOP_TRACE", () => {
  it("runs the work without recording anything", () => {
    expect(NOOP_TRACE.span("x", () => "done")).toBe("done");
    NOOP_TRACE.event("ignored");
    expect(NOOP_TRACE.currentSpan()).toBeUndefined();
    expect(NOOP_TRACE.rootSpan()).toBe(NOOP_SPAN);
    expect(NOOP_TRACE.startSpan("y")).toBe(NOOP_SPAN);
  });
});

// =============================================================================
// ConsoleExporter
// =============================================================================

describe("ConsoleExporter", () => {
  function capture(options: Parameters<typeof createConsoleExporter>[0] = {}) {
    const lines: string[] = [];
    const exporter = createConsoleExporter({ colors: false, log: (line) => lines.push(line), ...options });
    return { lines, trace: createTrace({ name: "root", exporter }) };
  }

  it("prints an indented tree of starts, ends and events", () => {
    const { lines, trace } = capture();

    trace.span("work", () => {
      trace.setAttribute("calc.node", "a");
    });
    trace.event("cache.hit", { "calc.identity": "b" });

    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe("[trace] root started");
    expect(lines[1]).toBe("[trace]   work started");
    expect(lines[2]).toMatch(/^\[trace\]   work \(.+\) \{node="a"\}$/);
    expect(lines[3]).toBe('[trace]     [cache.hit] {identity="b"}');
  });

  it("leaves out the error message but keeps the error flag", () => {
    const { lines, trace } = capture();

    expect(() =>
      trace.span("failing", () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");

    expect(lines[2]).toMatch(/^\[trace\]   failing \(.+\) \{error=true\}$/);
  });

  it("skips spans below the minimum duration", () => {
    const { lines, trace } = capture({ minDuration: 60_000_000_000n });
    trace.span("quick", () => undefined);
    expect(lines).toEqual(["[trace] root started", "[trace]   quick started"]);
  });

  it("can omit events and attributes", () => {
    const { lines, trace } = capture({ logEvents: false, logAttributes: false });
    trace.span("work", () => {
      trace.setAttribute("calc.node", "a");
      trace.event("cache.hit");
    });
    expect(lines).toHaveLength(3);
    expect(lines[2]).toMatch(/^\[trace\]   work \(.+\)$/);
  });

  it("uses the configured prefix", () => {
    const { lines } = capture({ prefix: "[calc]" });
    expect(lines).toEqual(["[calc] root started"]);
  });
});
