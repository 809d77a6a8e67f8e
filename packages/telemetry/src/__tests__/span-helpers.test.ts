import { SpanStatusCode, trace } from "@opentelemetry/api";
import { InMemorySpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { annotateActiveSpan, withSpan } from "../span-helpers.js";

describe("withSpan", () => {
  let exporter: InMemorySpanExporter;
  let provider: NodeTracerProvider;

  beforeEach(() => {
    exporter = new InMemorySpanExporter();
    provider = new NodeTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    trace.disable(); // Clear any previous global provider
    provider.register();
  });

  afterEach(async () => {
    trace.disable();
    exporter.reset();
    await provider.shutdown();
  });

  it("should create a named span with attributes", async () => {
    await withSpan("sift.hop.search", { "hop.tool": "search", "hop.deps": 0 }, async () => {
      // no-op
    });

    const spans = exporter.getFinishedSpans();
    expect(spans).toHaveLength(1);
    expect(spans[0]?.name).toBe("sift.hop.search");
    expect(spans[0]?.attributes["hop.tool"]).toBe("search");
    expect(spans[0]?.attributes["hop.deps"]).toBe(0);
  });

  it("should set OK status and return the function's value", async () => {
    const result = await withSpan("test.ok", {}, async () => 42);

    expect(result).toBe(42);
    expect(exporter.getFinishedSpans()[0]?.status.code).toBe(SpanStatusCode.OK);
  });

  it("should record exception and set ERROR status on failure", async () => {
    await expect(
      withSpan("test.error", {}, async () => {
        throw new Error("test failure");
      }),
    ).rejects.toThrow("test failure");

    const spans = exporter.getFinishedSpans();
    expect(spans[0]?.status.code).toBe(SpanStatusCode.ERROR);
    expect(spans[0]?.status.message).toBe("test failure");
    expect(spans[0]?.events).toHaveLength(1);
    expect(spans[0]?.events[0]?.name).toBe("exception");
  });

  it("should handle non-Error throws", async () => {
    await expect(
      withSpan("test.string-error", {}, async () => {
        throw "string error";
      }),
    ).rejects.toBe("string error");

    const spans = exporter.getFinishedSpans();
    expect(spans[0]?.status.code).toBe(SpanStatusCode.ERROR);
    expect(spans[0]?.status.message).toBe("string error");
    expect(spans[0]?.events).toHaveLength(0);
  });

  it("should nest child spans under the active parent", async () => {
    await withSpan("parent", {}, async () => {
      await withSpan("child", {}, async () => undefined);
    });

    const spans = exporter.getFinishedSpans();
    const parent = spans.find((s) => s.name === "parent");
    const child = spans.find((s) => s.name === "child");
    expect(child?.parentSpanId).toBe(parent?.spanContext().spanId);
  });

  it("should annotate the active span", async () => {
    await withSpan("annotated", {}, async () => {
      annotateActiveSpan({ "search.cache": "hit" });
    });

    expect(exporter.getFinishedSpans()[0]?.attributes["search.cache"]).toBe("hit");
  });
});

describe("withSpan without a registered provider", () => {
  it("should still execute the function", async () => {
    trace.disable();
    const result = await withSpan("noop", {}, async () => "done");
    expect(result).toBe("done");
  });

  it("should ignore annotations outside any span", () => {
    trace.disable();
    expect(() => annotateActiveSpan({ key: "value" })).not.toThrow();
  });
});
