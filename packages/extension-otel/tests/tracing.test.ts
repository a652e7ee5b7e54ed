import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createOtel } from "../src";
import { createScope } from "@weft/core";
import { SpanStatusCode } from "@opentelemetry/api";
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
} from "@opentelemetry/sdk-trace-base";

describe("OTel tracing", () => {
  let exporter: InMemorySpanExporter;
  let provider: BasicTracerProvider;

  beforeEach(() => {
    exporter = new InMemorySpanExporter();
    provider = new BasicTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
  });

  afterEach(async () => {
    exporter.reset();
    await provider.shutdown();
  });

  it("creates a span for a launched task", async () => {
    const scope = createScope({
      extensions: [createOtel({ tracer: provider.getTracer("test") })],
    });

    const job = scope.launch(() => {}, { name: "poll" });
    await job.join();
    await scope.dispose();

    const spans = exporter.getFinishedSpans();
    expect(spans.length).toBe(1);
    expect(spans[0]?.name).toBe("poll");
    expect(spans[0]?.status.code).toBe(SpanStatusCode.OK);
    expect(spans[0]?.attributes["weft.task.kind"]).toBe("launch");
    expect(spans[0]?.attributes["weft.dispatcher"]).toBe("Default");
  });

  it("names unnamed tasks by their kind", async () => {
    const scope = createScope({
      extensions: [createOtel({ tracer: provider.getTracer("test") })],
    });

    await scope.coroutineScope(() => 1);
    await scope.dispose();

    expect(exporter.getFinishedSpans().map((s) => s.name)).toEqual(["coroutineScope"]);
  });

  it("creates parent-child span hierarchy for nested tasks", async () => {
    const scope = createScope({
      extensions: [createOtel({ tracer: provider.getTracer("test") })],
    });

    const result = await scope
      .async(
        async (parent) => {
          const child = await parent.async(() => "child", { name: "child" }).await();
          return `parent-${child}`;
        },
        { name: "parent" }
      )
      .await();
    await scope.dispose();

    expect(result).toBe("parent-child");

    const spans = exporter.getFinishedSpans();
    expect(spans.length).toBe(2);

    const childSpan = spans.find((s) => s.name === "child");
    const parentSpan = spans.find((s) => s.name === "parent");

    expect(childSpan).toBeDefined();
    expect(parentSpan).toBeDefined();
    expect(childSpan?.parentSpanId).toBe(parentSpan?.spanContext().spanId);
    expect(childSpan?.spanContext().traceId).toBe(parentSpan?.spanContext().traceId);
  });

  it("concurrent siblings have isolated spans", async () => {
    const scope = createScope({
      extensions: [createOtel({ tracer: provider.getTracer("test") })],
    });

    const slow = scope.async(
      async (s) => {
        await s.delay(10);
        return "slow";
      },
      { name: "slow" }
    );
    const fast = scope.async(() => "fast", { name: "fast" });
    expect(await Promise.all([slow.await(), fast.await()])).toEqual(["slow", "fast"]);
    await scope.dispose();

    const spans = exporter.getFinishedSpans();
    expect(spans.length).toBe(2);
    expect(spans.find((s) => s.name === "slow")?.parentSpanId).toBeUndefined();
    expect(spans.find((s) => s.name === "fast")?.parentSpanId).toBeUndefined();
  });

  it("records failures on the span", async () => {
    const scope = createScope({
      extensions: [createOtel({ tracer: provider.getTracer("test") })],
    });

    const deferred = scope.async(
      () => {
        throw new Error("boom");
      },
      { name: "failing" }
    );
    await expect(deferred.await()).rejects.toThrow("boom");
    await scope.dispose();

    const span = exporter.getFinishedSpans()[0];
    expect(span?.status).toEqual({ code: SpanStatusCode.ERROR, message: "boom" });
    expect(span?.events.map((e) => e.name)).toEqual(["exception"]);
  });

  it("marks cancelled tasks without an error status", async () => {
    const scope = createScope({
      extensions: [createOtel({ tracer: provider.getTracer("test") })],
    });

    let started = false;
    const job = scope.launch(
      async (s) => {
        started = true;
        await s.delay(1000);
      },
      { name: "sleeper" }
    );
    await vi.waitFor(() => expect(started).toBe(true));
    job.cancel();
    await expect(job.join()).rejects.toThrow("Job was cancelled");
    await scope.dispose();

    const span = exporter.getFinishedSpans()[0];
    expect(span?.attributes["weft.cancelled"]).toBe(true);
    expect(span?.status.code).toBe(SpanStatusCode.UNSET);
  });

  it("taskFilter skips filtered tasks and parents across them", async () => {
    const scope = createScope({
      extensions: [
        createOtel({
          tracer: provider.getTracer("test"),
          taskFilter: (task) => task.kind !== "coroutineScope",
        }),
      ],
    });

    await scope
      .async(
        (outer) => outer.coroutineScope((inner) => inner.async(() => 1, { name: "leaf" }).await()),
        { name: "root-task" }
      )
      .await();
    await scope.dispose();

    const spans = exporter.getFinishedSpans();
    expect(spans.map((s) => s.name).sort()).toEqual(["leaf", "root-task"]);
    const leaf = spans.find((s) => s.name === "leaf");
    const root = spans.find((s) => s.name === "root-task");
    expect(leaf?.parentSpanId).toBe(root?.spanContext().spanId);
  });

  it("spanName overrides the default name", async () => {
    const scope = createScope({
      extensions: [
        createOtel({
          tracer: provider.getTracer("test"),
          spanName: (task) => `weft.${task.kind}`,
        }),
      ],
    });

    await scope.async(() => 1, { name: "ignored" }).await();
    await scope.dispose();

    expect(exporter.getFinishedSpans().map((s) => s.name)).toEqual(["weft.async"]);
  });
});
