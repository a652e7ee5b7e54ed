import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createOtel, extractContext, injectTaskContext, getTaskSpan } from "../src";
import { createScope } from "@weft/core";
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
} from "@opentelemetry/sdk-trace-base";
import { W3CTraceContextPropagator } from "@opentelemetry/core";
import { propagation, trace } from "@opentelemetry/api";

describe("Context propagation", () => {
  let exporter: InMemorySpanExporter;
  let provider: BasicTracerProvider;

  beforeEach(() => {
    exporter = new InMemorySpanExporter();
    provider = new BasicTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    propagation.setGlobalPropagator(new W3CTraceContextPropagator());
  });

  afterEach(async () => {
    exporter.reset();
    propagation.disable();
    await provider.shutdown();
  });

  it("extractContext parses W3C traceparent header", () => {
    const headers = {
      traceparent: "00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01",
    };

    const ctx = extractContext(headers);
    const spanContext = trace.getSpanContext(ctx);

    expect(spanContext?.traceId).toBe("0af7651916cd43dd8448eb211c80319c");
    expect(spanContext?.spanId).toBe("b7ad6b7169203331");
  });

  it("injectTaskContext writes the task span as W3C headers", async () => {
    const scope = createScope({
      extensions: [createOtel({ tracer: provider.getTracer("test") })],
    });

    const headers = await scope
      .async(
        (s) => {
          const out: Record<string, string> = {};
          injectTaskContext(s, out);
          return out;
        },
        { name: "outgoing" }
      )
      .await();
    await scope.dispose();

    const span = exporter.getFinishedSpans()[0];
    expect(headers.traceparent).toBe(
      `00-${span?.spanContext().traceId}-${span?.spanContext().spanId}-01`
    );
  });

  it("getTaskSpan returns the span of the running task", async () => {
    const scope = createScope({
      extensions: [createOtel({ tracer: provider.getTracer("test") })],
    });

    await scope
      .async(
        (s) => {
          getTaskSpan(s)?.setAttribute("user.id", "u-1");
        },
        { name: "annotated" }
      )
      .await();
    await scope.dispose();

    expect(exporter.getFinishedSpans()[0]?.attributes["user.id"]).toBe("u-1");
  });

  it("leaves headers untouched outside traced tasks", async () => {
    const scope = createScope();
    const headers: Record<string, string> = {};

    injectTaskContext(scope, headers);
    expect(headers).toEqual({});
    expect(getTaskSpan(scope)).toBeUndefined();
    await scope.dispose();
  });
});
