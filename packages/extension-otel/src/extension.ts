import {
  trace,
  context,
  SpanStatusCode,
} from "@opentelemetry/api";
import { isCancellation, type Weft } from "@weft/core";
import type { OtelExtension } from "./types";
import { findSpan, setJobSpan } from "./span";
import { createMetrics, type OtelMetrics } from "./metrics";

function getSpanName(task: Weft.TaskInfo, options: OtelExtension.Options): string {
  if (options.spanName) {
    return options.spanName(task);
  }
  return task.name ?? task.kind;
}

/**
 * Creates an extension that records one span per task body.
 *
 * Spans are parented on the span of the nearest traced ancestor job, so
 * the trace follows the job tree without a registered context manager.
 * Cancelled tasks keep an unset status and carry `weft.cancelled`.
 *
 * @example
 * ```typescript
 * const scope = createScope({
 *   extensions: [createOtel({ tracer: trace.getTracer("worker") })],
 * })
 * ```
 */
export function createOtel(options: OtelExtension.Options): Weft.Extension {
  const { tracer, meter, taskFilter } = options;

  let metrics: OtelMetrics | undefined;
  if (meter) {
    metrics = createMetrics(meter);
  }

  return {
    name: "otel",

    wrapTask: async (next, task) => {
      if (taskFilter && !taskFilter(task)) {
        return next();
      }

      const parentSpan = findSpan(task.job.parent);
      const parentContext = parentSpan
        ? trace.setSpan(context.active(), parentSpan)
        : context.active();

      const spanName = getSpanName(task, options);
      const span = tracer.startSpan(
        spanName,
        {
          attributes: {
            "weft.task.kind": task.kind,
            "weft.dispatcher": task.dispatcher.name,
          },
        },
        parentContext
      );
      setJobSpan(task.job, span);
      const start = performance.now();
      const attributes = { "task.name": spanName, "task.kind": task.kind };

      try {
        const result = await context.with(
          trace.setSpan(context.active(), span),
          next
        );
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (err) {
        if (isCancellation(err)) {
          span.setAttribute("weft.cancelled", true);
          throw err;
        }
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: err instanceof Error ? err.message : String(err),
        });
        if (err instanceof Error) {
          span.recordException(err);
        }
        metrics?.errorCounter.add(1, {
          ...attributes,
          "error.type": err instanceof Error ? err.constructor.name : "unknown",
        });
        throw err;
      } finally {
        metrics?.taskDurationHistogram.record(performance.now() - start, attributes);
        span.end();
      }
    },
  };
}
