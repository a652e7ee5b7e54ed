import type { Meter, Histogram, Counter } from "@opentelemetry/api";

export interface OtelMetrics {
  readonly taskDurationHistogram: Histogram;
  readonly errorCounter: Counter;
}

export function createMetrics(meter: Meter): OtelMetrics {
  return {
    taskDurationHistogram: meter.createHistogram("weft.task.duration_ms", {
      description: "Time from the start of a task body to its end in milliseconds",
      unit: "ms",
    }),
    errorCounter: meter.createCounter("weft.errors", {
      description: "Number of task bodies that failed with an error other than cancellation",
    }),
  };
}
