import type { Span } from "@opentelemetry/api";
import type { Weft } from "@weft/core";

const jobSpans = new WeakMap<Weft.Job<unknown>, Span>();

/** Span of `job`, else of its nearest traced ancestor */
export function findSpan(job: Weft.Job<unknown> | undefined): Span | undefined {
  for (let current = job; current; current = current.parent) {
    const span = jobSpans.get(current);
    if (span) return span;
  }
  return undefined;
}

export function setJobSpan(job: Weft.Job<unknown>, span: Span): void {
  jobSpans.set(job, span);
}
