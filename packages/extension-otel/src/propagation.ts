import { propagation, context, trace, type Context, type Span } from "@opentelemetry/api";
import type { Weft } from "@weft/core";
import { findSpan } from "./span";

/**
 * Extract trace context from incoming headers.
 * Use with incoming requests to continue distributed traces.
 *
 * @example
 * ```typescript
 * const incoming = extractContext(request.headers)
 * const span = tracer.startSpan("handle", {}, incoming)
 * ```
 */
export function extractContext(headers: Record<string, string>): Context {
  return propagation.extract(context.active(), headers);
}

/**
 * Inject the trace context of the task running in `scope` into outgoing headers.
 *
 * @example
 * ```typescript
 * scope.launch(async (s) => {
 *   const headers: Record<string, string> = {}
 *   injectTaskContext(s, headers)
 *   await fetch(url, { headers })
 * })
 * ```
 */
export function injectTaskContext(
  scope: Weft.Scope,
  headers: Record<string, string>
): void {
  const span = getTaskSpan(scope);
  if (span) {
    propagation.inject(trace.setSpan(context.active(), span), headers);
  }
}

/**
 * Span of the task running in `scope`, or of its nearest traced ancestor.
 * Useful for adding attributes or events to the active span.
 */
export function getTaskSpan(scope: Weft.Scope): Span | undefined {
  return findSpan(scope.job);
}
