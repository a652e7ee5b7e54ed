export { createOtel } from "./extension";
export { extractContext, injectTaskContext, getTaskSpan } from "./propagation";
export type { OtelExtension } from "./types";
export type { OtelMetrics } from "./metrics";

export const VERSION = "0.1.0";
