import type { Tracer, Meter } from "@opentelemetry/api";
import type { Weft } from "@weft/core";

export namespace OtelExtension {
  export interface Options {
    /** Tracer for span creation (required) */
    readonly tracer: Tracer;
    /** Meter for metrics (optional) */
    readonly meter?: Meter;
    /** Filter tasks to trace (default: all) */
    readonly taskFilter?: (task: Weft.TaskInfo) => boolean;
    /** Custom span name (default: the task name, else its kind) */
    readonly spanName?: (task: Weft.TaskInfo) => string;
  }
}
