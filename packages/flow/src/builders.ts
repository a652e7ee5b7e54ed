import type { MaybePromise } from "@weft/core"
import type { WeftFlow } from "./types"
import { Flow, flow } from "./flow"
import { channelSource } from "./produce"
import { merge as mergeSources } from "./combine"

export function flowOf<T>(...values: T[]): Flow<T> {
  return flow<T>(async (collector) => {
    for (const value of values) {
      await collector.emit(value)
    }
  })
}

export function emptyFlow<T = never>(): Flow<T> {
  return new Flow<T>(async () => {})
}

export function asFlow<T>(source: Iterable<T> | AsyncIterable<T>): Flow<T> {
  return flow<T>(async (collector) => {
    for await (const value of source) {
      await collector.emit(value)
    }
  })
}

/** Integers from `start` up to, not including, `endExclusive` */
export function range(start: number, endExclusive: number): Flow<number> {
  if (!Number.isInteger(start) || !Number.isInteger(endExclusive)) {
    throw new RangeError(`range expects integer bounds, got ${start} and ${endExclusive}`)
  }
  return flow<number>(async (collector) => {
    for (let value = start; value < endExclusive; value++) {
      await collector.emit(value)
    }
  })
}

/** Emit what `next` returns until it returns undefined */
export function generate<T>(next: () => MaybePromise<T | undefined>): Flow<T> {
  return flow<T>(async (collector) => {
    for (;;) {
      const value = await next()
      if (value === undefined) return
      await collector.emit(value)
    }
  })
}

/** Emit `value` forever; pair with `take` or a cancellable scope */
export function repeat<T>(value: T): Flow<T> {
  return flow<T>(async (collector) => {
    for (;;) {
      await collector.emit(value)
    }
  })
}

/** Emit 0, 1, 2, … with `ms` between values, the first one after `ms` */
export function interval(ms: number): Flow<number> {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`interval expects a finite, non-negative period, got ${ms}`)
  }
  return flow<number>(async (collector, scope) => {
    for (let tick = 0; ; tick++) {
      await scope.delay(ms)
      await collector.emit(tick)
    }
  })
}

/**
 * A flow whose block sends into a bounded channel, possibly from several
 * concurrent jobs launched in `producer.scope`. The flow completes once
 * the block and every job it launched have finished.
 *
 * @example
 * ```typescript
 * const pages = channelFlow<Page>(async ({ scope, send }) => {
 *   for (const url of urls) {
 *     scope.launch(async () => send(await fetchPage(url)))
 *   }
 * })
 * ```
 */
export function channelFlow<T>(
  block: (producer: WeftFlow.ProducerScope<T>) => Promise<void> | void,
  options?: WeftFlow.ChannelFlowOptions
): Flow<T> {
  return new Flow(channelSource(block, options?.capacity ?? 16))
}

/** A flow of the single value `fn` produces */
export function fromSuspending<T>(fn: () => MaybePromise<T>): Flow<T> {
  return flow<T>(async (collector) => {
    await collector.emit(await fn())
  })
}

/** Collect every flow concurrently and interleave their values */
export function merge<T>(...flows: Flow<T>[]): Flow<T> {
  return new Flow(
    mergeSources(flows.map((source): WeftFlow.CollectFn<T> => (collector, scope) => source.collectTo(collector, scope)))
  )
}
