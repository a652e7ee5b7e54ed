import { isCancellation, type MaybePromise, type Weft } from "@weft/core"
import type { WeftFlow } from "./types"
import { isFlowAbort } from "./errors"
import { assertCount } from "./collect"

type CollectFn<T> = WeftFlow.CollectFn<T>

/**
 * Collect `upstream`, remembering which error came from downstream so
 * that upstream-facing handlers can leave it alone.
 */
async function collectTracked<T>(
  upstream: CollectFn<T>,
  collector: WeftFlow.Collector<T>,
  scope: Weft.Scope
): Promise<{ failed: false } | { failed: true; error: unknown; downstream: boolean }> {
  let downstreamError: { error: unknown } | undefined
  try {
    await upstream({
      emit: async (value) => {
        try {
          await collector.emit(value)
        } catch (error) {
          downstreamError = { error }
          throw error
        }
      },
    }, scope)
    return { failed: false }
  } catch (error) {
    return { failed: true, error, downstream: downstreamError?.error === error }
  }
}

export function onStart<T>(
  upstream: CollectFn<T>,
  action: (collector: WeftFlow.Collector<T>) => MaybePromise<void>
): CollectFn<T> {
  return async (collector, scope) => {
    await action(collector)
    await upstream(collector, scope)
  }
}

/**
 * Run `action` once the upstream is done. It receives the failure or
 * cancellation that ended the collection, or nothing when the upstream
 * completed or a downstream operator stopped it; the failure is rethrown.
 */
export function onCompletion<T>(
  upstream: CollectFn<T>,
  action: (error?: unknown) => MaybePromise<void>
): CollectFn<T> {
  return async (collector, scope) => {
    try {
      await upstream(collector, scope)
    } catch (error) {
      await action(isFlowAbort(error) ? undefined : error)
      throw error
    }
    await action()
  }
}

export function onEmpty<T>(
  upstream: CollectFn<T>,
  action: (collector: WeftFlow.Collector<T>) => MaybePromise<void>
): CollectFn<T> {
  return async (collector, scope) => {
    let empty = true
    await upstream({
      emit: (value) => {
        empty = false
        return collector.emit(value)
      },
    }, scope)
    if (empty) {
      await action(collector)
    }
  }
}

/**
 * Handle upstream failures. Cancellation and errors thrown downstream of
 * this operator are rethrown untouched.
 */
export function catchError<T>(
  upstream: CollectFn<T>,
  handler: (error: unknown, collector: WeftFlow.Collector<T>) => MaybePromise<void>
): CollectFn<T> {
  return async (collector, scope) => {
    const result = await collectTracked(upstream, collector, scope)
    if (!result.failed) return
    if (result.downstream || isCancellation(result.error) || isFlowAbort(result.error)) {
      throw result.error
    }
    await handler(result.error, collector)
  }
}

/**
 * Collect `upstream` again after an upstream failure, up to `times` more
 * times, while `predicate` allows it.
 */
export function retry<T>(
  upstream: CollectFn<T>,
  times: number,
  predicate: (error: unknown, attempt: number) => MaybePromise<boolean> = () => true
): CollectFn<T> {
  assertCount("retry", times)
  return async (collector, scope) => {
    for (let attempt = 0; ; attempt++) {
      const result = await collectTracked(upstream, collector, scope)
      if (!result.failed) return
      const retryable =
        !result.downstream &&
        !isCancellation(result.error) &&
        !isFlowAbort(result.error) &&
        attempt < times &&
        (await predicate(result.error, attempt + 1))
      if (!retryable) throw result.error
    }
  }
}

/** Stop collecting silently once `ms` elapsed */
export function timeout<T>(upstream: CollectFn<T>, ms: number): CollectFn<T> {
  return async (collector, scope) => {
    await scope.withTimeoutOrUndefined(ms, (timed) => upstream(collector, timed))
  }
}
