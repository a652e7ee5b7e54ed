import { isCancellation, type MaybePromise, type Weft } from "@weft/core"
import type { WeftFlow } from "./types"
import type { Flow } from "./flow"

type CollectFn<T> = WeftFlow.CollectFn<T>

type Handler<T, R> = (value: T, collector: WeftFlow.Collector<R>, scope: Weft.Scope) => Promise<void>

/**
 * Handle each upstream value in a child job, cancelling and joining the job
 * of the previous value first. Values emitted by a cancelled handler never
 * reach downstream; a handler failure fails the whole collection.
 */
function latest<T, R>(upstream: CollectFn<T>, handle: Handler<T, R>): CollectFn<R> {
  return async (collector, scope) => {
    let failure: { error: unknown } | undefined
    try {
      await scope.coroutineScope(async (outer) => {
        let current: Weft.Deferred<void> | undefined

        await upstream({
          emit: async (value) => {
            if (current) {
              current.cancel()
              await current.join().catch((error: unknown) => {
                if (!isCancellation(error)) throw error
              })
            }
            current = outer.async(async (inner) => {
              const guarded: WeftFlow.Collector<R> = {
                emit: (item) => {
                  inner.ensureActive()
                  return collector.emit(item)
                },
              }
              try {
                await handle(value, guarded, inner)
              } catch (error) {
                if (!isCancellation(error)) {
                  failure = { error }
                  outer.cancel(error)
                }
                throw error
              }
            })
          },
        }, outer)

        if (current) await current.await()
      })
    } catch (error) {
      if (failure) throw failure.error
      throw error
    }
  }
}

export function flatMapLatest<T, R>(upstream: CollectFn<T>, fn: (value: T) => Flow<R>): CollectFn<R> {
  return latest<T, R>(upstream, (value, collector, scope) => fn(value).collectTo(collector, scope))
}

export function mapLatest<T, R>(
  upstream: CollectFn<T>,
  fn: (value: T, scope: Weft.Scope) => MaybePromise<R>
): CollectFn<R> {
  return latest<T, R>(upstream, async (value, collector, scope) => {
    await collector.emit(await fn(value, scope))
  })
}
