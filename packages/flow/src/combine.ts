import type { MaybePromise } from "@weft/core"
import type { WeftFlow } from "./types"
import { Channel } from "./channel"
import { FlowAbortedError } from "./errors"
import { drainProducers, type Producer } from "./produce"

type CollectFn<T> = WeftFlow.CollectFn<T>

type Update<A, B> = { side: 'a'; value: A } | { side: 'b'; value: B }

/**
 * Emit `fn(latestA, latestB)` whenever either side emits, once both sides
 * have produced a value. Completes when both sides complete.
 */
export function combine<A, B, R>(
  a: CollectFn<A>,
  b: CollectFn<B>,
  fn: (a: A, b: B) => MaybePromise<R>
): CollectFn<R> {
  return (collector, scope) => {
    let latestA: { value: A } | undefined
    let latestB: { value: B } | undefined

    return drainProducers<Update<A, B>>(
      scope,
      [
        (send, producerScope) => a({ emit: (value) => send({ side: 'a', value }) }, producerScope),
        (send, producerScope) => b({ emit: (value) => send({ side: 'b', value }) }, producerScope),
      ],
      { capacity: 0 },
      async (update) => {
        if (update.side === 'a') {
          latestA = { value: update.value }
        } else {
          latestB = { value: update.value }
        }
        if (latestA && latestB) {
          await collector.emit(await fn(latestA.value, latestB.value))
        }
      }
    )
  }
}

/** Pair values one to one; completes as soon as either side completes */
export function zip<A, B, R>(
  a: CollectFn<A>,
  b: CollectFn<B>,
  fn: (a: A, b: B) => MaybePromise<R>
): CollectFn<R> {
  return (collector, scope) =>
    scope.coroutineScope(async (inner) => {
      const channel = new Channel<B>(0)
      const producer = inner.launch(async (producerScope) => {
        try {
          await b({ emit: (value) => channel.send(value, producerScope.token) }, producerScope)
          channel.close()
        } catch (error) {
          channel.fail(error)
        }
      })

      const stop = new FlowAbortedError()
      try {
        await a({
          emit: async (value) => {
            const other = await channel.receive(inner.token)
            if (other.done) throw stop
            await collector.emit(await fn(value, other.value))
          },
        }, inner)
      } catch (error) {
        if (error !== stop) throw error
      } finally {
        producer.cancel()
      }
    })
}

type Sample<T> = { kind: 'value'; value: T } | { kind: 'tick' } | { kind: 'done' }

/**
 * On every emission of `sampler`, emit the latest upstream value if it was
 * not emitted yet. Completes with the upstream.
 */
export function sample<T>(upstream: CollectFn<T>, sampler: CollectFn<unknown>): CollectFn<T> {
  return async (collector, scope) => {
    let latest: { value: T } | undefined
    const stop = new FlowAbortedError()

    try {
      await drainProducers<Sample<T>>(
        scope,
        [
          async (send, producerScope) => {
            await upstream({ emit: (value) => send({ kind: 'value', value }) }, producerScope)
            await send({ kind: 'done' })
          },
          (send, producerScope) => sampler({ emit: () => send({ kind: 'tick' }) }, producerScope),
        ],
        { capacity: 0 },
        async (message) => {
          if (message.kind === 'value') {
            latest = { value: message.value }
            return
          }
          if (message.kind === 'done') throw stop
          if (latest) {
            const { value } = latest
            latest = undefined
            await collector.emit(value)
          }
        }
      )
    } catch (error) {
      if (error !== stop) throw error
    }
  }
}

export function concat<T>(first: CollectFn<T>, second: CollectFn<T>): CollectFn<T> {
  return async (collector, scope) => {
    await first(collector, scope)
    await second(collector, scope)
  }
}

export function startWith<T>(upstream: CollectFn<T>, values: ReadonlyArray<T>): CollectFn<T> {
  return async (collector, scope) => {
    for (const value of values) {
      await collector.emit(value)
    }
    await upstream(collector, scope)
  }
}

/** Collect every source concurrently; completes once all of them complete */
export function merge<T>(sources: ReadonlyArray<CollectFn<T>>): CollectFn<T> {
  return (collector, scope) =>
    drainProducers<T>(
      scope,
      sources.map((source): Producer<T> => (send, producerScope) => source({ emit: send }, producerScope)),
      { capacity: 0 },
      (value) => collector.emit(value)
    )
}
