import { currentScope, type Weft } from "@weft/core"
import type { WeftFlow } from "./types"
import { Channel } from "./channel"
import { assertCount } from "./collect"

type CollectFn<T> = WeftFlow.CollectFn<T>

/** Sends values into a shared channel from its own child job */
export type Producer<T> = (send: (value: T) => Promise<void>, scope: Weft.Scope) => Promise<void>

export interface ProduceOptions {
  readonly capacity: number
  /** Dispatcher of the producer jobs. Default: the collecting scope's */
  readonly dispatcher?: Weft.Dispatcher
}

/**
 * Run every producer in its own child job and feed what they send to
 * `onValue`, one value at a time, in the calling task.
 *
 * Resolves once all producers finished and the channel is drained. The
 * first producer failure becomes the result; leaving early, by failure or
 * by an abort thrown from `onValue`, cancels the remaining producers and
 * waits for them.
 */
export function drainProducers<T>(
  scope: Weft.Scope,
  producers: ReadonlyArray<Producer<T>>,
  options: ProduceOptions,
  onValue: (value: T) => Promise<void>
): Promise<void> {
  return scope.coroutineScope(async (inner) => {
    const channel = new Channel<T>(options.capacity)
    let running = producers.length
    if (running === 0) channel.close()

    const jobs = producers.map((produce) => {
      const job = inner.async(
        (producerScope) =>
          produce(
            (value) => channel.send(value, currentScope()?.token ?? producerScope.token),
            producerScope
          ),
        { dispatcher: options.dispatcher }
      )
      void job.await().then(
        () => {
          running--
          if (running === 0) channel.close()
        },
        (error: unknown) => channel.fail(error)
      )
      return job
    })

    try {
      for (;;) {
        const next = await channel.receive(inner.token)
        if (next.done) return
        await onValue(next.value)
      }
    } finally {
      for (const job of jobs) job.cancel()
    }
  })
}

/**
 * Collect `upstream` in a producer job ahead of the consumer, with up to
 * `capacity` values in flight. `capacity` 0 hands every value over directly.
 */
export function buffer<T>(upstream: CollectFn<T>, capacity: number, dispatcher?: Weft.Dispatcher): CollectFn<T> {
  assertCount("buffer", capacity)
  return (collector, scope) =>
    drainProducers<T>(
      scope,
      [(send, producerScope) => upstream({ emit: send }, producerScope)],
      { capacity, dispatcher },
      (value) => collector.emit(value)
    )
}

export function flowOn<T>(upstream: CollectFn<T>, dispatcher: Weft.Dispatcher): CollectFn<T> {
  return (collector, scope) => {
    if (!dispatcher.isDispatchNeeded(scope.dispatcher)) {
      return upstream(collector, scope)
    }
    return buffer(upstream, 1, dispatcher)(collector, scope)
  }
}

export function channelSource<T>(
  block: (producer: WeftFlow.ProducerScope<T>) => Promise<void> | void,
  capacity: number
): CollectFn<T> {
  assertCount("channelFlow capacity", capacity)
  return (collector, scope) =>
    drainProducers<T>(
      scope,
      [async (send, producerScope) => {
        await block({ scope: producerScope, send })
      }],
      { capacity },
      (value) => collector.emit(value)
    )
}
