import type { MaybePromise, Weft } from "@weft/core"
import type { Flow } from "./flow"

export namespace WeftFlow {
  /**
   * Receives the values of one collection.
   * The returned promise is the backpressure: a producer must not call
   * `emit` again before it settles.
   */
  export interface Collector<T> {
    emit(value: T): Promise<void>
  }

  /** Runs one collection: drives `collector` inside `scope` until done */
  export type CollectFn<T> = (collector: Collector<T>, scope: Weft.Scope) => Promise<void>

  export type Block<T> = (collector: Collector<T>, scope: Weft.Scope) => MaybePromise<void>

  /** Handed to a `channelFlow` block */
  export interface ProducerScope<T> {
    /** Scope of the producer; jobs launched here may send concurrently */
    readonly scope: Weft.Scope
    /** Suspends while the channel is full */
    send(value: T): Promise<void>
  }

  export interface ChannelFlowOptions {
    /** Default: 16 */
    capacity?: number
  }

  export interface SharedFlowOptions {
    /** Retained entries besides the replay ones. Default: 16 */
    capacity?: number
    /** Most recent values handed to each new subscriber first. Default: 0 */
    replay?: number
  }

  export interface SharedFlow<T> {
    /** Never suspends: when full, the oldest retained value is evicted */
    emit(value: T): void
    tryEmit(value: T): boolean
    asFlow(): Flow<T>
    readonly subscriptionCount: number
    readonly replayCache: ReadonlyArray<T>
    resetReplayCache(): void
  }

  export interface StateFlowOptions<T> {
    /** Default: structural equality */
    equals?: (a: T, b: T) => boolean
  }

  export interface StateFlow<T> {
    readonly value: T
    get(): T
    set(value: T): void
    emit(value: T): void
    update(fn: (current: T) => T): void
    /** Set `next` only if the current value equals `expect` */
    compareAndSet(expect: T, next: T): boolean
    asFlow(): Flow<T>
    readonly subscriptionCount: number
  }

  export namespace Utils {
    export type FlowValue<F> = F extends Flow<infer T> ? T : never
  }
}
