import type { MaybePromise, Weft } from "@weft/core"
import type { WeftFlow } from "./types"
import { ConcurrentEmitError } from "./errors"
import { runCollection } from "./collect"
import * as transforms from "./transform"
import * as produce from "./produce"
import * as lifecycle from "./lifecycle"
import * as combining from "./combine"
import * as terminal from "./terminal"
import { flatMapLatest, mapLatest } from "./latest"

export const flowSymbol: unique symbol = Symbol.for("@weft/flow/flow")

/**
 * Collector handed to `flow` blocks: rejects overlapping emissions and
 * checks the collecting scope for cancellation before each value.
 */
class SafeCollector<T> implements WeftFlow.Collector<T> {
  private emitting = false

  constructor(
    private readonly downstream: WeftFlow.Collector<T>,
    private readonly scope: Weft.Scope
  ) {}

  async emit(value: T): Promise<void> {
    if (this.emitting) throw new ConcurrentEmitError()
    this.scope.ensureActive()
    this.emitting = true
    try {
      await this.downstream.emit(value)
    } finally {
      this.emitting = false
    }
  }
}

/**
 * A cold, restartable stream of values.
 *
 * Nothing runs until a terminal operator collects it, and every collection
 * runs the whole chain again with fresh state. Intermediate operators return
 * new flows; terminal operators take an optional scope and otherwise collect
 * in the ambient scope of the calling task.
 *
 * @example
 * ```typescript
 * const squares = await flowOf(1, 2, 3, 4, 5)
 *   .filter((x) => x % 2 === 0)
 *   .map((x) => x * x)
 *   .toArray()
 * // [4, 16]
 * ```
 */
export class Flow<T> {
  readonly [flowSymbol] = true as const

  constructor(private readonly source: WeftFlow.CollectFn<T>) {}

  /** Low-level collection into `collector` within `scope` */
  collectTo(collector: WeftFlow.Collector<T>, scope: Weft.Scope): Promise<void> {
    return this.source(collector, scope)
  }

  collect(action?: (value: T) => MaybePromise<void>, scope?: Weft.Scope): Promise<void> {
    return runCollection(this.source, action ?? (() => {}), scope)
  }

  /** Collect in a new job launched in `scope` */
  launchIn(scope: Weft.Scope): Weft.Job<void> {
    return scope.launch((jobScope) => this.collect(undefined, jobScope))
  }

  /** Like `collect`, but a new value cancels the action still running for the previous one */
  collectLatest(action: (value: T, scope: Weft.Scope) => MaybePromise<void>, scope?: Weft.Scope): Promise<void> {
    return this.mapLatest(action).collect(undefined, scope)
  }

  map<R>(fn: (value: T) => MaybePromise<R>): Flow<R> {
    return new Flow(transforms.map(this.source, fn))
  }

  filter<S extends T>(predicate: (value: T) => value is S): Flow<S>
  filter(predicate: (value: T) => MaybePromise<boolean>): Flow<T>
  filter(predicate: (value: T) => MaybePromise<boolean>): Flow<T> {
    return new Flow(transforms.filter(this.source, predicate))
  }

  onEach(action: (value: T) => MaybePromise<void>): Flow<T> {
    return new Flow(transforms.onEach(this.source, action))
  }

  transform<R>(fn: (value: T, collector: WeftFlow.Collector<R>) => MaybePromise<void>): Flow<R> {
    return new Flow(transforms.transform(this.source, fn))
  }

  /** @throws RangeError when `count` is not a non-negative integer */
  take(count: number): Flow<T> {
    return new Flow(transforms.take(this.source, count))
  }

  takeWhile(predicate: (value: T) => MaybePromise<boolean>): Flow<T> {
    return new Flow(transforms.takeWhile(this.source, predicate))
  }

  drop(count: number): Flow<T> {
    return new Flow(transforms.drop(this.source, count))
  }

  dropWhile(predicate: (value: T) => MaybePromise<boolean>): Flow<T> {
    return new Flow(transforms.dropWhile(this.source, predicate))
  }

  /** Default equality: `Object.is` */
  distinctUntilChanged(equals?: (a: T, b: T) => boolean): Flow<T> {
    return new Flow(transforms.distinctUntilChangedBy(this.source, (value) => value, equals))
  }

  distinctUntilChangedBy<K>(key: (value: T) => K): Flow<T> {
    return new Flow(transforms.distinctUntilChangedBy(this.source, key))
  }

  flatMapConcat<R>(fn: (value: T) => Flow<R>): Flow<R> {
    return new Flow(transforms.flatMapConcat(this.source, fn))
  }

  flatMapLatest<R>(fn: (value: T) => Flow<R>): Flow<R> {
    return new Flow(flatMapLatest(this.source, fn))
  }

  mapLatest<R>(fn: (value: T, scope: Weft.Scope) => MaybePromise<R>): Flow<R> {
    return new Flow(mapLatest(this.source, fn))
  }

  /**
   * Run the upstream in a producer job, up to `capacity` values ahead of
   * the downstream. `buffer(0)` is a direct handoff.
   */
  buffer(capacity: number): Flow<T> {
    return new Flow(produce.buffer(this.source, capacity))
  }

  /** Run the upstream on `dispatcher`; downstream stays where it is collected */
  flowOn(dispatcher: Weft.Dispatcher): Flow<T> {
    return new Flow(produce.flowOn(this.source, dispatcher))
  }

  onStart(action: (collector: WeftFlow.Collector<T>) => MaybePromise<void>): Flow<T> {
    return new Flow(lifecycle.onStart(this.source, action))
  }

  onCompletion(action: (error?: unknown) => MaybePromise<void>): Flow<T> {
    return new Flow(lifecycle.onCompletion(this.source, action))
  }

  onEmpty(action: (collector: WeftFlow.Collector<T>) => MaybePromise<void>): Flow<T> {
    return new Flow(lifecycle.onEmpty(this.source, action))
  }

  catchError(handler: (error: unknown, collector: WeftFlow.Collector<T>) => MaybePromise<void>): Flow<T> {
    return new Flow(lifecycle.catchError(this.source, handler))
  }

  retry(times: number, predicate?: (error: unknown, attempt: number) => MaybePromise<boolean>): Flow<T> {
    return new Flow(lifecycle.retry(this.source, times, predicate))
  }

  /** Stop collecting, without an error, once `ms` elapsed */
  withTimeout(ms: number): Flow<T> {
    return new Flow(lifecycle.timeout(this.source, ms))
  }

  combine<U, R>(other: Flow<U>, fn: (a: T, b: U) => MaybePromise<R>): Flow<R> {
    return new Flow(combining.combine(this.source, other.source, fn))
  }

  zip<U, R>(other: Flow<U>, fn: (a: T, b: U) => MaybePromise<R>): Flow<R> {
    return new Flow(combining.zip(this.source, other.source, fn))
  }

  sample(sampler: Flow<unknown>): Flow<T> {
    return new Flow(combining.sample(this.source, sampler.source))
  }

  concat(other: Flow<T>): Flow<T> {
    return new Flow(combining.concat(this.source, other.source))
  }

  startWith(...values: T[]): Flow<T> {
    return new Flow(combining.startWith(this.source, values))
  }

  mergeWith(...others: Flow<T>[]): Flow<T> {
    return new Flow(combining.merge([this.source, ...others.map((other) => other.source)]))
  }

  toArray(scope?: Weft.Scope): Promise<T[]> {
    return terminal.toArray(this.source, scope)
  }

  toSet(scope?: Weft.Scope): Promise<Set<T>> {
    return terminal.toSet(this.source, scope)
  }

  first(predicate?: (value: T) => MaybePromise<boolean>, scope?: Weft.Scope): Promise<T> {
    return terminal.first(this.source, predicate, scope)
  }

  firstOrUndefined(predicate?: (value: T) => MaybePromise<boolean>, scope?: Weft.Scope): Promise<T | undefined> {
    return terminal.firstOrUndefined(this.source, predicate, scope)
  }

  last(predicate?: (value: T) => MaybePromise<boolean>, scope?: Weft.Scope): Promise<T> {
    return terminal.last(this.source, predicate, scope)
  }

  lastOrUndefined(predicate?: (value: T) => MaybePromise<boolean>, scope?: Weft.Scope): Promise<T | undefined> {
    return terminal.lastOrUndefined(this.source, predicate, scope)
  }

  single(scope?: Weft.Scope): Promise<T> {
    return terminal.single(this.source, scope)
  }

  singleOrUndefined(scope?: Weft.Scope): Promise<T | undefined> {
    return terminal.singleOrUndefined(this.source, scope)
  }

  fold<A>(initial: A, fn: (acc: A, value: T) => MaybePromise<A>, scope?: Weft.Scope): Promise<A> {
    return terminal.fold(this.source, initial, fn, scope)
  }

  reduce(fn: (acc: T, value: T) => MaybePromise<T>, scope?: Weft.Scope): Promise<T> {
    return terminal.reduce(this.source, fn, scope)
  }

  count(predicate?: (value: T) => MaybePromise<boolean>, scope?: Weft.Scope): Promise<number> {
    return terminal.count(this.source, predicate, scope)
  }

  any(predicate: (value: T) => MaybePromise<boolean>, scope?: Weft.Scope): Promise<boolean> {
    return terminal.any(this.source, predicate, scope)
  }

  all(predicate: (value: T) => MaybePromise<boolean>, scope?: Weft.Scope): Promise<boolean> {
    return terminal.all(this.source, predicate, scope)
  }

  none(predicate: (value: T) => MaybePromise<boolean>, scope?: Weft.Scope): Promise<boolean> {
    return terminal.none(this.source, predicate, scope)
  }
}

/**
 * Build a flow from a block that emits values.
 *
 * The block runs once per collection. Each `emit` suspends until the
 * downstream has handled the value and must be awaited before the next one.
 *
 * @example
 * ```typescript
 * const ticks = flow<number>(async (collector, scope) => {
 *   for (let i = 0; ; i++) {
 *     await scope.delay(100)
 *     await collector.emit(i)
 *   }
 * })
 * ```
 */
export function flow<T>(block: WeftFlow.Block<T>): Flow<T> {
  return new Flow<T>(async (collector, scope) => {
    await block(new SafeCollector(collector, scope), scope)
  })
}

export function isFlow(value: unknown): value is Flow<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    (value as Record<symbol, unknown>)[flowSymbol] === true
  )
}
