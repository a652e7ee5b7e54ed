import type { MaybePromise } from "@weft/core"
import type { WeftFlow } from "./types"
import type { Flow } from "./flow"
import { FlowAbortedError } from "./errors"
import { assertCount } from "./collect"

type CollectFn<T> = WeftFlow.CollectFn<T>

export function map<T, R>(upstream: CollectFn<T>, fn: (value: T) => MaybePromise<R>): CollectFn<R> {
  return (collector, scope) =>
    upstream({ emit: async (value) => collector.emit(await fn(value)) }, scope)
}

export function filter<T>(upstream: CollectFn<T>, predicate: (value: T) => MaybePromise<boolean>): CollectFn<T> {
  return (collector, scope) =>
    upstream({
      emit: async (value) => {
        if (await predicate(value)) {
          await collector.emit(value)
        }
      },
    }, scope)
}

export function onEach<T>(upstream: CollectFn<T>, action: (value: T) => MaybePromise<void>): CollectFn<T> {
  return (collector, scope) =>
    upstream({
      emit: async (value) => {
        await action(value)
        await collector.emit(value)
      },
    }, scope)
}

/** `fn` may emit any number of values downstream per upstream value */
export function transform<T, R>(
  upstream: CollectFn<T>,
  fn: (value: T, collector: WeftFlow.Collector<R>) => MaybePromise<void>
): CollectFn<R> {
  return (collector, scope) =>
    upstream({
      emit: async (value) => {
        await fn(value, collector)
      },
    }, scope)
}

/**
 * Forward the first `count` values, then unwind the upstream at the emit
 * that delivered the last one.
 */
export function take<T>(upstream: CollectFn<T>, count: number): CollectFn<T> {
  assertCount("take", count)
  return async (collector, scope) => {
    if (count === 0) return
    const stop = new FlowAbortedError()
    let taken = 0
    try {
      await upstream({
        emit: async (value) => {
          taken++
          await collector.emit(value)
          if (taken >= count) throw stop
        },
      }, scope)
    } catch (error) {
      if (error !== stop) throw error
    }
  }
}

export function takeWhile<T>(upstream: CollectFn<T>, predicate: (value: T) => MaybePromise<boolean>): CollectFn<T> {
  return async (collector, scope) => {
    const stop = new FlowAbortedError()
    try {
      await upstream({
        emit: async (value) => {
          if (!(await predicate(value))) throw stop
          await collector.emit(value)
        },
      }, scope)
    } catch (error) {
      if (error !== stop) throw error
    }
  }
}

export function drop<T>(upstream: CollectFn<T>, count: number): CollectFn<T> {
  assertCount("drop", count)
  return (collector, scope) => {
    let skipped = 0
    return upstream({
      emit: async (value) => {
        if (skipped < count) {
          skipped++
          return
        }
        await collector.emit(value)
      },
    }, scope)
  }
}

export function dropWhile<T>(upstream: CollectFn<T>, predicate: (value: T) => MaybePromise<boolean>): CollectFn<T> {
  return (collector, scope) => {
    let dropping = true
    return upstream({
      emit: async (value) => {
        if (dropping && (await predicate(value))) return
        dropping = false
        await collector.emit(value)
      },
    }, scope)
  }
}

export function distinctUntilChangedBy<T, K>(
  upstream: CollectFn<T>,
  key: (value: T) => K,
  equals: (a: K, b: K) => boolean = Object.is
): CollectFn<T> {
  return (collector, scope) => {
    let last: { key: K } | undefined
    return upstream({
      emit: async (value) => {
        const current = key(value)
        if (last && equals(last.key, current)) return
        last = { key: current }
        await collector.emit(value)
      },
    }, scope)
  }
}

export function flatMapConcat<T, R>(upstream: CollectFn<T>, fn: (value: T) => Flow<R>): CollectFn<R> {
  return (collector, scope) =>
    upstream({ emit: (value) => fn(value).collectTo(collector, scope) }, scope)
}
