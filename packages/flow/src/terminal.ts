import type { MaybePromise, Weft } from "@weft/core"
import type { WeftFlow } from "./types"
import { FlowAbortedError, MoreThanOneElementError, NoSuchElementError } from "./errors"
import { runCollection } from "./collect"

type CollectFn<T> = WeftFlow.CollectFn<T>
type Predicate<T> = (value: T) => MaybePromise<boolean>

const always = () => true

/** Stops the upstream at the first match */
async function findFirst<T>(
  source: CollectFn<T>,
  predicate: Predicate<T>,
  scope: Weft.Scope | undefined
): Promise<{ value: T } | undefined> {
  const stop = new FlowAbortedError()
  let found: { value: T } | undefined
  try {
    await runCollection(source, async (value) => {
      if (await predicate(value)) {
        found = { value }
        throw stop
      }
    }, scope)
  } catch (error) {
    if (error !== stop) throw error
  }
  return found
}

export async function toArray<T>(source: CollectFn<T>, scope?: Weft.Scope): Promise<T[]> {
  const values: T[] = []
  await runCollection(source, (value) => {
    values.push(value)
  }, scope)
  return values
}

export async function toSet<T>(source: CollectFn<T>, scope?: Weft.Scope): Promise<Set<T>> {
  const values = new Set<T>()
  await runCollection(source, (value) => {
    values.add(value)
  }, scope)
  return values
}

/**
 * @throws NoSuchElementError when no value matches
 */
export async function first<T>(source: CollectFn<T>, predicate?: Predicate<T>, scope?: Weft.Scope): Promise<T> {
  const found = await findFirst(source, predicate ?? always, scope)
  if (!found) {
    throw new NoSuchElementError(predicate ? "No value of the flow matches the predicate" : "Flow is empty")
  }
  return found.value
}

export async function firstOrUndefined<T>(
  source: CollectFn<T>,
  predicate?: Predicate<T>,
  scope?: Weft.Scope
): Promise<T | undefined> {
  const found = await findFirst(source, predicate ?? always, scope)
  return found?.value
}

async function findLast<T>(
  source: CollectFn<T>,
  predicate: Predicate<T>,
  scope: Weft.Scope | undefined
): Promise<{ value: T } | undefined> {
  let found: { value: T } | undefined
  await runCollection(source, async (value) => {
    if (await predicate(value)) {
      found = { value }
    }
  }, scope)
  return found
}

export async function last<T>(source: CollectFn<T>, predicate?: Predicate<T>, scope?: Weft.Scope): Promise<T> {
  const found = await findLast(source, predicate ?? always, scope)
  if (!found) {
    throw new NoSuchElementError(predicate ? "No value of the flow matches the predicate" : "Flow is empty")
  }
  return found.value
}

export async function lastOrUndefined<T>(
  source: CollectFn<T>,
  predicate?: Predicate<T>,
  scope?: Weft.Scope
): Promise<T | undefined> {
  const found = await findLast(source, predicate ?? always, scope)
  return found?.value
}

/**
 * @throws NoSuchElementError when the flow is empty
 * @throws MoreThanOneElementError as soon as a second value arrives
 */
export async function single<T>(source: CollectFn<T>, scope?: Weft.Scope): Promise<T> {
  let only: { value: T } | undefined
  await runCollection(source, (value) => {
    if (only) throw new MoreThanOneElementError()
    only = { value }
  }, scope)
  if (!only) throw new NoSuchElementError()
  return only.value
}

/** The only value, or undefined when the flow is empty or has more than one */
export async function singleOrUndefined<T>(source: CollectFn<T>, scope?: Weft.Scope): Promise<T | undefined> {
  const stop = new FlowAbortedError()
  let only: { value: T } | undefined
  let seen = 0
  try {
    await runCollection(source, (value) => {
      seen++
      if (seen > 1) throw stop
      only = { value }
    }, scope)
  } catch (error) {
    if (error !== stop) throw error
  }
  return seen === 1 ? only?.value : undefined
}

export async function fold<T, A>(
  source: CollectFn<T>,
  initial: A,
  fn: (acc: A, value: T) => MaybePromise<A>,
  scope?: Weft.Scope
): Promise<A> {
  let acc = initial
  await runCollection(source, async (value) => {
    acc = await fn(acc, value)
  }, scope)
  return acc
}

/**
 * @throws NoSuchElementError when the flow is empty
 */
export async function reduce<T>(
  source: CollectFn<T>,
  fn: (acc: T, value: T) => MaybePromise<T>,
  scope?: Weft.Scope
): Promise<T> {
  let acc: { value: T } | undefined
  await runCollection(source, async (value) => {
    acc = { value: acc ? await fn(acc.value, value) : value }
  }, scope)
  if (!acc) throw new NoSuchElementError("Cannot reduce an empty flow")
  return acc.value
}

export async function count<T>(source: CollectFn<T>, predicate?: Predicate<T>, scope?: Weft.Scope): Promise<number> {
  let total = 0
  await runCollection(source, async (value) => {
    if (!predicate || (await predicate(value))) total++
  }, scope)
  return total
}

export async function any<T>(source: CollectFn<T>, predicate: Predicate<T>, scope?: Weft.Scope): Promise<boolean> {
  return (await findFirst(source, predicate, scope)) !== undefined
}

export async function all<T>(source: CollectFn<T>, predicate: Predicate<T>, scope?: Weft.Scope): Promise<boolean> {
  const counterexample = await findFirst(source, async (value) => !(await predicate(value)), scope)
  return counterexample === undefined
}

export async function none<T>(source: CollectFn<T>, predicate: Predicate<T>, scope?: Weft.Scope): Promise<boolean> {
  return (await findFirst(source, predicate, scope)) === undefined
}
