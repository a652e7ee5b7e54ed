import { deferredSymbol } from "./symbols"
import type { Weft } from "./types"
import type { JobImpl } from "./job"
import { JobStateError } from "./errors"
import { unwrapOutcome } from "./internal/outcome"

export class DeferredImpl<T> implements Weft.Deferred<T> {
  readonly [deferredSymbol] = true as const

  constructor(private readonly _job: JobImpl<T>) {}

  get job(): Weft.Job<T> {
    return this._job
  }

  get isCompleted(): boolean {
    return this._job.isCompleted
  }

  get isCancelled(): boolean {
    return this._job.isCancelled
  }

  await(): Promise<T> {
    return this._job.join()
  }

  getCompleted(): T {
    const outcome = this._job.settledOutcome()
    if (!outcome) {
      throw new JobStateError(
        `Deferred ${this._job.describe()} has not completed yet`,
        this._job.name ?? `#${this._job.id}`
      )
    }
    return unwrapOutcome(outcome)
  }

  cancel(reason?: unknown): void {
    this._job.cancel(reason)
  }

  join(): Promise<T> {
    return this._job.join()
  }
}

export function isDeferred(value: unknown): value is Weft.Deferred<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    (value as Record<symbol, unknown>)[deferredSymbol] === true
  )
}

/**
 * Await every deferred concurrently. Rejects with the first failure
 * in settlement order; the other deferreds keep running.
 */
export function awaitAll<T>(deferreds: ReadonlyArray<Weft.Deferred<T>>): Promise<T[]> {
  return Promise.all(deferreds.map((deferred) => deferred.await()))
}
