import { createScope, currentScope, type MaybePromise, type Weft } from "@weft/core"
import type { WeftFlow } from "./types"

/**
 * Drive one collection of `source`, handing each value to `action`.
 *
 * Runs in `scope`, else in the ambient scope of the calling task, else in a
 * fresh root scope that is disposed once the collection ends.
 */
export async function runCollection<T>(
  source: WeftFlow.CollectFn<T>,
  action: (value: T) => MaybePromise<void>,
  scope?: Weft.Scope
): Promise<void> {
  const collector: WeftFlow.Collector<T> = {
    emit: async (value) => {
      await action(value)
    },
  }

  const target = scope ?? currentScope()
  if (target) {
    await source(collector, target)
    return
  }

  const root = createScope({ name: "collect" })
  try {
    await source(collector, root)
  } finally {
    await root.dispose()
  }
}

export function assertCount(operator: string, count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`${operator} expects a non-negative integer, got ${count}`)
  }
}
