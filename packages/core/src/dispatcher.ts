import { dispatcherSymbol } from "./symbols"
import type { Weft } from "./types"
import { DispatcherUnavailableError } from "./errors"
import { Executors } from "./executor"

type Pending = {
  task: () => void
  onDropped?: (error: DispatcherUnavailableError) => void
}

class DispatcherImpl implements Weft.Dispatcher {
  readonly [dispatcherSymbol] = true as const
  private readonly pending = new Set<Pending>()
  private _closed = false

  constructor(
    readonly name: string,
    private readonly executor: Weft.Executor
  ) {}

  get closed(): boolean {
    return this._closed
  }

  dispatch(task: () => void, onDropped?: (error: DispatcherUnavailableError) => void): void {
    if (this._closed) {
      const error = new DispatcherUnavailableError(this.name)
      if (!onDropped) throw error
      onDropped(error)
      return
    }

    const entry: Pending = { task, onDropped }
    this.pending.add(entry)
    try {
      this.executor.execute(() => {
        if (!this.pending.delete(entry)) return
        entry.task()
      })
    } catch (err) {
      this.pending.delete(entry)
      const error = new DispatcherUnavailableError(this.name, err)
      if (!onDropped) throw error
      onDropped(error)
    }
  }

  isDispatchNeeded(current?: Weft.Dispatcher): boolean {
    return current !== this
  }

  close(): void {
    if (this._closed) return
    this._closed = true

    const dropped = Array.from(this.pending)
    this.pending.clear()
    for (const entry of dropped) {
      try {
        entry.onDropped?.(new DispatcherUnavailableError(this.name))
      } catch (err) {
        console.error(`Error handling dropped task on dispatcher "${this.name}":`, err)
      }
    }
    this.executor.shutdown?.()
  }
}

/**
 * Wrap an executor into a named dispatcher.
 *
 * @example
 * ```typescript
 * const executor = Executors.manual()
 * const ui = createDispatcher("ui", executor)
 * scope.launch(render, { dispatcher: ui })
 * executor.drain()
 * ```
 */
export function createDispatcher(name: string, executor: Weft.Executor): Weft.Dispatcher {
  return new DispatcherImpl(name, executor)
}

export function isDispatcher(value: unknown): value is Weft.Dispatcher {
  return (
    typeof value === "object" &&
    value !== null &&
    (value as Record<symbol, unknown>)[dispatcherSymbol] === true
  )
}

/**
 * Process-wide dispatchers. `Default` and `IO` hop to a fresh macrotask,
 * `Main` to a microtask, `Unconfined` runs in place.
 */
export const Dispatchers: {
  readonly Default: Weft.Dispatcher
  readonly IO: Weft.Dispatcher
  readonly Main: Weft.Dispatcher
  readonly Unconfined: Weft.Dispatcher
} = {
  Default: createDispatcher("Default", Executors.macrotask()),
  IO: createDispatcher("IO", Executors.macrotask()),
  Main: createDispatcher("Main", Executors.microtask()),
  Unconfined: createDispatcher("Unconfined", Executors.inline()),
}
