import type { CancelToken } from "@weft/core"
import type { WeftFlow } from "./types"
import { flow, type Flow } from "./flow"
import { assertCount } from "./collect"

/** Wakes every suspended subscriber on the next change */
export class Signal {
  private readonly waiters = new Set<() => void>()

  wait(token: CancelToken): Promise<void> {
    if (token.reason) return Promise.reject(token.reason)
    return new Promise<void>((resolve, reject) => {
      const wake = () => {
        unsubscribe()
        resolve()
      }
      this.waiters.add(wake)
      const unsubscribe = token.onCancel((error) => {
        this.waiters.delete(wake)
        reject(error)
      })
    })
  }

  notifyAll(): void {
    const waiters = Array.from(this.waiters)
    this.waiters.clear()
    for (const wake of waiters) wake()
  }
}

/**
 * Hot multicast stream backed by a bounded ring of retained values.
 *
 * Values are numbered as they are emitted. Each subscriber keeps the number
 * of the next value it wants; when that value has already been evicted it
 * moves up to the oldest retained one.
 */
class SharedFlowImpl<T> implements WeftFlow.SharedFlow<T> {
  private readonly retained: Array<{ value: T }> = []
  private readonly signal = new Signal()
  private readonly limit: number
  private nextSeq = 0
  private replayFloor = 0
  private subscribers = 0

  constructor(
    capacity: number,
    private readonly replay: number
  ) {
    this.limit = Math.max(capacity, replay, 1)
  }

  get subscriptionCount(): number {
    return this.subscribers
  }

  get replayCache(): ReadonlyArray<T> {
    const start = this.replayStart() - this.oldestSeq()
    return this.retained.slice(start).map((entry) => entry.value)
  }

  emit(value: T): void {
    this.retained.push({ value })
    if (this.retained.length > this.limit) {
      this.retained.shift()
    }
    this.nextSeq++
    this.signal.notifyAll()
  }

  tryEmit(value: T): boolean {
    this.emit(value)
    return true
  }

  resetReplayCache(): void {
    this.replayFloor = this.nextSeq
  }

  asFlow(): Flow<T> {
    return flow<T>(async (collector, scope) => {
      this.subscribers++
      try {
        let cursor = this.replayStart()
        for (;;) {
          cursor = Math.max(cursor, this.oldestSeq())
          const entry = this.retained[cursor - this.oldestSeq()]
          if (cursor < this.nextSeq && entry) {
            cursor++
            await collector.emit(entry.value)
            continue
          }
          await this.signal.wait(scope.token)
        }
      } finally {
        this.subscribers--
      }
    })
  }

  private oldestSeq(): number {
    return this.nextSeq - this.retained.length
  }

  private replayStart(): number {
    return Math.max(this.nextSeq - this.replay, this.replayFloor, this.oldestSeq())
  }
}

/**
 * Create a hot stream that any number of collectors can subscribe to.
 *
 * `emit` never suspends and never fails: when `max(capacity, replay)`
 * values are retained, the oldest one is evicted and subscribers that had
 * not reached it skip it.
 *
 * @example
 * ```typescript
 * const events = createSharedFlow<string>({ replay: 1 })
 * events.asFlow().onEach(log).launchIn(scope)
 * events.emit("started")
 * ```
 */
export function createSharedFlow<T>(options?: WeftFlow.SharedFlowOptions): WeftFlow.SharedFlow<T> {
  const capacity = options?.capacity ?? 16
  const replay = options?.replay ?? 0
  assertCount("SharedFlow capacity", capacity)
  assertCount("SharedFlow replay", replay)
  return new SharedFlowImpl<T>(capacity, replay)
}
