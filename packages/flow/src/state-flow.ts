import type { WeftFlow } from "./types"
import { flow, type Flow } from "./flow"
import { Signal } from "./shared-flow"
import { structuralEquals } from "./equality"

class StateFlowImpl<T> implements WeftFlow.StateFlow<T> {
  private readonly signal = new Signal()
  private version = 0
  private subscribers = 0

  constructor(
    private current: T,
    private readonly equals: (a: T, b: T) => boolean
  ) {}

  get value(): T {
    return this.current
  }

  get subscriptionCount(): number {
    return this.subscribers
  }

  get(): T {
    return this.current
  }

  /** An equal value replaces the stored one without notifying collectors */
  set(value: T): void {
    const changed = !this.equals(this.current, value)
    this.current = value
    if (!changed) return
    this.version++
    this.signal.notifyAll()
  }

  emit(value: T): void {
    this.set(value)
  }

  update(fn: (current: T) => T): void {
    this.set(fn(this.current))
  }

  compareAndSet(expect: T, next: T): boolean {
    if (!this.equals(this.current, expect)) return false
    this.set(next)
    return true
  }

  /**
   * Delivers the current value first, then the latest value whenever it
   * differs from the one this collector saw last. Intermediate values set
   * while the collector was busy are skipped.
   */
  asFlow(): Flow<T> {
    return flow<T>(async (collector, scope) => {
      this.subscribers++
      try {
        let seenVersion = this.version
        let last = this.current
        await collector.emit(last)
        for (;;) {
          if (seenVersion === this.version) {
            await this.signal.wait(scope.token)
          }
          seenVersion = this.version
          const value = this.current
          if (this.equals(last, value)) continue
          last = value
          await collector.emit(value)
        }
      } finally {
        this.subscribers--
      }
    })
  }
}

/**
 * Create an observable value holder.
 *
 * @example
 * ```typescript
 * const count = createStateFlow(0)
 * count.asFlow().onEach(render).launchIn(scope)
 * count.update((n) => n + 1)
 * ```
 */
export function createStateFlow<T>(initial: T, options?: WeftFlow.StateFlowOptions<T>): WeftFlow.StateFlow<T> {
  return new StateFlowImpl(initial, options?.equals ?? structuralEquals)
}
