import type { CancelState } from "./types"
import { CancelledError, toCancelledError } from "./errors"

type CancelListener = (error: CancelledError) => void

/**
 * Cooperative cancellation flag shared down a job tree.
 *
 * A token created from a cancelled parent starts cancelled. Cancelling flips
 * the flag once and walks the child set pre-order; walking again is a no-op
 * for every token already flipped.
 *
 * @example
 * ```typescript
 * const root = new CancelToken()
 * const child = root.child()
 * root.cancel("shutdown")
 * child.isCancelled // true
 * ```
 */
export class CancelToken {
  private readonly controller = new AbortController()
  private readonly children = new Set<CancelToken>()
  private readonly listeners = new Set<CancelListener>()
  private error: CancelledError | undefined
  private released = false

  constructor(private readonly parent?: CancelToken) {
    if (!parent) return
    if (parent.isCancelled) {
      this.flip(parent.reason ?? new CancelledError())
    } else if (!parent.released) {
      parent.children.add(this)
    }
  }

  get state(): CancelState {
    if (this.error) return 'cancelled'
    if (this.released) return 'released'
    return 'active'
  }

  get isCancelled(): boolean {
    return this.error !== undefined
  }

  get reason(): CancelledError | undefined {
    return this.error
  }

  /** Aborted together with this token, for APIs that take an AbortSignal */
  get signal(): AbortSignal {
    return this.controller.signal
  }

  child(): CancelToken {
    return new CancelToken(this)
  }

  cancel(reason?: unknown): void {
    const error = this.error ?? toCancelledError(reason)
    this.flip(error)
    for (const child of Array.from(this.children)) {
      child.cancel(error)
    }
  }

  throwIfCancelled(): void {
    if (this.error) throw this.error
  }

  /**
   * Register a listener for the moment this token flips.
   * Runs synchronously when the token is already cancelled.
   */
  onCancel(listener: CancelListener): () => void {
    if (this.error) {
      listener(this.error)
      return () => {}
    }
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /** Detach from the parent once the owning job is terminal */
  release(): void {
    if (this.released) return
    this.released = true
    this.parent?.children.delete(this)
    this.children.clear()
    this.listeners.clear()
  }

  private flip(error: CancelledError): void {
    if (this.error) return
    this.error = error
    this.controller.abort(error)

    const listeners = Array.from(this.listeners)
    this.listeners.clear()
    for (const listener of listeners) {
      try {
        listener(error)
      } catch (listenerError) {
        console.error("Error in cancellation listener:", listenerError)
      }
    }
  }
}

/**
 * Settle with `promise`, or reject with the token's CancelledError
 * as soon as the token flips, whichever comes first.
 */
export function raceCancellation<T>(promise: Promise<T>, token: CancelToken | undefined): Promise<T> {
  if (!token) return promise
  if (token.reason) return Promise.reject(token.reason)

  return new Promise<T>((resolve, reject) => {
    const unsubscribe = token.onCancel(reject)
    promise.then(
      (value) => {
        unsubscribe()
        resolve(value)
      },
      (error: unknown) => {
        unsubscribe()
        reject(error)
      }
    )
  })
}
