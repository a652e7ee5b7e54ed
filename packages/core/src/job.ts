import { jobSymbol } from "./symbols"
import type { JobState, Weft } from "./types"
import { CancelToken, raceCancellation } from "./cancel-token"
import { JobStateError, type CancelledError, toCancelledError } from "./errors"
import { currentScope } from "./ambient"
import {
  createLatch,
  failure,
  unwrapOutcome,
  type Outcome,
  type OutcomeUtils,
} from "./internal/outcome"

let nextJobId = 1

/**
 * Node of the structured-concurrency tree.
 *
 * Terminal only once its body has finished and every child is terminal:
 * children count themselves in on creation and out on their own terminal
 * transition, and the parent re-checks when the count reaches zero.
 */
export class JobImpl<T = unknown> implements Weft.Job<T> {
  readonly [jobSymbol] = true as const
  readonly id = nextJobId++
  readonly token: CancelToken
  readonly parent: JobImpl<unknown> | undefined
  private readonly _children = new Set<JobImpl<unknown>>()
  private readonly listeners = new Set<() => void>()
  private readonly settled: OutcomeUtils.Latch<Outcome<T>> = createLatch()
  private pendingChildren = 0
  private bodyOutcome: Outcome<T> | undefined
  private terminal: { state: 'completed' | 'cancelled'; outcome: Outcome<T> } | undefined

  private constructor(
    readonly name: string | undefined,
    parent?: JobImpl<unknown>
  ) {
    this.parent = parent
    this.token = parent ? parent.token.child() : new CancelToken()
  }

  static root<T = unknown>(name?: string): JobImpl<T> {
    return new JobImpl<T>(name)
  }

  /**
   * Child starts cancelled when this job is cancelling.
   * @throws JobStateError when this job is already terminal
   */
  createChild<C = unknown>(name?: string): JobImpl<C> {
    if (this.terminal) {
      throw new JobStateError(
        `Cannot start a child of job ${this.describe()}: it has already completed`,
        this.name ?? `#${this.id}`
      )
    }
    const child = new JobImpl<C>(name, this)
    this._children.add(child)
    this.pendingChildren++
    return child
  }

  get state(): JobState {
    if (this.terminal) return this.terminal.state
    return this.token.isCancelled ? 'cancelling' : 'active'
  }

  get isActive(): boolean {
    return this.state === 'active' && !this.isCancelled
  }

  get isCancelled(): boolean {
    if (this.terminal) return this.terminal.state === 'cancelled'
    if (this.token.isCancelled) return true
    return this.parent?.isCancelled ?? false
  }

  get isCompleted(): boolean {
    return this.terminal !== undefined
  }

  get children(): ReadonlyArray<Weft.Job<unknown>> {
    return Array.from(this._children)
  }

  cancel(reason?: unknown): void {
    if (this.terminal) return
    this.markCancelling(this.token.reason ?? toCancelledError(reason))
  }

  join(): Promise<T> {
    const caller = currentScope()
    const outcome = raceCancellation(this.settled.promise, caller?.token)
    return outcome.then(unwrapOutcome)
  }

  /** Resolves with the final outcome once terminal; never rejects */
  whenSettled(): Promise<Outcome<T>> {
    return this.settled.promise
  }

  /** The final outcome, or undefined while the job is not terminal */
  settledOutcome(): Outcome<T> | undefined {
    return this.terminal?.outcome
  }

  async whenChildrenSettled(): Promise<void> {
    while (this._children.size > 0) {
      await Promise.all(Array.from(this._children, (child) => child.whenSettled()))
    }
  }

  invokeOnCompletion(listener: (job: Weft.Job<T>) => void): () => void {
    if (this.terminal) {
      listener(this)
      return () => {}
    }
    const notify = () => listener(this)
    this.listeners.add(notify)
    return () => {
      this.listeners.delete(notify)
    }
  }

  /**
   * Record the body's outcome. Only the first call counts.
   * The job turns terminal now or when its last child does.
   */
  complete(outcome: Outcome<T>): void {
    if (this.bodyOutcome) return
    this.bodyOutcome = outcome
    this.tryFinalize()
  }

  describe(): string {
    return this.name ? `"${this.name}"#${this.id}` : `#${this.id}`
  }

  private childSettled(child: JobImpl<unknown>): void {
    if (!this._children.delete(child)) return
    this.pendingChildren--
    this.tryFinalize()
  }

  private markCancelling(error: CancelledError): void {
    if (this.terminal) return
    this.token.cancel(error)
    for (const child of Array.from(this._children)) {
      child.markCancelling(error)
    }
  }

  private tryFinalize(): void {
    if (this.terminal || !this.bodyOutcome || this.pendingChildren > 0) return

    const cancelled = this.token.reason
    this.terminal = cancelled
      ? { state: 'cancelled', outcome: failure(cancelled) }
      : { state: 'completed', outcome: this.bodyOutcome }
    this.token.release()
    this.settled.open(this.terminal.outcome)

    const listeners = Array.from(this.listeners)
    this.listeners.clear()
    for (const listener of listeners) {
      try {
        listener()
      } catch (err) {
        console.error("Error in job completion listener:", err)
      }
    }

    this.parent?.childSettled(this)
  }
}

export function isJob(value: unknown): value is Weft.Job<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    (value as Record<symbol, unknown>)[jobSymbol] === true
  )
}
