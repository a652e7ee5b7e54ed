import type {
  scopeSymbol,
  jobSymbol,
  deferredSymbol,
  dispatcherSymbol,
} from "./symbols"
import type { CancelToken } from "./cancel-token"
import type { DispatcherUnavailableError } from "./errors"

export type MaybePromise<T> = T | Promise<T>

export type JobState = 'active' | 'cancelling' | 'completed' | 'cancelled'

export type CancelState = 'active' | 'cancelled' | 'released'

export namespace Weft {
  /**
   * Runs units of work. Fully responsible for when and where they run;
   * the runtime only relies on eventual execution.
   */
  export interface Executor {
    execute(task: () => void): void
    /** Called once when the owning dispatcher is closed */
    shutdown?(): void
  }

  export interface Dispatcher {
    readonly [dispatcherSymbol]: true
    readonly name: string
    readonly closed: boolean
    /**
     * Submit work to the executor.
     * If the dispatcher is closed before the task starts, `onDropped` receives
     * a DispatcherUnavailableError instead; without `onDropped` the error is thrown
     * for tasks dispatched after close.
     */
    dispatch(task: () => void, onDropped?: (error: DispatcherUnavailableError) => void): void
    /** False when `current` is this dispatcher, meaning work can stay where it is */
    isDispatchNeeded(current?: Dispatcher): boolean
    /** Drop pending work and refuse new work */
    close(): void
  }

  export interface Job<T = unknown> {
    readonly [jobSymbol]: true
    readonly id: number
    readonly name: string | undefined
    readonly parent: Job<unknown> | undefined
    readonly children: ReadonlyArray<Job<unknown>>
    readonly token: CancelToken
    readonly state: JobState
    /** Not terminal and not cancelled */
    readonly isActive: boolean
    /** Cancelled directly or through any ancestor */
    readonly isCancelled: boolean
    /** Reached a terminal state */
    readonly isCompleted: boolean
    /** Cancel this job and its whole subtree. Returns without waiting. */
    cancel(reason?: unknown): void
    /**
     * Wait until this job and all of its descendants are terminal.
     * @returns The body's value
     * @throws CancelledError when the job ended cancelled, or the body's own error
     */
    join(): Promise<T>
    invokeOnCompletion(listener: (job: Job<T>) => void): () => void
  }

  export interface Deferred<T> {
    readonly [deferredSymbol]: true
    readonly job: Job<T>
    readonly isCompleted: boolean
    readonly isCancelled: boolean
    /** Idempotent; every call observes the same stored outcome */
    await(): Promise<T>
    /**
     * Read the outcome of a completed deferred synchronously.
     * @throws JobStateError if the deferred is still running
     */
    getCompleted(): T
    cancel(reason?: unknown): void
    join(): Promise<T>
  }

  export type Body<T> = (scope: Scope) => MaybePromise<T>

  export type TaskKind =
    | 'launch'
    | 'async'
    | 'withDispatcher'
    | 'withTimeout'
    | 'coroutineScope'

  export interface TaskInfo {
    readonly kind: TaskKind
    readonly name: string | undefined
    readonly job: Job<unknown>
    readonly dispatcher: Dispatcher
  }

  export type StartMode = 'dispatched' | 'undispatched'

  export interface LaunchOptions {
    name?: string
    /** Dispatcher for the new task. Default: the parent scope's */
    dispatcher?: Dispatcher
    /**
     * `undispatched` runs the body synchronously up to its first suspension
     * instead of submitting it to the dispatcher. Default: `dispatched`
     */
    start?: StartMode
  }

  export interface ScopeOptions {
    /** Default: Dispatchers.Default */
    dispatcher?: Dispatcher
    name?: string
    extensions?: Extension[]
    /** Receives errors thrown by launched bodies. Default: console.error */
    onError?: (error: unknown, task: TaskInfo) => void
  }

  export interface Scope {
    readonly [scopeSymbol]: true
    readonly name: string | undefined
    readonly dispatcher: Dispatcher
    readonly job: Job<unknown>
    readonly token: CancelToken
    readonly parent: Scope | undefined
    readonly isActive: boolean
    readonly isCancelled: boolean
    /** Resolves once every extension's `init` has run */
    readonly ready: Promise<void>
    launch(body: Body<void>, options?: LaunchOptions): Job<void>
    async<T>(body: Body<T>, options?: LaunchOptions): Deferred<T>
    withDispatcher<T>(dispatcher: Dispatcher, body: Body<T>): Promise<T>
    coroutineScope<T>(body: Body<T>): Promise<T>
    withTimeout<T>(ms: number, body: Body<T>): Promise<T>
    withTimeoutOrUndefined<T>(ms: number, body: Body<T>): Promise<T | undefined>
    delay(ms: number): Promise<void>
    yield(): Promise<void>
    ensureActive(): void
    cancel(reason?: unknown): void
    join(): Promise<void>
    dispose(): Promise<void>
  }

  export interface Extension {
    readonly name: string
    init?(scope: Scope): MaybePromise<void>
    wrapTask?<R>(
      next: () => Promise<R>,
      task: TaskInfo,
      scope: Scope
    ): Promise<R>
    onError?(error: unknown, task: TaskInfo, scope: Scope): void
    dispose?(scope: Scope): MaybePromise<void>
  }

  /**
   * Utility types for type extraction.
   * @example
   * type Result = Weft.Utils.DeferredValue<typeof userDeferred>
   */
  export namespace Utils {
    export type DeferredValue<D> = D extends Deferred<infer T> ? T : never

    export type JobValue<J> = J extends Job<infer T> ? T : never

    export type BodyValue<B> = B extends Body<infer T> ? T : never
  }
}
