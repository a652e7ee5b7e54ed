import { scopeSymbol } from "./symbols"
import type { Weft } from "./types"
import type { CancelToken } from "./cancel-token"
import { JobImpl } from "./job"
import { DeferredImpl } from "./deferred"
import { Dispatchers } from "./dispatcher"
import { runInScope } from "./ambient"
import { TimeoutError, isCancellation } from "./errors"
import { failure, success, unwrapOutcome } from "./internal/outcome"

/** State every scope of one tree shares with its root */
interface TreeState {
  readonly extensions: Weft.Extension[]
  readonly onError: ((error: unknown, task: Weft.TaskInfo) => void) | undefined
  ready: Promise<void>
  initialized: boolean
  disposed: boolean
}

function assertDuration(operation: string, ms: number): void {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`${operation} expects a finite, non-negative duration, got ${ms}`)
  }
}

class ScopeImpl implements Weft.Scope {
  readonly [scopeSymbol] = true as const

  constructor(
    private readonly _job: JobImpl<unknown>,
    readonly dispatcher: Weft.Dispatcher,
    readonly parent: ScopeImpl | undefined,
    private readonly tree: TreeState
  ) {}

  get name(): string | undefined {
    return this._job.name
  }

  get job(): Weft.Job<unknown> {
    return this._job
  }

  get token(): CancelToken {
    return this._job.token
  }

  get isActive(): boolean {
    return this._job.isActive
  }

  get isCancelled(): boolean {
    return this._job.isCancelled
  }

  get ready(): Promise<void> {
    return this.tree.ready
  }

  launch(body: Weft.Body<void>, options?: Weft.LaunchOptions): Weft.Job<void> {
    return this.spawn('launch', body, options)
  }

  async<T>(body: Weft.Body<T>, options?: Weft.LaunchOptions): Weft.Deferred<T> {
    return new DeferredImpl(this.spawn('async', body, options))
  }

  /**
   * Run `body` on `dispatcher` in a child job and hand its outcome back here.
   * Cancelling the caller cancels the child; the caller resumes once the child
   * is terminal.
   */
  withDispatcher<T>(dispatcher: Weft.Dispatcher, body: Weft.Body<T>): Promise<T> {
    const start = dispatcher.isDispatchNeeded(this.dispatcher) ? 'dispatched' : 'undispatched'
    const job = this.spawn('withDispatcher', body, { dispatcher, start })
    return this.awaitChild(job)
  }

  coroutineScope<T>(body: Weft.Body<T>): Promise<T> {
    const job = this.spawn('coroutineScope', body, { start: 'undispatched' })
    return this.awaitChild(job)
  }

  withTimeout<T>(ms: number, body: Weft.Body<T>): Promise<T> {
    return this.runTimed(ms, body, (error): T => {
      throw error
    })
  }

  withTimeoutOrUndefined<T>(ms: number, body: Weft.Body<T>): Promise<T | undefined> {
    return this.runTimed(ms, body, () => undefined)
  }

  delay(ms: number): Promise<void> {
    assertDuration("delay", ms)
    const token = this.token
    if (token.reason) return Promise.reject(token.reason)

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        unsubscribe()
        resolve()
      }, ms)
      const unsubscribe = token.onCancel((error) => {
        clearTimeout(timer)
        reject(error)
      })
    })
  }

  async yield(): Promise<void> {
    await new Promise<void>((resolve) => setImmediate(resolve))
    this.ensureActive()
  }

  ensureActive(): void {
    this.token.throwIfCancelled()
  }

  cancel(reason?: unknown): void {
    this._job.cancel(reason)
  }

  /** Wait until every job started in this scope is terminal */
  join(): Promise<void> {
    return this._job.whenChildrenSettled()
  }

  async dispose(): Promise<void> {
    this.cancel()
    if (!this.parent) {
      this._job.complete(success(undefined))
    }
    await this._job.whenSettled()

    if (this.parent || this.tree.disposed) return
    this.tree.disposed = true
    for (const ext of this.tree.extensions) {
      if (ext.dispose) {
        await ext.dispose(this)
      }
    }
  }

  private spawn<T>(
    kind: Weft.TaskKind,
    body: Weft.Body<T>,
    options: Weft.LaunchOptions = {}
  ): JobImpl<T> {
    const dispatcher = options.dispatcher ?? this.dispatcher
    const job = this._job.createChild<T>(options.name)
    const child = new ScopeImpl(job, dispatcher, this, this.tree)
    const task: Weft.TaskInfo = { kind, name: options.name, job, dispatcher }
    const start = () => child.runBody(job, body, task)

    if (options.start === 'undispatched') {
      start()
    } else {
      dispatcher.dispatch(start, (error) => job.complete(failure(error)))
    }
    return job
  }

  private runBody<T>(job: JobImpl<T>, body: Weft.Body<T>, task: Weft.TaskInfo): void {
    const reason = job.token.reason
    if (reason) {
      job.complete(failure(reason))
      return
    }

    void runInScope(this, () => this.invoke(body, task)).then(
      (value) => job.complete(success(value)),
      (error: unknown) => {
        if (task.kind === 'launch' && !isCancellation(error)) {
          this.report(error, task)
        }
        job.complete(failure(error))
      }
    )
  }

  private async invoke<T>(body: Weft.Body<T>, task: Weft.TaskInfo): Promise<T> {
    if (!this.tree.initialized) {
      await this.tree.ready
    }

    let next = async (): Promise<T> => body(this)
    const extensions = this.tree.extensions
    for (let i = extensions.length - 1; i >= 0; i--) {
      const ext = extensions[i]
      if (ext?.wrapTask) {
        const inner = next
        next = () => ext.wrapTask?.(inner, task, this) ?? inner()
      }
    }
    return next()
  }

  private report(error: unknown, task: Weft.TaskInfo): void {
    for (const ext of this.tree.extensions) {
      if (!ext.onError) continue
      try {
        ext.onError(error, task, this)
      } catch (hookError) {
        console.error(`Error in onError hook of extension "${ext.name}":`, hookError)
      }
    }

    const handler = this.tree.onError
    if (!handler) {
      console.error(`Uncaught error in launched job ${task.name ?? `#${task.job.id}`}:`, error)
      return
    }
    try {
      handler(error, task)
    } catch (handlerError) {
      console.error("Error in scope onError handler:", handlerError)
    }
  }

  private async awaitChild<T>(job: JobImpl<T>): Promise<T> {
    const outcome = await job.whenSettled()
    this.token.throwIfCancelled()
    return unwrapOutcome(outcome)
  }

  private async runTimed<T, R>(
    ms: number,
    body: Weft.Body<T>,
    onTimeout: (error: TimeoutError) => R
  ): Promise<T | R> {
    assertDuration("withTimeout", ms)
    const timeout = new TimeoutError(ms)
    const job = this.spawn('withTimeout', body, { start: 'undispatched' })
    const timer = setTimeout(() => job.cancel(timeout), ms)
    try {
      return await this.awaitChild(job)
    } catch (error) {
      if (error === timeout) return onTimeout(timeout)
      throw error
    } finally {
      clearTimeout(timer)
    }
  }
}

export function isScope(value: unknown): value is Weft.Scope {
  return (
    typeof value === "object" &&
    value !== null &&
    (value as Record<symbol, unknown>)[scopeSymbol] === true
  )
}

async function initExtensions(scope: Weft.Scope, tree: TreeState): Promise<void> {
  for (const ext of tree.extensions) {
    if (ext.init) {
      await ext.init(scope)
    }
  }
  tree.initialized = true
}

/**
 * Creates a root scope: the top of a job tree.
 *
 * @param options - Optional configuration for dispatcher, name, extensions and error reporting
 * @returns A Scope whose `ready` promise resolves once every extension's `init` ran
 *
 * @example
 * ```typescript
 * const scope = createScope({ name: "app", extensions: [tracing] })
 *
 * scope.launch(async (s) => {
 *   while (true) {
 *     await s.delay(1000)
 *     await poll()
 *   }
 * })
 *
 * const total = await scope.async(() => countRows()).await()
 * await scope.dispose()
 * ```
 */
export function createScope(options?: Weft.ScopeOptions): Weft.Scope {
  const extensions = options?.extensions ?? []
  const tree: TreeState = {
    extensions,
    onError: options?.onError,
    ready: Promise.resolve(),
    initialized: !extensions.some((ext) => ext.init !== undefined),
    disposed: false,
  }
  const scope = new ScopeImpl(
    JobImpl.root(options?.name),
    options?.dispatcher ?? Dispatchers.Default,
    undefined,
    tree
  )
  if (!tree.initialized) {
    tree.ready = initExtensions(scope, tree)
  }
  return scope
}

