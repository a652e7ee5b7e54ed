import { AsyncLocalStorage } from "node:async_hooks"
import type { Weft } from "./types"
import { JobStateError } from "./errors"

const scopeStorage = new AsyncLocalStorage<Weft.Scope>()

/**
 * The scope of the task whose body is currently running, if any.
 * Set for the whole async continuation of a body started by
 * `launch`, `async`, `withDispatcher`, `withTimeout` or `coroutineScope`.
 *
 * @example
 * ```typescript
 * async function loadProfile(id: string) {
 *   const scope = requireCurrentScope()
 *   const [user, posts] = await awaitAll([
 *     scope.async(() => fetchUser(id)),
 *     scope.async(() => fetchPosts(id)),
 *   ])
 * }
 * ```
 */
export function currentScope(): Weft.Scope | undefined {
  return scopeStorage.getStore()
}

/**
 * @throws JobStateError when called outside of a task body
 */
export function requireCurrentScope(): Weft.Scope {
  const scope = scopeStorage.getStore()
  if (!scope) {
    throw new JobStateError("No scope is bound to the current task", "<none>")
  }
  return scope
}

export function runInScope<T>(scope: Weft.Scope, fn: () => T): T {
  return scopeStorage.run(scope, fn)
}
