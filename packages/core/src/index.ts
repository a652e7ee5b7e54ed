export type { Weft, MaybePromise, JobState, CancelState } from "./types"
export {
  scopeSymbol,
  jobSymbol,
  deferredSymbol,
  dispatcherSymbol,
} from "./symbols"
export {
  CancelledError,
  TimeoutError,
  DispatcherUnavailableError,
  JobStateError,
  isCancellation,
  toCancelledError,
} from "./errors"
export { CancelToken, raceCancellation } from "./cancel-token"
export { Executors, type ManualExecutor } from "./executor"
export { createDispatcher, isDispatcher, Dispatchers } from "./dispatcher"
export { isJob } from "./job"
export { awaitAll, isDeferred } from "./deferred"
export { createScope, isScope } from "./scope"
export { currentScope, requireCurrentScope } from "./ambient"

export const VERSION = "0.1.0"
