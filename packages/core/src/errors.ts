export class CancelledError extends Error {
  static readonly CODE: string = "C001"
  readonly code: string = CancelledError.CODE

  constructor(message = "Job was cancelled", cause?: unknown) {
    super(message, { cause })
    this.name = "CancelledError"
  }
}

export class TimeoutError extends CancelledError {
  static override readonly CODE: string = "C002"
  override readonly code: string = TimeoutError.CODE
  readonly timeoutMs: number

  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`)
    this.name = "TimeoutError"
    this.timeoutMs = timeoutMs
  }
}

export class DispatcherUnavailableError extends Error {
  static readonly CODE = "D001"
  readonly code: typeof DispatcherUnavailableError.CODE = DispatcherUnavailableError.CODE
  readonly dispatcherName: string

  constructor(dispatcherName: string, cause?: unknown) {
    super(`Dispatcher "${dispatcherName}" dropped the task before it ran`, { cause })
    this.name = "DispatcherUnavailableError"
    this.dispatcherName = dispatcherName
  }
}

export class JobStateError extends Error {
  static readonly CODE = "J001"
  readonly code: typeof JobStateError.CODE = JobStateError.CODE
  readonly jobName: string

  constructor(message: string, jobName: string) {
    super(message)
    this.name = "JobStateError"
    this.jobName = jobName
  }
}

export function isCancellation(error: unknown): error is CancelledError {
  return error instanceof CancelledError
}

/**
 * Normalizes a cancellation reason into a CancelledError.
 * CancelledError instances (including TimeoutError) pass through unchanged.
 */
export function toCancelledError(reason: unknown): CancelledError {
  if (reason instanceof CancelledError) return reason
  if (reason === undefined) return new CancelledError()
  const causeMsg = reason instanceof Error ? reason.message : String(reason)
  return new CancelledError(`Job was cancelled: ${causeMsg}`, reason)
}
