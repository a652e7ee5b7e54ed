export class NoSuchElementError extends Error {
  static readonly CODE = "F001"
  readonly code: typeof NoSuchElementError.CODE = NoSuchElementError.CODE

  constructor(message = "Flow is empty") {
    super(message)
    this.name = "NoSuchElementError"
  }
}

export class MoreThanOneElementError extends Error {
  static readonly CODE = "F002"
  readonly code: typeof MoreThanOneElementError.CODE = MoreThanOneElementError.CODE

  constructor(message = "Flow has more than one element") {
    super(message)
    this.name = "MoreThanOneElementError"
  }
}

/**
 * A collector's `emit` was called again before the previous call returned.
 * Emissions of one collection must be sequential.
 */
export class ConcurrentEmitError extends Error {
  static readonly CODE = "F003"
  readonly code: typeof ConcurrentEmitError.CODE = ConcurrentEmitError.CODE

  constructor() {
    super("Collector.emit was called before the previous emission returned")
    this.name = "ConcurrentEmitError"
  }
}

export class ChannelClosedError extends Error {
  static readonly CODE = "F004"
  readonly code: typeof ChannelClosedError.CODE = ChannelClosedError.CODE

  constructor() {
    super("Channel is closed")
    this.name = "ChannelClosedError"
  }
}

/**
 * Thrown by an operator that needs no more values, and caught again by the
 * same operator once the upstream has unwound. Never escapes a collection.
 */
export class FlowAbortedError extends Error {
  constructor() {
    super("Flow collection was stopped by a downstream operator")
    this.name = "FlowAbortedError"
  }
}

export function isFlowAbort(error: unknown): error is FlowAbortedError {
  return error instanceof FlowAbortedError
}
