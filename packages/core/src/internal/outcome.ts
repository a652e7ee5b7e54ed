export type Outcome<T> =
  | { readonly kind: "value"; readonly value: T }
  | { readonly kind: "error"; readonly error: unknown }

export namespace OutcomeUtils {
  export type Latch<T> = {
    readonly promise: Promise<T>
    open(value: T): void
  }
}

export function success<T>(value: T): Outcome<T> {
  return { kind: "value", value }
}

export function failure<T = never>(error: unknown): Outcome<T> {
  return { kind: "error", error }
}

export function unwrapOutcome<T>(outcome: Outcome<T>): T {
  if (outcome.kind === "error") {
    throw outcome.error
  }
  return outcome.value
}

/**
 * A promise that is opened from the outside exactly once.
 * Later calls to `open` are ignored.
 */
export function createLatch<T>(): OutcomeUtils.Latch<T> {
  let release: ((value: T) => void) | undefined
  let opened = false
  const promise = new Promise<T>((resolve) => {
    release = resolve
  })

  return {
    promise,
    open(value) {
      if (opened) return
      opened = true
      release?.(value)
    },
  }
}
