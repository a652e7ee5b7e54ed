import type { CancelToken } from "@weft/core"
import { ChannelClosedError } from "./errors"

type Receiver<T> = {
  resolve(result: IteratorResult<T, undefined>): void
  reject(error: unknown): void
}

type Sender<T> = {
  readonly value: T
  resolve(): void
  reject(error: unknown): void
}

type CloseState = { readonly failed: boolean; readonly cause: unknown }

function removeFrom<T>(items: T[], item: T): void {
  const index = items.indexOf(item)
  if (index >= 0) items.splice(index, 1)
}

/**
 * Bounded single-consumer queue between jobs.
 *
 * `capacity` 0 is a rendezvous: every `send` waits for a `receive`.
 * Waiting on either side is cancelled through the given token.
 */
export class Channel<T> {
  private readonly queue: Array<{ value: T }> = []
  private readonly receivers: Receiver<T>[] = []
  private readonly senders: Sender<T>[] = []
  private closeState: CloseState | undefined

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Channel capacity must be a non-negative integer, got ${capacity}`)
    }
  }

  get isClosed(): boolean {
    return this.closeState !== undefined
  }

  send(value: T, token?: CancelToken): Promise<void> {
    if (this.closeState) return Promise.reject(new ChannelClosedError())
    if (token?.reason) return Promise.reject(token.reason)

    const receiver = this.receivers.shift()
    if (receiver) {
      receiver.resolve({ done: false, value })
      return Promise.resolve()
    }
    if (this.queue.length < this.capacity) {
      this.queue.push({ value })
      return Promise.resolve()
    }

    return new Promise<void>((resolve, reject) => {
      const sender: Sender<T> = {
        value,
        resolve: () => {
          unsubscribe?.()
          resolve()
        },
        reject: (error) => {
          unsubscribe?.()
          reject(error)
        },
      }
      this.senders.push(sender)
      const unsubscribe = token?.onCancel((error) => {
        removeFrom(this.senders, sender)
        reject(error)
      })
    })
  }

  /**
   * Next value, or `done` once the channel is closed and drained.
   * A channel closed by `fail` rejects with the failure after draining.
   */
  receive(token?: CancelToken): Promise<IteratorResult<T, undefined>> {
    if (token?.reason) return Promise.reject(token.reason)

    const head = this.queue.shift()
    if (head) {
      this.admitSender()
      return Promise.resolve({ done: false, value: head.value })
    }
    const sender = this.senders.shift()
    if (sender) {
      sender.resolve()
      return Promise.resolve({ done: false, value: sender.value })
    }
    if (this.closeState) {
      return this.closeState.failed
        ? Promise.reject(this.closeState.cause)
        : Promise.resolve({ done: true, value: undefined })
    }

    return new Promise<IteratorResult<T, undefined>>((resolve, reject) => {
      const receiver: Receiver<T> = {
        resolve: (result) => {
          unsubscribe?.()
          resolve(result)
        },
        reject: (error) => {
          unsubscribe?.()
          reject(error)
        },
      }
      this.receivers.push(receiver)
      const unsubscribe = token?.onCancel((error) => {
        removeFrom(this.receivers, receiver)
        reject(error)
      })
    })
  }

  close(): void {
    this.finish({ failed: false, cause: undefined })
  }

  fail(cause: unknown): void {
    this.finish({ failed: true, cause })
  }

  private admitSender(): void {
    const sender = this.senders.shift()
    if (!sender) return
    this.queue.push({ value: sender.value })
    sender.resolve()
  }

  private finish(state: CloseState): void {
    if (this.closeState) return
    this.closeState = state

    for (const receiver of this.receivers.splice(0)) {
      if (state.failed) {
        receiver.reject(state.cause)
      } else {
        receiver.resolve({ done: true, value: undefined })
      }
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError())
    }
  }
}
