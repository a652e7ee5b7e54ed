import type { Weft } from "./types"

export interface ManualExecutor extends Weft.Executor {
  /** Number of queued tasks */
  readonly size: number
  /** Run the oldest queued task. Returns false when the queue is empty. */
  runNext(): boolean
  /** Run queued tasks, including ones queued while draining, until empty */
  drain(): number
  /** Refuse further work and drop queued tasks */
  shutdown(): void
}

/**
 * Stock executors.
 *
 * `macrotask` runs each task on its own `setImmediate` turn, `microtask`
 * queues it behind the current job, `inline` runs it in the caller's stack.
 */
export const Executors = {
  macrotask(): Weft.Executor {
    return {
      execute(task) {
        setImmediate(task)
      },
    }
  },

  microtask(): Weft.Executor {
    return {
      execute(task) {
        queueMicrotask(task)
      },
    }
  },

  inline(): Weft.Executor {
    return {
      execute(task) {
        task()
      },
    }
  },

  /**
   * Queue tasks until the caller runs them. After `shutdown` the executor
   * refuses work and throws from `execute`.
   */
  manual(): ManualExecutor {
    const queue: Array<() => void> = []
    let stopped = false

    return {
      get size() {
        return queue.length
      },
      execute(task) {
        if (stopped) {
          throw new Error("Manual executor has been shut down")
        }
        queue.push(task)
      },
      runNext() {
        const task = queue.shift()
        if (!task) return false
        task()
        return true
      },
      drain() {
        let ran = 0
        while (this.runNext()) ran++
        return ran
      },
      shutdown() {
        stopped = true
        queue.length = 0
      },
    }
  },
}
