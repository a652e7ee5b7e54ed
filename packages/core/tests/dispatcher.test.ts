import { describe, it, expect, vi } from "vitest"
import { createDispatcher, Dispatchers, isDispatcher } from "../src/dispatcher"
import { Executors } from "../src/executor"
import { DispatcherUnavailableError } from "../src/errors"

describe("Executors.manual()", () => {
  it("queues tasks until drained", () => {
    const executor = Executors.manual()
    const ran: number[] = []
    executor.execute(() => ran.push(1))
    executor.execute(() => {
      ran.push(2)
      executor.execute(() => ran.push(3))
    })

    expect(executor.size).toBe(2)
    expect(executor.runNext()).toBe(true)
    expect(ran).toEqual([1])
    expect(executor.drain()).toBe(2)
    expect(ran).toEqual([1, 2, 3])
    expect(executor.runNext()).toBe(false)
  })

  it("refuses work after shutdown", () => {
    const executor = Executors.manual()
    executor.shutdown()
    expect(() => executor.execute(() => {})).toThrow("Manual executor has been shut down")
  })
})

describe("Dispatcher", () => {
  it("runs dispatched tasks through its executor", () => {
    const executor = Executors.manual()
    const dispatcher = createDispatcher("test", executor)
    const task = vi.fn()

    dispatcher.dispatch(task)
    expect(task).not.toHaveBeenCalled()

    executor.drain()
    expect(task).toHaveBeenCalledTimes(1)
  })

  it("needs a dispatch only when leaving the current dispatcher", () => {
    const a = createDispatcher("a", Executors.inline())
    const b = createDispatcher("b", Executors.inline())
    expect(a.isDispatchNeeded(a)).toBe(false)
    expect(a.isDispatchNeeded(b)).toBe(true)
    expect(a.isDispatchNeeded()).toBe(true)
  })

  it("drops pending tasks on close", () => {
    const executor = Executors.manual()
    const dispatcher = createDispatcher("worker", executor)
    const task = vi.fn()
    const dropped: DispatcherUnavailableError[] = []

    dispatcher.dispatch(task, (error) => dropped.push(error))
    dispatcher.close()
    executor.drain()

    expect(dispatcher.closed).toBe(true)
    expect(task).not.toHaveBeenCalled()
    expect(dropped).toHaveLength(1)
    expect(dropped[0]?.dispatcherName).toBe("worker")
  })

  it("shuts the executor down on close", () => {
    const shutdown = vi.fn()
    const dispatcher = createDispatcher("custom", { execute: (task) => task(), shutdown })
    dispatcher.close()
    dispatcher.close()
    expect(shutdown).toHaveBeenCalledTimes(1)
  })

  it("drops tasks dispatched after close", () => {
    const dispatcher = createDispatcher("closed", Executors.inline())
    dispatcher.close()

    const onDropped = vi.fn()
    dispatcher.dispatch(() => {}, onDropped)
    expect(onDropped).toHaveBeenCalledWith(expect.any(DispatcherUnavailableError))
    expect(() => dispatcher.dispatch(() => {})).toThrow(DispatcherUnavailableError)
  })

  it("reports an executor that refuses work as unavailable", () => {
    const refusal = new Error("queue full")
    const dispatcher = createDispatcher("full", {
      execute: () => {
        throw refusal
      },
    })

    const dropped: DispatcherUnavailableError[] = []
    dispatcher.dispatch(() => {}, (error) => dropped.push(error))
    expect(dropped[0]?.cause).toBe(refusal)
  })

  it("exposes the built-in dispatchers", () => {
    expect(Dispatchers.Default.name).toBe("Default")
    expect(Dispatchers.IO.name).toBe("IO")
    expect(Dispatchers.Main.name).toBe("Main")
    expect(Dispatchers.Unconfined.name).toBe("Unconfined")
    expect(Dispatchers.IO).not.toBe(Dispatchers.Default)
    expect(isDispatcher(Dispatchers.Main)).toBe(true)
    expect(isDispatcher({ name: "Main" })).toBe(false)
  })

  it("runs Unconfined tasks in place", () => {
    let ran = false
    Dispatchers.Unconfined.dispatch(() => {
      ran = true
    })
    expect(ran).toBe(true)
  })
})
