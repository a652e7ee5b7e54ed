import { describe, it, expect, vi, afterEach } from "vitest"
import { CancelToken, raceCancellation } from "../src/cancel-token"
import { CancelledError } from "../src/errors"

describe("CancelToken", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("starts active", () => {
    const token = new CancelToken()
    expect(token.state).toBe("active")
    expect(token.isCancelled).toBe(false)
    expect(token.reason).toBeUndefined()
    expect(token.signal.aborted).toBe(false)
  })

  it("propagates cancellation to children pre-order", () => {
    const root = new CancelToken()
    const a = root.child()
    const a1 = a.child()
    const b = root.child()
    const order: string[] = []
    root.onCancel(() => order.push("root"))
    a.onCancel(() => order.push("a"))
    a1.onCancel(() => order.push("a1"))
    b.onCancel(() => order.push("b"))

    root.cancel("shutdown")

    expect(order).toEqual(["root", "a", "a1", "b"])
    expect(a1.reason).toBe(root.reason)
    expect(root.reason?.message).toBe("Job was cancelled: shutdown")
  })

  it("keeps the first reason on repeated cancellation", () => {
    const token = new CancelToken()
    const listener = vi.fn()
    token.onCancel(listener)

    token.cancel("first")
    token.cancel("second")

    expect(token.reason?.message).toBe("Job was cancelled: first")
    expect(listener).toHaveBeenCalledTimes(1)
  })

  it("creates children of a cancelled token already cancelled", () => {
    const parent = new CancelToken()
    parent.cancel()
    const child = parent.child()
    expect(child.isCancelled).toBe(true)
    expect(child.reason).toBe(parent.reason)
  })

  it("does not propagate upward", () => {
    const parent = new CancelToken()
    const child = parent.child()
    child.cancel()
    expect(parent.isCancelled).toBe(false)
  })

  it("aborts its signal with the cancellation error", () => {
    const token = new CancelToken()
    token.cancel()
    expect(token.signal.aborted).toBe(true)
    expect(token.signal.reason).toBeInstanceOf(CancelledError)
  })

  it("runs late listeners immediately", () => {
    const token = new CancelToken()
    token.cancel()
    const listener = vi.fn()
    token.onCancel(listener)
    expect(listener).toHaveBeenCalledWith(token.reason)
  })

  it("stops notifying after unsubscribe", () => {
    const token = new CancelToken()
    const listener = vi.fn()
    const unsubscribe = token.onCancel(listener)
    unsubscribe()
    token.cancel()
    expect(listener).not.toHaveBeenCalled()
  })

  it("detaches from its parent on release", () => {
    const parent = new CancelToken()
    const child = parent.child()
    child.release()
    expect(child.state).toBe("released")

    parent.cancel()
    expect(child.isCancelled).toBe(false)
  })

  it("keeps the cancelled flag after release", () => {
    const token = new CancelToken()
    token.cancel()
    token.release()
    expect(token.state).toBe("cancelled")
  })

  it("logs a throwing listener and still notifies the rest", () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {})
    const token = new CancelToken()
    const failure = new Error("listener failed")
    const second = vi.fn()
    token.onCancel(() => {
      throw failure
    })
    token.onCancel(second)

    token.cancel()

    expect(second).toHaveBeenCalledTimes(1)
    expect(consoleError).toHaveBeenCalledWith("Error in cancellation listener:", failure)
  })

  it("throwIfCancelled throws the stored reason", () => {
    const token = new CancelToken()
    expect(() => token.throwIfCancelled()).not.toThrow()
    token.cancel()
    expect(() => token.throwIfCancelled()).toThrow(token.reason)
  })
})

describe("raceCancellation()", () => {
  it("settles with the promise when the token stays active", async () => {
    const token = new CancelToken()
    await expect(raceCancellation(Promise.resolve(7), token)).resolves.toBe(7)
  })

  it("rejects as soon as the token flips", async () => {
    const token = new CancelToken()
    const pending = raceCancellation(new Promise<number>(() => {}), token)
    token.cancel()
    await expect(pending).rejects.toBe(token.reason)
  })

  it("rejects immediately for a token that is already cancelled", async () => {
    const token = new CancelToken()
    token.cancel()
    await expect(raceCancellation(Promise.resolve(1), token)).rejects.toBeInstanceOf(CancelledError)
  })
})
