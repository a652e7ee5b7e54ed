import { describe, it, expect } from "vitest"
import { createScope } from "@weft/core"
import { flow } from "../src/flow"
import { flowOf, emptyFlow } from "../src/builders"
import { MoreThanOneElementError, NoSuchElementError } from "../src/errors"

describe("terminal operators", () => {
  it("toArray and toSet gather every value", async () => {
    expect(await flowOf(1, 2, 2).toArray()).toEqual([1, 2, 2])
    expect(await flowOf(1, 2, 2).toSet()).toEqual(new Set([1, 2]))
  })

  it("collects in an explicit scope", async () => {
    const scope = createScope({ name: "explicit" })
    const names = await flow<string | undefined>(async (collector, collecting) => {
      await collector.emit(collecting.name)
    }).toArray(scope)

    expect(names).toEqual(["explicit"])
    await scope.dispose()
  })

  describe("first()", () => {
    it("returns the first value and stops the upstream", async () => {
      let emitted = 0
      const source = flow<number>(async (collector) => {
        for (let i = 1; i <= 5; i++) {
          emitted++
          await collector.emit(i)
        }
      })

      expect(await source.first((x) => x > 1)).toBe(2)
      expect(emitted).toBe(2)
    })

    it("throws NoSuchElementError when nothing matches", async () => {
      await expect(emptyFlow<number>().first()).rejects.toThrow("Flow is empty")
      await expect(flowOf(1).first((x) => x > 1)).rejects.toThrow(
        "No value of the flow matches the predicate"
      )
      await expect(emptyFlow<number>().first()).rejects.toBeInstanceOf(NoSuchElementError)
    })

    it("firstOrUndefined returns undefined instead", async () => {
      expect(await emptyFlow<number>().firstOrUndefined()).toBeUndefined()
      expect(await flowOf(4, 5).firstOrUndefined()).toBe(4)
    })
  })

  describe("last()", () => {
    it("returns the last matching value", async () => {
      expect(await flowOf(1, 2, 3).last()).toBe(3)
      expect(await flowOf(1, 2, 3).last((x) => x < 3)).toBe(2)
      expect(await flowOf(1).lastOrUndefined((x) => x > 1)).toBeUndefined()
      await expect(emptyFlow<number>().last()).rejects.toBeInstanceOf(NoSuchElementError)
    })
  })

  describe("single()", () => {
    it("returns the only value", async () => {
      expect(await flowOf("only").single()).toBe("only")
    })

    it("rejects empty and multi-valued flows", async () => {
      await expect(emptyFlow<string>().single()).rejects.toBeInstanceOf(NoSuchElementError)
      await expect(flowOf(1, 2).single()).rejects.toBeInstanceOf(MoreThanOneElementError)
    })

    it("singleOrUndefined returns undefined for both", async () => {
      expect(await emptyFlow<string>().singleOrUndefined()).toBeUndefined()
      expect(await flowOf(1, 2).singleOrUndefined()).toBeUndefined()
      expect(await flowOf(7).singleOrUndefined()).toBe(7)
    })
  })

  describe("fold() and reduce()", () => {
    it("accumulates from an initial value", async () => {
      expect(await flowOf(1, 2, 3).fold("", (acc, n) => acc + n)).toBe("123")
    })

    it("reduce starts from the first value", async () => {
      expect(await flowOf(2, 3, 4).reduce((acc, n) => acc * n)).toBe(24)
      await expect(emptyFlow<number>().reduce((a, b) => a + b)).rejects.toThrow(
        "Cannot reduce an empty flow"
      )
    })
  })

  it("count counts all or matching values", async () => {
    expect(await flowOf(1, 2, 3).count()).toBe(3)
    expect(await flowOf(1, 2, 3).count((x) => x % 2 === 1)).toBe(2)
  })

  it("any, all and none answer predicates", async () => {
    const numbers = flowOf(1, 2, 3)
    expect(await numbers.any((x) => x === 2)).toBe(true)
    expect(await numbers.any((x) => x === 9)).toBe(false)
    expect(await numbers.all((x) => x > 0)).toBe(true)
    expect(await numbers.all((x) => x > 1)).toBe(false)
    expect(await numbers.none((x) => x > 3)).toBe(true)
    expect(await emptyFlow<number>().all(() => false)).toBe(true)
  })
})
