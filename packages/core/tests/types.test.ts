import { describe, it, expectTypeOf } from "vitest"
import { createScope, type Weft } from "../src/index"

describe("Type Inference", () => {
  it("infers the deferred value from the body", () => {
    const scope = createScope()
    const deferred = scope.async(() => ({ id: 1, name: "ada" }))

    expectTypeOf(deferred).toEqualTypeOf<Weft.Deferred<{ id: number; name: string }>>()
    expectTypeOf<Weft.Utils.DeferredValue<typeof deferred>>().toEqualTypeOf<{ id: number; name: string }>()
    deferred.cancel()
  })

  it("unwraps async bodies", () => {
    const scope = createScope()
    const deferred = scope.async(async () => "text")

    expectTypeOf(deferred.await()).toEqualTypeOf<Promise<string>>()
    deferred.cancel()
  })

  it("widens withTimeoutOrUndefined with undefined", () => {
    const scope = createScope()
    const result = scope.withTimeoutOrUndefined(10, () => 1)

    expectTypeOf(result).toEqualTypeOf<Promise<number | undefined>>()
    void result
  })

  it("extracts job and body values", () => {
    type Body = Weft.Body<number[]>
    expectTypeOf<Weft.Utils.BodyValue<Body>>().toEqualTypeOf<number[]>()
    expectTypeOf<Weft.Utils.JobValue<Weft.Job<boolean>>>().toEqualTypeOf<boolean>()
  })
})
