export const scopeSymbol: unique symbol = Symbol.for("@weft/core/scope")
export const jobSymbol: unique symbol = Symbol.for("@weft/core/job")
export const deferredSymbol: unique symbol = Symbol.for("@weft/core/deferred")
export const dispatcherSymbol: unique symbol = Symbol.for("@weft/core/dispatcher")
