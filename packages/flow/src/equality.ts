/** Pairs currently being compared, keyed by the left-hand object */
type Visited = WeakMap<object, WeakSet<object>>

function setHas(set: Set<unknown>, item: unknown, visited: Visited): boolean {
  if (set.has(item)) return true
  for (const candidate of set) {
    if (equalsWith(candidate, item, visited)) return true
  }
  return false
}

function enter(visited: Visited, a: object, b: object): boolean {
  const partners = visited.get(a)
  if (partners?.has(b)) return false
  if (partners) {
    partners.add(b)
  } else {
    visited.set(a, new WeakSet([b]))
  }
  return true
}

function equalsWith(a: unknown, b: unknown, visited: Visited): boolean {
  if (Object.is(a, b)) return true
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) {
    return false
  }
  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false
  // a pair already under comparison counts as equal
  if (!enter(visited, a, b)) return true

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    return a.every((item, index) => equalsWith(item, b[index], visited))
  }

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime()
  }

  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) return false
    for (const [key, value] of a) {
      if (!b.has(key) || !equalsWith(value, b.get(key), visited)) return false
    }
    return true
  }

  if (a instanceof Set && b instanceof Set) {
    if (a.size !== b.size) return false
    for (const item of a) {
      if (!setHas(b, item, visited)) return false
    }
    return true
  }

  const entriesA: Array<[string, unknown]> = Object.entries(a)
  const entriesB = new Map<string, unknown>(Object.entries(b))
  if (entriesA.length !== entriesB.size) return false
  return entriesA.every(([key, value]) => entriesB.has(key) && equalsWith(value, entriesB.get(key), visited))
}

/**
 * Content equality for the values state usually holds.
 *
 * Primitives compare with `Object.is`. Objects with different prototypes are
 * never equal; arrays, `Date`, `Map` and `Set` compare by content, any other
 * object by its own enumerable properties. Cyclic values are supported.
 */
export function structuralEquals(a: unknown, b: unknown): boolean {
  return equalsWith(a, b, new WeakMap())
}
