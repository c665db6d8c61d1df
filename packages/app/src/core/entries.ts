import type { JsonObject, Var } from "./var.js"

// CHANGE: single key/value iteration for both ordering modes
// WHY: stringify, getNames and toJson must agree on one active order
// PURITY: CORE
// INVARIANT: names(o) is a permutation of keys(o.values)

export type Entry = readonly [key: string, value: Var]

// Code-unit order, not locale order.
export const compareKeys = (left: string, right: string): number => {
  if (left < right) {
    return -1
  }
  return left > right ? 1 : 0
}

/**
 * List entries of an object in its active order.
 *
 * @param self - Object container.
 * @returns Key/value pairs, insertion-ordered or sorted by key.
 *
 * @pure true
 * @invariant result.length = self.values.size
 * @complexity O(n log n)
 */
export const orderedEntries = (self: JsonObject): ReadonlyArray<Entry> => {
  const entries: ReadonlyArray<Entry> = [...self.values.entries()]
  if (self.preserveInsertionOrder) {
    return entries
  }
  return entries.toSorted((left, right) => compareKeys(left[0], right[0]))
}

export const orderedNames = (self: JsonObject): ReadonlyArray<string> =>
  orderedEntries(self).map(([key]) => key)
