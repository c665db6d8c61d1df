import * as JsonArray from "./array.js"
import { orderedEntries } from "./entries.js"
import * as JsonObject from "./object.js"
import type { Var } from "./var.js"
import * as V from "./var.js"

// CHANGE: bridge between plain JSON data and variant values
// WHY: let callers build containers from literals and read them back as plain data
// PURITY: CORE
// COMPLEXITY: O(n)/O(n)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonRecord = { readonly [key: string]: Json }

// Objects as maps, so every key keeps the container's active order.
export type OrderedJson =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<OrderedJson>
  | ReadonlyMap<string, OrderedJson>

export interface FromJsonOptions {
  readonly preserveInsertionOrder?: boolean
}

const isJsonArray = (value: Json): value is ReadonlyArray<Json> => Array.isArray(value)

/**
 * Build a variant value from plain JSON data.
 *
 * @param value - Plain JSON data.
 * @param options - Ordering mode for every object created.
 * @returns Var tree; objects are populated in Object.entries order.
 *
 * @pure true
 * @invariant integral numbers become Int
 * @complexity O(n)
 */
export const fromJson = (value: Json, options: FromJsonOptions = {}): Var => {
  if (value === null || typeof value !== "object") {
    return V.make(value)
  }
  if (isJsonArray(value)) {
    return V.array(JsonArray.fromIterable(value.map((item) => fromJson(item, options))))
  }
  return V.object(
    JsonObject.fromEntries(
      Object.entries(value).map(([key, item]) => [key, fromJson(item, options)] as const),
      options
    )
  )
}

/**
 * Turn a variant value back into plain JSON data.
 *
 * Property order of the result is the host's: keys that look like array
 * indexes come first in ascending numeric order, the rest follow the
 * container's active order. Use toOrderedJson when the order matters.
 *
 * @param value - Acyclic value to convert.
 * @returns Plain data; Empty becomes null.
 *
 * @pure true
 * @invariant toJson(V.empty) = null
 * @complexity O(n)
 */
export const toJson = (value: Var): Json => {
  switch (value._tag) {
    case "Empty":
      return null
    case "Bool":
    case "Int":
    case "Float":
    case "String":
      return value.value
    case "Array":
      return value.value.values.map(toJson)
    case "Object":
      return Object.fromEntries(orderedEntries(value.value).map(([key, item]) => [key, toJson(item)]))
  }
}

/**
 * Turn a variant value into data whose objects are maps in active order.
 *
 * @param value - Acyclic value to convert.
 * @returns Ordered data; Empty becomes null.
 *
 * @pure true
 * @invariant [...toOrderedJson(V.object(o)).keys()] = getNames(o)
 * @complexity O(n)
 */
export const toOrderedJson = (value: Var): OrderedJson => {
  switch (value._tag) {
    case "Empty":
      return null
    case "Bool":
    case "Int":
    case "Float":
    case "String":
      return value.value
    case "Array":
      return value.value.values.map(toOrderedJson)
    case "Object":
      return new Map(
        orderedEntries(value.value).map(([key, item]): readonly [string, OrderedJson] => [key, toOrderedJson(item)])
      )
  }
}
