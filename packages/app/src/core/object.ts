import type * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { ConversionTarget, ConversionTargets } from "./conversion.js"
import { convert, convertOr } from "./conversion.js"
import type { Entry } from "./entries.js"
import { orderedEntries, orderedNames } from "./entries.js"
import type { ConversionError, StringifyError } from "./errors.js"
import type { OutputSink } from "./stringify.js"
import { stringifyObject, toText as varToText } from "./stringify.js"
import type { JsonArray, JsonObject, Var, VarInput } from "./var.js"
import * as V from "./var.js"

// CHANGE: ordered object container over a single insertion-ordered map
// WHY: one map holds the keys for both ordering modes
// QUOTE(TZ): "removing a key removes it from names, size and output together"
// REF: req-object-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o,k: remove(o, k) → k ∉ getNames(o) ∧ size(o) = |getNames(o)|
// PURITY: CORE
// EFFECT: set/remove/clear mutate the container in place
// INVARIANT: preserveInsertionOrder is fixed at construction
// COMPLEXITY: O(1) lookups and updates, O(n log n) sorted iteration

export type { JsonObject } from "./var.js"

export interface MakeOptions {
  readonly preserveInsertionOrder?: boolean
}

export const make = (options: MakeOptions = {}): JsonObject => ({
  _tag: "JsonObject",
  preserveInsertionOrder: options.preserveInsertionOrder ?? false,
  values: new Map<string, Var>()
})

/**
 * Build a container from key/value pairs, in the given order.
 *
 * @pure true
 * @complexity O(n)
 */
export const fromEntries = (
  entries: Iterable<readonly [string, VarInput]>,
  options: MakeOptions = {}
): JsonObject => {
  const self = make(options)
  for (const [key, value] of entries) {
    set(self, key, value)
  }
  return self
}

/**
 * Copy the top-level pairs into a new container with the same ordering mode.
 * Nested arrays and objects stay shared with the source.
 *
 * @pure true
 * @complexity O(n)
 */
export const copy = (self: JsonObject): JsonObject => V.copyObject(self)

export const deepCopy = (self: JsonObject): JsonObject => V.deepCopyObject(self)

export const get = (self: JsonObject, key: string): Var => self.values.get(key) ?? V.empty

export const getArray = (self: JsonObject, key: string): Option.Option<JsonArray> => {
  const value = get(self, key)
  return value._tag === "Array" ? Option.some(value.value) : Option.none()
}

export const getObject = (self: JsonObject, key: string): Option.Option<JsonObject> => {
  const value = get(self, key)
  return value._tag === "Object" ? Option.some(value.value) : Option.none()
}

/**
 * Read a property converted to the target type.
 *
 * @param self - Object container.
 * @param key - Property name.
 * @param target - Conversion target.
 * @returns Converted value; a missing key is an Empty value and fails like one.
 *
 * @pure true
 * @invariant getValue(o, k, t) = convert(get(o, k), t)
 * @complexity O(1) for scalars
 */
export const getValue = <T extends ConversionTarget>(
  self: JsonObject,
  key: string,
  target: T
): Either.Either<ConversionTargets[T], ConversionError> => convert(get(self, key), target)

/**
 * Read a property converted to the target type, or a default.
 *
 * @param self - Object container.
 * @param key - Property name.
 * @param target - Conversion target.
 * @param fallback - Returned when the key is absent, empty, or does not convert.
 *
 * @pure true
 * @invariant never fails
 * @complexity O(1) for scalars
 */
export const optValue = <T extends ConversionTarget>(
  self: JsonObject,
  key: string,
  target: T,
  fallback: ConversionTargets[T]
): ConversionTargets[T] => convertOr(get(self, key), target, fallback)

export const getNames = (self: JsonObject): ReadonlyArray<string> => orderedNames(self)

export const entries = (self: JsonObject): ReadonlyArray<Entry> => orderedEntries(self)

export const has = (self: JsonObject, key: string): boolean => self.values.has(key)

export const isArray = (self: JsonObject, key: string): boolean => V.isArray(get(self, key))

export const isObject = (self: JsonObject, key: string): boolean => V.isObject(get(self, key))

export const isNull = (self: JsonObject, key: string): boolean => V.isEmpty(get(self, key))

export const size = (self: JsonObject): number => self.values.size

/**
 * Insert or overwrite a property. Overwriting keeps the key's position.
 *
 * @pure false
 * @effect mutates self
 * @complexity O(1)
 */
export const set = (self: JsonObject, key: string, value: VarInput): void => {
  self.values.set(key, V.make(value))
}

/**
 * Remove a property.
 *
 * @returns true when the key existed.
 *
 * @pure false
 * @effect mutates self
 * @invariant the key leaves every ordering at once
 * @complexity O(1)
 */
export const remove = (self: JsonObject, key: string): boolean => self.values.delete(key)

export const clear = (self: JsonObject): void => {
  self.values.clear()
}

export const stringify = (
  self: JsonObject,
  out: OutputSink,
  indent = 0,
  step = -1
): Either.Either<void, StringifyError> => stringifyObject(self, out, indent, step)

export const toText = (self: JsonObject, indent = 0, step = -1): Either.Either<string, StringifyError> =>
  varToText(V.object(self), indent, step)
