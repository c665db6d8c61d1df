import type * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { ConversionTarget, ConversionTargets } from "./conversion.js"
import { convert, convertOr } from "./conversion.js"
import type { ConversionError, StringifyError } from "./errors.js"
import type { OutputSink } from "./stringify.js"
import { stringifyArray, toText as varToText } from "./stringify.js"
import type { JsonArray, JsonObject, Var, VarInput } from "./var.js"
import * as V from "./var.js"

// CHANGE: array container sharing the object's accessor vocabulary by index
// WHY: nested arrays are the second handle kind a Var may hold
// QUOTE(TZ): "arrays print with the same indent/step rules as objects"
// REF: req-array-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a,i: i ≥ size(a) → isNull(a, i)
// PURITY: CORE
// EFFECT: add/set/remove/clear mutate the container in place
// INVARIANT: values has no holes; gaps created by set are Empty
// COMPLEXITY: O(1) access, O(n) remove

export type { JsonArray } from "./var.js"

export const make = (): JsonArray => ({ _tag: "JsonArray", values: [] })

export const fromIterable = (values: Iterable<VarInput>): JsonArray => {
  const self = make()
  for (const value of values) {
    add(self, value)
  }
  return self
}

export const copy = (self: JsonArray): JsonArray => V.copyArray(self)

export const deepCopy = (self: JsonArray): JsonArray => V.deepCopyArray(self)

export const get = (self: JsonArray, index: number): Var => self.values[index] ?? V.empty

export const getArray = (self: JsonArray, index: number): Option.Option<JsonArray> => {
  const value = get(self, index)
  return value._tag === "Array" ? Option.some(value.value) : Option.none()
}

export const getObject = (self: JsonArray, index: number): Option.Option<JsonObject> => {
  const value = get(self, index)
  return value._tag === "Object" ? Option.some(value.value) : Option.none()
}

export const getValue = <T extends ConversionTarget>(
  self: JsonArray,
  index: number,
  target: T
): Either.Either<ConversionTargets[T], ConversionError> => convert(get(self, index), target)

export const optValue = <T extends ConversionTarget>(
  self: JsonArray,
  index: number,
  target: T,
  fallback: ConversionTargets[T]
): ConversionTargets[T] => convertOr(get(self, index), target, fallback)

export const isArray = (self: JsonArray, index: number): boolean => V.isArray(get(self, index))

export const isObject = (self: JsonArray, index: number): boolean => V.isObject(get(self, index))

export const isNull = (self: JsonArray, index: number): boolean => V.isEmpty(get(self, index))

export const size = (self: JsonArray): number => self.values.length

export const add = (self: JsonArray, value: VarInput): void => {
  self.values.push(V.make(value))
}

/**
 * Replace the element at index, padding with Empty values when index is past the end.
 * Negative or fractional indexes are ignored.
 *
 * @pure false
 * @effect mutates self
 * @invariant size(self) ≥ index + 1 afterwards
 * @complexity O(k) where k = number of padded slots
 */
export const set = (self: JsonArray, index: number, value: VarInput): void => {
  if (!Number.isInteger(index) || index < 0) {
    return
  }
  while (self.values.length < index) {
    self.values.push(V.empty)
  }
  if (index === self.values.length) {
    self.values.push(V.make(value))
    return
  }
  self.values[index] = V.make(value)
}

export const remove = (self: JsonArray, index: number): boolean => {
  if (index < 0 || index >= self.values.length) {
    return false
  }
  self.values.splice(index, 1)
  return true
}

export const clear = (self: JsonArray): void => {
  self.values.length = 0
}

export const stringify = (
  self: JsonArray,
  out: OutputSink,
  indent = 0,
  step = -1
): Either.Either<void, StringifyError> => stringifyArray(self, out, indent, step)

export const toText = (self: JsonArray, indent = 0, step = -1): Either.Either<string, StringifyError> =>
  varToText(V.array(self), indent, step)
