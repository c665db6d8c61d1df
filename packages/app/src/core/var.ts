// CHANGE: model the variant value as a closed tagged union
// WHY: one slot type for parsers to populate and serializers to consume
// QUOTE(TZ): "a value is empty, bool, integer, float, string, array or object"
// REF: req-var-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ Var: type(v) ∈ VarType ∧ (type(v) = "Int" → Number.isInteger(v.value))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Array/Object payloads are shared handles, never copied implicitly
// COMPLEXITY: O(1)/O(1) except deepCopy: O(n)

export interface JsonArray {
  readonly _tag: "JsonArray"
  readonly values: Array<Var>
}

export interface JsonObject {
  readonly _tag: "JsonObject"
  readonly preserveInsertionOrder: boolean
  readonly values: Map<string, Var>
}

export type Empty = { readonly _tag: "Empty" }
export type Bool = { readonly _tag: "Bool"; readonly value: boolean }
export type Int = { readonly _tag: "Int"; readonly value: number }
export type Float = { readonly _tag: "Float"; readonly value: number }
export type Str = { readonly _tag: "String"; readonly value: string }
export type ArrayHandle = { readonly _tag: "Array"; readonly value: JsonArray }
export type ObjectHandle = { readonly _tag: "Object"; readonly value: JsonObject }

export type Var = Empty | Bool | Int | Float | Str | ArrayHandle | ObjectHandle

export type VarType = Var["_tag"]

export type VarInput = Var | JsonArray | JsonObject | string | number | boolean | null | undefined

export const empty: Var = { _tag: "Empty" }

export const bool = (value: boolean): Var => ({ _tag: "Bool", value })

export const int = (value: number): Var => ({ _tag: "Int", value: Math.trunc(value) })

export const float = (value: number): Var => ({ _tag: "Float", value })

export const string = (value: string): Var => ({ _tag: "String", value })

export const array = (value: JsonArray): Var => ({ _tag: "Array", value })

export const object = (value: JsonObject): Var => ({ _tag: "Object", value })

/**
 * Wrap a plain input into a Var.
 *
 * @param input - Var, container handle, or primitive.
 * @returns Var holding the input; integral numbers become Int.
 *
 * @pure true
 * @invariant make(v) = v for every v ∈ Var
 * @complexity O(1)
 */
export const make = (input: VarInput): Var => {
  if (input === null || input === undefined) {
    return empty
  }
  if (typeof input === "boolean") {
    return bool(input)
  }
  if (typeof input === "number") {
    return Number.isInteger(input) ? int(input) : float(input)
  }
  if (typeof input === "string") {
    return string(input)
  }
  if (input._tag === "JsonArray") {
    return array(input)
  }
  if (input._tag === "JsonObject") {
    return object(input)
  }
  return input
}

export const type = (value: Var): VarType => value._tag

export const isEmpty = (value: Var): value is Empty => value._tag === "Empty"

export const isBool = (value: Var): value is Bool => value._tag === "Bool"

export const isArray = (value: Var): value is ArrayHandle => value._tag === "Array"

export const isObject = (value: Var): value is ObjectHandle => value._tag === "Object"

export const isInteger = (value: Var): value is Int => value._tag === "Int"

export const isNumeric = (value: Var): value is Int | Float => value._tag === "Int" || value._tag === "Float"

export const isSigned = (value: Var): value is Int | Float => isNumeric(value)

export const isString = (value: Var): value is Str => value._tag === "String"

/**
 * Compare two values by kind and payload. Handles compare by identity.
 *
 * @pure true
 * @complexity O(1)
 */
export const equals = (left: Var, right: Var): boolean => {
  if (left._tag === "Empty" || right._tag === "Empty") {
    return left._tag === right._tag
  }
  return left._tag === right._tag && Object.is(left.value, right.value)
}

export const copyArray = (self: JsonArray): JsonArray => ({
  _tag: "JsonArray",
  values: [...self.values]
})

export const copyObject = (self: JsonObject): JsonObject => ({
  _tag: "JsonObject",
  preserveInsertionOrder: self.preserveInsertionOrder,
  values: new Map(self.values)
})

interface Copies {
  readonly arrays: Map<JsonArray, JsonArray>
  readonly objects: Map<JsonObject, JsonObject>
}

const copyArrayWith = (self: JsonArray, copies: Copies): JsonArray => {
  const existing = copies.arrays.get(self)
  if (existing !== undefined) {
    return existing
  }
  const values: Array<Var> = []
  const copied: JsonArray = { _tag: "JsonArray", values }
  copies.arrays.set(self, copied)
  for (const value of self.values) {
    values.push(copyWith(value, copies))
  }
  return copied
}

const copyObjectWith = (self: JsonObject, copies: Copies): JsonObject => {
  const existing = copies.objects.get(self)
  if (existing !== undefined) {
    return existing
  }
  const values = new Map<string, Var>()
  const copied: JsonObject = { _tag: "JsonObject", preserveInsertionOrder: self.preserveInsertionOrder, values }
  copies.objects.set(self, copied)
  for (const [key, value] of self.values) {
    values.set(key, copyWith(value, copies))
  }
  return copied
}

const copyWith = (value: Var, copies: Copies): Var => {
  if (value._tag === "Array") {
    return array(copyArrayWith(value.value, copies))
  }
  if (value._tag === "Object") {
    return object(copyObjectWith(value.value, copies))
  }
  return value
}

const freshCopies = (): Copies => ({ arrays: new Map(), objects: new Map() })

export const deepCopyArray = (self: JsonArray): JsonArray => copyArrayWith(self, freshCopies())

export const deepCopyObject = (self: JsonObject): JsonObject => copyObjectWith(self, freshCopies())

/**
 * Copy a value together with every nested container it reaches.
 * A container reached twice is copied once, so shared and cyclic
 * structure is kept in the copy.
 *
 * @param value - Value to copy.
 * @returns Value that shares no container with the input.
 *
 * @pure true
 * @invariant scalar values are returned as is
 * @complexity O(n) where n = number of nested values
 */
export const deepCopy = (value: Var): Var => copyWith(value, freshCopies())
