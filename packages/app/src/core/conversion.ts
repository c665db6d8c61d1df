import * as Either from "effect/Either"

import type { ConversionError } from "./errors.js"
import { badConversion, notImplemented } from "./errors.js"
import { toText } from "./stringify.js"
import type { Var } from "./var.js"

// CHANGE: kind-directed conversion of variant values to typed targets
// WHY: typed accessors need a fallible, exception-free conversion table
// QUOTE(TZ): "unsupported conversions fail with BadConversion"
// REF: req-convert-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v,t: convert(v, t) = Right(x) → x : ConversionTargets[t]
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Empty never converts; integer targets never leave their range
// COMPLEXITY: O(1) for scalars, O(n) for container to string

export interface ConversionTargets {
  readonly bool: boolean
  readonly int8: number
  readonly int16: number
  readonly int32: number
  readonly int64: number
  readonly uint8: number
  readonly uint16: number
  readonly uint32: number
  readonly uint64: number
  readonly float: number
  readonly double: number
  readonly char: string
  readonly string: string
  readonly date: Date
}

export type ConversionTarget = keyof ConversionTargets

export type IntegerTarget = "int8" | "int16" | "int32" | "int64" | "uint8" | "uint16" | "uint32" | "uint64"

type Converted<T extends ConversionTarget> = Either.Either<ConversionTargets[T], ConversionError>

type Converter<T extends ConversionTarget> = (value: Var) => Converted<T>

type NumberResult = Either.Either<number, ConversionError>

interface Range {
  readonly min: number
  readonly max: number
}

const integerRanges: { readonly [K in IntegerTarget]: Range } = {
  int8: { min: -128, max: 127 },
  int16: { min: -32768, max: 32767 },
  int32: { min: -2147483648, max: 2147483647 },
  int64: { min: Number.MIN_SAFE_INTEGER, max: Number.MAX_SAFE_INTEGER },
  uint8: { min: 0, max: 255 },
  uint16: { min: 0, max: 65535 },
  uint32: { min: 0, max: 4294967295 },
  uint64: { min: 0, max: Number.MAX_SAFE_INTEGER }
}

const FLOAT_MAX = 3.4028234663852886e38

const integerPattern = /^[+-]?\d+$/u
const decimalPattern = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/u

export const isConversionTarget = (value: string): value is ConversionTarget => Object.hasOwn(converters, value)

const parseInteger = (text: string): number | undefined => {
  const trimmed = text.trim()
  return integerPattern.test(trimmed) ? Number(trimmed) : undefined
}

const parseDecimal = (text: string): number | undefined => {
  const trimmed = text.trim()
  return decimalPattern.test(trimmed) ? Number(trimmed) : undefined
}

const toInteger = (target: IntegerTarget) => (value: Var): NumberResult => {
  const range = integerRanges[target]
  const checked = (raw: number): NumberResult => {
    if (!Number.isFinite(raw)) {
      return Either.left(badConversion(value._tag, target, `${raw} is not finite`))
    }
    const truncated = Math.trunc(raw)
    if (truncated < range.min || truncated > range.max) {
      return Either.left(badConversion(value._tag, target, `${raw} is out of range`))
    }
    return Either.right(truncated === 0 ? 0 : truncated)
  }
  switch (value._tag) {
    case "Bool":
      return Either.right(value.value ? 1 : 0)
    case "Int":
    case "Float":
      return checked(value.value)
    case "String": {
      const parsed = parseInteger(value.value)
      return parsed === undefined
        ? Either.left(badConversion(value._tag, target, `"${value.value}" is not an integer`))
        : checked(parsed)
    }
    default:
      return Either.left(badConversion(value._tag, target))
  }
}

const toDouble = (target: "float" | "double", narrow: (raw: number) => number | undefined) =>
(value: Var): NumberResult => {
  const narrowed = (raw: number): NumberResult => {
    const result = narrow(raw)
    return result === undefined
      ? Either.left(badConversion(value._tag, target, `${raw} is out of range`))
      : Either.right(result)
  }
  switch (value._tag) {
    case "Bool":
      return Either.right(value.value ? 1 : 0)
    case "Int":
    case "Float":
      return narrowed(value.value)
    case "String": {
      const parsed = parseDecimal(value.value)
      return parsed === undefined
        ? Either.left(badConversion(value._tag, target, `"${value.value}" is not a number`))
        : narrowed(parsed)
    }
    default:
      return Either.left(badConversion(value._tag, target))
  }
}

const narrowFloat = (raw: number): number | undefined =>
  Number.isFinite(raw) && Math.abs(raw) > FLOAT_MAX ? undefined : Math.fround(raw)

const toBool: Converter<"bool"> = (value) => {
  switch (value._tag) {
    case "Empty":
      return Either.left(badConversion(value._tag, "bool"))
    case "Bool":
      return Either.right(value.value)
    case "Int":
    case "Float":
      return Either.right(value.value !== 0)
    case "String": {
      const text = value.value
      return Either.right(!(text.length === 0 || text === "0" || text.toLowerCase() === "false"))
    }
    case "Array":
      return Either.right(value.value.values.length > 0)
    case "Object":
      return Either.right(value.value.values.size > 0)
  }
}

const charFromCode = (value: Var, raw: number): Converted<"char"> => {
  const code = Math.trunc(raw)
  if (!Number.isFinite(raw) || code < 0 || code > 255) {
    return Either.left(badConversion(value._tag, "char", `${raw} is not a character code`))
  }
  return Either.right(String.fromCharCode(code))
}

const toChar: Converter<"char"> = (value) => {
  switch (value._tag) {
    case "Bool":
      return Either.right(value.value ? "\u0001" : "\u0000")
    case "Int":
    case "Float":
      return charFromCode(value, value.value)
    case "String": {
      const code = value.value.codePointAt(0)
      return Either.right(code === undefined ? "\u0000" : String.fromCodePoint(code))
    }
    default:
      return Either.left(badConversion(value._tag, "char"))
  }
}

const toStringValue: Converter<"string"> = (value) => {
  switch (value._tag) {
    case "Empty":
      return Either.left(badConversion(value._tag, "string"))
    case "Bool":
      return Either.right(value.value ? "true" : "false")
    case "Int":
    case "Float":
      return Either.right(String(value.value))
    case "String":
      return Either.right(value.value)
    case "Array":
    case "Object":
      return Either.mapLeft(toText(value, 2), (error) => badConversion(value._tag, "string", error.message))
  }
}

const dateFrom = (value: Var, time: number): Converted<"date"> => {
  const date = new Date(time)
  return Number.isNaN(date.getTime())
    ? Either.left(badConversion(value._tag, "date", `${time} is not a valid time`))
    : Either.right(date)
}

const toDate: Converter<"date"> = (value) => {
  switch (value._tag) {
    case "Int":
    case "Float":
      return dateFrom(value, value.value)
    case "String": {
      const time = Date.parse(value.value)
      return Number.isNaN(time)
        ? Either.left(badConversion(value._tag, "date", `"${value.value}" is not a date`))
        : dateFrom(value, time)
    }
    case "Array":
    case "Object":
      return Either.left(notImplemented(value._tag, "date"))
    default:
      return Either.left(badConversion(value._tag, "date"))
  }
}

const converters: { readonly [K in ConversionTarget]: Converter<K> } = {
  bool: toBool,
  int8: toInteger("int8"),
  int16: toInteger("int16"),
  int32: toInteger("int32"),
  int64: toInteger("int64"),
  uint8: toInteger("uint8"),
  uint16: toInteger("uint16"),
  uint32: toInteger("uint32"),
  uint64: toInteger("uint64"),
  float: toDouble("float", narrowFloat),
  double: toDouble("double", (raw) => raw),
  char: toChar,
  string: toStringValue,
  date: toDate
}

/**
 * Convert a value to the requested target type.
 *
 * @param value - Value to convert.
 * @param target - Name of the target type.
 * @returns The converted value or a typed ConversionError.
 *
 * @pure true
 * @invariant convert(empty, t) is Left for every t
 * @complexity O(1) for scalars, O(n) for containers converted to string
 */
export const convert = <T extends ConversionTarget>(value: Var, target: T): Converted<T> => {
  const converter: Converter<T> = converters[target]
  return converter(value)
}

/**
 * Convert a value, falling back to a default on any failure.
 *
 * @pure true
 * @invariant never fails
 * @complexity same as convert
 */
export const convertOr = <T extends ConversionTarget>(
  value: Var,
  target: T,
  fallback: ConversionTargets[T]
): ConversionTargets[T] => {
  if (value._tag === "Empty") {
    return fallback
  }
  return Either.getOrElse(convert(value, target), () => fallback)
}
