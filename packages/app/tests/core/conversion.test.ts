import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import * as JsonArray from "../../src/core/array.js"
import { convert, convertOr, isConversionTarget } from "../../src/core/conversion.js"
import * as JsonObject from "../../src/core/object.js"
import * as V from "../../src/core/var.js"

const leftMessage = <A>(result: Either.Either<A, { readonly message: string }>): string | undefined =>
  Either.isLeft(result) ? result.left.message : undefined

describe("integer targets", () => {
  it.effect("truncates floats toward zero", () =>
    Effect.sync(() => {
      expect(convert(V.float(3.9), "int32")).toEqual(Either.right(3))
      expect(convert(V.float(-3.9), "int32")).toEqual(Either.right(-3))
    }))

  it.effect("parses trimmed integer text", () =>
    Effect.sync(() => {
      expect(convert(V.string(" 42 "), "int32")).toEqual(Either.right(42))
      expect(convert(V.string("-7"), "int8")).toEqual(Either.right(-7))
      expect(leftMessage(convert(V.string("4.2"), "int32"))).toBe(
        "Can not convert String to int32: \"4.2\" is not an integer"
      )
    }))

  it.effect("rejects values outside the target range", () =>
    Effect.sync(() => {
      expect(leftMessage(convert(V.int(300), "int8"))).toBe("Can not convert Int to int8: 300 is out of range")
      expect(leftMessage(convert(V.int(-1), "uint8"))).toBe("Can not convert Int to uint8: -1 is out of range")
      expect(convert(V.int(255), "uint8")).toEqual(Either.right(255))
      expect(convert(V.int(4294967295), "uint32")).toEqual(Either.right(4294967295))
    }))

  it.effect("maps booleans to 0 and 1", () =>
    Effect.sync(() => {
      expect(convert(V.bool(true), "int64")).toEqual(Either.right(1))
      expect(convert(V.bool(false), "uint16")).toEqual(Either.right(0))
    }))

  it.effect("fails for empty values and containers", () =>
    Effect.sync(() => {
      expect(leftMessage(convert(V.empty, "int32"))).toBe("Can not convert Empty to int32")
      expect(leftMessage(convert(V.array(JsonArray.make()), "int32"))).toBe("Can not convert Array to int32")
    }))
})

describe("floating targets", () => {
  it.effect("parses decimal and exponent text", () =>
    Effect.sync(() => {
      expect(convert(V.string("1e3"), "double")).toEqual(Either.right(1000))
      expect(convert(V.string(".5"), "double")).toEqual(Either.right(0.5))
      expect(leftMessage(convert(V.string("abc"), "double"))).toBe(
        "Can not convert String to double: \"abc\" is not a number"
      )
    }))

  it.effect("narrows to single precision for float", () =>
    Effect.sync(() => {
      expect(convert(V.float(0.1), "float")).toEqual(Either.right(Math.fround(0.1)))
      expect(leftMessage(convert(V.float(1e39), "float"))).toBe(
        "Can not convert Float to float: 1e+39 is out of range"
      )
      expect(convert(V.float(1e39), "double")).toEqual(Either.right(1e39))
    }))

  it.effect("fails when an object is read as a number", () =>
    Effect.sync(() => {
      const result = convert(V.object(JsonObject.make()), "double")
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left).toEqual({
          _tag: "BadConversion",
          from: "Object",
          to: "double",
          message: "Can not convert Object to double"
        })
      }
    }))
})

describe("bool, char and string targets", () => {
  it.effect("treats empty, zero and false text as false", () =>
    Effect.sync(() => {
      expect(convert(V.string(""), "bool")).toEqual(Either.right(false))
      expect(convert(V.string("0"), "bool")).toEqual(Either.right(false))
      expect(convert(V.string("FALSE"), "bool")).toEqual(Either.right(false))
      expect(convert(V.string("no"), "bool")).toEqual(Either.right(true))
      expect(convert(V.int(0), "bool")).toEqual(Either.right(false))
      expect(convert(V.array(JsonArray.make()), "bool")).toEqual(Either.right(false))
      expect(leftMessage(convert(V.empty, "bool"))).toBe("Can not convert Empty to bool")
    }))

  it.effect("reads characters from codes and text", () =>
    Effect.sync(() => {
      expect(convert(V.int(65), "char")).toEqual(Either.right("A"))
      expect(convert(V.string("xyz"), "char")).toEqual(Either.right("x"))
      expect(convert(V.string("\u{1F600}!"), "char")).toEqual(Either.right("\u{1F600}"))
      expect(convert(V.string(""), "char")).toEqual(Either.right("\u0000"))
      expect(leftMessage(convert(V.int(300), "char"))).toBe(
        "Can not convert Int to char: 300 is not a character code"
      )
    }))

  it.effect("renders scalars and containers as text", () =>
    Effect.sync(() => {
      expect(convert(V.float(1.5), "string")).toEqual(Either.right("1.5"))
      expect(convert(V.bool(true), "string")).toEqual(Either.right("true"))
      expect(convert(V.array(JsonArray.fromIterable([1, 2])), "string")).toEqual(Either.right("[\n  1,\n  2\n]"))
    }))
})

describe("date target", () => {
  it.effect("parses ISO text and epoch milliseconds", () =>
    Effect.sync(() => {
      const parsed = convert(V.string("2024-03-01T12:00:00.000Z"), "date")
      expect(Either.map(parsed, (date) => date.toISOString())).toEqual(Either.right("2024-03-01T12:00:00.000Z"))
      const epoch = convert(V.int(0), "date")
      expect(Either.map(epoch, (date) => date.getTime())).toEqual(Either.right(0))
    }))

  it.effect("reports containers as not implemented", () =>
    Effect.sync(() => {
      const result = convert(V.object(JsonObject.make()), "date")
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe("NotImplemented")
        expect(result.left.message).toBe("Conversion not implemented: Object => date")
      }
    }))

  it.effect("rejects unparseable text", () =>
    Effect.sync(() => {
      expect(leftMessage(convert(V.string("someday"), "date"))).toBe(
        "Can not convert String to date: \"someday\" is not a date"
      )
    }))
})

describe("convertOr", () => {
  it.effect("returns the fallback for empty values and failures", () =>
    Effect.sync(() => {
      expect(convertOr(V.empty, "string", "none")).toBe("none")
      expect(convertOr(V.string("x"), "int32", -1)).toBe(-1)
      expect(convertOr(V.string("12"), "int32", -1)).toBe(12)
    }))

  it.effect("recognizes target names", () =>
    Effect.sync(() => {
      expect(isConversionTarget("uint64")).toBe(true)
      expect(isConversionTarget("toString")).toBe(false)
      expect(isConversionTarget("long")).toBe(false)
    }))
})
