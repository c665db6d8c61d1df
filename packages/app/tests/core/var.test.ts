import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import * as JsonArray from "../../src/core/array.js"
import * as JsonObject from "../../src/core/object.js"
import { toText } from "../../src/core/stringify.js"
import * as V from "../../src/core/var.js"

describe("Var construction", () => {
  it.effect("wraps primitives by kind", () =>
    Effect.sync(() => {
      expect(V.make(null)).toEqual(V.empty)
      expect(V.make(undefined)).toEqual(V.empty)
      expect(V.make(true)).toEqual({ _tag: "Bool", value: true })
      expect(V.make(7)).toEqual({ _tag: "Int", value: 7 })
      expect(V.make(7.25)).toEqual({ _tag: "Float", value: 7.25 })
      expect(V.make("s")).toEqual({ _tag: "String", value: "s" })
    }))

  it.effect("wraps container handles without copying", () =>
    Effect.sync(() => {
      const list = JsonArray.make()
      const object = JsonObject.make()
      const wrappedList = V.make(list)
      const wrappedObject = V.make(object)
      expect(V.isArray(wrappedList) && wrappedList.value === list).toBe(true)
      expect(V.isObject(wrappedObject) && wrappedObject.value === object).toBe(true)
    }))

  it.effect("returns existing values unchanged", () =>
    Effect.sync(() => {
      const value = V.float(1.5)
      expect(V.make(value)).toBe(value)
    }))

  it.effect("truncates integer payloads", () =>
    Effect.sync(() => {
      expect(V.int(2.8)).toEqual({ _tag: "Int", value: 2 })
    }))
})

describe("Var inspection", () => {
  it.effect("reports kinds through predicates", () =>
    Effect.sync(() => {
      expect(V.type(V.string("x"))).toBe("String")
      expect(V.isEmpty(V.empty)).toBe(true)
      expect(V.isBool(V.bool(false))).toBe(true)
      expect(V.isInteger(V.int(1))).toBe(true)
      expect(V.isInteger(V.float(1.5))).toBe(false)
      expect(V.isNumeric(V.float(1.5))).toBe(true)
      expect(V.isSigned(V.int(-1))).toBe(true)
      expect(V.isString(V.int(1))).toBe(false)
    }))

  it.effect("compares by kind and payload", () =>
    Effect.sync(() => {
      expect(V.equals(V.int(1), V.int(1))).toBe(true)
      expect(V.equals(V.int(1), V.float(1))).toBe(false)
      expect(V.equals(V.empty, V.empty)).toBe(true)
      expect(V.equals(V.empty, V.string(""))).toBe(false)
      expect(V.equals(V.array(JsonArray.make()), V.array(JsonArray.make()))).toBe(false)
    }))

  it.effect("deep copies nested containers", () =>
    Effect.sync(() => {
      const inner = JsonArray.fromIterable([1])
      const original = V.object(JsonObject.fromEntries([["list", inner]]))
      const copied = V.deepCopy(original)
      JsonArray.add(inner, 2)
      expect(V.isObject(copied)).toBe(true)
      if (V.isObject(copied)) {
        expect(JsonObject.toText(copied.value)).toEqual(Either.right(`{"list":[1]}`))
      }
      expect(toText(original)).toEqual(Either.right(`{"list":[1,2]}`))
    }))

  it.effect("deep copies cyclic containers into a matching cycle", () =>
    Effect.sync(() => {
      const object = JsonObject.fromEntries([["a", 1]])
      JsonObject.set(object, "self", object)
      const copied = JsonObject.deepCopy(object)
      const inner = JsonObject.getObject(copied, "self")
      expect(copied).not.toBe(object)
      expect(Option.isSome(inner) && inner.value === copied).toBe(true)
    }))

  it.effect("copies a container shared by two keys once", () =>
    Effect.sync(() => {
      const shared = JsonArray.fromIterable([1])
      const copied = JsonObject.deepCopy(JsonObject.fromEntries([["x", shared], ["y", shared]]))
      const x = JsonObject.getArray(copied, "x")
      const y = JsonObject.getArray(copied, "y")
      expect(Option.isSome(x) && Option.isSome(y) && x.value === y.value && x.value !== shared).toBe(true)
    }))
})
