import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import * as JsonArray from "../../src/core/array.js"
import * as JsonObject from "../../src/core/object.js"
import * as V from "../../src/core/var.js"

describe("JsonArray", () => {
  it.effect("pads with empty values when setting past the end", () =>
    Effect.sync(() => {
      const list = JsonArray.make()
      JsonArray.set(list, 3, "x")
      expect(JsonArray.size(list)).toBe(4)
      expect(JsonArray.isNull(list, 1)).toBe(true)
      expect(JsonArray.toText(list)).toEqual(Either.right(`[null,null,null,"x"]`))
    }))

  it.effect("replaces in place and ignores invalid indexes", () =>
    Effect.sync(() => {
      const list = JsonArray.fromIterable([1, 2])
      JsonArray.set(list, 0, true)
      JsonArray.set(list, -1, "ignored")
      JsonArray.set(list, 0.5, "ignored")
      expect(JsonArray.toText(list)).toEqual(Either.right("[true,2]"))
    }))

  it.effect("removes by index", () =>
    Effect.sync(() => {
      const list = JsonArray.fromIterable(["a", "b", "c"])
      expect(JsonArray.remove(list, 1)).toBe(true)
      expect(JsonArray.remove(list, 5)).toBe(false)
      expect(JsonArray.toText(list)).toEqual(Either.right(`["a","c"]`))
      JsonArray.clear(list)
      expect(JsonArray.size(list)).toBe(0)
    }))

  it.effect("reads typed values and handles", () =>
    Effect.sync(() => {
      const nested = JsonObject.make()
      const list = JsonArray.fromIterable(["12", nested])
      expect(JsonArray.getValue(list, 0, "int32")).toEqual(Either.right(12))
      expect(JsonArray.optValue(list, 9, "int32", -1)).toBe(-1)
      expect(JsonArray.getObject(list, 1)).toEqual(Option.some(nested))
      expect(Option.isNone(JsonArray.getArray(list, 1))).toBe(true)
      expect(JsonArray.isObject(list, 1)).toBe(true)
      expect(JsonArray.isArray(list, 0)).toBe(false)
      expect(JsonArray.get(list, 9)).toEqual(V.empty)
    }))

  it.effect("pretty prints with indent and step", () =>
    Effect.sync(() => {
      const list = JsonArray.fromIterable([1, JsonObject.fromEntries([["k", "v"]])])
      expect(JsonArray.toText(list, 2, 2)).toEqual(Either.right("[\n  1,\n  {\n    \"k\" : \"v\"\n  }\n]"))
    }))

  it.effect("copy shares nested containers while deepCopy does not", () =>
    Effect.sync(() => {
      const inner = JsonArray.make()
      const list = JsonArray.fromIterable([inner])
      const shallow = JsonArray.copy(list)
      const deep = JsonArray.deepCopy(list)
      JsonArray.add(inner, 1)
      expect(JsonArray.toText(shallow)).toEqual(Either.right("[[1]]"))
      expect(JsonArray.toText(deep)).toEqual(Either.right("[[]]"))
    }))
})
