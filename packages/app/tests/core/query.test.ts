import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { formatAppError } from "../../src/core/errors.js"
import * as JsonObject from "../../src/core/object.js"
import type { GetQuery } from "../../src/core/query.js"
import { runGetQuery } from "../../src/core/query.js"

const document = JsonObject.fromEntries([
  ["port", "42"],
  ["when", "2024-03-01T00:00:00Z"],
  ["nested", JsonObject.fromEntries([["a", 1]])]
])

const query = (overrides: Partial<GetQuery> & Pick<GetQuery, "key">): GetQuery => ({
  as: undefined,
  fallback: undefined,
  indent: 2,
  step: 2,
  ...overrides
})

describe("runGetQuery", () => {
  it.effect("renders the raw value as JSON text", () =>
    Effect.sync(() => {
      expect(runGetQuery(document, query({ key: "port" }))).toEqual(Either.right("\"42\""))
      expect(runGetQuery(document, query({ key: "nested" }))).toEqual(Either.right("{\n  \"a\" : 1\n}"))
    }))

  it.effect("fails for a missing key without a target", () =>
    Effect.sync(() => {
      const result = runGetQuery(document, query({ key: "missing" }))
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left).toEqual({ _tag: "KeyNotFound", key: "missing" })
        expect(formatAppError(result.left)).toBe("key not found: missing")
      }
    }))

  it.effect("converts to the requested target", () =>
    Effect.sync(() => {
      expect(runGetQuery(document, query({ key: "port", as: "int32" }))).toEqual(Either.right("42"))
      expect(runGetQuery(document, query({ key: "when", as: "date" }))).toEqual(
        Either.right("2024-03-01T00:00:00.000Z")
      )
      expect(runGetQuery(document, query({ key: "port", as: "bool" }))).toEqual(Either.right("true"))
    }))

  it.effect("fails a conversion without a default", () =>
    Effect.sync(() => {
      const result = runGetQuery(document, query({ key: "missing", as: "int32" }))
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(formatAppError(result.left)).toBe("conversion failed: Can not convert Empty to int32")
      }
    }))

  it.effect("falls back to the default", () =>
    Effect.sync(() => {
      expect(runGetQuery(document, query({ key: "missing", as: "int32", fallback: "7" }))).toEqual(
        Either.right("7")
      )
      expect(runGetQuery(document, query({ key: "nested", as: "int32", fallback: "-1" }))).toEqual(
        Either.right("-1")
      )
    }))

  it.effect("rejects a default that does not convert", () =>
    Effect.sync(() => {
      const result = runGetQuery(document, query({ key: "port", as: "int32", fallback: "x" }))
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(formatAppError(result.left)).toBe(
          "error: --default \"x\" is not a valid int32: Can not convert String to int32: \"x\" is not an integer"
        )
      }
    }))
})
