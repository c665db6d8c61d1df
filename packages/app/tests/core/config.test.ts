import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../../src/core/cli.js"
import { parseCliArgs } from "../../src/core/cli.js"
import { resolveConfig } from "../../src/core/config.js"
import { cliArgv } from "../app/test-helpers.js"

const cliOf = (...args: ReadonlyArray<string>): CliArgs => {
  const parsed = parseCliArgs(cliArgv("--input", "a.json", ...args))
  if (Either.isLeft(parsed)) {
    throw new Error(parsed.left.message)
  }
  return parsed.right
}

describe("resolveConfig", () => {
  it.effect("uses defaults when nothing is configured", () =>
    Effect.sync(() => {
      expect(resolveConfig(cliOf(), undefined)).toEqual({ indent: 2, step: 2, preserveInsertionOrder: false })
    }))

  it.effect("derives step from the file indent", () =>
    Effect.sync(() => {
      expect(resolveConfig(cliOf(), { indent: 4 })).toEqual({ indent: 4, step: 4, preserveInsertionOrder: false })
    }))

  it.effect("lets flags override the file", () =>
    Effect.sync(() => {
      const file = { indent: 4, step: 3, preserveOrder: true }
      expect(resolveConfig(cliOf("--step", "1", "--preserve-order", "false"), file)).toEqual({
        indent: 4,
        step: 1,
        preserveInsertionOrder: false
      })
      expect(resolveConfig(cliOf(), file)).toEqual({ indent: 4, step: 3, preserveInsertionOrder: true })
    }))

  it.effect("resolves --compact to a single line", () =>
    Effect.sync(() => {
      expect(resolveConfig(cliOf("--compact"), { indent: 4 })).toEqual({
        indent: 0,
        step: 0,
        preserveInsertionOrder: false
      })
    }))
})
