import { Match } from "effect"

import type { CliError } from "./cli.js"
import type { ConversionTarget } from "./conversion.js"
import type { JsonParseError } from "./parse.js"
import type { VarType } from "./var.js"

// CHANGE: unify error algebra for conversion, serialization, and the CLI
// WHY: provide typed failures for accessors and for program exit codes
// QUOTE(TZ): "exit code 1 on any error, printed to stderr"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type BadConversion = {
  readonly _tag: "BadConversion"
  readonly from: VarType
  readonly to: ConversionTarget
  readonly message: string
}
export type NotImplemented = {
  readonly _tag: "NotImplemented"
  readonly from: VarType
  readonly to: ConversionTarget
  readonly message: string
}
export type ConversionError = BadConversion | NotImplemented

export type UnsupportedValue = { readonly _tag: "UnsupportedValue"; readonly message: string }
export type StringifyError = UnsupportedValue

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type KeyNotFound = { readonly _tag: "KeyNotFound"; readonly key: string }

export type AppError =
  | CliError
  | ConversionError
  | StringifyError
  | JsonParseError
  | ConfigError
  | FileError
  | KeyNotFound

export const badConversion = (from: VarType, to: ConversionTarget, reason?: string): BadConversion => ({
  _tag: "BadConversion",
  from,
  to,
  message: reason === undefined ? `Can not convert ${from} to ${to}` : `Can not convert ${from} to ${to}: ${reason}`
})

export const notImplemented = (from: VarType, to: ConversionTarget): NotImplemented => ({
  _tag: "NotImplemented",
  from,
  to,
  message: `Conversion not implemented: ${from} => ${to}`
})

export const unsupportedValue = (message: string): UnsupportedValue => ({
  _tag: "UnsupportedValue",
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const keyNotFound = (key: string): KeyNotFound => ({
  _tag: "KeyNotFound",
  key
})

/**
 * Render an error as a single diagnostic line.
 *
 * @param error - Any failure produced by the program.
 * @returns Line without trailing newline.
 *
 * @pure true
 * @invariant every AppError tag has a rendering
 * @complexity O(1)
 */
export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => `error: ${value.message}`),
    Match.tag("BadConversion", (value) => `conversion failed: ${value.message}`),
    Match.tag("NotImplemented", (value) => `conversion failed: ${value.message}`),
    Match.tag("UnsupportedValue", (value) => `stringify failed: ${value.message}`),
    Match.tag(
      "JsonParseError",
      (value) => `parse failed: ${value.message} (line ${value.line}, column ${value.column})`
    ),
    Match.tag("ConfigError", (value) => `config: ${value.message}`),
    Match.tag("FileError", (value) => `file: ${value.message}`),
    Match.tag("KeyNotFound", (value) => `key not found: ${value.key}`),
    Match.exhaustive
  )
