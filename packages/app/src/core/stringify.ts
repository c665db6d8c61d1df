import * as Either from "effect/Either"

import { orderedEntries } from "./entries.js"
import type { StringifyError } from "./errors.js"
import { unsupportedValue } from "./errors.js"
import type { JsonArray, JsonObject, Var } from "./var.js"

// CHANGE: write JSON text for variant values and both containers
// WHY: one indent/step algorithm shared by objects and arrays so nesting renders consistently
// QUOTE(TZ): "indent 0 prints one line; otherwise each level adds step spaces"
// REF: req-stringify-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: stringify(v, out, 0, 0) writes a single line of JSON text
// PURITY: CORE
// EFFECT: writes to the given OutputSink
// INVARIANT: on Left, the sink holds a prefix of the output and must be discarded
// COMPLEXITY: O(n) where n = number of nested values

export interface OutputSink {
  readonly write: (chunk: string) => void
}

export interface StringSink extends OutputSink {
  readonly contents: () => string
}

export const makeStringSink = (): StringSink => {
  const chunks: Array<string> = []
  return {
    write: (chunk) => {
      chunks.push(chunk)
    },
    contents: () => chunks.join("")
  }
}

const done: Either.Either<void, StringifyError> = Either.right(undefined)

// A negative step means one level is as wide as the base indent.
export const resolveStep = (indent: number, step: number): number => step < 0 ? indent : step

const writeSpaces = (out: OutputSink, count: number): void => {
  if (count > 0) {
    out.write(" ".repeat(count))
  }
}

const closingIndent = (indent: number, step: number): number => indent >= step ? indent - step : indent

export const formatString = (value: string): string => JSON.stringify(value)

const formatNumber = (value: number): Either.Either<string, StringifyError> =>
  Number.isFinite(value)
    ? Either.right(Object.is(value, -0) ? "0" : String(value))
    : Either.left(unsupportedValue(`${value} has no JSON representation`))

type Container = JsonArray | JsonObject

// Containers on the current path from the root; a repeat is a cycle.
type Path = Set<Container>

const enter = (path: Path, self: Container): Either.Either<void, StringifyError> => {
  if (path.has(self)) {
    return Either.left(unsupportedValue("cyclic structure has no JSON representation"))
  }
  path.add(self)
  return done
}

const writeObject = (
  self: JsonObject,
  out: OutputSink,
  indent: number,
  step: number,
  path: Path
): Either.Either<void, StringifyError> => {
  const entered = enter(path, self)
  if (Either.isLeft(entered)) {
    return entered
  }
  const levelStep = resolveStep(indent, step)
  out.write("{")
  if (indent > 0) {
    out.write("\n")
  }
  const entries = orderedEntries(self)
  for (const [index, [key, value]] of entries.entries()) {
    writeSpaces(out, indent)
    out.write(formatString(key))
    out.write(indent > 0 ? " : " : ":")
    const written = writeValue(value, out, indent + levelStep, levelStep, path)
    if (Either.isLeft(written)) {
      return written
    }
    if (index < entries.length - 1) {
      out.write(",")
    }
    if (levelStep > 0) {
      out.write("\n")
    }
  }
  writeSpaces(out, closingIndent(indent, levelStep))
  out.write("}")
  path.delete(self)
  return done
}

const writeArray = (
  self: JsonArray,
  out: OutputSink,
  indent: number,
  step: number,
  path: Path
): Either.Either<void, StringifyError> => {
  const entered = enter(path, self)
  if (Either.isLeft(entered)) {
    return entered
  }
  const levelStep = resolveStep(indent, step)
  out.write("[")
  if (indent > 0) {
    out.write("\n")
  }
  for (const [index, value] of self.values.entries()) {
    if (index > 0) {
      out.write(",")
      if (levelStep > 0) {
        out.write("\n")
      }
    }
    writeSpaces(out, indent)
    const written = writeValue(value, out, indent + levelStep, levelStep, path)
    if (Either.isLeft(written)) {
      return written
    }
  }
  if (levelStep > 0) {
    out.write("\n")
  }
  writeSpaces(out, closingIndent(indent, levelStep))
  out.write("]")
  path.delete(self)
  return done
}

const writeValue = (
  value: Var,
  out: OutputSink,
  indent: number,
  step: number,
  path: Path
): Either.Either<void, StringifyError> => {
  switch (value._tag) {
    case "Empty":
      out.write("null")
      return done
    case "Bool":
      out.write(value.value ? "true" : "false")
      return done
    case "Int":
    case "Float":
      return Either.map(formatNumber(value.value), (text) => {
        out.write(text)
      })
    case "String":
      out.write(formatString(value.value))
      return done
    case "Array":
      return writeArray(value.value, out, indent, step, path)
    case "Object":
      return writeObject(value.value, out, indent, step, path)
  }
}

/**
 * Write an object container as JSON text.
 *
 * @param self - Object container.
 * @param out - Output sink.
 * @param indent - Base indentation; 0 selects compact output.
 * @param step - Per-level indentation increment; negative means `indent`.
 * @returns Right on success, Left if a nested value has no JSON form or the graph is cyclic.
 *
 * @pure false
 * @effect writes to out
 * @invariant entries are written in the container's active order
 * @complexity O(n)
 */
export const stringifyObject = (
  self: JsonObject,
  out: OutputSink,
  indent = 0,
  step = -1
): Either.Either<void, StringifyError> => writeObject(self, out, indent, step, new Set())

/**
 * Write an array container as JSON text.
 *
 * @param self - Array container.
 * @param out - Output sink.
 * @param indent - Base indentation; 0 selects compact output.
 * @param step - Per-level indentation increment; negative means `indent`.
 * @returns Right on success, Left if an element has no JSON form or the graph is cyclic.
 *
 * @pure false
 * @effect writes to out
 * @invariant elements are written in index order
 * @complexity O(n)
 */
export const stringifyArray = (
  self: JsonArray,
  out: OutputSink,
  indent = 0,
  step = -1
): Either.Either<void, StringifyError> => writeArray(self, out, indent, step, new Set())

/**
 * Write any value as JSON text, dispatching on its held kind.
 * A container shared by two branches is written twice; one that contains
 * itself fails.
 *
 * @param value - Value to write.
 * @param out - Output sink.
 * @param indent - Indentation passed to nested containers.
 * @param step - Per-level increment passed to nested containers.
 * @returns Right on success, Left for non-finite numbers and cycles.
 *
 * @pure false
 * @effect writes to out
 * @invariant Empty is written as null
 * @complexity O(n)
 */
export const stringify = (
  value: Var,
  out: OutputSink,
  indent = 0,
  step = -1
): Either.Either<void, StringifyError> => writeValue(value, out, indent, step, new Set())

/**
 * Render a value to a string.
 *
 * @pure true
 * @complexity O(n)
 */
export const toText = (value: Var, indent = 0, step = -1): Either.Either<string, StringifyError> => {
  const sink = makeStringSink()
  return Either.map(stringify(value, sink, indent, step), () => sink.contents())
}
