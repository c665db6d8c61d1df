import * as Either from "effect/Either"

import * as JsonArray from "./array.js"
import * as JsonObject from "./object.js"
import type { Var } from "./var.js"
import * as V from "./var.js"

// CHANGE: parse JSON text into variant values and ordered containers
// WHY: populate containers through set/add only, keeping source key order when requested
// QUOTE(TZ): "duplicate keys keep their first position and their last value"
// REF: req-parse-1
// SOURCE: https://www.rfc-editor.org/rfc/rfc8259
// FORMAT THEOREM: ∀s: parse(s) = Right(v) → stringify(v) is valid JSON text
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: integral lexemes within the safe range become Int, every other number Float
// COMPLEXITY: O(n) where n = text length

export type JsonParseError = {
  readonly _tag: "JsonParseError"
  readonly message: string
  readonly line: number
  readonly column: number
  readonly offset: number
}

export interface ParseOptions {
  readonly preserveInsertionOrder?: boolean
  readonly maxDepth?: number
}

interface Settings {
  readonly preserveInsertionOrder: boolean
  readonly maxDepth: number
}

interface Cursor {
  readonly text: string
  offset: number
}

type Parsed<A> = Either.Either<A, JsonParseError>

const DEFAULT_MAX_DEPTH = 1000

const numberPattern = /-?(?:0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?/uy

const simpleEscapes: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const locate = (text: string, offset: number): { readonly line: number; readonly column: number } => {
  let line = 1
  let lineStart = 0
  for (let index = 0; index < offset && index < text.length; index++) {
    if (text[index] === "\n") {
      line++
      lineStart = index + 1
    }
  }
  return { line, column: offset - lineStart + 1 }
}

const failAt = <A>(cursor: Cursor, message: string, offset = cursor.offset): Parsed<A> => {
  const { column, line } = locate(cursor.text, offset)
  const error: JsonParseError = { _tag: "JsonParseError", message, line, column, offset }
  return Either.left(error)
}

const describe = (char: string | undefined): string =>
  char === undefined ? "end of input" : `character ${JSON.stringify(char)}`

const skipWhitespace = (cursor: Cursor): void => {
  while (cursor.offset < cursor.text.length) {
    const char = cursor.text[cursor.offset]
    if (char !== " " && char !== "\t" && char !== "\n" && char !== "\r") {
      return
    }
    cursor.offset++
  }
}

const expectChar = (cursor: Cursor, expected: string): Parsed<void> => {
  const char = cursor.text[cursor.offset]
  if (char !== expected) {
    return failAt(cursor, `Expected '${expected}' but found ${describe(char)}`)
  }
  cursor.offset++
  return Either.right(undefined)
}

const parseLiteral = (cursor: Cursor, word: string, value: Var): Parsed<Var> => {
  if (cursor.text.startsWith(word, cursor.offset)) {
    cursor.offset += word.length
    return Either.right(value)
  }
  return failAt(cursor, `Unexpected ${describe(cursor.text[cursor.offset])}`)
}

const parseNumber = (cursor: Cursor): Parsed<Var> => {
  numberPattern.lastIndex = cursor.offset
  const match = numberPattern.exec(cursor.text)
  if (match === null) {
    return failAt(cursor, "Invalid number")
  }
  const lexeme = match[0]
  cursor.offset += lexeme.length
  const value = Number(lexeme)
  const integral = match[1] === undefined && match[2] === undefined
  return Either.right(integral && Number.isSafeInteger(value) ? V.int(value) : V.float(value))
}

const readHex = (cursor: Cursor): Parsed<number> => {
  const digits = cursor.text.slice(cursor.offset, cursor.offset + 4)
  if (!/^[0-9a-fA-F]{4}$/u.test(digits)) {
    return failAt(cursor, "Invalid unicode escape")
  }
  cursor.offset += 4
  return Either.right(Number.parseInt(digits, 16))
}

const parseString = (cursor: Cursor): Parsed<string> => {
  const opened = expectChar(cursor, "\"")
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  const chunks: Array<string> = []
  let runStart = cursor.offset
  while (cursor.offset < cursor.text.length) {
    const char = cursor.text[cursor.offset] ?? ""
    if (char === "\"") {
      chunks.push(cursor.text.slice(runStart, cursor.offset))
      cursor.offset++
      return Either.right(chunks.join(""))
    }
    if (char < " ") {
      return failAt(cursor, "Unescaped control character in string")
    }
    if (char !== "\\") {
      cursor.offset++
      continue
    }
    chunks.push(cursor.text.slice(runStart, cursor.offset))
    const escape = cursor.text[cursor.offset + 1]
    cursor.offset += 2
    if (escape === "u") {
      const code = readHex(cursor)
      if (Either.isLeft(code)) {
        return Either.left(code.left)
      }
      chunks.push(String.fromCharCode(code.right))
    } else {
      const decoded = escape === undefined ? undefined : simpleEscapes[escape]
      if (decoded === undefined) {
        return failAt(cursor, `Invalid escape sequence \\${escape ?? ""}`, cursor.offset - 2)
      }
      chunks.push(decoded)
    }
    runStart = cursor.offset
  }
  return failAt(cursor, "Unterminated string")
}

// Container parsers return Either and are mutually recursive with parseValue.
const parseObjectBody = (cursor: Cursor, settings: Settings, depth: number): Parsed<Var> => {
  cursor.offset++
  const self = JsonObject.make({ preserveInsertionOrder: settings.preserveInsertionOrder })
  skipWhitespace(cursor)
  if (cursor.text[cursor.offset] === "}") {
    cursor.offset++
    return Either.right(V.object(self))
  }
  for (;;) {
    skipWhitespace(cursor)
    if (cursor.text[cursor.offset] !== "\"") {
      return failAt(cursor, `Expected string key but found ${describe(cursor.text[cursor.offset])}`)
    }
    const key = parseString(cursor)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    skipWhitespace(cursor)
    const colon = expectChar(cursor, ":")
    if (Either.isLeft(colon)) {
      return Either.left(colon.left)
    }
    const value = parseValue(cursor, settings, depth + 1)
    if (Either.isLeft(value)) {
      return value
    }
    JsonObject.set(self, key.right, value.right)
    skipWhitespace(cursor)
    const next = cursor.text[cursor.offset]
    cursor.offset++
    if (next === "}") {
      return Either.right(V.object(self))
    }
    if (next !== ",") {
      return failAt(cursor, `Expected ',' or '}' but found ${describe(next)}`, cursor.offset - 1)
    }
  }
}

const parseArrayBody = (cursor: Cursor, settings: Settings, depth: number): Parsed<Var> => {
  cursor.offset++
  const self = JsonArray.make()
  skipWhitespace(cursor)
  if (cursor.text[cursor.offset] === "]") {
    cursor.offset++
    return Either.right(V.array(self))
  }
  for (;;) {
    const value = parseValue(cursor, settings, depth + 1)
    if (Either.isLeft(value)) {
      return value
    }
    JsonArray.add(self, value.right)
    skipWhitespace(cursor)
    const next = cursor.text[cursor.offset]
    cursor.offset++
    if (next === "]") {
      return Either.right(V.array(self))
    }
    if (next !== ",") {
      return failAt(cursor, `Expected ',' or ']' but found ${describe(next)}`, cursor.offset - 1)
    }
  }
}

const parseValue = (cursor: Cursor, settings: Settings, depth: number): Parsed<Var> => {
  skipWhitespace(cursor)
  const char = cursor.text[cursor.offset]
  if (char === "{" || char === "[") {
    if (depth >= settings.maxDepth) {
      return failAt(cursor, `Maximum nesting depth of ${settings.maxDepth} exceeded`)
    }
    return char === "{" ? parseObjectBody(cursor, settings, depth) : parseArrayBody(cursor, settings, depth)
  }
  if (char === "\"") {
    return Either.map(parseString(cursor), V.string)
  }
  if (char === "t") {
    return parseLiteral(cursor, "true", V.bool(true))
  }
  if (char === "f") {
    return parseLiteral(cursor, "false", V.bool(false))
  }
  if (char === "n") {
    return parseLiteral(cursor, "null", V.empty)
  }
  if (char === "-" || (char !== undefined && char >= "0" && char <= "9")) {
    return parseNumber(cursor)
  }
  return failAt(cursor, `Unexpected ${describe(char)}`)
}

/**
 * Parse JSON text into a variant value.
 *
 * @param text - JSON document.
 * @param options - Ordering mode for objects and maximum nesting depth.
 * @returns Either with the root value or a positioned JsonParseError.
 *
 * @pure true
 * @invariant duplicate keys keep their first position and their last value
 * @complexity O(n)
 */
export const parseJson = (text: string, options: ParseOptions = {}): Parsed<Var> => {
  const settings: Settings = {
    preserveInsertionOrder: options.preserveInsertionOrder ?? false,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH
  }
  const cursor: Cursor = { text, offset: 0 }
  const root = parseValue(cursor, settings, 0)
  if (Either.isLeft(root)) {
    return root
  }
  skipWhitespace(cursor)
  if (cursor.offset < text.length) {
    return failAt(cursor, `Unexpected trailing ${describe(text[cursor.offset])}`)
  }
  return root
}

/**
 * Parse JSON text whose root must be an object.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseObject = (text: string, options: ParseOptions = {}): Parsed<JsonObject.JsonObject> =>
  Either.flatMap(parseJson(text, options), (root) =>
    root._tag === "Object"
      ? Either.right(root.value)
      : failAt<JsonObject.JsonObject>({ text, offset: 0 }, `Expected an object at the root but found ${root._tag}`))
