import * as Either from "effect/Either"

import { cliError } from "./cli.js"
import type { ConversionTarget, ConversionTargets } from "./conversion.js"
import { convert } from "./conversion.js"
import type { AppError } from "./errors.js"
import { keyNotFound } from "./errors.js"
import * as JsonObject from "./object.js"
import { toText } from "./stringify.js"
import * as V from "./var.js"

// CHANGE: answer a single-key query against a parsed document
// WHY: expose get/getValue/optValue through the CLI without IO in the core
// QUOTE(TZ): "get --key k [--as type] [--default value]"
// PURITY: CORE
// INVARIANT: a missing key only fails when no target type is requested

export interface GetQuery {
  readonly key: string
  readonly as: ConversionTarget | undefined
  readonly fallback: string | undefined
  readonly indent: number
  readonly step: number
}

type Converted = ConversionTargets[ConversionTarget]

export const renderConverted = (value: Converted): string =>
  value instanceof Date ? value.toISOString() : String(value)

const parseFallback = (text: string, target: ConversionTarget): Either.Either<Converted, AppError> =>
  Either.mapLeft(
    convert(V.string(text), target),
    (error) => cliError(`--default ${JSON.stringify(text)} is not a valid ${target}: ${error.message}`)
  )

/**
 * Render one property of a document as text.
 *
 * @param document - Parsed root object.
 * @param query - Key, optional conversion target, optional default, and formatting.
 * @returns Rendered value or the failure that stopped it.
 *
 * @pure true
 * @invariant without a target, containers render as JSON text with the given indent/step
 * @complexity O(n)
 */
export const runGetQuery = (
  document: JsonObject.JsonObject,
  query: GetQuery
): Either.Either<string, AppError> => {
  const target = query.as
  if (target === undefined) {
    if (!JsonObject.has(document, query.key)) {
      return Either.left(keyNotFound(query.key))
    }
    return toText(JsonObject.get(document, query.key), query.indent, query.step)
  }
  if (query.fallback === undefined) {
    return Either.map(JsonObject.getValue(document, query.key, target), renderConverted)
  }
  return Either.map(
    parseFallback(query.fallback, target),
    (fallback) => renderConverted(JsonObject.optValue(document, query.key, target, fallback))
  )
}
