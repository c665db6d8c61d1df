import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import type { JsonObject } from "../core/object.js"
import type { ParseOptions } from "../core/parse.js"
import { parseObject } from "../core/parse.js"

// CHANGE: provide JSON document read/write helpers over the Effect file system
// WHY: isolate filesystem IO while the core stays pure
// PURITY: SHELL
// EFFECT: Effect<JsonObject, AppError, FileSystem>

export const readDocumentText = (
  path: string
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    return yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
  })

export const readDocument = (
  path: string,
  options: ParseOptions
): Effect.Effect<JsonObject, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const raw = yield* _(readDocumentText(path))
    yield* _(Effect.logDebug(`read ${raw.length} characters from ${path}`))
    const parsed = parseObject(raw, options)
    if (parsed._tag === "Left") {
      return yield* _(Effect.fail(parsed.left))
    }
    return parsed.right
  })

export const writeDocumentText = (
  path: string,
  payload: string
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const text = payload.endsWith("\n") ? payload : `${payload}\n`
    yield* _(
      fs.writeFileString(path, text).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`wrote ${text.length} characters to ${path}`))
  })
