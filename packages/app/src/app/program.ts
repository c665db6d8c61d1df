import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { DEFAULT_CONFIG_PATH, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import * as JsonObject from "../core/object.js"
import { runGetQuery } from "../core/query.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readDocument, writeDocumentText } from "../shell/document.js"
import { loggerLayer } from "../shell/logger.js"

// CHANGE: orchestrate CLI modes with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "format/get/names"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀mode: run(mode) returns exitCode = 0 or fails with AppError
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emit = (cli: CliArgs, payload: string): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (cli.output === undefined) {
      yield* _(writeStdout(payload))
    } else {
      yield* _(writeDocumentText(cli.output, payload))
    }
    return { output: payload, exitCode: 0 }
  })

const handleFormat = (
  cli: CliArgs,
  config: ResolvedConfig,
  document: JsonObject.JsonObject
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const text = yield* _(fromEither(JsonObject.toText(document, config.indent, config.step)))
    yield* _(Effect.logDebug(`formatted ${JsonObject.size(document)} top-level keys`))
    return yield* _(emit(cli, text))
  })

const handleNames = (
  cli: CliArgs,
  document: JsonObject.JsonObject
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  emit(cli, JsonObject.getNames(document).join("\n"))

const handleGet = (
  cli: CliArgs,
  config: ResolvedConfig,
  document: JsonObject.JsonObject
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const text = yield* _(
      fromEither(
        runGetQuery(document, {
          key: cli.key ?? "",
          as: cli.as,
          fallback: cli.fallback,
          indent: config.indent,
          step: config.step
        })
      )
    )
    return yield* _(emit(cli, text))
  })

const executeCommand = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const configPath = cli.configPath ?? DEFAULT_CONFIG_PATH
    const configFile = yield* _(loadConfigFile(configPath, cli.configPath !== undefined))
    const config = resolveConfig(cli, configFile)
    const document = yield* _(
      readDocument(cli.input, { preserveInsertionOrder: config.preserveInsertionOrder })
    )
    return yield* _(
      Match.value(cli.command).pipe(
        Match.when("format", () => handleFormat(cli, config, document)),
        Match.when("names", () => handleNames(cli, document)),
        Match.when("get", () => handleGet(cli, config, document)),
        Match.exhaustive
      )
    )
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the emitted text and exit code.
 *
 * @pure false
 * @effect FileSystem, stdout, stderr logging
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(executeCommand(cli).pipe(Effect.provide(loggerLayer(cli.verbose))))
  })
