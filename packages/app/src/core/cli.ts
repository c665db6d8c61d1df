import { Match } from "effect"
import * as Either from "effect/Either"

import type { ConversionTarget } from "./conversion.js"
import { isConversionTarget } from "./conversion.js"

// CHANGE: implement deterministic CLI parsing for ordered-json
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "ordered-json [format|get|names] --input <file> [flags]"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.input ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "format" | "get" | "names"

export interface CliArgs {
  readonly command: CliCommand
  readonly input: string
  readonly output: string | undefined
  readonly configPath: string | undefined
  readonly indent: number | undefined
  readonly step: number | undefined
  readonly preserveOrder: boolean | undefined
  readonly key: string | undefined
  readonly as: ConversionTarget | undefined
  readonly fallback: string | undefined
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseCount = (flagName: string, value: string): Either.Either<number, CliError> =>
  /^\d+$/u.test(value)
    ? Either.right(Number(value))
    : Either.left(cliError(`--${flagName} expects a non-negative integer, got: ${value}`))

const countOf = (flagName: string) => (value: string): Either.Either<number, CliError> =>
  parseCount(flagName, value)

const parseTarget = (value: string): Either.Either<ConversionTarget, CliError> =>
  isConversionTarget(value)
    ? Either.right(value)
    : Either.left(cliError(`Unknown conversion target: ${value}`))

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("format", () => Either.right<CliCommand>("format")),
    Match.when("get", () => Either.right<CliCommand>("get")),
    Match.when("names", () => Either.right<CliCommand>("names")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  input: "",
  output: undefined,
  configPath: undefined,
  indent: undefined,
  step: undefined,
  preserveOrder: undefined,
  key: undefined,
  as: undefined,
  fallback: undefined,
  verbose: false
})

interface FlagStep {
  readonly next: CliArgs
  readonly consumed: number
}

// Keys and defaults may themselves start with "-" (e.g. --default -1).
const dashValueFlags: ReadonlySet<string> = new Set(["key", "default"])

const isMissingValue = (flagName: string, nextValue: string): boolean =>
  dashValueFlags.has(flagName) ? nextValue.startsWith("--") : isFlag(nextValue)

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isMissingValue(flagName, nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: CliArgs, consumed: number): Either.Either<FlagStep, CliError> =>
  Either.right({ next, consumed })

const parseValueFlag = <A>(
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (value: string) => Either.Either<A, CliError>,
  update: (args: CliArgs, value: A) => CliArgs
): Either.Either<FlagStep, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (raw) =>
    Either.map(decode(raw), (value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    })))

const asText = (value: string): Either.Either<string, CliError> => Either.right(value)

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Either.Either<FlagStep, CliError> => {
  const useNext = inlineValue === undefined && nextValue !== undefined && !isFlag(nextValue) &&
    parseBoolean(nextValue)._tag === "Right"
  const nextValueResolved = inlineValue ?? (useNext ? nextValue : "true")
  return Either.map(parseBoolean(nextValueResolved ?? "true"), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<FlagStep, CliError>

const flagParsers: Record<string, FlagParser> = {
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  compact: (current) => setParsedFlag({ ...current, indent: 0, step: 0 }, 1),
  "preserve-order": (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      preserveOrder: value
    })),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, asText, (args, value) => ({
      ...args,
      input: value
    })),
  output: (current, inlineValue, nextValue) =>
    parseValueFlag("output", current, inlineValue, nextValue, asText, (args, value) => ({
      ...args,
      output: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, asText, (args, value) => ({
      ...args,
      configPath: value
    })),
  indent: (current, inlineValue, nextValue) =>
    parseValueFlag("indent", current, inlineValue, nextValue, countOf("indent"), (args, value) => ({
      ...args,
      indent: value
    })),
  step: (current, inlineValue, nextValue) =>
    parseValueFlag("step", current, inlineValue, nextValue, countOf("step"), (args, value) => ({
      ...args,
      step: value
    })),
  key: (current, inlineValue, nextValue) =>
    parseValueFlag("key", current, inlineValue, nextValue, asText, (args, value) => ({
      ...args,
      key: value
    })),
  as: (current, inlineValue, nextValue) =>
    parseValueFlag("as", current, inlineValue, nextValue, parseTarget, (args, value) => ({
      ...args,
      as: value
    })),
  default: (current, inlineValue, nextValue) =>
    parseValueFlag("default", current, inlineValue, nextValue, asText, (args, value) => ({
      ...args,
      fallback: value
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<FlagStep, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const separator = raw.indexOf("=")
  const name = separator === -1 ? raw.slice(2) : raw.slice(2, separator)
  const inlineValue = separator === -1 ? undefined : raw.slice(separator + 1)
  const parser = Object.hasOwn(flagParsers, name) ? flagParsers[name] : undefined
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "format", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const validateArgs = (args: CliArgs): Either.Either<CliArgs, CliError> => {
  if (args.input.length === 0) {
    return Either.left(cliError("Missing required flag --input"))
  }
  if (args.command === "get" && args.key === undefined) {
    return Either.left(cliError("get requires --key"))
  }
  if (args.fallback !== undefined && args.as === undefined) {
    return Either.left(cliError("--default requires --as"))
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to format when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  return Either.flatMap(parseCommandFromArgs(rawArgs), (parsed) =>
    Either.flatMap(parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command)), validateArgs))
}
