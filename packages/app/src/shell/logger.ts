import { Layer, Logger, LogLevel } from "effect"

// CHANGE: route Effect logs to stderr with a verbosity switch
// WHY: stdout carries the JSON output of the CLI
// PURITY: SHELL

const renderMessage = (message: unknown): string =>
  Array.isArray(message) ? message.map((part: unknown) => String(part)).join(" ") : String(message)

export const stderrLogger = Logger.make(({ logLevel, message }) => {
  process.stderr.write(`[${logLevel.label.toLowerCase()}] ${renderMessage(message)}\n`)
})

export const loggerLayer = (verbose: boolean): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, stderrLogger),
    Logger.minimumLogLevel(verbose ? LogLevel.Debug : LogLevel.Info)
  )
