import type { CliArgs } from "./cli.js"
import { resolveStep } from "./stringify.js"

// CHANGE: define config merging rules and defaults for formatting
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): "CLI flags > config file > defaults"
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved indent and step are non-negative integers
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly indent?: number
  readonly step?: number
  readonly preserveOrder?: boolean
}

export interface ResolvedConfig {
  readonly indent: number
  readonly step: number
  readonly preserveInsertionOrder: boolean
}

export const DEFAULT_CONFIG_PATH = "./.ordered-json.json"

export const DEFAULT_INDENT = 2

const resolveIndent = (cli: CliArgs, fileConfig: FileConfig | undefined): number =>
  cli.indent ?? fileConfig?.indent ?? DEFAULT_INDENT

const resolvePreserveOrder = (cli: CliArgs, fileConfig: FileConfig | undefined): boolean =>
  cli.preserveOrder ?? fileConfig?.preserveOrder ?? false

/**
 * Resolve the effective formatting config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .ordered-json.json.
 * @returns Resolved configuration; an unset step equals the indent.
 *
 * @pure true
 * @invariant step ≥ 0
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => {
  const indent = resolveIndent(cli, fileConfig)
  return {
    indent,
    step: resolveStep(indent, cli.step ?? fileConfig?.step ?? -1),
    preserveInsertionOrder: resolvePreserveOrder(cli, fileConfig)
  }
}
