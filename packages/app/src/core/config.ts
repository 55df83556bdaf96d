import type { CliArgs } from "./cli.js"
import { DEFAULT_MAX_DEPTH } from "./parse.js"
import type { OutputFormat } from "./render.js"
import { DEFAULT_INDENT } from "./render.js"

// CHANGE: define config merging rules and defaults for the json-value CLI
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): "precedence CLI flags > config file > defaults"
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: maxDepth ≥ 1
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly indent?: string
  readonly compact?: boolean
  readonly maxDepth?: number
}

export interface ResolvedConfig {
  readonly indent: string
  readonly format: OutputFormat
  readonly maxDepth: number
}

// an explicit command always wins over the file's "compact" preference
const resolveFormat = (cli: CliArgs, fileConfig: FileConfig | undefined): OutputFormat => {
  if (cli.commandExplicit) {
    return cli.command === "compact" ? "compact" : "indented"
  }
  return fileConfig?.compact === true ? "compact" : "indented"
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-value.json.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  indent: cli.indent ?? fileConfig?.indent ?? DEFAULT_INDENT,
  format: resolveFormat(cli, fileConfig),
  maxDepth: cli.maxDepth ?? fileConfig?.maxDepth ?? DEFAULT_MAX_DEPTH
})
