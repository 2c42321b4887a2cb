import type { CliArgs } from "./cli.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): "flags override the config file"
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: resolve(cli, cfg).indent = cli.indent ?? cfg.indent ?? 2
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolve(cli, cfg).indent = cli.indent ?? cfg.indent ?? 2
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly indent?: number
}

export interface ResolvedConfig {
  readonly indent: number
}

export const DEFAULT_INDENT = 2

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .graphql-literal.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  indent: cli.indent ?? fileConfig?.indent ?? DEFAULT_INDENT
})
