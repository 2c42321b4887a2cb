import { Match } from "effect"

import type { CliError } from "./cli.js"
import type { JsonDecodeError } from "./serialize.js"

// CHANGE: unify error algebra for the CLI shell
// WHY: provide typed failures for program flow and a single rendering point for stderr
// QUOTE(TZ): "typed errors, one line on stderr"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: render(e) is a single line
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ParseFileError = { readonly _tag: "ParseError"; readonly source: string; readonly error: string }
export type LiteralError = { readonly _tag: "LiteralError"; readonly source: string; readonly message: string }

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | ParseFileError
  | JsonDecodeError
  | LiteralError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const parseFileError = (source: string, error: string): ParseFileError => ({
  _tag: "ParseError",
  source,
  error
})

export const literalError = (source: string): LiteralError => ({
  _tag: "LiteralError",
  source,
  message: `${source}: not a literal value (it contains a variable or a repeated field name)`
})

/**
 * Render an error as a single line for stderr.
 *
 * @pure true
 * @invariant every AppError tag has a rendering
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (e) => `Usage error: ${e.message}`),
    Match.tag("ConfigError", (e) => `Invalid config: ${e.message}`),
    Match.tag("FileError", (e) => `File error: ${e.message}`),
    Match.tag("ParseError", (e) => `Cannot parse ${e.source}: ${e.error}`),
    Match.tag("JsonDecodeError", (e) => `Cannot decode JSON: ${e.message}`),
    Match.tag("LiteralError", (e) => e.message),
    Match.exhaustive
  )
