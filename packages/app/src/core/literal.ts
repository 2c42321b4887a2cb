import { parseValue } from "graphql"
import * as Either from "effect/Either"

import { astToValue } from "./ast.js"
import type { LiteralError, ParseFileError } from "./errors.js"
import { literalError, parseFileError } from "./errors.js"
import type { Value } from "./value.js"

// CHANGE: turn GraphQL literal text into a canonical value
// WHY: the parse command reads literals as they appear in queries
// QUOTE(TZ): "parse a GraphQL literal given inline or in a file"
// REF: req-literal-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: parseLiteral(t) = Right(v) → astToValue(parseValue(t)) = Some(v)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Right(v) → v = astToValue(parseValue(text))
// COMPLEXITY: O(n)

/**
 * Parse a GraphQL value literal such as `{a: [1, RED], b: "x"}`.
 *
 * @param source - Label for diagnostics (file path or "--literal").
 * @param text - Literal source text.
 * @returns ParseError on a syntax error, LiteralError when the literal holds a
 *   variable or repeats a field name.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseLiteral = (
  source: string,
  text: string
): Either.Either<Value, ParseFileError | LiteralError> =>
  Either.flatMap(
    Either.try({
      try: () => parseValue(text),
      catch: (error) => parseFileError(source, error instanceof Error ? error.message : String(error))
    }),
    (ast) => Either.fromOption(astToValue(ast), () => literalError(source))
  )
