import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for graphql-literal
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "graphql-literal [normalize|print|parse]"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(a) → a.command ∈ Commands
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected; parse requires exactly one input source
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "normalize" | "print" | "parse"

export interface CliArgs {
  readonly command: CliCommand
  readonly input: string | undefined
  readonly literal: string | undefined
  readonly indent: number | undefined
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const MAX_INDENT = 10

const isFlag = (value: string): boolean => value.startsWith("--")

const parseIndent = (value: string): Either.Either<number, CliError> => {
  const parsed = Number(value)
  if (value.trim().length === 0 || !Number.isInteger(parsed) || parsed < 0 || parsed > MAX_INDENT) {
    return Either.left(cliError(`Invalid indent: ${value} (expected an integer from 0 to ${MAX_INDENT})`))
  }
  return Either.right(parsed)
}

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("normalize", () => Either.right<CliCommand>("normalize")),
    Match.when("print", () => Either.right<CliCommand>("print")),
    Match.when("parse", () => Either.right<CliCommand>("parse")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  input: undefined,
  literal: undefined,
  indent: undefined,
  configPath: "./.graphql-literal.json",
  configPathExplicit: false,
  verbose: false
})

// A literal such as `-1` is a legitimate value, so only `--` marks a flag.
const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

type ParsedFlag = { readonly next: CliArgs; readonly consumed: number }

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  verbose: (current) => Either.right({ next: { ...current, verbose: true }, consumed: 1 }),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, input: value })),
  literal: (current, inlineValue, nextValue) =>
    parseValueFlag("literal", current, inlineValue, nextValue, (args, value) =>
      Either.right({ ...args, literal: value })),
  indent: (current, inlineValue, nextValue) =>
    parseValueFlag("indent", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseIndent(value), (indent) => ({ ...args, indent }))),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        configPath: value,
        configPathExplicit: true
      }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  const separator = raw.indexOf("=")
  const name = separator === -1 ? raw.slice(2) : raw.slice(2, separator)
  const inlineValue = separator === -1 ? undefined : raw.slice(separator + 1)
  const parser = flagParsers[name]
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
    return Either.right({ command: "normalize", startIndex: 0 })
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

const validateSources = (args: CliArgs): Either.Either<CliArgs, CliError> => {
  if (args.command === "parse") {
    if ((args.input === undefined) === (args.literal === undefined)) {
      return Either.left(cliError("parse needs exactly one of --input or --literal"))
    }
    return Either.right(args)
  }
  if (args.literal !== undefined) {
    return Either.left(cliError(`--literal is only accepted by parse, not ${args.command}`))
  }
  if (args.input === undefined) {
    return Either.left(cliError(`${args.command} needs --input`))
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
 * @invariant command defaults to normalize when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  return Either.flatMap(parseCommandFromArgs(rawArgs), (parsed) =>
    Either.flatMap(
      parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command)),
      validateSources
    ))
}
