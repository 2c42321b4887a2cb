import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"

import { printValue } from "../core/ast.js"
import type { CliArgs } from "../core/cli.js"
import { cliError, parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { parseLiteral } from "../core/literal.js"
import { fromJson, serializeValue } from "../core/serialize.js"
import type { Value } from "../core/value.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readJsonFile, readTextFile } from "../shell/input.js"

// CHANGE: orchestrate CLI modes with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "normalize, print or parse a literal from the command line"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: runCli(argv) = Right(r) → r.exitCode = 0
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output is produced at most once per run
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

// validateSources guarantees --input for normalize and print
const requireInput = (cli: CliArgs): Effect.Effect<string, AppError> =>
  cli.input === undefined
    ? Effect.fail(cliError(`${cli.command} needs --input`))
    : Effect.succeed(cli.input)

const readJsonValue = (cli: CliArgs): Effect.Effect<Value, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const path = yield* _(requireInput(cli))
    const json = yield* _(readJsonFile(path))
    const value = yield* _(fromEither(fromJson(json)))
    yield* _(Effect.logDebug(`Decoded ${value._tag} from ${path}`))
    return value
  })

const readLiteralValue = (cli: CliArgs): Effect.Effect<Value, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (cli.literal !== undefined) {
      return yield* _(fromEither(parseLiteral("--literal", cli.literal)))
    }
    const path = yield* _(requireInput(cli))
    const text = yield* _(readTextFile(path))
    return yield* _(fromEither(parseLiteral(path, text)))
  })

const handleNormalize = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.map(readJsonValue(cli), (value) => ({ output: serializeValue(value, config.indent), exitCode: 0 }))

const handlePrint = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.map(readJsonValue(cli), (value) => ({ output: printValue(value), exitCode: 0 }))

const handleParse = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.map(readLiteralValue(cli), (value) => ({ output: serializeValue(value, config.indent), exitCode: 0 }))

const executeCommand = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("normalize", () => handleNormalize(cli, config)),
    Match.when("print", () => handlePrint(cli)),
    Match.when("parse", () => handleParse(cli, config)),
    Match.exhaustive
  )

const runParsed = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const config = resolveConfig(cli, fileConfig)
    yield* _(Effect.logDebug(`Running ${cli.command} with indent=${config.indent}`))
    return yield* _(executeCommand(cli, config))
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the rendered output and exit code.
 *
 * @pure false
 * @effect FileSystem, Logger
 * @invariant output is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const level = cli.verbose ? LogLevel.Debug : LogLevel.Info
    return yield* _(runParsed(cli).pipe(Logger.withMinimumLogLevel(level)))
  })
