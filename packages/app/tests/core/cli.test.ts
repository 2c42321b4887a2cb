import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { parseCliArgs } from "../../src/core/cli.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "graphql-literal", ...args]

const errorMessage = (...args: ReadonlyArray<string>): Option.Option<string> =>
  Option.map(Either.getLeft(parseCliArgs(argv(...args))), (error) => error.message)

describe("parseCliArgs", () => {
  it.effect("defaults to normalize with the default config path", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(argv("--input", "in.json"))
      expect(parsed).toEqual(
        Either.right({
          command: "normalize",
          input: "in.json",
          literal: undefined,
          indent: undefined,
          configPath: "./.graphql-literal.json",
          configPathExplicit: false,
          verbose: false
        })
      )
    }))

  it.effect("accepts inline flag values and an explicit config", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(argv("print", "--input=in.json", "--config", "cfg.json", "--indent=4", "--verbose"))
      expect(Either.map(parsed, (cli) => [cli.command, cli.input, cli.configPath, cli.configPathExplicit, cli.indent, cli.verbose]))
        .toEqual(Either.right(["print", "in.json", "cfg.json", true, 4, true]))
    }))

  it.effect("takes a literal starting with a dash as a value", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(argv("parse", "--literal", "-1"))
      expect(Either.map(parsed, (cli) => cli.literal)).toEqual(Either.right("-1"))
    }))

  it.effect("rejects bad input with a usage message", () =>
    Effect.sync(() => {
      expect(errorMessage("format")).toEqual(Option.some("Unknown command: format"))
      expect(errorMessage("--input", "a.json", "--color")).toEqual(Option.some("Unknown flag: --color"))
      expect(errorMessage("--input")).toEqual(Option.some("Missing value for --input"))
      expect(errorMessage("--input", "a.json", "extra")).toEqual(Option.some("Unexpected positional argument: extra"))
      expect(errorMessage("--input", "a.json", "--indent", "11")).toEqual(
        Option.some("Invalid indent: 11 (expected an integer from 0 to 10)")
      )
    }))

  it.effect("checks the input sources of each command", () =>
    Effect.sync(() => {
      expect(errorMessage("parse")).toEqual(Option.some("parse needs exactly one of --input or --literal"))
      expect(errorMessage("parse", "--input", "a.graphql", "--literal", "1")).toEqual(
        Option.some("parse needs exactly one of --input or --literal")
      )
      expect(errorMessage("print", "--literal", "1")).toEqual(Option.some("--literal is only accepted by parse, not print"))
      expect(errorMessage("normalize")).toEqual(Option.some("normalize needs --input"))
    }))
})
