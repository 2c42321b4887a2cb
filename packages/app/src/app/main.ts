#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { renderAppError } from "../core/errors.js"
import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// QUOTE(TZ): "exit with a non-zero code on failure"
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCode ∈ {0, 1}
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: failures print one line to stderr and exit with code 1
// COMPLEXITY: O(1)

const writeLine = (stream: NodeJS.WriteStream, payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    stream.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const main = runCli(process.argv).pipe(
  Effect.flatMap((result) => writeLine(process.stdout, result.output).pipe(Effect.as(result.exitCode))),
  Effect.catchAll((error) => writeLine(process.stderr, renderAppError(error)).pipe(Effect.as(1))),
  Effect.flatMap((exitCode) =>
    Effect.sync(() => {
      if (exitCode !== 0) {
        process.exitCode = exitCode
      }
    })
  )
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
