import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { AppError } from "../core/errors.js"
import { fileError, parseFileError } from "../core/errors.js"
import type { Json } from "../core/json.js"
import { isJson } from "../core/json.js"

// CHANGE: read input documents for the CLI
// WHY: isolate filesystem IO and JSON syntax checks from the pure conversions
// QUOTE(TZ): "read the document to convert from --input"
// REF: req-input-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: parseJsonText(t) = Right(j) → j = JSON.parse(t)
// PURITY: SHELL
// EFFECT: Effect<Json | string, AppError, FileSystem>
// INVARIANT: JSON is validated before use
// COMPLEXITY: O(n)

// A declared schema hands the parsed value through untouched; a Record
// schema would rebuild objects and lose a "__proto__" key.
const JsonSchema: Schema.Schema<Json> = Schema.declare(isJson, { identifier: "Json" })

const JsonParseSchema = Schema.parseJson(JsonSchema)

export const parseJsonText = (source: string, raw: string): Effect.Effect<Json, AppError> =>
  pipe(
    Schema.decodeUnknown(JsonParseSchema)(raw),
    Effect.mapError((error) => parseFileError(source, TreeFormatter.formatErrorSync(error)))
  )

export const readTextFile = (
  path: string
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`Read ${contents.length} characters from ${path}`))
    return contents
  })

export const readJsonFile = (
  path: string
): Effect.Effect<Json, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const raw = yield* _(readTextFile(path))
    return yield* _(parseJsonText(path, raw))
  })
