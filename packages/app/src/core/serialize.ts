import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { Json, JsonObject } from "./json.js"
import { isJsonObject } from "./json.js"
import { GraphQLString, Int32, Name } from "./scalars.js"
import { foldTree } from "./traverse.js"
import type { ObjectValue, Value } from "./value.js"
import {
  childValues,
  makeList,
  objectFields,
  objectFromList,
  valueBoolean,
  valueFloat,
  valueInt,
  valueList,
  valueNull,
  valueObject,
  valueString
} from "./value.js"

// CHANGE: serialize values to order-preserving JSON and decode JSON back
// WHY: responses are written as JSON; consumers rely on field order being stable
// QUOTE(TZ): "the JSON serializer preserves field order"
// REF: req-serializer-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o: keys(toJson(o)) = names(objectFields(o))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: ∀o: keys(toJson(valueObject(o))) = names(objectFields(o)) in order
// COMPLEXITY: O(n)/O(d)

export type JsonDecodeError = { readonly _tag: "JsonDecodeError"; readonly message: string }

export const jsonDecodeError = (message: string): JsonDecodeError => ({
  _tag: "JsonDecodeError",
  message
})

const encodeNode = (value: Value, results: ReadonlyArray<Json>): Json => {
  switch (value._tag) {
    case "ValueInt":
      return value.value
    case "ValueFloat":
      // JSON has no NaN or Infinity
      return Number.isFinite(value.value) ? value.value : null
    case "ValueBoolean":
    case "ValueString":
    case "ValueEnum":
      return value.value
    case "ValueList":
      return results
    case "ValueObject":
      // fromEntries defines own properties, so "__proto__" stays an ordinary key
      return Object.fromEntries(
        objectFields(value.value).map((field, index) => [field.name, results[index] ?? null])
      )
    case "ValueNull":
      return null
  }
}

/**
 * Convert a value to its JSON form.
 *
 * @pure true
 * @invariant object keys appear in field insertion order
 * @complexity O(n)
 */
export const toJson = (value: Value): Json => foldTree(value, childValues, encodeNode)

export const objectToJson = (object: ObjectValue): JsonObject =>
  Object.fromEntries(objectFields(object).map((field) => [field.name, toJson(field.value)]))

interface Located {
  readonly value: Value
  readonly depth: number
}

const locatedChildren = (node: Located): ReadonlyArray<Located> =>
  childValues(node.value).map((value) => ({ value, depth: node.depth + 1 }))

// JSON.stringify caps the indent at 10 spaces
const indentWidth = (indent: number): number => Math.min(10, Math.max(0, Math.floor(indent)))

const writeContainer = (
  open: string,
  close: string,
  items: ReadonlyArray<string>,
  width: number,
  depth: number
): string => {
  if (items.length === 0) {
    return `${open}${close}`
  }
  if (width === 0) {
    return `${open}${items.join(",")}${close}`
  }
  const inner = " ".repeat(width * (depth + 1))
  const outer = " ".repeat(width * depth)
  return `${open}\n${inner}${items.join(`,\n${inner}`)}\n${outer}${close}`
}

const writeNode = (width: number) => (node: Located, results: ReadonlyArray<string>): string => {
  const value = node.value
  switch (value._tag) {
    case "ValueInt":
      return String(value.value)
    case "ValueFloat":
      return Number.isFinite(value.value) ? JSON.stringify(value.value) : "null"
    case "ValueBoolean":
      return value.value ? "true" : "false"
    case "ValueString":
    case "ValueEnum":
      return JSON.stringify(value.value)
    case "ValueList":
      return writeContainer("[", "]", results, width, node.depth)
    case "ValueObject": {
      const separator = width === 0 ? ":" : ": "
      const members = objectFields(value.value).map((field, index) =>
        `${JSON.stringify(field.name)}${separator}${results[index] ?? "null"}`
      )
      return writeContainer("{", "}", members, width, node.depth)
    }
    case "ValueNull":
      return "null"
  }
}

/**
 * Serialize a value as JSON text. The output equals
 * `JSON.stringify(toJson(value), null, indent)`.
 *
 * @param indent - Spaces per nesting level; 0 renders a single line.
 *
 * @pure true
 * @complexity O(n)
 */
export const serializeValue = (value: Value, indent = 0): string =>
  foldTree({ value, depth: 0 }, locatedChildren, writeNode(indentWidth(indent)))

export const serializeObject = (object: ObjectValue, indent = 0): string =>
  serializeValue(valueObject(object), indent)

const isJsonArray = (json: Json): json is ReadonlyArray<Json> => Array.isArray(json)

const jsonChildren = (json: Json): ReadonlyArray<Json> => {
  if (isJsonArray(json)) {
    return json
  }
  return isJsonObject(json) ? Object.values(json) : []
}

const decodeNumber = (n: number): Value =>
  Option.match(Int32.option(n), {
    onNone: () => valueFloat(n),
    onSome: valueInt
  })

const decodeObject = (
  json: JsonObject,
  results: ReadonlyArray<Either.Either<Value, JsonDecodeError>>
): Either.Either<Value, JsonDecodeError> =>
  Either.flatMap(Either.all(results), (values) => {
    const pairs: Array<readonly [Name, Value]> = []
    for (const [index, key] of Object.keys(json).entries()) {
      const value = values[index]
      if (!Name.is(key)) {
        return Either.left(jsonDecodeError(`Invalid field name ${JSON.stringify(key)}`))
      }
      if (value !== undefined) {
        pairs.push([key, value])
      }
    }
    return Option.match(objectFromList(pairs), {
      onNone: () => Either.left(jsonDecodeError("Duplicate field name")),
      onSome: (object) => Either.right(valueObject(object))
    })
  })

const decodeNode = (
  json: Json,
  results: ReadonlyArray<Either.Either<Value, JsonDecodeError>>
): Either.Either<Value, JsonDecodeError> => {
  if (json === null) {
    return Either.right(valueNull)
  }
  if (typeof json === "boolean") {
    return Either.right(valueBoolean(json))
  }
  if (typeof json === "number") {
    return Either.right(decodeNumber(json))
  }
  if (typeof json === "string") {
    return Either.right(valueString(GraphQLString(json)))
  }
  if (isJsonArray(json)) {
    return Either.map(Either.all(results), (values) => valueList(makeList(values)))
  }
  return decodeObject(json, results)
}

/**
 * Decode JSON into a value. Integral numbers in the 32-bit range become Int,
 * other numbers Float; strings become String (an enum is not recoverable
 * from JSON).
 *
 * @returns JsonDecodeError when an object key is not a GraphQL name.
 *
 * @pure true
 * @complexity O(n)
 */
export const fromJson = (json: Json): Either.Either<Value, JsonDecodeError> => foldTree(json, jsonChildren, decodeNode)
