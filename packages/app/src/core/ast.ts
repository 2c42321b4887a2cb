import { Kind, print } from "graphql"
import type { ConstObjectFieldNode, ConstValueNode, ValueNode } from "graphql"
import * as Option from "effect/Option"

import { GraphQLString, Int32, Name } from "./scalars.js"
import { foldTree } from "./traverse.js"
import type { ObjectField, Value } from "./value.js"
import {
  childValues,
  makeList,
  makeObject,
  objectField,
  objectFields,
  valueBoolean,
  valueEnum,
  valueFloat,
  valueInt,
  valueList,
  valueNull,
  valueObject,
  valueString
} from "./value.js"

// CHANGE: bridge parser value nodes and canonical values
// WHY: literals written in a query become canonical values; values can be re-materialized as AST
// QUOTE(TZ): "astToValue is partial and returns none for variables; valueToAST is total"
// REF: req-ast-bridge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: astToValue(valueToAST(v)) = Some(v)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: ∀v: astToValue(valueToAST(v)) = Some(v); ∀a: astToValue(a) = Some(v) → astEquals(valueToAST(v), a)
// COMPLEXITY: O(n)/O(d)

const astChildren = (node: ValueNode): ReadonlyArray<ValueNode> => {
  switch (node.kind) {
    case Kind.LIST:
      return node.values
    case Kind.OBJECT:
      return node.fields.map((field) => field.value)
    default:
      return []
  }
}

const parseInt32 = (lexeme: string): Option.Option<Value> => Option.map(Int32.option(Number(lexeme)), valueInt)

const convertObject = (
  names: ReadonlyArray<string>,
  results: ReadonlyArray<Option.Option<Value>>
): Option.Option<Value> =>
  Option.flatMap(Option.all(results), (values) => {
    const fields: Array<ObjectField> = []
    for (const [index, raw] of names.entries()) {
      const name = Name.option(raw)
      const value = values[index]
      if (Option.isNone(name) || value === undefined) {
        return Option.none()
      }
      fields.push(objectField(name.value, value))
    }
    return Option.map(makeObject(fields), valueObject)
  })

const convertNode = (
  node: ValueNode,
  results: ReadonlyArray<Option.Option<Value>>
): Option.Option<Value> => {
  switch (node.kind) {
    case Kind.INT:
      return parseInt32(node.value)
    case Kind.FLOAT:
      return Option.some(valueFloat(Number(node.value)))
    case Kind.BOOLEAN:
      return Option.some(valueBoolean(node.value))
    case Kind.STRING:
      return Option.some(valueString(GraphQLString(node.value)))
    case Kind.ENUM:
      return Option.map(Name.option(node.value), valueEnum)
    case Kind.NULL:
      return Option.some(valueNull)
    case Kind.LIST:
      return Option.map(Option.all(results), (values) => valueList(makeList(values)))
    case Kind.OBJECT:
      return convertObject(node.fields.map((field) => field.name.value), results)
    case Kind.VARIABLE:
      return Option.none()
  }
}

/**
 * Convert an AST value into a literal value.
 *
 * @param ast - Value node produced by the GraphQL parser.
 * @returns None for variables (anywhere in the tree), out-of-range ints, and
 *   objects with a repeated field name.
 *
 * @pure true
 * @invariant Some(v) → v contains no variables
 * @complexity O(n)
 */
export const astToValue = (ast: ValueNode): Option.Option<Value> => foldTree(ast, astChildren, convertNode)

// A float lexeme keeps a fraction or exponent so that printing and
// re-parsing it yields a FloatValue again.
const formatFloat = (value: number): string => {
  const text = String(value)
  return !Number.isFinite(value) || /[.eE]/u.test(text) ? text : `${text}.0`
}

const buildNode = (value: Value, results: ReadonlyArray<ConstValueNode>): ConstValueNode => {
  switch (value._tag) {
    case "ValueInt":
      return { kind: Kind.INT, value: String(value.value) }
    case "ValueFloat":
      return { kind: Kind.FLOAT, value: formatFloat(value.value) }
    case "ValueBoolean":
      return { kind: Kind.BOOLEAN, value: value.value }
    case "ValueString":
      return { kind: Kind.STRING, value: value.value, block: false }
    case "ValueEnum":
      return { kind: Kind.ENUM, value: value.value }
    case "ValueList":
      return { kind: Kind.LIST, values: results }
    case "ValueObject": {
      const fields: Array<ConstObjectFieldNode> = []
      for (const [index, field] of objectFields(value.value).entries()) {
        const node = results[index]
        if (node !== undefined) {
          fields.push({ kind: Kind.OBJECT_FIELD, name: { kind: Kind.NAME, value: field.name }, value: node })
        }
      }
      return { kind: Kind.OBJECT, fields }
    }
    case "ValueNull":
      return { kind: Kind.NULL }
  }
}

/**
 * Convert a literal value into an AST value.
 *
 * @pure true
 * @invariant astToValue(valueToAST(v)) = Some(v)
 * @complexity O(n)
 */
export const valueToAST = (value: Value): ConstValueNode => foldTree(value, childValues, buildNode)

const sameNumber = (left: string, right: string): boolean => {
  const l = Number(left)
  const r = Number(right)
  return l === r || (Number.isNaN(l) && Number.isNaN(r))
}

type NodePair = readonly [ValueNode, ValueNode]

// Compares the roots of a pair and schedules their children.
const samePair = (pairs: Array<NodePair>, left: ValueNode, right: ValueNode): boolean => {
  switch (left.kind) {
    case Kind.INT:
      return right.kind === Kind.INT && sameNumber(left.value, right.value)
    case Kind.FLOAT:
      return right.kind === Kind.FLOAT && sameNumber(left.value, right.value)
    case Kind.BOOLEAN:
      return right.kind === Kind.BOOLEAN && left.value === right.value
    case Kind.STRING:
      return right.kind === Kind.STRING && left.value === right.value
    case Kind.ENUM:
      return right.kind === Kind.ENUM && left.value === right.value
    case Kind.NULL:
      return right.kind === Kind.NULL
    case Kind.VARIABLE:
      return right.kind === Kind.VARIABLE && left.name.value === right.name.value
    case Kind.LIST: {
      if (right.kind !== Kind.LIST || left.values.length !== right.values.length) {
        return false
      }
      for (const [index, item] of left.values.entries()) {
        const other = right.values[index]
        if (other === undefined) {
          return false
        }
        pairs.push([item, other])
      }
      return true
    }
    case Kind.OBJECT: {
      if (right.kind !== Kind.OBJECT || left.fields.length !== right.fields.length) {
        return false
      }
      for (const [index, field] of left.fields.entries()) {
        const other = right.fields[index]
        if (other === undefined || field.name.value !== other.name.value) {
          return false
        }
        pairs.push([field.value, other.value])
      }
      return true
    }
  }
}

/**
 * Structural AST equality ignoring source locations and the block-string
 * flag. Int and Float lexemes compare by numeric value.
 *
 * @pure true
 * @invariant nesting depth does not grow the call stack
 * @complexity O(n)
 */
export const astEquals = (left: ValueNode, right: ValueNode): boolean => {
  const pairs: Array<NodePair> = [[left, right]]
  for (let pair = pairs.pop(); pair !== undefined; pair = pairs.pop()) {
    if (!samePair(pairs, pair[0], pair[1])) {
      return false
    }
  }
  return true
}

// GraphQL has no NaN or Infinity literal; printed, they would read back as enums.
const buildPrintableNode = (value: Value, results: ReadonlyArray<ConstValueNode>): ConstValueNode =>
  value._tag === "ValueFloat" && !Number.isFinite(value.value) ? { kind: Kind.NULL } : buildNode(value, results)

/**
 * Render a value as GraphQL literal syntax, e.g. `{x: 1, y: null}`.
 * NaN and infinite floats print as `null`, as in the JSON form.
 */
export const printValue = (value: Value): string => print(foldTree(value, childValues, buildPrintableNode))
