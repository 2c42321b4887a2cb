import { Kind } from "graphql"
import type { ValueNode } from "graphql"
import { FastCheck as fc } from "effect"
import * as Option from "effect/Option"

import { valueToAST } from "../../src/core/ast.js"
import { GraphQLString, Int32, INT32_MAX, INT32_MIN, Name } from "../../src/core/scalars.js"
import type { Value } from "../../src/core/value.js"
import {
  makeList,
  objectFromList,
  valueBoolean,
  valueEnum,
  valueFloat,
  valueInt,
  valueList,
  valueNull,
  valueObject,
  valueString
} from "../../src/core/value.js"

export const nameArb: fc.Arbitrary<Name> = fc
  .stringMatching(/^[_A-Za-z][_0-9A-Za-z]{0,6}$/)
  .map((raw) => Name(raw))

const scalarArb: fc.Arbitrary<Value> = fc.oneof(
  fc.integer({ min: INT32_MIN, max: INT32_MAX }).map((n) => valueInt(Int32(n))),
  fc.double().map(valueFloat),
  fc.boolean().map(valueBoolean),
  fc.string().map((s) => valueString(GraphQLString(s))),
  nameArb.map(valueEnum),
  fc.constant(valueNull)
)

export const { value: valueArb } = fc.letrec<{ value: Value }>((tie) => ({
  value: fc.oneof(
    { maxDepth: 3, depthIdentifier: "value" },
    scalarArb,
    fc.array(tie("value"), { maxLength: 4 }).map((values) => valueList(makeList(values))),
    fc
      .uniqueArray(fc.tuple(nameArb, tie("value")), { selector: ([name]) => name, maxLength: 4 })
      .map((pairs) => valueObject(Option.getOrThrow(objectFromList(pairs))))
  )
}))

const variableArb: fc.Arbitrary<ValueNode> = nameArb.map((name): ValueNode => ({
  kind: Kind.VARIABLE,
  name: { kind: Kind.NAME, value: name }
}))

const duplicateFieldArb: fc.Arbitrary<ValueNode> = fc
  .tuple(nameArb, valueArb, valueArb)
  .map(([name, first, second]): ValueNode => ({
    kind: Kind.OBJECT,
    fields: [
      { kind: Kind.OBJECT_FIELD, name: { kind: Kind.NAME, value: name }, value: valueToAST(first) },
      { kind: Kind.OBJECT_FIELD, name: { kind: Kind.NAME, value: name }, value: valueToAST(second) }
    ]
  }))

const listWithVariableArb: fc.Arbitrary<ValueNode> = fc
  .tuple(valueArb, variableArb)
  .map(([value, variable]): ValueNode => ({ kind: Kind.LIST, values: [valueToAST(value), variable] }))

export const astArb: fc.Arbitrary<ValueNode> = fc.oneof(
  valueArb.map((value): ValueNode => valueToAST(value)),
  variableArb,
  duplicateFieldArb,
  listWithVariableArb
)
