import * as Option from "effect/Option"

import * as OrderedMap from "./ordered-map.js"
import type { GraphQLString, Int32, Name } from "./scalars.js"

// CHANGE: define the canonical literal value algebra
// WHY: queries and responses share one variable-free value form independent of AST and wire
// QUOTE(TZ): "an Object has unique, insertion-ordered keys"
// REF: req-value-model-1
// SOURCE: n/a
// FORMAT THEOREM: ∀fs: makeObject(fs) = Some(o) ↔ names(fs) are distinct
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: ∀o ∈ ObjectValue: field names are unique and keep insertion order
// COMPLEXITY: O(1)/O(1) per constructor, O(n) for object construction

export type ValueInt = { readonly _tag: "ValueInt"; readonly value: Int32 }
export type ValueFloat = { readonly _tag: "ValueFloat"; readonly value: number }
export type ValueBoolean = { readonly _tag: "ValueBoolean"; readonly value: boolean }
export type ValueString = { readonly _tag: "ValueString"; readonly value: GraphQLString }
export type ValueEnum = { readonly _tag: "ValueEnum"; readonly value: Name }
export type ValueList = { readonly _tag: "ValueList"; readonly value: List }
export type ValueObject = { readonly _tag: "ValueObject"; readonly value: ObjectValue }
export type ValueNull = { readonly _tag: "ValueNull" }

/**
 * A concrete GraphQL value: the AST value type without variables.
 */
export type Value =
  | ValueInt
  | ValueFloat
  | ValueBoolean
  | ValueString
  | ValueEnum
  | ValueList
  | ValueObject
  | ValueNull

// Lists may mix variants even though GraphQL list types are homogeneous.
export interface List {
  readonly _tag: "List"
  readonly values: ReadonlyArray<Value>
}

/**
 * A literal GraphQL object (the "map" of a response).
 */
export interface ObjectValue {
  readonly _tag: "Object"
  readonly fields: OrderedMap.OrderedMap<Name, Value>
}

export interface ObjectField {
  readonly name: Name
  readonly value: Value
}

export const valueInt = (value: Int32): Value => ({ _tag: "ValueInt", value })

export const valueFloat = (value: number): Value => ({ _tag: "ValueFloat", value })

export const valueBoolean = (value: boolean): Value => ({ _tag: "ValueBoolean", value })

export const valueString = (value: GraphQLString): Value => ({ _tag: "ValueString", value })

export const valueEnum = (value: Name): Value => ({ _tag: "ValueEnum", value })

export const valueList = (value: List): Value => ({ _tag: "ValueList", value })

export const valueObject = (value: ObjectValue): Value => ({ _tag: "ValueObject", value })

export const valueNull: Value = { _tag: "ValueNull" }

export const makeList = (values: ReadonlyArray<Value>): List => ({ _tag: "List", values })

export const objectField = (name: Name, value: Value): ObjectField => ({ name, value })

const fromFields = (fields: OrderedMap.OrderedMap<Name, Value>): ObjectValue => ({
  _tag: "Object",
  fields
})

export const emptyObject: ObjectValue = fromFields(OrderedMap.empty())

/**
 * Extract the object payload of a value.
 *
 * @returns Some(object) for ValueObject, None for every other variant.
 *
 * @pure true
 * @complexity O(1)
 */
export const toObject = (value: Value): Option.Option<ObjectValue> =>
  value._tag === "ValueObject" ? Option.some(value.value) : Option.none()

/**
 * Build an object from (name, value) pairs.
 *
 * @pure true
 * @invariant Some(o) → objectFields(o) lists pairs in the given order
 * @complexity O(n)
 */
export const objectFromList = (
  pairs: ReadonlyArray<readonly [Name, Value]>
): Option.Option<ObjectValue> => Option.map(OrderedMap.orderedMap(pairs), fromFields)

/**
 * Build an object from fields.
 *
 * @returns None when two fields share a name.
 *
 * @pure true
 * @invariant no partial object is ever returned
 * @complexity O(n)
 */
export const makeObject = (fields: ReadonlyArray<ObjectField>): Option.Option<ObjectValue> =>
  objectFromList(fields.map((field) => [field.name, field.value] as const))

/**
 * Merge objects in order.
 *
 * @returns None if any field name occurs in more than one object.
 *
 * @pure true
 * @invariant Some(o) → objectFields(o) = concat(objectFields(objects))
 * @complexity O(Σ fields)
 */
export const unionObjects = (objects: ReadonlyArray<ObjectValue>): Option.Option<ObjectValue> =>
  Option.map(
    OrderedMap.unions(objects.map((object) => object.fields)),
    fromFields
  )

export const objectFields = (object: ObjectValue): ReadonlyArray<ObjectField> =>
  OrderedMap.toList(object.fields).map(([name, value]) => objectField(name, value))

export const lookupField = (object: ObjectValue, name: Name): Option.Option<Value> =>
  OrderedMap.lookup(object.fields, name)

// Direct children of a container value, in order.
export const childValues = (value: Value): ReadonlyArray<Value> => {
  switch (value._tag) {
    case "ValueList":
      return value.value.values
    case "ValueObject":
      return objectFields(value.value).map((field) => field.value)
    default:
      return []
  }
}
