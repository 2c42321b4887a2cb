import * as Arr from "effect/Array"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { printValue } from "./ast.js"
import type { GraphQLString, Int32, Name } from "./scalars.js"
import { GraphQLString as makeGraphQLString } from "./scalars.js"
import type { List, ObjectValue, Value } from "./value.js"
import {
  makeList,
  valueBoolean,
  valueEnum,
  valueFloat,
  valueInt,
  valueList,
  valueNull,
  valueObject,
  valueString
} from "./value.js"

// CHANGE: add explicit marshaller instances between native types and values
// WHY: handler-level code receives typed data; untrusted values must fail as results, not exceptions
// QUOTE(TZ): "WrongType is distinct from the empty-list error for NonEmpty"
// REF: req-marshal-1
// SOURCE: n/a
// FORMAT THEOREM: ∀m,x: m.fromValue(m.toValue(x)) = Right(x')
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: ∀m, x: m.fromValue(m.toValue(x)) = Right(x') with x' ≡ x
// COMPLEXITY: O(n)/O(n)

export type WrongType = {
  readonly _tag: "WrongType"
  readonly expected: string
  readonly actual: Value
  readonly message: string
}

export type EmptyList = {
  readonly _tag: "EmptyList"
  readonly actual: Value
  readonly message: string
}

export type FromValueError = WrongType | EmptyList

export const wrongType = (expected: string, actual: Value): WrongType => ({
  _tag: "WrongType",
  expected,
  actual,
  message: `Wrong type, should be ${expected}: ${printValue(actual)}`
})

export const emptyList = (actual: Value): EmptyList => ({
  _tag: "EmptyList",
  actual,
  message: "Cannot construct a non-empty array from an empty list"
})

/**
 * Conversion of a native type into a value. Never fails.
 */
export interface ToValue<A> {
  readonly toValue: (self: A) => Value
}

/**
 * Conversion of a value into a native type: the boundary where incoming
 * data becomes application data.
 */
export interface FromValue<A> {
  readonly fromValue: (value: Value) => Either.Either<A, FromValueError>
}

export interface Marshal<A> extends ToValue<A>, FromValue<A> {}

export const toValue = <A>(instance: ToValue<A>, self: A): Value => instance.toValue(self)

export const fromValue = <A>(instance: FromValue<A>, value: Value): Either.Either<A, FromValueError> =>
  instance.fromValue(value)

export const value: Marshal<Value> = {
  toValue: (self) => self,
  fromValue: Either.right
}

export const boolean: Marshal<boolean> = {
  toValue: valueBoolean,
  fromValue: (v) => v._tag === "ValueBoolean" ? Either.right(v.value) : Either.left(wrongType("Boolean", v))
}

export const int32: Marshal<Int32> = {
  toValue: valueInt,
  fromValue: (v) => v._tag === "ValueInt" ? Either.right(v.value) : Either.left(wrongType("Int", v))
}

export const float: Marshal<number> = {
  toValue: valueFloat,
  fromValue: (v) => v._tag === "ValueFloat" ? Either.right(v.value) : Either.left(wrongType("Float", v))
}

export const string: Marshal<GraphQLString> = {
  toValue: valueString,
  fromValue: (v) => v._tag === "ValueString" ? Either.right(v.value) : Either.left(wrongType("String", v))
}

// Raw text goes through the String wrapper.
export const text: Marshal<string> = {
  toValue: (self) => valueString(makeGraphQLString(self)),
  fromValue: (v) => Either.map(string.fromValue(v), (s): string => s)
}

export const enumName: Marshal<Name> = {
  toValue: valueEnum,
  fromValue: (v) => v._tag === "ValueEnum" ? Either.right(v.value) : Either.left(wrongType("Enum", v))
}

export const list: Marshal<List> = {
  toValue: valueList,
  fromValue: (v) => v._tag === "ValueList" ? Either.right(v.value) : Either.left(wrongType("List", v))
}

export const object: Marshal<ObjectValue> = {
  toValue: valueObject,
  fromValue: (v) => v._tag === "ValueObject" ? Either.right(v.value) : Either.left(wrongType("Object", v))
}

export const arrayToValue = <A>(item: ToValue<A>): ToValue<ReadonlyArray<A>> => ({
  toValue: (self) => valueList(makeList(self.map(item.toValue)))
})

/**
 * Decode a list element-wise.
 *
 * @invariant the first failing element decides the error
 * @complexity O(n)
 */
export const arrayFromValue = <A>(item: FromValue<A>): FromValue<ReadonlyArray<A>> => ({
  fromValue: (v) =>
    v._tag === "ValueList"
      ? Either.all(v.value.values.map(item.fromValue))
      : Either.left(wrongType("List", v))
})

export const array = <A>(item: Marshal<A>): Marshal<ReadonlyArray<A>> => ({
  ...arrayToValue(item),
  ...arrayFromValue(item)
})

export const nonEmptyArrayToValue = <A>(item: ToValue<A>): ToValue<Arr.NonEmptyReadonlyArray<A>> =>
  arrayToValue(item)

/**
 * Decode a list that must have at least one element. An empty list is an
 * EmptyList error, anything that is not a list is WrongType.
 *
 * @complexity O(n)
 */
export const nonEmptyArrayFromValue = <A>(item: FromValue<A>): FromValue<Arr.NonEmptyReadonlyArray<A>> => ({
  fromValue: (v) => {
    if (v._tag !== "ValueList") {
      return Either.left(wrongType("List", v))
    }
    const values = v.value.values
    if (!Arr.isNonEmptyReadonlyArray(values)) {
      return Either.left(emptyList(v))
    }
    return Either.zipWith(
      item.fromValue(Arr.headNonEmpty(values)),
      Either.all(Arr.tailNonEmpty(values).map(item.fromValue)),
      (head, tail) => Arr.prepend(tail, head)
    )
  }
})

export const nonEmptyArray = <A>(item: Marshal<A>): Marshal<Arr.NonEmptyReadonlyArray<A>> => ({
  ...nonEmptyArrayToValue(item),
  ...nonEmptyArrayFromValue(item)
})

export const optionToValue = <A>(item: ToValue<A>): ToValue<Option.Option<A>> => ({
  toValue: (self) => Option.match(self, { onNone: () => valueNull, onSome: item.toValue })
})

export const optionFromValue = <A>(item: FromValue<A>): FromValue<Option.Option<A>> => ({
  fromValue: (v) => v._tag === "ValueNull" ? Either.right(Option.none()) : Either.map(item.fromValue(v), Option.some)
})

export const option = <A>(item: Marshal<A>): Marshal<Option.Option<A>> => ({
  ...optionToValue(item),
  ...optionFromValue(item)
})
