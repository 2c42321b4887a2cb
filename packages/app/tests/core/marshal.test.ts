import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import * as Marshal from "../../src/core/marshal.js"
import { GraphQLString, Int32, Name } from "../../src/core/scalars.js"
import type { Value } from "../../src/core/value.js"
import { makeList, valueBoolean, valueEnum, valueInt, valueList, valueNull, valueString } from "../../src/core/value.js"
import { equals } from "../../src/core/value-order.js"

const int = (n: number): Value => valueInt(Int32(n))
const list = (...values: ReadonlyArray<Value>): Value => valueList(makeList(values))

const errorOf = <A>(result: Either.Either<A, Marshal.FromValueError>): Option.Option<Marshal.FromValueError> =>
  Either.getLeft(result)

describe("scalar instances", () => {
  it.effect("decode their own variant", () =>
    Effect.sync(() => {
      expect(Marshal.fromValue(Marshal.boolean, valueBoolean(true))).toEqual(Either.right(true))
      expect(Marshal.fromValue(Marshal.int32, int(42))).toEqual(Either.right(42))
      expect(Marshal.fromValue(Marshal.text, valueString(GraphQLString("hi")))).toEqual(Either.right("hi"))
      expect(Marshal.fromValue(Marshal.enumName, valueEnum(Name("RED")))).toEqual(Either.right("RED"))
    }))

  it.effect("report WrongType with the expected type and the printed value", () =>
    Effect.sync(() => {
      const error = errorOf(Marshal.fromValue(Marshal.int32, valueBoolean(true)))
      expect(Option.map(error, (e) => e._tag)).toEqual(Option.some("WrongType"))
      expect(Option.map(error, (e) => e.message)).toEqual(Option.some("Wrong type, should be Int: true"))
      const text = errorOf(Marshal.fromValue(Marshal.text, valueEnum(Name("RED"))))
      expect(Option.map(text, (e) => e.message)).toEqual(Option.some("Wrong type, should be String: RED"))
    }))

  it.effect("value instance is the identity", () =>
    Effect.sync(() => {
      const input = list(int(1), valueNull)
      expect(equals(Marshal.toValue(Marshal.value, input), input)).toBe(true)
      expect(Either.isRight(Marshal.fromValue(Marshal.value, input))).toBe(true)
    }))
})

describe("array", () => {
  it.effect("encodes and decodes element-wise", () =>
    Effect.sync(() => {
      const instance = Marshal.array(Marshal.int32)
      expect(equals(instance.toValue([Int32(1), Int32(2)]), list(int(1), int(2)))).toBe(true)
      const decoded = instance.fromValue(list(int(1), int(2)))
      expect(Either.isRight(decoded) ? decoded.right : []).toEqual([1, 2])
    }))

  it.effect("fails on the first element of the wrong type", () =>
    Effect.sync(() => {
      const error = errorOf(Marshal.array(Marshal.int32).fromValue(list(int(1), valueNull, valueBoolean(false))))
      expect(Option.map(error, (e) => e.message)).toEqual(Option.some("Wrong type, should be Int: null"))
    }))
})

describe("nonEmptyArray", () => {
  const instance = Marshal.nonEmptyArray(Marshal.boolean)

  it.effect("rejects an empty list with EmptyList", () =>
    Effect.sync(() => {
      const error = errorOf(instance.fromValue(list()))
      expect(Option.map(error, (e) => e._tag)).toEqual(Option.some("EmptyList"))
      expect(Option.map(error, (e) => e.message)).toEqual(
        Option.some("Cannot construct a non-empty array from an empty list")
      )
    }))

  it.effect("rejects a non-list with WrongType", () =>
    Effect.sync(() => {
      const error = errorOf(instance.fromValue(valueNull))
      expect(Option.map(error, (e) => e._tag)).toEqual(Option.some("WrongType"))
      expect(Option.map(error, (e) => e.message)).toEqual(Option.some("Wrong type, should be List: null"))
    }))

  it.effect("decodes a non-empty list in order", () =>
    Effect.sync(() => {
      const decoded = instance.fromValue(list(valueBoolean(true), valueBoolean(false)))
      expect(Either.isRight(decoded) ? decoded.right : []).toEqual([true, false])
    }))
})

describe("option", () => {
  const instance = Marshal.option(Marshal.int32)

  it.effect("maps null to none and anything else through the inner instance", () =>
    Effect.sync(() => {
      expect(Either.map(instance.fromValue(valueNull), Option.isNone)).toEqual(Either.right(true))
      expect(Either.map(instance.fromValue(int(5)), Option.getOrNull)).toEqual(Either.right(5))
      expect(Either.isLeft(instance.fromValue(valueBoolean(true)))).toBe(true)
      expect(equals(instance.toValue(Option.none()), valueNull)).toBe(true)
      expect(equals(instance.toValue(Option.some(Int32(5))), int(5))).toBe(true)
    }))
})
