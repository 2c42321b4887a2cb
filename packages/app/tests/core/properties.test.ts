import { describe, expect, it } from "@effect/vitest"
import { Effect, FastCheck as fc } from "effect"
import * as Arr from "effect/Array"
import * as Equivalence from "effect/Equivalence"
import * as Option from "effect/Option"
import { Kind, parseValue } from "graphql"

import * as Marshal from "../../src/core/marshal.js"
import { roundtripFromAST, roundtripFromValue, roundtripValue } from "../../src/core/properties.js"
import { Int32, INT32_MAX, INT32_MIN } from "../../src/core/scalars.js"
import { astArb, valueArb } from "./arbitrary.js"

const int32Arb = fc.integer({ min: INT32_MIN, max: INT32_MAX }).map((n) => Int32(n))

describe("round-trip properties", () => {
  it.effect("values survive conversion to the AST and back", () =>
    Effect.sync(() => {
      fc.assert(fc.property(valueArb, roundtripFromValue))
    }))

  it.effect("AST literals survive conversion to values and back", () =>
    Effect.sync(() => {
      fc.assert(fc.property(astArb, roundtripFromAST))
    }))

  it.effect("parsed literals with variables are accepted vacuously", () =>
    Effect.sync(() => {
      expect(roundtripFromAST(parseValue("[1, $x]"))).toBe(true)
      expect(roundtripFromAST(parseValue(`{a: 1.50, b: """s"""}`))).toBe(true)
      expect(roundtripFromAST({ kind: Kind.INT, value: "9999999999" })).toBe(true)
    }))

  it.effect("marshal instances round-trip", () =>
    Effect.sync(() => {
      const optionalInts = Marshal.option(Marshal.array(Marshal.int32))
      const optionalIntsEq: Equivalence.Equivalence<Option.Option<ReadonlyArray<Int32>>> = Option.getEquivalence(
        Arr.getEquivalence(Equivalence.number)
      )
      const boolsEq: Equivalence.Equivalence<Arr.NonEmptyReadonlyArray<boolean>> = Arr.getEquivalence(
        Equivalence.boolean
      )
      fc.assert(
        fc.property(fc.option(fc.array(int32Arb), { nil: undefined }), (raw) =>
          roundtripValue(optionalInts, optionalIntsEq, Option.fromNullable(raw)))
      )
      fc.assert(
        fc.property(fc.double({ noNaN: true }), (n) => roundtripValue(Marshal.float, Equivalence.number, n))
      )
      fc.assert(fc.property(fc.string(), (s) => roundtripValue(Marshal.text, Equivalence.string, s)))
      fc.assert(
        fc.property(
          fc.tuple(fc.boolean(), fc.array(fc.boolean())).map(([head, tail]) => Arr.prepend(tail, head)),
          (bools) => roundtripValue(Marshal.nonEmptyArray(Marshal.boolean), boolsEq, bools)
        )
      )
    }))
})
