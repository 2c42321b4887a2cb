import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import * as OrderedMap from "../../src/core/ordered-map.js"

describe("OrderedMap", () => {
  it.effect("preserves insertion order rather than key order", () =>
    Effect.sync(() => {
      const map = OrderedMap.orderedMap([["z", 1], ["a", 2], ["m", 3]])
      expect(Option.map(map, OrderedMap.toList)).toEqual(Option.some([["z", 1], ["a", 2], ["m", 3]]))
    }))

  it.effect("refuses duplicate keys", () =>
    Effect.sync(() => {
      expect(Option.isNone(OrderedMap.orderedMap([["k", 1], ["k", 1]]))).toBe(true)
    }))

  it.effect("unions disjoint maps and rejects overlapping ones", () =>
    Effect.sync(() => {
      const left = OrderedMap.orderedMap([["a", 1]])
      const right = OrderedMap.orderedMap([["b", 2]])
      const clash = OrderedMap.orderedMap([["a", 3]])
      const merged = Option.flatMap(Option.all([left, right]), OrderedMap.unions)
      const collided = Option.flatMap(Option.all([left, clash]), OrderedMap.unions)
      expect(Option.map(merged, OrderedMap.toList)).toEqual(Option.some([["a", 1], ["b", 2]]))
      expect(Option.isNone(collided)).toBe(true)
    }))

  it.effect("looks up keys and reports its size", () =>
    Effect.sync(() => {
      const map = OrderedMap.orderedMap([["a", "x"], ["b", "y"]])
      expect(Option.flatMap(map, (m) => OrderedMap.lookup(m, "b"))).toEqual(Option.some("y"))
      expect(Option.flatMap(map, (m) => OrderedMap.lookup(m, "c"))).toEqual(Option.none())
      expect(Option.map(map, OrderedMap.size)).toEqual(Option.some(2))
      expect(OrderedMap.size(OrderedMap.empty())).toBe(0)
    }))
})
