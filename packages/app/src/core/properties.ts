import type { ValueNode } from "graphql"
import type * as Equivalence from "effect/Equivalence"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { astEquals, astToValue, valueToAST } from "./ast.js"
import type { Marshal } from "./marshal.js"
import type { Value } from "./value.js"
import { equals } from "./value-order.js"

// CHANGE: expose the round-trip laws as predicates
// WHY: the same laws are checked by property tests and usable by downstream instances
// QUOTE(TZ): "round-trip laws must hold"
// REF: req-roundtrip-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: roundtripFromValue(v) = true
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: each predicate is total
// COMPLEXITY: O(n)/O(d)

/**
 * An AST value converts to a literal and back, unless it is not a literal.
 */
export const roundtripFromAST = (ast: ValueNode): boolean =>
  Option.match(astToValue(ast), {
    onNone: () => true,
    onSome: (value) => astEquals(valueToAST(value), ast)
  })

/**
 * A literal converts to the AST and back.
 */
export const roundtripFromValue = (value: Value): boolean =>
  Option.match(astToValue(valueToAST(value)), {
    onNone: () => false,
    onSome: (converted) => equals(converted, value)
  })

/**
 * Anything that converts to a value and from a value should round-trip.
 */
export const roundtripValue = <A>(
  instance: Marshal<A>,
  equivalence: Equivalence.Equivalence<A>,
  self: A
): boolean =>
  Either.match(instance.fromValue(instance.toValue(self)), {
    onLeft: () => false,
    onRight: (decoded) => equivalence(decoded, self)
  })
