import * as Brand from "effect/Brand"

// CHANGE: introduce branded scalar payloads for literal values
// WHY: keep Int range, identifier syntax, and text-vs-enum distinction in the type system
// QUOTE(TZ): "Int is a 32-bit signed integer; names are GraphQL identifiers"
// REF: req-value-scalars-1
// SOURCE: n/a
// FORMAT THEOREM: ∀n: Int32.is(n) ↔ n ∈ ℤ ∧ -2^31 ≤ n < 2^31
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Int32 ∈ [-2^31, 2^31 - 1] ∩ ℤ; Name matches /^[_A-Za-z][_0-9A-Za-z]*$/
// COMPLEXITY: O(1)/O(1) for Int32, O(n)/O(1) for Name

export const INT32_MIN = -2147483648
export const INT32_MAX = 2147483647

export type Int32 = number & Brand.Brand<"Int32">

export const Int32 = Brand.refined<Int32>(
  (n) => Number.isInteger(n) && n >= INT32_MIN && n <= INT32_MAX,
  (n) => Brand.error(`Expected ${n} to be a 32-bit signed integer`)
)

const namePattern = /^[_A-Za-z][_0-9A-Za-z]*$/u

/**
 * A validated GraphQL identifier, used for object keys and enum values.
 */
export type Name = string & Brand.Brand<"Name">

export const Name = Brand.refined<Name>(
  (s) => namePattern.test(s),
  (s) => Brand.error(`Expected ${JSON.stringify(s)} to be a GraphQL name`)
)

/**
 * GraphQL string scalar. Separate from {@link Name} so that enum values and
 * text never mix.
 */
export type GraphQLString = string & Brand.Brand<"GraphQLString">

export const GraphQLString = Brand.nominal<GraphQLString>()
