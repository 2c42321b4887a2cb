// CHANGE: describe the JSON wire form values are serialized to
// WHY: serializer output and CLI input share one closed JSON type
// QUOTE(TZ): "an order-preserving JSON serializer"
// REF: req-wire-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀j ∈ Json: isJson(j) = true
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)

const isJsonLeaf = (value: unknown): boolean =>
  value === null ||
  typeof value === "boolean" ||
  typeof value === "string" ||
  (typeof value === "number" && Number.isFinite(value))

/**
 * Check that an unknown value is JSON data. Objects are inspected in place,
 * so own keys such as "__proto__" survive.
 *
 * @pure true
 * @invariant nesting depth does not grow the call stack
 * @complexity O(n)
 */
export const isJson = (value: unknown): value is Json => {
  const pending: Array<unknown> = [value]
  while (pending.length > 0) {
    const current = pending.pop()
    if (Array.isArray(current)) {
      for (const item of current) {
        pending.push(item)
      }
    } else if (typeof current === "object" && current !== null) {
      const prototype = Object.getPrototypeOf(current)
      if (prototype !== Object.prototype && prototype !== null) {
        return false
      }
      for (const item of Object.values(current)) {
        pending.push(item)
      }
    } else if (!isJsonLeaf(current)) {
      return false
    }
  }
  return true
}
