import * as Equivalence from "effect/Equivalence"
import * as Order from "effect/Order"

import * as OrderedMap from "./ordered-map.js"
import type { Value } from "./value.js"

// CHANGE: define total structural ordering and equality for values
// WHY: values are compared in tests and by callers; object field order must count
// QUOTE(TZ): "equality and ordering are structural"
// REF: req-value-order-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a,b: compare(a, b) = -compare(b, a)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: compare(a, b) = 0 ⇔ a and b have the same variants, payloads and field order
// COMPLEXITY: O(n)/O(d)

type Ordering = -1 | 0 | 1

const variantRank: Record<Value["_tag"], number> = {
  ValueInt: 0,
  ValueFloat: 1,
  ValueBoolean: 2,
  ValueString: 3,
  ValueEnum: 4,
  ValueList: 5,
  ValueObject: 6,
  ValueNull: 7
}

const compareNumbers = (left: number, right: number): Ordering => {
  if (Number.isNaN(left)) {
    return Number.isNaN(right) ? 0 : 1
  }
  if (Number.isNaN(right)) {
    return -1
  }
  return left < right ? -1 : left > right ? 1 : 0
}

const compareStrings = (left: string, right: string): Ordering => left < right ? -1 : left > right ? 1 : 0

const compareBooleans = (left: boolean, right: boolean): Ordering => compareNumbers(Number(left), Number(right))

// Pending comparisons, processed last-in first-out. Element pairs are pushed
// in reverse so the leftmost difference decides.
type Task =
  | { readonly _tag: "Values"; readonly left: Value; readonly right: Value }
  | { readonly _tag: "Keys"; readonly left: string; readonly right: string }
  | { readonly _tag: "Lengths"; readonly left: number; readonly right: number }

const pushList = (
  tasks: Array<Task>,
  left: ReadonlyArray<Value>,
  right: ReadonlyArray<Value>
): void => {
  tasks.push({ _tag: "Lengths", left: left.length, right: right.length })
  for (let index = Math.min(left.length, right.length) - 1; index >= 0; index--) {
    const l = left[index]
    const r = right[index]
    if (l !== undefined && r !== undefined) {
      tasks.push({ _tag: "Values", left: l, right: r })
    }
  }
}

const pushObject = (
  tasks: Array<Task>,
  left: ReadonlyArray<readonly [string, Value]>,
  right: ReadonlyArray<readonly [string, Value]>
): void => {
  tasks.push({ _tag: "Lengths", left: left.length, right: right.length })
  for (let index = Math.min(left.length, right.length) - 1; index >= 0; index--) {
    const l = left[index]
    const r = right[index]
    if (l !== undefined && r !== undefined) {
      tasks.push({ _tag: "Values", left: l[1], right: r[1] })
      tasks.push({ _tag: "Keys", left: l[0], right: r[0] })
    }
  }
}

// Returns the ordering of two scalars, or schedules the children of two
// containers and returns 0.
const step = (tasks: Array<Task>, left: Value, right: Value): Ordering => {
  if (left._tag !== right._tag) {
    return compareNumbers(variantRank[left._tag], variantRank[right._tag])
  }
  switch (left._tag) {
    case "ValueInt":
      return right._tag === "ValueInt" ? compareNumbers(left.value, right.value) : 0
    case "ValueFloat":
      return right._tag === "ValueFloat" ? compareNumbers(left.value, right.value) : 0
    case "ValueBoolean":
      return right._tag === "ValueBoolean" ? compareBooleans(left.value, right.value) : 0
    case "ValueString":
      return right._tag === "ValueString" ? compareStrings(left.value, right.value) : 0
    case "ValueEnum":
      return right._tag === "ValueEnum" ? compareStrings(left.value, right.value) : 0
    case "ValueList":
      if (right._tag === "ValueList") {
        pushList(tasks, left.value.values, right.value.values)
      }
      return 0
    case "ValueObject":
      if (right._tag === "ValueObject") {
        pushObject(tasks, OrderedMap.toList(left.value.fields), OrderedMap.toList(right.value.fields))
      }
      return 0
    case "ValueNull":
      return 0
  }
}

const compareValues = (left: Value, right: Value): Ordering => {
  const tasks: Array<Task> = [{ _tag: "Values", left, right }]
  for (let task = tasks.pop(); task !== undefined; task = tasks.pop()) {
    const result = task._tag === "Values"
      ? step(tasks, task.left, task.right)
      : task._tag === "Keys"
      ? compareStrings(task.left, task.right)
      : compareNumbers(task.left, task.right)
    if (result !== 0) {
      return result
    }
  }
  return 0
}

/**
 * Total order on values: variant first (Int < Float < Boolean < String < Enum
 * < List < Object < Null), then payload. Lists and objects compare
 * lexicographically, objects over their fields in insertion order.
 */
export const ValueOrder: Order.Order<Value> = Order.make(compareValues)

export const ValueEquivalence: Equivalence.Equivalence<Value> = Equivalence.make(
  (left, right) => compareValues(left, right) === 0
)

export const equals = (left: Value, right: Value): boolean => ValueEquivalence(left, right)
