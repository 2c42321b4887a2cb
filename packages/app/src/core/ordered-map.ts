import * as Option from "effect/Option"

// CHANGE: add an immutable key-unique map that remembers insertion order
// WHY: object fields must stay unique and keep the order they were written in
// QUOTE(TZ): "fail-on-collision union"
// REF: req-ordered-map-1
// SOURCE: n/a
// FORMAT THEOREM: ∀ms: unions(ms) = Some(m) ↔ keys(ms) are pairwise disjoint
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: keys are unique; toList(m) yields entries in insertion order
// COMPLEXITY: O(n)/O(n) to build, O(1) lookup

export interface OrderedMap<K, V> {
  readonly _tag: "OrderedMap"
  readonly entries: ReadonlyMap<K, V>
}

const fromMap = <K, V>(entries: ReadonlyMap<K, V>): OrderedMap<K, V> => ({
  _tag: "OrderedMap",
  entries
})

export const empty = <K, V>(): OrderedMap<K, V> => fromMap(new Map<K, V>())

const collect = <K, V>(
  target: Map<K, V>,
  entries: Iterable<readonly [K, V]>
): boolean => {
  for (const [key, value] of entries) {
    if (target.has(key)) {
      return false
    }
    target.set(key, value)
  }
  return true
}

/**
 * Build a map from a list of entries.
 *
 * @returns None when two entries share a key; no partial map is produced.
 *
 * @pure true
 * @invariant Some(m) → toList(m) = entries
 * @complexity O(n)
 */
export const orderedMap = <K, V>(
  entries: Iterable<readonly [K, V]>
): Option.Option<OrderedMap<K, V>> => {
  const target = new Map<K, V>()
  return collect(target, entries) ? Option.some(fromMap(target)) : Option.none()
}

/**
 * Concatenate maps in argument order.
 *
 * Collision policy: a key present in more than one input rejects the whole
 * union (None). Neither side wins.
 *
 * @pure true
 * @invariant Some(m) → keys(m) = ⊎ keys(maps) (disjoint union)
 * @complexity O(Σ size)
 */
export const unions = <K, V>(
  maps: Iterable<OrderedMap<K, V>>
): Option.Option<OrderedMap<K, V>> => {
  const target = new Map<K, V>()
  for (const map of maps) {
    if (!collect(target, map.entries)) {
      return Option.none()
    }
  }
  return Option.some(fromMap(target))
}

export const toList = <K, V>(map: OrderedMap<K, V>): ReadonlyArray<readonly [K, V]> => [...map.entries]

export const lookup = <K, V>(map: OrderedMap<K, V>, key: K): Option.Option<NonNullable<V>> =>
  Option.fromNullable(map.entries.get(key))

export const size = <K, V>(map: OrderedMap<K, V>): number => map.entries.size
