// CHANGE: provide a stack-based post-order fold over finite trees
// WHY: value trees come from untrusted input; nesting depth must not grow the call stack
// QUOTE(TZ): "make the traversals iterative"
// REF: req-depth-guard-1
// SOURCE: n/a
// FORMAT THEOREM: foldTree(t, c, f) = f(t, map(c(t), foldTree))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: combine(node, rs) sees rs in the order children(node) lists them
// COMPLEXITY: O(n)/O(d) where d = tree depth

interface Frame<N, R> {
  readonly node: N
  readonly pending: ReadonlyArray<N>
  readonly results: Array<R>
}

const frameOf = <N, R>(node: N, children: (node: N) => ReadonlyArray<N>): Frame<N, R> => ({
  node,
  pending: children(node),
  results: []
})

/**
 * Fold a tree bottom-up without recursion.
 *
 * @param root - Tree root.
 * @param children - Direct children of a node, in order.
 * @param combine - Builds a node's result from its children's results.
 * @returns Result for the root.
 *
 * @pure true (given pure callbacks)
 * @complexity O(n)
 */
export const foldTree = <N, R>(
  root: N,
  children: (node: N) => ReadonlyArray<N>,
  combine: (node: N, results: ReadonlyArray<R>) => R
): R => {
  const stack: Array<Frame<N, R>> = []
  let current = frameOf<N, R>(root, children)
  for (;;) {
    if (current.results.length < current.pending.length) {
      const next = current.pending[current.results.length]
      if (next !== undefined) {
        stack.push(current)
        current = frameOf<N, R>(next, children)
        continue
      }
    }
    const result = combine(current.node, current.results)
    const parent = stack.pop()
    if (parent === undefined) {
      return result
    }
    parent.results.push(result)
    current = parent
  }
}
