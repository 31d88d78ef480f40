import type { Value } from "./value.js"

// CHANGE: walk a dotted path through a tree with the fluent accessors
// WHY: path lookups reuse the chain semantics, errors surface on the node the walk stops at
// SOURCE: n/a
// FORMAT THEOREM: ∀r, p: walk(r, p) = get(...get(get(r, p0), p1)..., pn)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: array indices are bounds-checked before get(index) is called
// COMPLEXITY: O(|p|)

const INDEX = /^\d+$/

export const splitPath = (raw: string): ReadonlyArray<string> =>
  raw.split(".").filter((segment) => segment.length > 0)

const step = (node: Value, segment: string): Value => {
  if (node.type() !== "Array" || !INDEX.test(segment)) {
    return node.get(segment)
  }
  const index = Number(segment)
  return index < node.size() ? node.get(index) : node.setError("NotFound")
}

/**
 * Follow `segments` from `root`. Numeric segments index arrays, everything else is an
 * object key. The chain never stops early: inspect `error()` on the returned node.
 *
 * @param root - Tree to walk.
 * @param segments - Path segments, e.g. splitPath("items.0.name").
 * @returns The reached node, or the node where the walk got stuck (with a pending error).
 *
 * @pure false (records errors on visited nodes)
 * @complexity O(|segments|)
 */
export const walkPath = (root: Value, segments: ReadonlyArray<string>): Value => {
  let current = root
  for (const segment of segments) {
    current = step(current, segment)
  }
  return current
}
