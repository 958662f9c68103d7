// CHANGE: add graph traversal primitives over an abstract neighbour function
// FORMAT THEOREM: ∀s,f: s ∈ reachable(s,f) ∧ ∀x ∈ reachable(s,f): f(x) ⊆ reachable(s,f)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every node is expanded at most once; no recursion
// COMPLEXITY: O(V + E)

export type Neighbors = (node: string) => Iterable<string>

/**
 * Collect every node reachable from `start`, `start` included.
 *
 * @pure true
 * @invariant safe on cyclic graphs; frontier is an explicit stack
 * @complexity O(V + E)
 */
export const reachable = (start: string, neighbors: Neighbors): ReadonlySet<string> => {
  const visited = new Set<string>([start])
  const stack: Array<string> = [start]
  let current = stack.pop()
  while (current !== undefined) {
    for (const next of neighbors(current)) {
      if (!visited.has(next)) {
        visited.add(next)
        stack.push(next)
      }
    }
    current = stack.pop()
  }
  return visited
}

/**
 * Breadth-first hop counts from `start`.
 *
 * Map insertion order is non-decreasing distance, so iterating the result
 * yields nodes rank by rank.
 *
 * @pure true
 * @invariant distances.get(start) = 0
 * @complexity O(V + E)
 */
export const distances = (start: string, neighbors: Neighbors): ReadonlyMap<string, number> => {
  const result = new Map<string, number>([[start, 0]])
  const queue: Array<string> = [start]
  let head = 0
  while (head < queue.length) {
    const node = queue[head]
    head += 1
    if (node === undefined) {
      break
    }
    const distance = result.get(node) ?? 0
    for (const next of neighbors(node)) {
      if (!result.has(next)) {
        result.set(next, distance + 1)
        queue.push(next)
      }
    }
  }
  return result
}
