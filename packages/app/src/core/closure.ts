import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { PackageNotFound } from "./errors.js"
import type { Neighbors } from "./graph.js"
import { reachable } from "./graph.js"
import type { PackageRecord } from "./package.js"
import { sortedSet } from "./package.js"
import type { PackageRegistry } from "./registry.js"

// CHANGE: compute mandatory and optional transitive closures with reverse indexes
// FORMAT THEOREM: ∀i,d: d ∈ recursiveRequires(i) ↔ i ∈ recursiveWhatRequires(d)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: i ∉ closures(i); recursiveRequires(i) ∩ recursiveComplements(i) = ∅
// COMPLEXITY: O(V · (V + E))

type EdgeSelector = (record: PackageRecord) => ReadonlyArray<string>

const mandatoryEdges: EdgeSelector = (record) => record.requires

const allEdges: EdgeSelector = (record) => [...record.requires, ...record.advises]

const neighborsOf = (registry: PackageRegistry, select: EdgeSelector): Neighbors => (identifier) =>
  Option.match(registry.lookup(identifier), {
    onNone: () => [],
    onSome: (record) => select(record).filter((target) => registry.has(target))
  })

const addReverse = (index: Map<string, Array<string>>, target: string, source: string): void => {
  const existing = index.get(target)
  if (existing === undefined) {
    index.set(target, [source])
  } else {
    existing.push(source)
  }
}

interface ForwardClosure {
  readonly requires: ReadonlySet<string>
  readonly complements: ReadonlySet<string>
}

const forwardClosure = (
  identifier: string,
  mandatory: Neighbors,
  optional: Neighbors
): ForwardClosure => {
  const required = new Set(reachable(identifier, mandatory))
  required.delete(identifier)
  const complements = [...reachable(identifier, optional)].filter(
    (target) => target !== identifier && !required.has(target)
  )
  return { requires: sortedSet(required), complements: sortedSet(complements) }
}

/**
 * Compute recursive requirement and complement sets for every package.
 *
 * Reverse indexes are rebuilt from scratch, so the operation is idempotent
 * while edges stay unchanged. Edges to identifiers outside the registry are ignored.
 *
 * @param registry - Fully populated registry; updated in place.
 * @returns Either.right(undefined) or PackageNotFound if the registry shrinks mid-run.
 *
 * @pure false
 * @invariant ∀i: recursiveComplements(i) ∩ recursiveRequires(i) = ∅
 * @complexity O(V · (V + E))
 */
export const computeClosures = (registry: PackageRegistry): Either.Either<void, PackageNotFound> => {
  const mandatory = neighborsOf(registry, mandatoryEdges)
  const optional = neighborsOf(registry, allEdges)
  const forward = new Map<string, ForwardClosure>()
  const whatRequires = new Map<string, Array<string>>()
  const whatComplements = new Map<string, Array<string>>()

  for (const identifier of registry.identifiers()) {
    const closure = forwardClosure(identifier, mandatory, optional)
    forward.set(identifier, closure)
    for (const dependency of closure.requires) {
      addReverse(whatRequires, dependency, identifier)
    }
    for (const dependency of closure.complements) {
      addReverse(whatComplements, dependency, identifier)
    }
  }

  for (const identifier of registry.identifiers()) {
    const record = registry.get(identifier)
    if (Either.isLeft(record)) {
      return Either.left(record.left)
    }
    const closure = forward.get(identifier)
    const updated = registry.set({
      ...record.right,
      recursiveRequires: closure?.requires ?? new Set<string>(),
      recursiveComplements: closure?.complements ?? new Set<string>(),
      recursiveWhatRequires: sortedSet(whatRequires.get(identifier) ?? []),
      recursiveWhatComplements: sortedSet(whatComplements.get(identifier) ?? [])
    })
    if (Either.isLeft(updated)) {
      return Either.left(updated.left)
    }
  }
  return Either.right(undefined)
}
