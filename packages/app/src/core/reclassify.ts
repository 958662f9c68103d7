import { Match } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { PackageNotFound } from "./errors.js"
import type { PackageRecord } from "./package.js"
import type { PackageRegistry } from "./registry.js"

// CHANGE: correct tier misclassification using reachability from the upper tier
// FORMAT THEOREM: d ∈ disconnected ↔ d ∈ lower ∧ (whatRequires(d) ∪ whatComplements(d)) ∩ upper = ∅
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: promotion decisions use the disconnected set frozen at the start of the pass
// COMPLEXITY: O(L · C)

export type ReclassificationPolicy = "prune" | "promote" | "none"

export const reclassificationPolicies: ReadonlyArray<ReclassificationPolicy> = ["prune", "promote", "none"]

export interface Reclassification {
  readonly policy: ReclassificationPolicy
  readonly identifiers: ReadonlyArray<string>
}

const dependents = (record: PackageRecord): ReadonlyArray<string> => [
  ...record.recursiveWhatRequires,
  ...record.recursiveWhatComplements
]

/**
 * Lower-tier packages that no upper-tier package depends on, even optionally.
 *
 * @pure true
 * @invariant result is sorted and ⊆ lower tier
 * @complexity O(L · C)
 */
export const findDisconnected = (registry: PackageRegistry): ReadonlyArray<string> =>
  registry
    .records("lower")
    .filter((record) =>
      !dependents(record).some((identifier) => Option.contains(registry.tierOf(identifier), "upper"))
    )
    .map((record) => record.identifier)

/**
 * Remove every disconnected lower-tier package.
 *
 * @returns Removed identifiers, sorted.
 *
 * @pure false
 * @invariant the upper tier is untouched
 * @complexity O(L · C)
 */
export const pruneDisconnected = (
  registry: PackageRegistry
): Either.Either<ReadonlyArray<string>, PackageNotFound> => {
  const disconnected = findDisconnected(registry)
  for (const identifier of disconnected) {
    const removed = registry.remove(identifier)
    if (Either.isLeft(removed)) {
      return Either.left(removed.left)
    }
  }
  return Either.right(disconnected)
}

/**
 * Promote disconnected packages that are not support for another disconnected package.
 *
 * @returns Promoted identifiers, sorted.
 *
 * @pure false
 * @invariant running twice promotes nothing the second time
 * @complexity O(L · C)
 */
export const promoteDisconnected = (
  registry: PackageRegistry
): Either.Either<ReadonlyArray<string>, PackageNotFound> => {
  const frozen = new Set(findDisconnected(registry))
  const promoted: Array<string> = []
  for (const identifier of frozen) {
    const record = registry.get(identifier)
    if (Either.isLeft(record)) {
      return Either.left(record.left)
    }
    const supportsAnotherOrphan = dependents(record.right).some((dependent) => frozen.has(dependent))
    if (!supportsAnotherOrphan) {
      promoted.push(identifier)
    }
  }
  for (const identifier of promoted) {
    const moved = registry.move(identifier, "upper")
    if (Either.isLeft(moved)) {
      return Either.left(moved.left)
    }
  }
  return Either.right(promoted)
}

/**
 * Run the selected reclassification policy once.
 *
 * @pure false
 * @invariant policy "none" never mutates the registry
 * @complexity O(L · C)
 */
export const applyPolicy = (
  registry: PackageRegistry,
  policy: ReclassificationPolicy
): Either.Either<Reclassification, PackageNotFound> => {
  const outcome: Either.Either<ReadonlyArray<string>, PackageNotFound> = Match.value(policy).pipe(
    Match.when("prune", () => pruneDisconnected(registry)),
    Match.when("promote", () => promoteDisconnected(registry)),
    Match.when("none", () => Either.right<ReadonlyArray<string>>([])),
    Match.exhaustive
  )
  return Either.map(outcome, (identifiers) => ({ policy, identifiers }))
}
