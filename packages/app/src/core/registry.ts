import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { DuplicatePackage, PackageNotFound, RegistryError } from "./errors.js"
import { duplicatePackage, packageNotFound } from "./errors.js"
import type { PackageInput, PackageRecord, Tier } from "./package.js"
import { compareIdentifiers, makePackageRecord, tiers } from "./package.js"

// CHANGE: model the installed packages as a two-tier registry with explicit failures
// FORMAT THEOREM: ∀id: |{t ∈ Tiers : id ∈ tier(t)}| ≤ 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: iteration is lexicographic by identifier; no operation silently overwrites
// COMPLEXITY: O(1) lookup, O(n log n) first iteration after a mutation

export interface PackageRegistry {
  readonly get: (identifier: string) => Either.Either<PackageRecord, PackageNotFound>
  readonly lookup: (identifier: string) => Option.Option<PackageRecord>
  readonly has: (identifier: string) => boolean
  readonly tierOf: (identifier: string) => Option.Option<Tier>
  readonly put: (tier: Tier, record: PackageRecord) => Either.Either<void, DuplicatePackage>
  readonly set: (record: PackageRecord) => Either.Either<void, PackageNotFound>
  readonly remove: (identifier: string) => Either.Either<PackageRecord, PackageNotFound>
  readonly move: (identifier: string, target: Tier) => Either.Either<void, PackageNotFound>
  readonly identifiers: (tier?: Tier) => ReadonlyArray<string>
  readonly records: (tier?: Tier) => ReadonlyArray<PackageRecord>
  readonly size: (tier?: Tier) => number
}

type Store = Record<Tier, Map<string, PackageRecord>>

const findTier = (store: Store, identifier: string): Tier | undefined =>
  tiers.find((tier) => store[tier].has(identifier))

/**
 * Create an empty registry.
 *
 * @returns PackageRegistry backed by one map per tier.
 *
 * @pure false
 * @invariant an identifier lives in exactly one tier
 * @complexity O(1)
 */
export const makeRegistry = (): PackageRegistry => {
  const store: Store = { upper: new Map(), lower: new Map() }
  const sorted = new Map<Tier | "all", ReadonlyArray<string>>()

  const identifiers = (tier?: Tier): ReadonlyArray<string> => {
    const key = tier ?? "all"
    const cached = sorted.get(key)
    if (cached !== undefined) {
      return cached
    }
    const keys = tier === undefined
      ? [...store.upper.keys(), ...store.lower.keys()]
      : [...store[tier].keys()]
    const result = keys.toSorted(compareIdentifiers)
    sorted.set(key, result)
    return result
  }

  const lookup = (identifier: string): Option.Option<PackageRecord> => {
    const tier = findTier(store, identifier)
    return tier === undefined ? Option.none() : Option.fromNullable(store[tier].get(identifier))
  }

  const get = (identifier: string): Either.Either<PackageRecord, PackageNotFound> =>
    Option.match(lookup(identifier), {
      onNone: () => Either.left(packageNotFound(identifier, "get")),
      onSome: (record) => Either.right(record)
    })

  const put = (tier: Tier, record: PackageRecord): Either.Either<void, DuplicatePackage> => {
    const existing = findTier(store, record.identifier)
    if (existing !== undefined) {
      return Either.left(duplicatePackage(record.identifier, existing))
    }
    store[tier].set(record.identifier, record)
    sorted.clear()
    return Either.right(undefined)
  }

  const set = (record: PackageRecord): Either.Either<void, PackageNotFound> => {
    const tier = findTier(store, record.identifier)
    if (tier === undefined) {
      return Either.left(packageNotFound(record.identifier, "set"))
    }
    store[tier].set(record.identifier, record)
    return Either.right(undefined)
  }

  const remove = (identifier: string): Either.Either<PackageRecord, PackageNotFound> => {
    const tier = findTier(store, identifier)
    const record = tier === undefined ? undefined : store[tier].get(identifier)
    if (tier === undefined || record === undefined) {
      return Either.left(packageNotFound(identifier, "remove"))
    }
    store[tier].delete(identifier)
    sorted.clear()
    return Either.right(record)
  }

  const move = (identifier: string, target: Tier): Either.Either<void, PackageNotFound> => {
    const tier = findTier(store, identifier)
    const record = tier === undefined ? undefined : store[tier].get(identifier)
    if (tier === undefined || record === undefined) {
      return Either.left(packageNotFound(identifier, "move"))
    }
    if (tier !== target) {
      store[tier].delete(identifier)
      store[target].set(identifier, record)
      sorted.clear()
    }
    return Either.right(undefined)
  }

  const records = (tier?: Tier): ReadonlyArray<PackageRecord> =>
    identifiers(tier).flatMap((identifier) => Option.toArray(lookup(identifier)))

  return {
    get,
    lookup,
    has: (identifier) => findTier(store, identifier) !== undefined,
    tierOf: (identifier) => Option.fromNullable(findTier(store, identifier)),
    put,
    set,
    remove,
    move,
    identifiers,
    records,
    size: (tier) => tier === undefined ? store.upper.size + store.lower.size : store[tier].size
  }
}

/**
 * Build a registry from collector output.
 *
 * @param inputs - Package inputs with their initial tier.
 * @returns Populated registry or the first DuplicatePackage.
 *
 * @pure true
 * @invariant result.size() = inputs.length on success
 * @complexity O(n)
 */
export const registryFromInputs = (
  inputs: Iterable<PackageInput>
): Either.Either<PackageRegistry, RegistryError> => {
  const registry = makeRegistry()
  for (const input of inputs) {
    const added = registry.put(input.tier, makePackageRecord(input))
    if (Either.isLeft(added)) {
      return Either.left(added.left)
    }
  }
  return Either.right(registry)
}
