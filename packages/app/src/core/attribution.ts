import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { PackageNotFound } from "./errors.js"
import type { PackageRecord } from "./package.js"
import { totalAttributedBytes, totalPseudobytes } from "./package.js"
import type { PackageRegistry } from "./registry.js"

// CHANGE: distribute lower-tier installed bytes across their upper-tier claimants
// FORMAT THEOREM: Σ{installedBytes(p) : claimantCount(p) ≠ 0} = Σ{totalAttributedBytes(u) : u ∈ upper}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: equal split per claimant; disconnected packages attribute nothing
// COMPLEXITY: O(L · C) where L = lower-tier size, C = claimants per package

export interface Claimants {
  readonly mandatory: ReadonlyArray<string>
  readonly optional: ReadonlyArray<string>
}

interface Accumulator {
  mandatory: number
  optional: number
}

const isUpper = (registry: PackageRegistry) => (identifier: string): boolean =>
  Option.contains(registry.tierOf(identifier), "upper")

/**
 * Upper-tier packages whose closures contain the given record.
 *
 * @pure true
 * @invariant result lists follow the lexicographic order of the reverse indexes
 * @complexity O(C)
 */
export const claimantsOf = (registry: PackageRegistry, record: PackageRecord): Claimants => ({
  mandatory: [...record.recursiveWhatRequires].filter(isUpper(registry)),
  optional: [...record.recursiveWhatComplements].filter(isUpper(registry))
})

const accumulatorFor = (totals: Map<string, Accumulator>, identifier: string): Accumulator => {
  const existing = totals.get(identifier)
  if (existing !== undefined) {
    return existing
  }
  const created: Accumulator = { mandatory: 0, optional: 0 }
  totals.set(identifier, created)
  return created
}

/**
 * Compute pseudobytes for the upper tier and claimant counts for the lower tier.
 *
 * Accumulators start from zero on every call, so repeated runs give the same values.
 *
 * @param registry - Registry with closures computed and tiers settled; updated in place.
 * @returns Either.right(undefined) or PackageNotFound.
 *
 * @pure false
 * @invariant upper records get claimantCount = undefined; lower records get zero pseudobytes
 * @complexity O(L · C + U)
 */
export const computeAttribution = (registry: PackageRegistry): Either.Either<void, PackageNotFound> => {
  const totals = new Map<string, Accumulator>()
  const counts = new Map<string, number>()

  for (const record of registry.records("lower")) {
    const claimants = claimantsOf(registry, record)
    const count = claimants.mandatory.length + claimants.optional.length
    counts.set(record.identifier, count)
    if (count === 0) {
      continue
    }
    const share = record.installedBytes / count
    for (const claimant of claimants.mandatory) {
      accumulatorFor(totals, claimant).mandatory += share
    }
    for (const claimant of claimants.optional) {
      accumulatorFor(totals, claimant).optional += share
    }
  }

  for (const record of registry.records()) {
    const total = totals.get(record.identifier)
    const updated = registry.set({
      ...record,
      claimantCount: counts.get(record.identifier),
      mandatoryPseudobytes: total?.mandatory ?? 0,
      optionalPseudobytes: total?.optional ?? 0
    })
    if (Either.isLeft(updated)) {
      return Either.left(updated.left)
    }
  }
  return Either.right(undefined)
}

export interface ConservationSummary {
  readonly connectedInstalledBytes: number
  readonly upperAttributedBytes: number
  readonly upperPseudobytes: number
  readonly connectedLowerBytes: number
  readonly disconnected: ReadonlyArray<string>
}

const sum = (values: ReadonlyArray<number>): number => values.reduce((left, right) => left + right, 0)

/**
 * Totals used to check that attribution neither creates nor loses bytes.
 *
 * @pure true
 * @invariant connectedInstalledBytes ≈ upperAttributedBytes
 * @complexity O(n)
 */
export const summarizeConservation = (registry: PackageRegistry): ConservationSummary => {
  const connected = registry.records().filter((record) => record.claimantCount !== 0)
  const upper = registry.records("upper")
  const lower = registry.records("lower")
  return {
    connectedInstalledBytes: sum(connected.map((record) => record.installedBytes)),
    upperAttributedBytes: sum(upper.map(totalAttributedBytes)),
    upperPseudobytes: sum(upper.map(totalPseudobytes)),
    connectedLowerBytes: sum(
      lower.filter((record) => record.claimantCount !== 0).map((record) => record.installedBytes)
    ),
    disconnected: lower.filter((record) => record.claimantCount === 0).map((record) => record.identifier)
  }
}
