import * as Option from "effect/Option"

// CHANGE: define the package record and its derived cost quantities
// FORMAT THEOREM: ∀r: totalAttributedBytes(r) = r.installedBytes + r.mandatoryPseudobytes + r.optionalPseudobytes
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: computed sets iterate in lexicographic order
// COMPLEXITY: O(1)/O(1)

export type Tier = "upper" | "lower"

export const tiers: ReadonlyArray<Tier> = ["upper", "lower"]

export interface PackageMetadata {
  readonly name: string | undefined
  readonly description: string | undefined
  readonly category: string | undefined
  readonly variety: string | undefined
  readonly installation: string | undefined
}

export interface PackageEdges {
  readonly requires: ReadonlyArray<string>
  readonly advises: ReadonlyArray<string>
  readonly suggests: ReadonlyArray<string>
  readonly supplements: ReadonlyArray<string>
  readonly enhances: ReadonlyArray<string>
}

export interface PackageRecord extends PackageMetadata, PackageEdges {
  readonly identifier: string
  readonly installedBytes: number
  readonly recursiveRequires: ReadonlySet<string>
  readonly recursiveComplements: ReadonlySet<string>
  readonly recursiveWhatRequires: ReadonlySet<string>
  readonly recursiveWhatComplements: ReadonlySet<string>
  readonly claimantCount: number | undefined
  readonly mandatoryPseudobytes: number
  readonly optionalPseudobytes: number
}

/**
 * Collector output for one package, before any computed field exists.
 */
export interface PackageInput extends Partial<PackageMetadata>, Partial<PackageEdges> {
  readonly identifier: string
  readonly tier: Tier
  readonly installedBytes: number
}

export interface CostRatios {
  readonly installed: number
  readonly mandatory: number
  readonly optional: number
}

export const compareIdentifiers = (left: string, right: string): number => {
  if (left < right) {
    return -1
  }
  return left > right ? 1 : 0
}

export const sortedSet = (values: Iterable<string>): ReadonlySet<string> =>
  new Set([...new Set(values)].toSorted(compareIdentifiers))

const emptySet: ReadonlySet<string> = new Set<string>()

/**
 * Build a record with empty closures and zero accumulators.
 *
 * @pure true
 * @invariant claimantCount is undefined until attribution runs
 * @complexity O(e) where e = number of edges
 */
export const makePackageRecord = (input: PackageInput): PackageRecord => ({
  identifier: input.identifier,
  name: input.name,
  description: input.description,
  category: input.category,
  variety: input.variety,
  installation: input.installation,
  requires: [...(input.requires ?? [])],
  advises: [...(input.advises ?? [])],
  suggests: [...(input.suggests ?? [])],
  supplements: [...(input.supplements ?? [])],
  enhances: [...(input.enhances ?? [])],
  installedBytes: input.installedBytes,
  recursiveRequires: emptySet,
  recursiveComplements: emptySet,
  recursiveWhatRequires: emptySet,
  recursiveWhatComplements: emptySet,
  claimantCount: undefined,
  mandatoryPseudobytes: 0,
  optionalPseudobytes: 0
})

export const displayName = (record: PackageRecord): string => record.name ?? record.identifier

export const totalPseudobytes = (record: PackageRecord): number =>
  record.mandatoryPseudobytes + record.optionalPseudobytes

export const totalAttributedBytes = (record: PackageRecord): number =>
  record.installedBytes + totalPseudobytes(record)

/**
 * Split of a package's attributed bytes into its own, mandatory and optional shares.
 *
 * @pure true
 * @invariant Some(r) → r.installed + r.mandatory + r.optional ≈ 1
 * @complexity O(1)
 */
export const costRatios = (record: PackageRecord): Option.Option<CostRatios> => {
  const total = totalAttributedBytes(record)
  if (total <= 0) {
    return Option.none()
  }
  return Option.some({
    installed: record.installedBytes / total,
    mandatory: record.mandatoryPseudobytes / total,
    optional: record.optionalPseudobytes / total
  })
}
