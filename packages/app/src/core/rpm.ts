import * as Either from "effect/Either"

import type { PackageInput, Tier } from "./package.js"
import { compareIdentifiers } from "./package.js"

// CHANGE: turn rpm query rows and dnf install reasons into registry input
// FORMAT THEOREM: ∀p ∈ result: p.tier = "upper" ↔ reason(p) = user
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: group-installed packages and kernel or glib packages never enter the registry
// COMPLEXITY: O(n · d) where d = relation names per package

const listSeparator = ","

const list = (tag: string): string => `[%{${tag}}${listSeparator}]`

export const rpmFields = [
  "%{NAME}",
  "%{ARCH}",
  "%{INSTALLTIME}",
  "%{SIZE}",
  "%{GROUP}",
  list("PROVIDENAME"),
  list("REQUIRENAME"),
  list("RECOMMENDNAME"),
  list("SUGGESTNAME"),
  list("SUPPLEMENTNAME"),
  list("ENHANCENAME"),
  "%{SUMMARY}"
] as const

export const rpmQueryFormat = `${rpmFields.join("\t")}\n`

export const dnfReasonFormat = "%{name}\t%{arch}\t%{reason}\n"

export interface RpmRow {
  readonly name: string
  readonly architecture: string
  readonly installTime: number
  readonly installedBytes: number
  readonly group: string
  readonly provides: ReadonlyArray<string>
  readonly requires: ReadonlyArray<string>
  readonly recommends: ReadonlyArray<string>
  readonly suggests: ReadonlyArray<string>
  readonly supplements: ReadonlyArray<string>
  readonly enhances: ReadonlyArray<string>
  readonly summary: string
}

export const rpmIdentifier = (row: Pick<RpmRow, "name" | "architecture">): string =>
  `${row.name}:${row.architecture}`

const excludedPrefixes = ["kernel", "glib"] as const

const parseNames = (field: string): ReadonlyArray<string> => [
  ...new Set(field.split(listSeparator).map((name) => name.trim()).filter((name) => name.length > 0))
]

const parseCount = (value: string): number => {
  const parsed = Number.parseInt(value.trim(), 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0
}

const parseRow = (line: string, lineNumber: number): Either.Either<RpmRow, string> => {
  const cells = line.split("\t")
  if (cells.length < rpmFields.length) {
    return Either.left(`line ${lineNumber}: expected ${rpmFields.length} fields, got ${cells.length}`)
  }
  const [
    name = "",
    architecture = "",
    installTime = "",
    size = "",
    group = "",
    provides = "",
    requires = "",
    recommends = "",
    suggests = "",
    supplements = "",
    enhances = "",
    ...summary
  ] = cells
  if (name.length === 0) {
    return Either.left(`line ${lineNumber}: missing package name`)
  }
  return Either.right({
    name,
    architecture,
    installTime: parseCount(installTime),
    installedBytes: parseCount(size),
    group: group === "Unspecified" || group === "(none)" ? "" : group,
    provides: parseNames(provides),
    requires: parseNames(requires),
    recommends: parseNames(recommends),
    suggests: parseNames(suggests),
    supplements: parseNames(supplements),
    enhances: parseNames(enhances),
    summary: summary.join("\t").trim()
  })
}

/**
 * Parse `rpm -qa --queryformat` output produced with {@link rpmQueryFormat}.
 *
 * @returns Rows, or a message naming the first malformed line.
 *
 * @pure true
 * @invariant blank lines are skipped
 * @complexity O(n)
 */
export const parseRpmQuery = (output: string): Either.Either<ReadonlyArray<RpmRow>, string> => {
  const rows: Array<RpmRow> = []
  for (const [index, line] of output.split("\n").entries()) {
    if (line.trim().length === 0) {
      continue
    }
    const row = parseRow(line, index + 1)
    if (Either.isLeft(row)) {
      return Either.left(row.left)
    }
    rows.push(row.right)
  }
  return Either.right(rows)
}

const normalizeReason = (reason: string): string => reason.trim().toLowerCase().replaceAll(/\s+/gu, "-")

/**
 * Parse `dnf repoquery --installed` output produced with {@link dnfReasonFormat}.
 *
 * Reasons are lower-cased with spaces turned into dashes, so `Weak Dependency`
 * and `weak-dependency` read the same.
 *
 * @returns Reason per `name:arch`, or a message naming the first malformed line.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseReasonList = (output: string): Either.Either<ReadonlyMap<string, string>, string> => {
  const reasons = new Map<string, string>()
  for (const [index, line] of output.split("\n").entries()) {
    if (line.trim().length === 0) {
      continue
    }
    const [name = "", architecture = "", reason = "", ...surplus] = line.split("\t")
    if (name.length === 0 || architecture.length === 0 || surplus.length > 0) {
      return Either.left(`line ${index + 1}: expected name, arch and reason`)
    }
    reasons.set(rpmIdentifier({ name, architecture }), normalizeReason(reason))
  }
  return Either.right(reasons)
}

/**
 * Keep the most recently installed row of every `name:arch`.
 *
 * @pure true
 * @invariant result has unique identifiers; ties keep the later row
 * @complexity O(n)
 */
export const latestRows = (rows: ReadonlyArray<RpmRow>): ReadonlyArray<RpmRow> => {
  const latest = new Map<string, RpmRow>()
  for (const row of rows) {
    const identifier = rpmIdentifier(row)
    const current = latest.get(identifier)
    if (current === undefined || row.installTime >= current.installTime) {
      latest.set(identifier, row)
    }
  }
  return [...latest.values()]
}

const reasonOf = (reasons: ReadonlyMap<string, string>, row: RpmRow): string =>
  reasons.get(rpmIdentifier(row)) ?? "unknown"

export const isExcludedRpm = (row: RpmRow, reason: string): boolean =>
  reason === "group" ||
  row.architecture === "(none)" ||
  excludedPrefixes.some((prefix) => row.name.startsWith(prefix))

export interface ProviderIndex {
  readonly byName: ReadonlyMap<string, ReadonlyArray<RpmRow>>
}

export const indexProviders = (rows: ReadonlyArray<RpmRow>): ProviderIndex => {
  const byName = new Map<string, Array<RpmRow>>()
  const add = (name: string, row: RpmRow): void => {
    const existing = byName.get(name)
    if (existing === undefined) {
      byName.set(name, [row])
    } else if (!existing.includes(row)) {
      existing.push(row)
    }
  }
  for (const row of rows) {
    add(row.name, row)
    for (const provided of row.provides) {
      add(provided, row)
    }
  }
  return { byName }
}

/**
 * Resolve capability names to every collected package providing them.
 *
 * Unlike Debian OR groups, an rpm capability carries no preference, so all
 * providers are kept. A package never resolves to itself or to another
 * architecture of its own name.
 *
 * @pure true
 * @invariant result is sorted and free of duplicates
 * @complexity O(c · p)
 */
export const resolveCapabilities = (
  index: ProviderIndex,
  dependent: RpmRow,
  capabilities: ReadonlyArray<string>
): ReadonlyArray<string> => {
  const resolved = new Set<string>()
  for (const capability of capabilities) {
    for (const provider of index.byName.get(capability) ?? []) {
      if (provider.name !== dependent.name) {
        resolved.add(rpmIdentifier(provider))
      }
    }
  }
  return [...resolved].toSorted(compareIdentifiers)
}

/**
 * Build registry input for the packages dnf knows as installed.
 *
 * @param rows - Parsed rpm query output.
 * @param reasons - Install reason per `name:arch`; a missing entry reads as `unknown`.
 * @returns Inputs sorted by identifier.
 *
 * @pure true
 * @invariant requires = Requires, advises = Recommends; edges only point at collected packages
 * @complexity O(n · d)
 */
export const rpmInputs = (
  rows: ReadonlyArray<RpmRow>,
  reasons: ReadonlyMap<string, string>
): ReadonlyArray<PackageInput> => {
  const collected = latestRows(rows).filter((row) => !isExcludedRpm(row, reasonOf(reasons, row)))
  const index = indexProviders(collected)
  return collected
    .toSorted((left, right) => compareIdentifiers(rpmIdentifier(left), rpmIdentifier(right)))
    .map((row) => {
      const tier: Tier = reasonOf(reasons, row) === "user" ? "upper" : "lower"
      const resolve = (capabilities: ReadonlyArray<string>): ReadonlyArray<string> =>
        resolveCapabilities(index, row, capabilities)
      return {
        identifier: rpmIdentifier(row),
        tier,
        installedBytes: row.installedBytes,
        name: row.name,
        description: row.summary.length > 0 ? row.summary : undefined,
        category: row.group.length > 0 ? row.group : undefined,
        requires: resolve(row.requires),
        advises: resolve(row.recommends),
        suggests: resolve(row.suggests),
        supplements: resolve(row.supplements),
        enhances: resolve(row.enhances)
      }
    })
}
