import * as Either from "effect/Either"

import type { HistoryMarks } from "./apt-history.js"
import { emptyHistory } from "./apt-history.js"
import type { Neighbors } from "./graph.js"
import { reachable } from "./graph.js"
import type { PackageInput, Tier } from "./package.js"
import { compareIdentifiers } from "./package.js"

// CHANGE: turn dpkg-query rows and the manual-install list into registry input
// FORMAT THEOREM: ∀p ∈ result: p.tier = "upper" ↔ manual(p) ∧ p ∉ base ∪ auto(history) ∧ ¬lib(p)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every relation target is an installed package of the user set
// COMPLEXITY: O(n · (n + e))

export const dpkgFields = [
  "${Package}",
  "${Architecture}",
  "${db:Status-Abbrev}",
  "${Installed-Size}",
  "${Section}",
  "${Priority}",
  "${Provides}",
  "${Depends}",
  "${Pre-Depends}",
  "${Recommends}",
  "${Suggests}",
  "${Enhances}",
  "${binary:Summary}"
] as const

export const dpkgQueryFormat = `${dpkgFields.join("\t")}\n`

export interface Alternative {
  readonly name: string
  readonly architecture: string | undefined
}

export type OrGroup = ReadonlyArray<Alternative>

export interface DpkgRow {
  readonly name: string
  readonly architecture: string
  readonly installed: boolean
  readonly installedKib: number
  readonly section: string
  readonly priority: string
  readonly provides: ReadonlyArray<string>
  readonly depends: ReadonlyArray<OrGroup>
  readonly preDepends: ReadonlyArray<OrGroup>
  readonly recommends: ReadonlyArray<OrGroup>
  readonly suggests: ReadonlyArray<OrGroup>
  readonly enhances: ReadonlyArray<OrGroup>
  readonly summary: string
}

const baselinePriorities: ReadonlySet<string> = new Set(["required", "important", "standard"])

export const dpkgIdentifier = (row: Pick<DpkgRow, "name" | "architecture">): string =>
  `${row.name}:${row.architecture}`

const parseAlternative = (raw: string): Alternative | undefined => {
  const [token = ""] = raw.trim().split(/[\s(]/u)
  if (token.length === 0) {
    return undefined
  }
  const [name = "", architecture] = token.split(":", 2)
  return { name, architecture }
}

/**
 * Parse a relationship field such as `libc6 (>= 2.34), mail-transport-agent | postfix`.
 *
 * @pure true
 * @invariant empty groups are dropped
 * @complexity O(n)
 */
export const parseRelations = (field: string): ReadonlyArray<OrGroup> =>
  field
    .split(",")
    .map((group) => group.split("|").flatMap((raw) => parseAlternative(raw) ?? []))
    .filter((group) => group.length > 0)

const parseKib = (value: string): number => {
  const parsed = Number.parseInt(value.trim(), 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0
}

const parseRow = (line: string, lineNumber: number): Either.Either<DpkgRow, string> => {
  const cells = line.split("\t")
  if (cells.length < dpkgFields.length) {
    return Either.left(`line ${lineNumber}: expected ${dpkgFields.length} fields, got ${cells.length}`)
  }
  const [
    name = "",
    architecture = "",
    status = "",
    size = "",
    section = "",
    priority = "",
    provides = "",
    depends = "",
    preDepends = "",
    recommends = "",
    suggests = "",
    enhances = "",
    ...summary
  ] = cells
  return Either.right({
    name,
    architecture,
    installed: status.charAt(1) === "i",
    installedKib: parseKib(size),
    section,
    priority,
    provides: parseRelations(provides).flatMap((group) => group.map((alternative) => alternative.name)),
    depends: parseRelations(depends),
    preDepends: parseRelations(preDepends),
    recommends: parseRelations(recommends),
    suggests: parseRelations(suggests),
    enhances: parseRelations(enhances),
    summary: summary.join("\t").trim()
  })
}

/**
 * Parse the tab-separated output of `dpkg-query -W -f` with {@link dpkgQueryFormat}.
 *
 * @returns Rows, or a message naming the first malformed line.
 *
 * @pure true
 * @invariant blank lines are skipped
 * @complexity O(n)
 */
export const parseDpkgQuery = (output: string): Either.Either<ReadonlyArray<DpkgRow>, string> => {
  const rows: Array<DpkgRow> = []
  const lines = output.split("\n")
  for (const [index, line] of lines.entries()) {
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

/**
 * Parse `apt-mark showmanual` output into a set of names.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseManualList = (output: string): ReadonlySet<string> =>
  new Set(output.split("\n").map((line) => line.trim()).filter((line) => line.length > 0))

const sectionIs = (section: string, expected: string): boolean =>
  section === expected || section.endsWith(`/${expected}`)

export interface Installed {
  readonly rows: ReadonlyMap<string, DpkgRow>
  readonly providers: ReadonlyMap<string, ReadonlyArray<string>>
}

export const indexInstalled = (rows: ReadonlyArray<DpkgRow>): Installed => {
  const installed = new Map<string, DpkgRow>()
  const providers = new Map<string, Array<string>>()
  const addProvider = (name: string, identifier: string): void => {
    const existing = providers.get(name)
    if (existing === undefined) {
      providers.set(name, [identifier])
    } else {
      existing.push(identifier)
    }
  }
  for (const row of rows.filter((candidate) => candidate.installed)) {
    const identifier = dpkgIdentifier(row)
    installed.set(identifier, row)
    addProvider(row.name, identifier)
    for (const virtual of row.provides) {
      addProvider(virtual, identifier)
    }
  }
  return { rows: installed, providers }
}

const architectureMatches = (alternative: Alternative, dependent: DpkgRow, candidate: DpkgRow): boolean => {
  if (alternative.architecture !== undefined && alternative.architecture !== "any") {
    return alternative.architecture === "native"
      ? candidate.architecture === dependent.architecture || candidate.architecture === "all"
      : candidate.architecture === alternative.architecture
  }
  return true
}

/**
 * Resolve each OR group to its first installed alternative inside `allowed`.
 *
 * A real package of the same name is preferred over providers; among candidates
 * the dependent's architecture (or `all`) wins, then identifier order.
 *
 * @pure true
 * @invariant result contains no duplicates and only allowed identifiers
 * @complexity O(g · a · p)
 */
export const resolveGroups = (
  installed: Installed,
  dependent: DpkgRow,
  groups: ReadonlyArray<OrGroup>,
  allowed: ReadonlySet<string> | undefined
): ReadonlyArray<string> => {
  const resolved: Array<string> = []
  for (const group of groups) {
    for (const alternative of group) {
      const candidates = (installed.providers.get(alternative.name) ?? [])
        .filter((identifier) => allowed === undefined || allowed.has(identifier))
        .flatMap((identifier) => {
          const row = installed.rows.get(identifier)
          return row !== undefined && architectureMatches(alternative, dependent, row) ? [row] : []
        })
        .toSorted((left, right) => {
          const rank = (row: DpkgRow): number =>
            (row.name === alternative.name ? 0 : 2) +
            (row.architecture === dependent.architecture || row.architecture === "all" ? 0 : 1)
          return rank(left) - rank(right) || compareIdentifiers(dpkgIdentifier(left), dpkgIdentifier(right))
        })
      const [chosen] = candidates
      if (chosen !== undefined) {
        const identifier = dpkgIdentifier(chosen)
        if (!resolved.includes(identifier)) {
          resolved.push(identifier)
        }
        break
      }
    }
  }
  return resolved
}

export interface AptTiers {
  readonly base: ReadonlySet<string>
  readonly ahistoricalLibs: ReadonlySet<string>
  readonly user: ReadonlySet<string>
  readonly upper: ReadonlySet<string>
}

const isManual = (manual: ReadonlySet<string>, row: DpkgRow): boolean =>
  manual.has(dpkgIdentifier(row)) || manual.has(row.name)

/**
 * Split installed packages into the base system and the user's packages.
 *
 * The base system is everything reachable from required, important and
 * standard packages or task packages. History refines the split: packages
 * the installer touched leave the user set, packages APT installed as
 * automatic leave the upper tier, and libraries count as upper only when
 * history shows them installed on request.
 *
 * @pure true
 * @invariant upper ⊆ user; user ∩ (base ∪ history.system) = ∅
 * @complexity O(n · (n + e))
 */
export const classifyApt = (
  rows: ReadonlyArray<DpkgRow>,
  manual: ReadonlySet<string>,
  history: HistoryMarks = emptyHistory
): AptTiers => {
  const installed = indexInstalled(rows)
  const systemEdges: Neighbors = (identifier) => {
    const row = installed.rows.get(identifier)
    if (row === undefined) {
      return []
    }
    return resolveGroups(installed, row, [...row.depends, ...row.preDepends, ...row.recommends], undefined)
  }
  const base = new Set<string>()
  const ahistoricalLibs = new Set<string>()
  for (const [identifier, row] of installed.rows) {
    if (baselinePriorities.has(row.priority) || sectionIs(row.section, "tasks")) {
      for (const member of reachable(identifier, systemEdges)) {
        base.add(member)
      }
    } else if (sectionIs(row.section, "libs") && !history.manual.has(identifier)) {
      ahistoricalLibs.add(identifier)
    }
  }
  const user = new Set(
    [...installed.rows.keys()].filter((identifier) => !base.has(identifier) && !history.system.has(identifier))
  )
  const upper = new Set(
    [...user].filter((identifier) => {
      const row = installed.rows.get(identifier)
      return row !== undefined &&
        isManual(manual, row) &&
        !ahistoricalLibs.has(identifier) &&
        !history.automatic.has(identifier)
    })
  )
  return { base, ahistoricalLibs, user, upper }
}

/**
 * Build registry input for the user's packages.
 *
 * @param rows - Parsed dpkg-query output.
 * @param manual - Names or identifiers marked as manually installed.
 * @param history - Marks replayed from the APT history logs.
 * @returns Inputs sorted by identifier; sizes converted from KiB to bytes.
 *
 * @pure true
 * @invariant requires = Depends + Pre-Depends, advises = Recommends
 * @complexity O(n · (n + e))
 */
export const aptInputs = (
  rows: ReadonlyArray<DpkgRow>,
  manual: ReadonlySet<string>,
  history: HistoryMarks = emptyHistory
): ReadonlyArray<PackageInput> => {
  const installed = indexInstalled(rows)
  const tiers = classifyApt(rows, manual, history)
  return [...tiers.user].toSorted(compareIdentifiers).flatMap((identifier) => {
    const row = installed.rows.get(identifier)
    if (row === undefined) {
      return []
    }
    const tier: Tier = tiers.upper.has(identifier) ? "upper" : "lower"
    const resolve = (groups: ReadonlyArray<OrGroup>): ReadonlyArray<string> =>
      resolveGroups(installed, row, groups, tiers.user)
    return [{
      identifier,
      tier,
      installedBytes: row.installedKib * 1024,
      name: row.name,
      description: row.summary.length > 0 ? row.summary : undefined,
      category: row.section.length > 0 ? row.section : undefined,
      requires: [...new Set([...resolve(row.depends), ...resolve(row.preDepends)])],
      advises: resolve(row.recommends),
      suggests: resolve(row.suggests),
      enhances: resolve(row.enhances)
    }]
  })
}
