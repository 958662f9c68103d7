import { Match } from "effect"
import * as Option from "effect/Option"

import type { CostRatios, PackageRecord, Tier } from "./package.js"
import { compareIdentifiers, costRatios, displayName, totalAttributedBytes, totalPseudobytes } from "./package.js"
import type { PackageRegistry } from "./registry.js"
import { rangeOf, rescale } from "./scale.js"
import { bytesToHumanSi } from "./units.js"

// CHANGE: render the bar graph and JSON views of a finished registry
// FORMAT THEOREM: ∀row: |bar(row)| = barWidth
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: rows are ordered by totalAttributedBytes descending, identifier ascending
// COMPLEXITY: O(n log n)

export type BarLegend = "packages" | "applications"

export interface BarSettings {
  readonly barWidth: number
  readonly legend: BarLegend
}

export const barCharacters = {
  installed: "█",
  mandatory: "▓",
  optional: "░"
} as const

const notableThreshold = 0.33

const legendLines = (legend: BarLegend): ReadonlyArray<string> =>
  Match.value(legend).pipe(
    Match.when("packages", () => [
      `${barCharacters.installed} size of the explicitly user-installed package`,
      `${barCharacters.mandatory} sum of size per share count over all implicit recursive requirements`,
      `${barCharacters.optional} sum of size per share count over all other implicit recursive requirements ` +
      "and recommendations"
    ]),
    Match.when("applications", () => [
      `${barCharacters.installed} application size`,
      `${barCharacters.mandatory} runtime size per share count`,
      `${barCharacters.optional} sum of size per share count over all recursive extensions`
    ]),
    Match.exhaustive
  )

const byTotalDescending = (left: PackageRecord, right: PackageRecord): number =>
  totalAttributedBytes(right) - totalAttributedBytes(left) || compareIdentifiers(left.identifier, right.identifier)

interface Segments {
  readonly installed: number
  readonly mandatory: number
  readonly optional: number
}

/**
 * Split a bar length by the cost ratios; the largest ratio absorbs rounding.
 *
 * @pure true
 * @invariant installed + mandatory + optional = round(length)
 * @complexity O(1)
 */
export const splitBar = (length: number, ratios: CostRatios): Segments => {
  const parts = [ratios.installed, ratios.mandatory, ratios.optional]
  const rounded = parts.map((ratio) => Math.round(length * ratio))
  const largest = parts.indexOf(Math.max(...parts))
  const drift = Math.round(length) - rounded.reduce((left, right) => left + right, 0)
  const adjusted = rounded.map((value, index) => index === largest ? value + drift : value)
  return { installed: adjusted[0] ?? 0, mandatory: adjusted[1] ?? 0, optional: adjusted[2] ?? 0 }
}

const formatRatios = (ratios: Option.Option<CostRatios>): string =>
  Option.match(ratios, {
    onNone: () => "NaN NaN NaN",
    onSome: (value) => [value.installed, value.mandatory, value.optional].map((ratio) => ratio.toFixed(1)).join(" ")
  })

const advisedShare = (record: PackageRecord): number =>
  record.installedBytes / Math.max(1, record.claimantCount ?? 1)

/**
 * The most expensive advised lower-tier package, shown when optional cost dominates.
 *
 * @pure true
 * @invariant empty unless the optional ratio exceeds one third
 * @complexity O(a log a)
 */
export const notableAdvice = (registry: PackageRegistry, record: PackageRecord): string => {
  const optional = Option.match(costRatios(record), { onNone: () => 0, onSome: (ratios) => ratios.optional })
  if (optional <= notableThreshold) {
    return ""
  }
  const isLower = (identifier: string): boolean => Option.contains(registry.tierOf(identifier), "lower")
  const candidates = record.advises
    .filter(isLower)
    .flatMap((identifier) => Option.toArray(registry.lookup(identifier)))
    .toSorted((left, right) =>
      advisedShare(right) - advisedShare(left) || compareIdentifiers(left.identifier, right.identifier)
    )
  const [first] = candidates
  if (first === undefined) {
    return ""
  }
  const more = [...record.recursiveComplements].filter(isLower).length > 1 ? "..." : ""
  return ` -> ${displayName(first)}${more}`
}

/**
 * Render one bar per upper-tier package, preceded by a legend.
 *
 * @param registry - Registry after attribution.
 * @param settings - Bar width and legend flavour.
 * @returns Lines without trailing newlines.
 *
 * @pure true
 * @invariant one row per upper-tier package
 * @complexity O(n log n)
 */
export const renderBarGraph = (registry: PackageRegistry, settings: BarSettings): ReadonlyArray<string> => {
  const width = settings.barWidth
  const ordered = registry.records("upper").toSorted(byTotalDescending)
  const range = rangeOf(ordered.map(totalAttributedBytes))
  const rows = ordered.map((record) => {
    const total = totalAttributedBytes(record)
    const shortest = range === undefined || range.max <= 0 ? 0 : Math.round((range.min * width) / range.max)
    const length = range === undefined ? 0 : rescale(total, range, shortest, width)
    const ratios = costRatios(record)
    const segments = Option.match(ratios, {
      onNone: () => ({ installed: 0, mandatory: 0, optional: 0 }),
      onSome: (value) => splitBar(length, value)
    })
    const filled = barCharacters.installed.repeat(Math.max(0, segments.installed)) +
      barCharacters.mandatory.repeat(Math.max(0, segments.mandatory)) +
      barCharacters.optional.repeat(Math.max(0, segments.optional))
    const bar = filled.padEnd(width, " ")
    const [value = "", unit = ""] = bytesToHumanSi(Math.trunc(total)).split(" ")
    return `${value.padStart(4)} ${unit.padEnd(2)} ${formatRatios(ratios)} [${bar}] ${displayName(record)}${
      notableAdvice(registry, record)
    }`
  })
  return [...legendLines(settings.legend), "", ...rows]
}

export interface JsonRecord {
  readonly tier: Tier
  readonly identifier: string
  readonly name: string | null
  readonly description: string | null
  readonly category: string | null
  readonly variety: string | null
  readonly installation: string | null
  readonly installedBytes: number
  readonly requires: ReadonlyArray<string>
  readonly advises: ReadonlyArray<string>
  readonly suggests: ReadonlyArray<string>
  readonly supplements: ReadonlyArray<string>
  readonly enhances: ReadonlyArray<string>
  readonly recursiveRequires: ReadonlyArray<string>
  readonly recursiveComplements: ReadonlyArray<string>
  readonly recursiveWhatRequires: ReadonlyArray<string>
  readonly recursiveWhatComplements: ReadonlyArray<string>
  readonly claimantCount: number | null
  readonly mandatoryPseudobytes: number
  readonly optionalPseudobytes: number
  readonly totalPseudobytes: number
  readonly totalAttributedBytes: number
  readonly costRatios: CostRatios | null
}

export const toJsonRecord = (tier: Tier, record: PackageRecord): JsonRecord => ({
  tier,
  identifier: record.identifier,
  name: record.name ?? null,
  description: record.description ?? null,
  category: record.category ?? null,
  variety: record.variety ?? null,
  installation: record.installation ?? null,
  installedBytes: record.installedBytes,
  requires: record.requires,
  advises: record.advises,
  suggests: record.suggests,
  supplements: record.supplements,
  enhances: record.enhances,
  recursiveRequires: [...record.recursiveRequires],
  recursiveComplements: [...record.recursiveComplements],
  recursiveWhatRequires: [...record.recursiveWhatRequires],
  recursiveWhatComplements: [...record.recursiveWhatComplements],
  claimantCount: record.claimantCount ?? null,
  mandatoryPseudobytes: record.mandatoryPseudobytes,
  optionalPseudobytes: record.optionalPseudobytes,
  totalPseudobytes: totalPseudobytes(record),
  totalAttributedBytes: totalAttributedBytes(record),
  costRatios: Option.getOrNull(costRatios(record))
})

/**
 * Render the registry as JSON text, upper tier first.
 *
 * @pure true
 * @invariant output parses back to `{ packages }` with one entry per package
 * @complexity O(n)
 */
export const renderJsonReport = (registry: PackageRegistry): string =>
  JSON.stringify(
    {
      packages: [
        ...registry.records("upper").map((record) => toJsonRecord("upper", record)),
        ...registry.records("lower").map((record) => toJsonRecord("lower", record))
      ]
    },
    null,
    2
  )
