import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { makeArrowGraph } from "./arrows.js"
import type { CandidateNotFound } from "./errors.js"
import { candidateNotFound } from "./errors.js"
import { distances } from "./graph.js"
import type { PackageRecord } from "./package.js"
import { displayName, totalAttributedBytes } from "./package.js"
import type { PackageRegistry } from "./registry.js"
import { bytesToHumanSi } from "./units.js"

// CHANGE: resolve a package query and list its dependency neighbourhood rank by rank
// FORMAT THEOREM: ∀q: resolveCandidate(q) = Right(id) → id = q ∨ {k : k startsWith q} = {id}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: ranks are separated by exactly one spacer row; even ranks draw arrows left, odd ranks right
// COMPLEXITY: O(V + E) per render, O(n · |q| · |k|) per failed lookup

export const detailsBarWidth = 10

export const detailsMarkers = {
  root: "*",
  mandatory: "R",
  optional: "O"
} as const

/**
 * Levenshtein distance with a two-row table.
 *
 * @pure true
 * @invariant editDistance(a, b) = editDistance(b, a)
 * @complexity O(|a| · |b|)
 */
export const editDistance = (left: string, right: string): number => {
  let previous = Array.from({ length: right.length + 1 }, (_, index) => index)
  for (let row = 1; row <= left.length; row += 1) {
    const current = [row]
    for (let column = 1; column <= right.length; column += 1) {
      const substitution = (previous[column - 1] ?? 0) + (left[row - 1] === right[column - 1] ? 0 : 1)
      const deletion = (previous[column] ?? 0) + 1
      const insertion = (current[column - 1] ?? 0) + 1
      current.push(Math.min(substitution, deletion, insertion))
    }
    previous = current
  }
  return previous[right.length] ?? 0
}

const closestIdentifier = (identifiers: ReadonlyArray<string>, query: string): string | undefined =>
  identifiers.reduce<{ readonly identifier: string; readonly distance: number } | undefined>((best, identifier) => {
    const distance = editDistance(query, identifier)
    return best === undefined || distance < best.distance ? { identifier, distance } : best
  }, undefined)?.identifier

/**
 * Resolve a user query to one identifier: exact match, else unique prefix.
 *
 * @returns The identifier, or CandidateNotFound with the closest identifier and every prefix match.
 *
 * @pure true
 * @invariant matches are sorted
 * @complexity O(n)
 */
export const resolveCandidate = (
  registry: PackageRegistry,
  query: string
): Either.Either<string, CandidateNotFound> => {
  if (registry.has(query)) {
    return Either.right(query)
  }
  const identifiers = registry.identifiers()
  const matches = identifiers.filter((identifier) => identifier.startsWith(query))
  const [only] = matches
  if (only !== undefined && matches.length === 1) {
    return Either.right(only)
  }
  return Either.left(candidateNotFound(query, closestIdentifier(identifiers, query), matches))
}

const neighborhood = (registry: PackageRegistry) => (identifier: string): ReadonlyArray<string> =>
  Option.match(registry.lookup(identifier), {
    onNone: () => [],
    onSome: (record) => [...record.requires, ...record.advises].filter((target) => registry.has(target))
  })

const sizeBar = (installedBytes: number, largest: number): string => {
  const filled = largest > 0 ? Math.round((installedBytes / largest) * detailsBarWidth) : 0
  return "╴".repeat(detailsBarWidth - filled) + "━".repeat(filled)
}

const markerFor = (root: PackageRecord, identifier: string): string => {
  if (identifier === root.identifier) {
    return detailsMarkers.root
  }
  return root.recursiveRequires.has(identifier) ? detailsMarkers.mandatory : detailsMarkers.optional
}

const joinColumns = (parts: ReadonlyArray<string>): string =>
  parts.filter((part) => part.length > 0).join(" ").trimEnd()

/**
 * List the package and everything it requires or advises, one rank per hop.
 *
 * Arrows from packages of even rank are drawn left of the names, arrows from
 * odd ranks to the right, so consecutive ranks never share a column.
 *
 * @param registry - Registry after attribution.
 * @param identifier - A resolved identifier.
 * @returns Lines without trailing newlines.
 *
 * @pure true
 * @invariant the first line holds the package itself
 * @complexity O(V · (V + E))
 */
export const renderDetails = (registry: PackageRegistry, identifier: string): ReadonlyArray<string> =>
  Option.match(registry.lookup(identifier), {
    onNone: () => [],
    onSome: (root) => {
      const ranked = [...distances(identifier, neighborhood(registry))].flatMap(([node, rank]) =>
        Option.toArray(Option.map(registry.lookup(node), (record) => ({ record, rank })))
      )
      const rows: Array<PackageRecord | undefined> = []
      let previousRank = 0
      for (const { rank, record } of ranked) {
        if (rank !== previousRank) {
          rows.push(undefined)
          previousRank = rank
        }
        rows.push(record)
      }
      const nodes = rows.map((record) => record?.identifier ?? "")
      const even = makeArrowGraph(nodes)
      const odd = makeArrowGraph(nodes)
      for (const { rank, record } of ranked) {
        const graph = rank % 2 === 0 ? even : odd
        graph.arrow(record.identifier, record.requires, { compact: true, allowCrossing: true })
        graph.arrow(record.identifier, record.advises, { compact: true, allowCrossing: true })
      }
      const leftArrows = even.render()
      const rightArrows = odd.render(true)
      const nameWidth = ranked.reduce((width, entry) => Math.max(width, displayName(entry.record).length), 0)
      const largest = ranked.reduce((size, entry) => Math.max(size, entry.record.installedBytes), 0)
      const lines = rows.map((record, index) => {
        const text = record === undefined
          ? " ".repeat(2 + nameWidth + 1 + detailsBarWidth)
          : `${markerFor(root, record.identifier)} ${displayName(record).padEnd(nameWidth)} ${
            sizeBar(record.installedBytes, largest)
          }`
        return joinColumns([leftArrows[index] ?? "", text, rightArrows[index] ?? ""])
      })
      return [
        ...lines,
        "",
        `${root.recursiveRequires.size} required, ${root.recursiveComplements.size} complementary, ${
          bytesToHumanSi(Math.trunc(totalAttributedBytes(root)))
        } attributed`
      ]
    }
  })
