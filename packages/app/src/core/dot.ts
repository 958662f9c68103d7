import * as Option from "effect/Option"

import type { PackageRecord } from "./package.js"
import { compareIdentifiers, costRatios, displayName, totalAttributedBytes } from "./package.js"
import type { PackageRegistry } from "./registry.js"
import { clamp, rangeOf, rescale } from "./scale.js"

// CHANGE: render the abstracted dependency graph as Graphviz DOT
// FORMAT THEOREM: ∀r1,r2: content(r1) = content(r2) → renderDot(r1) = renderDot(r2)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: node and edge statements are emitted sorted
// COMPLEXITY: O(n log n)

/** Text already in DOT escString form; `\n` and `\l` inside it are line breaks. */
export interface DotEscString {
  readonly _tag: "DotEscString"
  readonly text: string
}

export type DotValue = string | number | boolean | DotEscString

export type DotAttributes = ReadonlyArray<readonly [string, DotValue]>

export interface DotSettings {
  readonly cutOff: number
}

const graphOptions: ReadonlyArray<string> = [
  "overlap=prism",
  "overlap_scaling=-6",
  "smoothing=rng",
  "splines=true",
  "esep=\"+10\"",
  "start=1",
  "tooltip=\" \"",
  "node [fontname=Cantarell]"
]

export const palette = {
  upper: "#b08a58",
  upperFill: "#e6cfaea0",
  requires: "#2080a0a0",
  requiresEdge: "#2080a080",
  advises: "#5c9a70",
  advisesFill: "#a8cdb060"
} as const

const escapeDot = (value: string): string => value.replaceAll("\\", "\\\\").replaceAll("\"", "\\\"")

const quote = (value: string): string => `"${escapeDot(value)}"`

/**
 * Escape each line and join them with a DOT line break.
 *
 * @pure true
 * @invariant backslashes in `lines` never reach the output unescaped
 * @complexity O(n)
 */
export const escLines = (
  lines: ReadonlyArray<string>,
  separator: "\\n" | "\\l",
  trailing = false
): DotEscString => ({
  _tag: "DotEscString",
  text: lines.map(escapeDot).join(separator) + (trailing ? separator : "")
})

const formatValue = (value: DotValue): string =>
  typeof value === "object" ? `"${value.text}"` : quote(String(value))

export const formatAttributes = (attributes: DotAttributes): string =>
  attributes.map(([key, value]) => `${key}=${formatValue(value)}`).join(",")

export const nodeStatement = (identifier: string, attributes: DotAttributes): string =>
  `${quote(identifier)} [${formatAttributes(attributes)}]`

export const edgeStatement = (tail: string, head: string, attributes: DotAttributes): string =>
  `${quote(tail)} -> ${quote(head)} [${formatAttributes(attributes)}]`

const parseHex = (color: string): ReadonlyArray<number> => {
  const digits = color.replace(/^#/u, "")
  const channels: Array<number> = []
  for (let index = 0; index < digits.length; index += 2) {
    channels.push(Number.parseInt(digits.slice(index, index + 2), 16))
  }
  return channels.length === 3 ? [...channels, 255] : channels
}

const toHex = (channel: number): string => Math.round(clamp(channel, 0, 255)).toString(16).padStart(2, "0")

/**
 * Interpolate two #rrggbb[aa] colours channel by channel.
 *
 * @pure true
 * @invariant mixHex(a, b, 0) = a with an explicit alpha channel
 * @complexity O(1)
 */
export const mixHex = (from: string, to: string, t: number): string => {
  const left = parseHex(from)
  const right = parseHex(to)
  const weight = clamp(t)
  const mixed = left.map((channel, index) => channel + ((right[index] ?? channel) - channel) * weight)
  return `#${mixed.map(toHex).join("")}`
}

/**
 * Greedy word wrap; words longer than `width` are split.
 *
 * @pure true
 * @invariant every line has at most `width` characters
 * @complexity O(n)
 */
export const wrapText = (text: string, width: number): ReadonlyArray<string> => {
  const words = text.split(/\s+/u).filter((word) => word.length > 0).flatMap((word) => {
    const chunks: Array<string> = []
    for (let index = 0; index < word.length; index += width) {
      chunks.push(word.slice(index, index + width))
    }
    return chunks
  })
  const lines: Array<string> = []
  let current = ""
  for (const word of words) {
    if (current.length === 0) {
      current = word
    } else if (current.length + 1 + word.length <= width) {
      current = `${current} ${word}`
    } else {
      lines.push(current)
      current = word
    }
  }
  if (current.length > 0) {
    lines.push(current)
  }
  return lines
}

interface Group {
  size: number
  readonly members: Array<string>
}

const addToGroup = (groups: Map<string, Group>, key: string, member: string, size: number): void => {
  const group = groups.get(key)
  if (group === undefined) {
    groups.set(key, { size, members: [member] })
  } else {
    group.size += size
    group.members.push(member)
  }
}

const optionalShare = (record: PackageRecord): number =>
  Option.match(costRatios(record), { onNone: () => 0, onSome: (ratios) => ratios.optional })

/**
 * Render the registry as a DOT digraph.
 *
 * Lower-tier packages are grouped by their set of mandatory upper-tier claimants;
 * groups shared by at least `cutOff` claimants become point nodes.
 *
 * @param registry - Registry after attribution.
 * @param settings - Grouping threshold.
 * @returns DOT source ending with a newline.
 *
 * @pure true
 * @invariant output depends only on registry content
 * @complexity O(n log n)
 */
export const renderDot = (registry: PackageRegistry, settings: DotSettings): string => {
  const nodes: Array<string> = []
  const edges: Array<string> = []
  const connected = new Set<string>()
  const isUpper = (identifier: string): boolean => Option.contains(registry.tierOf(identifier), "upper")
  const upper = registry.records("upper")

  const lowerGroups = new Map<string, Group>()
  for (const record of registry.records("lower")) {
    const key = [...record.recursiveWhatRequires].filter(isUpper).join(",")
    addToGroup(lowerGroups, key, record.identifier, record.installedBytes)
  }
  const shared = [...lowerGroups.entries()].filter(([key]) =>
    key.length > 0 && key.split(",").length >= settings.cutOff
  )
  const lowerRange = rangeOf(shared.map(([, group]) => group.size))
  const upperRange = rangeOf(upper.map(totalAttributedBytes))

  const advisers = new Map<string, Set<string>>()
  for (const record of upper) {
    for (const requirement of record.requires) {
      if (isUpper(requirement)) {
        connected.add(record.identifier)
        connected.add(requirement)
        edges.push(edgeStatement(record.identifier, requirement, [["penwidth", 4], ["color", palette.upper]]))
      }
    }
    for (const advice of record.advises) {
      if (isUpper(advice)) {
        connected.add(record.identifier)
        connected.add(advice)
        edges.push(
          edgeStatement(record.identifier, advice, [
            ["style", "dashed"],
            ["penwidth", 4],
            ["color", palette.advises]
          ])
        )
      } else if (registry.has(advice)) {
        const existing = advisers.get(advice) ?? new Set<string>()
        existing.add(record.identifier)
        advisers.set(advice, existing)
      }
    }
  }

  const adviceGroups = new Map<string, Group>()
  for (const advice of [...advisers.keys()].toSorted(compareIdentifiers)) {
    const key = [...(advisers.get(advice) ?? [])].toSorted(compareIdentifiers).join(",")
    const size = Option.match(registry.lookup(advice), { onNone: () => 0, onSome: (record) => record.installedBytes })
    addToGroup(adviceGroups, key, advice, size)
  }

  for (const [index, [key, group]] of shared.entries()) {
    const groupId = `#${index}`
    nodes.push(
      nodeStatement(groupId, [
        ["shape", "point"],
        ["height", lowerRange === undefined ? 0.2 : rescale(group.size, lowerRange, 0.2, 2)],
        ["fixedsize", true],
        ["color", palette.requires],
        ["tooltip", escLines(group.members.toSorted(compareIdentifiers), "\\n")]
      ])
    )
    for (const claimant of key.split(",")) {
      connected.add(claimant)
      edges.push(
        edgeStatement(claimant, groupId, [["arrowhead", "none"], ["color", palette.requiresEdge], ["penwidth", 1.5]])
      )
    }
  }

  for (const [index, [key, group]] of [...adviceGroups.entries()].entries()) {
    const groupId = `#R${index}`
    const names = [
      ...new Set(group.members.map((member) =>
        Option.match(registry.lookup(member), { onNone: () => member, onSome: displayName })
      ))
    ].toSorted(compareIdentifiers)
    nodes.push(
      nodeStatement(groupId, [
        ["label", escLines(names, "\\l", true)],
        ["tooltip", escLines(group.members.toSorted(compareIdentifiers), "\\n")],
        ["shape", "box"],
        ["fixedsize", false],
        ["style", "rounded,filled"],
        ["penwidth", 2],
        ["color", palette.advises],
        ["fillcolor", palette.advisesFill],
        ["labeljust", "l"]
      ])
    )
    for (const adviser of key.split(",")) {
      connected.add(adviser)
      edges.push(
        edgeStatement(adviser, groupId, [
          ["style", "dashed"],
          ["penwidth", 2],
          ["arrowhead", "none"],
          ["color", palette.advises]
        ])
      )
    }
  }

  const maxOptionalShare = upper.reduce((max, record) => Math.max(max, optionalShare(record)), 0)
  for (const record of upper) {
    if (!connected.has(record.identifier)) {
      continue
    }
    const share = optionalShare(record)
    const t = share > 0 && maxOptionalShare > 0 ? share / maxOptionalShare : 0
    nodes.push(
      nodeStatement(record.identifier, [
        ["label", escLines(wrapText(displayName(record).slice(0, 40), 10), "\\n")],
        ["shape", "circle"],
        ["penwidth", 4],
        ["height", upperRange === undefined ? 1.2 : rescale(totalAttributedBytes(record), upperRange, 1.2, 3)],
        ["fixedsize", true],
        ["color", mixHex(palette.upper, palette.advises, t)],
        ["fillcolor", mixHex(palette.upperFill, palette.advisesFill, t)],
        ["style", "filled"]
      ])
    )
  }

  const statements = [
    ...graphOptions,
    "",
    ...nodes.toSorted(compareIdentifiers),
    "",
    ...edges.toSorted(compareIdentifiers)
  ]
  const body = statements.map((line) => line.length === 0 ? "" : `  ${line}`)
  return ["digraph D {", "", ...body, "", "}", ""].join("\n")
}
