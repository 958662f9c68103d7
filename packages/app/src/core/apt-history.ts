// CHANGE: replay APT history logs into manual, automatic and system install marks
// FORMAT THEOREM: ∀id: id ∈ manual ↔ the last requested operation on id installed it without `automatic`
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: logs are folded oldest first; system marks are never withdrawn
// COMPLEXITY: O(n) where n = log size

export interface HistoryMarks {
  readonly manual: ReadonlySet<string>
  readonly automatic: ReadonlySet<string>
  readonly system: ReadonlySet<string>
}

export const emptyHistory: HistoryMarks = {
  manual: new Set<string>(),
  automatic: new Set<string>(),
  system: new Set<string>()
}

export interface HistoryEntry {
  readonly identifier: string
  readonly automatic: boolean
}

export type HistorySection = ReadonlyMap<string, string>

type Operation = "Install" | "Remove" | "Purge"

const operations: ReadonlyArray<Operation> = ["Install", "Remove", "Purge"]

const entryPattern = /([^:]*):([^ ]*) \(([^)]*)\),? ?/gu

/**
 * Split a log into `Key: value` sections separated by blank lines.
 *
 * Lines starting with whitespace continue the previous field.
 *
 * @pure true
 * @invariant empty sections are dropped
 * @complexity O(n)
 */
export const parseHistorySections = (text: string): ReadonlyArray<HistorySection> => {
  const sections: Array<HistorySection> = []
  let current = new Map<string, string>()
  let lastKey: string | undefined
  const flush = (): void => {
    if (current.size > 0) {
      sections.push(current)
    }
    current = new Map<string, string>()
    lastKey = undefined
  }
  for (const line of text.split("\n")) {
    if (line.trim().length === 0) {
      flush()
      continue
    }
    if (/^\s/u.test(line)) {
      if (lastKey !== undefined) {
        current.set(lastKey, `${current.get(lastKey) ?? ""} ${line.trim()}`)
      }
      continue
    }
    const separator = line.indexOf(":")
    if (separator === -1) {
      continue
    }
    lastKey = line.slice(0, separator).trim()
    current.set(lastKey, line.slice(separator + 1).trim())
  }
  flush()
  return sections
}

/**
 * Parse an operation field such as `vim:amd64 (2:9.0-1), libx:amd64 (1.2, automatic)`.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseHistoryEntries = (value: string): ReadonlyArray<HistoryEntry> =>
  [...value.trim().matchAll(entryPattern)].flatMap((match) => {
    const [, name = "", architecture = "", details = ""] = match
    if (name.length === 0) {
      return []
    }
    return [{ identifier: `${name}:${architecture}`, automatic: details.endsWith("automatic") }]
  })

interface MutableMarks {
  readonly manual: Set<string>
  readonly automatic: Set<string>
  readonly system: Set<string>
}

const applySection = (marks: MutableMarks, section: HistorySection): void => {
  const requested = section.has("Requested-By")
  for (const operation of operations) {
    const value = section.get(operation)
    if (value === undefined) {
      continue
    }
    for (const entry of parseHistoryEntries(value)) {
      if (!requested) {
        marks.system.add(entry.identifier)
        continue
      }
      const target = entry.automatic ? marks.automatic : marks.manual
      if (operation === "Install") {
        target.add(entry.identifier)
      } else {
        target.delete(entry.identifier)
      }
    }
  }
}

/**
 * Fold history logs into install marks.
 *
 * Sections without `Requested-By` come from the installer or unattended runs
 * and mark every package they touch as part of the system.
 *
 * @param logs - Log contents, oldest first.
 * @returns Marks keyed by `name:arch`.
 *
 * @pure true
 * @invariant manual ∩ automatic may be non-empty; callers decide precedence
 * @complexity O(n)
 */
export const replayHistory = (logs: ReadonlyArray<string>): HistoryMarks => {
  const marks: MutableMarks = { manual: new Set(), automatic: new Set(), system: new Set() }
  for (const log of logs) {
    for (const section of parseHistorySections(log)) {
      applySection(marks, section)
    }
  }
  return marks
}

/**
 * Read one variable from `apt-config shell NAME Key/f` output, e.g. `HISTORY='/var/log/apt/history.log'`.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseAptConfigShell = (output: string, variable: string): string | undefined => {
  const pattern = new RegExp(`^${variable}='(.*)'$`, "u")
  for (const line of output.split("\n")) {
    const value = pattern.exec(line.trim())?.[1]
    if (value !== undefined) {
      return value.replaceAll("'\\''", "'")
    }
  }
  return undefined
}

/**
 * Rotated logs share the stem of the active log: `history.log`, `history.log.1.gz`, ...
 *
 * @pure true
 * @complexity O(n)
 */
export const isHistoryLog = (fileName: string, activeLog: string): boolean => {
  const stem = activeLog.split(".")[0] ?? activeLog
  return stem.length > 0 && fileName.startsWith(stem)
}
