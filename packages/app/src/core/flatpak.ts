import * as Either from "effect/Either"

import type { PackageInput, Tier } from "./package.js"
import { humanToBytes } from "./units.js"

// CHANGE: turn `flatpak list` rows and installed metadata into registry input
// FORMAT THEOREM: ∀row: row.runtime ≠ "" ↔ tier(row) = "upper" ∧ requires(row) = [row.runtime]
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: hidden extensions end with zero bytes once folded into a parent
// COMPLEXITY: O(n · p) where p = extension points per ref

export const flatpakColumns = [
  "ref",
  "name",
  "runtime",
  "branch",
  "size",
  "installation",
  "active",
  "description"
] as const

export type FlatpakVariety = "app" | "runtime" | "runtime/extension" | "runtime/extension/hidden"

export interface FlatpakRow {
  readonly ref: string
  readonly name: string
  readonly runtime: string
  readonly branch: string
  readonly size: string
  readonly installation: string
  readonly active: string
  readonly description: string
}

export interface ExtensionPoint {
  readonly name: string
  readonly versions: ReadonlyArray<string>
}

const hiddenExtension = /\.(?:Locale|Debug)\/[^/]*\/[^/]*$/u

export const flatpakLabel = (name: string, branch: string): string =>
  name.endsWith(branch) || branch.startsWith("stable") ? name : `${name} ${branch}`

/**
 * Split tab-separated `flatpak list --columns=...` output; missing cells become "".
 *
 * @pure true
 * @invariant blank lines are skipped
 * @complexity O(n)
 */
export const parseFlatpakList = (output: string): ReadonlyArray<FlatpakRow> =>
  output
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line) => {
      const [ref = "", name = "", runtime = "", branch = "", size = "", installation = "", ...rest] = line.split("\t")
      const [active = "", description = ""] = rest
      return { ref, name, runtime, branch, size, installation, active, description }
    })

export interface InstallationDirs {
  readonly user: string
  readonly system: string
}

/**
 * Base directory of an installation named in the `installation` column.
 *
 * @pure true
 * @invariant "user" maps to the per-user directory, anything else to the system one
 * @complexity O(1)
 */
export const installationBase = (installation: string, dirs: InstallationDirs): string =>
  installation === "user" ? dirs.user : dirs.system

export const initialVariety = (row: FlatpakRow): FlatpakVariety => {
  if (row.runtime.length > 0) {
    return "app"
  }
  return hiddenExtension.test(row.ref) ? "runtime/extension/hidden" : "runtime"
}

/**
 * Directory name under the installation base holding a ref's deploy.
 *
 * @pure true
 * @complexity O(1)
 */
export const metadataKind = (variety: FlatpakVariety): "app" | "runtime" => variety === "app" ? "app" : "runtime"

/**
 * Read `[Extension name@tag]` sections from a metadata key file.
 *
 * Without `version`/`versions` an extension point follows the branch of `ref`.
 *
 * @pure true
 * @invariant versions contain no empty strings
 * @complexity O(n)
 */
export const parseExtensionPoints = (metadata: string, ref: string): ReadonlyArray<ExtensionPoint> => {
  const branch = ref.replace(/.*\//u, "")
  const points: Array<{ readonly name: string; readonly keys: Map<string, string> }> = []
  let current: Map<string, string> | undefined
  for (const rawLine of metadata.split("\n")) {
    const line = rawLine.trim()
    if (line.length === 0 || line.startsWith("#")) {
      continue
    }
    const section = /^\[(.*)\]$/u.exec(line)
    if (section !== null) {
      const extension = /^Extension ([^@]*)@?.*$/u.exec(section[1] ?? "")
      current = extension === null ? undefined : new Map<string, string>()
      if (extension !== null && current !== undefined) {
        points.push({ name: extension[1] ?? "", keys: current })
      }
      continue
    }
    const separator = line.indexOf("=")
    if (current !== undefined && separator > 0) {
      current.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim())
    }
  }
  return points.map(({ keys, name }) => {
    const versions = (keys.get("versions") ?? "").split(";")
    const version = keys.get("version") ?? ""
    const listed = versions.includes(version) ? versions : [...versions, version]
    return { name, versions: [...listed, branch].filter((value) => value.length > 0) }
  })
}

/**
 * Refs providing the given extension points, in point order then ref order.
 *
 * @pure true
 * @invariant every result is `<id>/<arch>/<version>` with version listed by its point
 * @complexity O(p · n)
 */
export const resolveExtensionPoints = (
  points: ReadonlyArray<ExtensionPoint>,
  refs: ReadonlyArray<string>
): ReadonlyArray<string> =>
  points.flatMap((point) => {
    const candidates = new Map<string, Array<string>>()
    for (const ref of refs) {
      if (!ref.startsWith(`${point.name}.`) && !ref.startsWith(`${point.name}/`)) {
        continue
      }
      const cut = ref.lastIndexOf("/")
      const idArch = ref.slice(0, cut)
      const version = ref.slice(cut + 1)
      const versions = candidates.get(idArch)
      if (versions === undefined) {
        candidates.set(idArch, [version])
      } else {
        versions.push(version)
      }
    }
    return [...candidates.entries()].flatMap(([idArch, versions]) =>
      point.versions.filter((version) => versions.includes(version)).map((version) => `${idArch}/${version}`)
    )
  })

interface Entry {
  readonly row: FlatpakRow
  readonly tier: Tier
  variety: FlatpakVariety
  installedBytes: number
  readonly advises: Array<string>
}

/**
 * Build registry input from list rows and each ref's extension points.
 *
 * Hidden extensions (`.Locale`, `.Debug`) fold their bytes into the first
 * parent that declares them; other extensions become `advises` edges.
 *
 * @param rows - Parsed list output.
 * @param pointsOf - Extension points per ref, keyed by ref.
 * @returns Inputs in list order, or a message for an unreadable size.
 *
 * @pure true
 * @invariant Σ installedBytes is unchanged by folding
 * @complexity O(n · p)
 */
export const flatpakInputs = (
  rows: ReadonlyArray<FlatpakRow>,
  pointsOf: ReadonlyMap<string, ReadonlyArray<ExtensionPoint>>
): Either.Either<ReadonlyArray<PackageInput>, string> => {
  const entries = new Map<string, Entry>()
  for (const row of rows) {
    const size = humanToBytes(row.size)
    if (Either.isLeft(size)) {
      return Either.left(`${row.ref}: ${size.left}`)
    }
    const variety = initialVariety(row)
    entries.set(row.ref, {
      row,
      tier: variety === "app" ? "upper" : "lower",
      variety,
      installedBytes: size.right,
      advises: []
    })
  }
  const refs = [...entries.keys()]
  for (const [ref, parent] of entries) {
    for (const extensionRef of resolveExtensionPoints(pointsOf.get(ref) ?? [], refs)) {
      const extension = entries.get(extensionRef)
      if (extension === undefined) {
        continue
      }
      if (extension.variety === "runtime/extension/hidden") {
        parent.installedBytes += extension.installedBytes
        extension.installedBytes = 0
      } else {
        parent.advises.push(extensionRef)
        extension.variety = "runtime/extension"
      }
    }
  }
  return Either.right(
    [...entries.values()].map((entry) => ({
      identifier: entry.row.ref,
      tier: entry.tier,
      installedBytes: entry.installedBytes,
      requires: entry.row.runtime.length > 0 ? [entry.row.runtime] : [],
      advises: entry.advises,
      name: flatpakLabel(entry.row.name, entry.row.branch),
      description: entry.row.description.length > 0 ? entry.row.description : undefined,
      variety: entry.variety,
      installation: entry.row.installation.length > 0 ? entry.row.installation : undefined
    }))
  )
}
