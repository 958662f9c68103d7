import { Match } from "effect"

import type { CliError } from "./cli.js"
import type { Tier } from "./package.js"

// CHANGE: unify error algebra for the package footprint tool
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique; registry errors carry identifier and operation
// COMPLEXITY: O(1)/O(1)

export type RegistryOperation = "get" | "set" | "remove" | "move"

export type PackageNotFound = {
  readonly _tag: "PackageNotFound"
  readonly identifier: string
  readonly operation: RegistryOperation
}
export type DuplicatePackage = {
  readonly _tag: "DuplicatePackage"
  readonly identifier: string
  readonly tier: Tier
}
export type RegistryError = PackageNotFound | DuplicatePackage

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type SnapshotError = { readonly _tag: "SnapshotError"; readonly file: string; readonly error: string }
export type CommandFailed = {
  readonly _tag: "CommandFailed"
  readonly command: string
  readonly message: string
}
export type CandidateNotFound = {
  readonly _tag: "CandidateNotFound"
  readonly query: string
  readonly closest: string | undefined
  readonly matches: ReadonlyArray<string>
}

export type AppError =
  | CliError
  | RegistryError
  | ConfigError
  | FileError
  | SnapshotError
  | CommandFailed
  | CandidateNotFound

export const packageNotFound = (identifier: string, operation: RegistryOperation): PackageNotFound => ({
  _tag: "PackageNotFound",
  identifier,
  operation
})

export const duplicatePackage = (identifier: string, tier: Tier): DuplicatePackage => ({
  _tag: "DuplicatePackage",
  identifier,
  tier
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const snapshotError = (file: string, error: string): SnapshotError => ({
  _tag: "SnapshotError",
  file,
  error
})

export const commandFailed = (command: string, message: string): CommandFailed => ({
  _tag: "CommandFailed",
  command,
  message
})

export const candidateNotFound = (
  query: string,
  closest: string | undefined,
  matches: ReadonlyArray<string>
): CandidateNotFound => ({
  _tag: "CandidateNotFound",
  query,
  closest,
  matches
})

const renderCandidate = (error: CandidateNotFound): string => {
  const hint = error.closest === undefined ? `No package matches "${error.query}"` : `Did you mean "${error.closest}"?`
  if (error.matches.length === 0) {
    return hint
  }
  return [hint, `Packages that start with "${error.query}":`, ...error.matches.map((match) => `  - ${match}`)]
    .join("\n")
}

/**
 * Render an AppError as a user-facing message.
 *
 * @pure true
 * @invariant every tag yields a non-empty message
 * @complexity O(n) where n = candidate matches
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => value.message),
    Match.tag("PackageNotFound", (value) => `${value.operation}: package not found: ${value.identifier}`),
    Match.tag("DuplicatePackage", (value) => `put: package already registered: ${value.identifier} (${value.tier})`),
    Match.tag("ConfigError", (value) => `Invalid config: ${value.message}`),
    Match.tag("FileError", (value) => value.message),
    Match.tag("SnapshotError", (value) => `Invalid snapshot ${value.file}: ${value.error}`),
    Match.tag("CommandFailed", (value) => `${value.command}: ${value.message}`),
    Match.tag("CandidateNotFound", renderCandidate),
    Match.exhaustive
  )

/**
 * Process exit code for a failed run: 2 for usage errors, 1 otherwise.
 *
 * @pure true
 * @complexity O(1)
 */
export const exitCodeFor = (error: AppError): number => error._tag === "CliError" ? 2 : 1
