import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"

import type { PackageInput } from "./package.js"

// CHANGE: decode portable package snapshots into registry input
// FORMAT THEOREM: ∀s: decodeSnapshot(s) = Right(xs) → ∀x ∈ xs: x.installedBytes ∈ ℕ
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: package order of the file is preserved
// COMPLEXITY: O(n)

const Identifiers = S.Array(S.String)

export const SnapshotPackageSchema = S.Struct({
  identifier: S.String.pipe(S.minLength(1)),
  tier: S.Literal("upper", "lower"),
  installedBytes: S.Number.pipe(S.int(), S.nonNegative()),
  requires: S.optional(Identifiers),
  advises: S.optional(Identifiers),
  suggests: S.optional(Identifiers),
  supplements: S.optional(Identifiers),
  enhances: S.optional(Identifiers),
  name: S.optional(S.String),
  description: S.optional(S.String),
  category: S.optional(S.String),
  variety: S.optional(S.String),
  installation: S.optional(S.String)
})

export const SnapshotSchema = S.Struct({
  packages: S.Array(SnapshotPackageSchema)
})

export type Snapshot = S.Schema.Type<typeof SnapshotSchema>

const decodeJson = S.decodeUnknownEither(S.parseJson(SnapshotSchema))

/**
 * Decode snapshot JSON text.
 *
 * @returns Inputs in file order, or the formatted schema failure.
 *
 * @pure true
 * @invariant duplicate identifiers are left for the registry to reject
 * @complexity O(n)
 */
export const decodeSnapshot = (raw: string): Either.Either<ReadonlyArray<PackageInput>, string> =>
  decodeJson(raw).pipe(
    Either.map((snapshot) => snapshot.packages),
    Either.mapLeft((error) => TreeFormatter.formatErrorSync(error))
  )
