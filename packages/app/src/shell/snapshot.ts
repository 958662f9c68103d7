import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { AppError } from "../core/errors.js"
import { fileError, snapshotError } from "../core/errors.js"
import type { PackageInput } from "../core/package.js"
import { decodeSnapshot } from "../core/snapshot.js"

// CHANGE: read a package snapshot file from disk
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<PackageInput>, AppError, FileSystem>
// INVARIANT: decode failures name the file

export const collectSnapshot = (
  path: string
): Effect.Effect<ReadonlyArray<PackageInput>, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    const decoded = decodeSnapshot(contents)
    if (Either.isLeft(decoded)) {
      return yield* _(Effect.fail(snapshotError(path, decoded.left)))
    }
    yield* _(Effect.logDebug("snapshot decoded").pipe(Effect.annotateLogs({ path, packages: decoded.right.length })))
    return decoded.right
  })
