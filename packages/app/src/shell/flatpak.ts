import type { CommandExecutor } from "@effect/platform/CommandExecutor"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import type { Path as PathService } from "@effect/platform/Path"
import { Path } from "@effect/platform/Path"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { homedir } from "node:os"

import type { AppError } from "../core/errors.js"
import { commandFailed, fileError } from "../core/errors.js"
import type { ExtensionPoint, FlatpakRow, InstallationDirs } from "../core/flatpak.js"
import {
  flatpakColumns,
  flatpakInputs,
  initialVariety,
  installationBase,
  metadataKind,
  parseExtensionPoints,
  parseFlatpakList
} from "../core/flatpak.js"
import type { PackageInput } from "../core/package.js"
import { captureCommand } from "./command.js"

// CHANGE: collect Flatpak apps and runtimes with their extension points
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<PackageInput>, AppError, CommandExecutor | FileSystem | Path>
// INVARIANT: a ref without a readable metadata file has no extension points

type FlatpakEnv = CommandExecutor | FileSystemService | PathService

const installationDirs: Effect.Effect<InstallationDirs, never, PathService> = Effect.gen(function*(_) {
  const path = yield* _(Path)
  const env = yield* _(Effect.sync(() => process.env))
  const home = yield* _(Effect.sync(() => homedir()))
  return {
    user: env["FLATPAK_USER_DIR"] ?? path.join(home, ".local", "share", "flatpak"),
    system: env["FLATPAK_SYSTEM_DIR"] ?? path.join("/", "var", "lib", "flatpak")
  }
})

const readExtensionPoints = (
  row: FlatpakRow,
  dirs: InstallationDirs
): Effect.Effect<ReadonlyArray<ExtensionPoint>, AppError, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const file = path.join(
      installationBase(row.installation, dirs),
      metadataKind(initialVariety(row)),
      row.ref,
      "active",
      "metadata"
    )
    const exists = yield* _(fs.exists(file).pipe(Effect.mapError((error) => fileError(String(error)))))
    if (!exists) {
      yield* _(Effect.logDebug("no metadata").pipe(Effect.annotateLogs("ref", row.ref)))
      return []
    }
    const contents = yield* _(fs.readFileString(file).pipe(Effect.mapError((error) => fileError(String(error)))))
    return parseExtensionPoints(contents, row.ref)
  })

export const collectFlatpak: Effect.Effect<ReadonlyArray<PackageInput>, AppError, FlatpakEnv> = Effect.gen(
  function*(_) {
    const listing = yield* _(captureCommand("flatpak", ["list", "--all", `--columns=${flatpakColumns.join(",")}`]))
    const rows = parseFlatpakList(listing)
    const dirs = yield* _(installationDirs)
    const points = yield* _(
      Effect.forEach(rows, (row) => Effect.map(readExtensionPoints(row, dirs), (found) => [row.ref, found] as const))
    )
    const inputs = flatpakInputs(rows, new Map(points))
    if (Either.isLeft(inputs)) {
      return yield* _(Effect.fail(commandFailed("flatpak list", inputs.left)))
    }
    return inputs.right
  }
)
