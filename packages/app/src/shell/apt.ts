import type { CommandExecutor } from "@effect/platform/CommandExecutor"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import type { Path as PathService } from "@effect/platform/Path"
import { Path } from "@effect/platform/Path"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { HistoryMarks } from "../core/apt-history.js"
import { isHistoryLog, parseAptConfigShell, replayHistory } from "../core/apt-history.js"
import { aptInputs, dpkgQueryFormat, parseDpkgQuery, parseManualList } from "../core/dpkg.js"
import type { AppError } from "../core/errors.js"
import { commandFailed, fileError } from "../core/errors.js"
import type { PackageInput } from "../core/package.js"
import { captureCommand } from "./command.js"

// CHANGE: collect Debian packages through dpkg-query, apt-mark and the APT history logs
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<PackageInput>, AppError, CommandExecutor | FileSystem | Path>
// INVARIANT: the package database and the logs are only read

type AptEnv = CommandExecutor | FileSystemService | PathService

const defaultHistoryLog = "/var/log/apt/history.log"

const historyLogPath: Effect.Effect<string, AppError, CommandExecutor> = Effect.map(
  captureCommand("apt-config", ["shell", "HISTORY", "Dir::Log::History/f"]),
  (output) => parseAptConfigShell(output, "HISTORY") ?? defaultHistoryLog
)

interface LogFile {
  readonly file: string
  readonly modified: number
}

const readLog = (file: string): Effect.Effect<string, AppError, CommandExecutor | FileSystemService> =>
  file.endsWith(".gz")
    ? captureCommand("gzip", ["-cd", file])
    : Effect.flatMap(FileSystem, (fs) =>
      fs.readFileString(file).pipe(Effect.mapError((error) => fileError(String(error)))))

/**
 * Read every history log beside the active one, oldest first.
 *
 * @pure false
 * @effect CommandExecutor, FileSystem, Path
 * @invariant a missing log directory yields no logs
 * @complexity O(f log f + total log size)
 */
export const readHistoryLogs = (activeLog: string): Effect.Effect<ReadonlyArray<string>, AppError, AptEnv> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const directory = path.dirname(activeLog)
    const exists = yield* _(fs.exists(directory).pipe(Effect.mapError((error) => fileError(String(error)))))
    if (!exists) {
      yield* _(Effect.logDebug("no apt history").pipe(Effect.annotateLogs("directory", directory)))
      return []
    }
    const names = yield* _(fs.readDirectory(directory).pipe(Effect.mapError((error) => fileError(String(error)))))
    const files = yield* _(
      Effect.forEach(
        names.filter((name) => isHistoryLog(name, path.basename(activeLog))),
        (name): Effect.Effect<LogFile, AppError> => {
          const file = path.join(directory, name)
          return fs.stat(file).pipe(
            Effect.map((info) => ({
              file,
              modified: Option.match(info.mtime, { onNone: () => 0, onSome: (date) => date.getTime() })
            })),
            Effect.mapError((error) => fileError(String(error)))
          )
        }
      )
    )
    const ordered = files.toSorted((left, right) => left.modified - right.modified)
    return yield* _(Effect.forEach(ordered, (log) => readLog(log.file)))
  })

const readHistory: Effect.Effect<HistoryMarks, AppError, AptEnv> = Effect.gen(function*(_) {
  const activeLog = yield* _(historyLogPath)
  const logs = yield* _(readHistoryLogs(activeLog))
  const marks = replayHistory(logs)
  yield* _(
    Effect.logDebug("apt history replayed").pipe(
      Effect.annotateLogs({
        logs: logs.length,
        manual: marks.manual.size,
        automatic: marks.automatic.size,
        system: marks.system.size
      })
    )
  )
  return marks
})

export const collectApt: Effect.Effect<ReadonlyArray<PackageInput>, AppError, AptEnv> = Effect.gen(
  function*(_) {
    const listing = yield* _(captureCommand("dpkg-query", ["-W", `-f=${dpkgQueryFormat}`]))
    const manualListing = yield* _(captureCommand("apt-mark", ["showmanual"]))
    const rows = parseDpkgQuery(listing)
    if (Either.isLeft(rows)) {
      return yield* _(Effect.fail(commandFailed("dpkg-query", rows.left)))
    }
    const manual = parseManualList(manualListing)
    const history = yield* _(readHistory)
    yield* _(
      Effect.logDebug("dpkg database read").pipe(
        Effect.annotateLogs({ rows: rows.right.length, manual: manual.size })
      )
    )
    return aptInputs(rows.right, manual, history)
  }
)
