import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"

// CHANGE: decode .dependency-footprint.json with schema validation
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types and ranges
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: a missing implicit config yields undefined; a missing explicit one fails
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    policy: S.Literal("prune", "promote", "none"),
    barWidth: S.Number.pipe(S.int(), S.greaterThanOrEqualTo(3)),
    cutOff: S.Number.pipe(S.int(), S.greaterThanOrEqualTo(1))
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.policy === undefined ? {} : { policy: config.policy }),
      ...(config.barWidth === undefined ? {} : { barWidth: config.barWidth }),
      ...(config.cutOff === undefined ? {} : { cutOff: config.cutOff })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      yield* _(Effect.logDebug("no config file").pipe(Effect.annotateLogs("path", path)))
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    return yield* _(decodeConfig(contents))
  })
