import type { CommandExecutor } from "@effect/platform/CommandExecutor"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { AppError } from "../core/errors.js"
import { commandFailed } from "../core/errors.js"
import type { PackageInput } from "../core/package.js"
import { dnfReasonFormat, parseReasonList, parseRpmQuery, rpmInputs, rpmQueryFormat } from "../core/rpm.js"
import { captureCommand } from "./command.js"

// CHANGE: collect Fedora packages through rpm and dnf install reasons
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<PackageInput>, AppError, CommandExecutor>
// INVARIANT: dnf runs from its cache; nothing is installed or refreshed

export const collectDnf: Effect.Effect<ReadonlyArray<PackageInput>, AppError, CommandExecutor> = Effect.gen(
  function*(_) {
    const listing = yield* _(captureCommand("rpm", ["-qa", "--queryformat", rpmQueryFormat]))
    const reasonListing = yield* _(
      captureCommand("dnf", ["-q", "-C", "repoquery", "--installed", "--queryformat", dnfReasonFormat])
    )
    const rows = parseRpmQuery(listing)
    if (Either.isLeft(rows)) {
      return yield* _(Effect.fail(commandFailed("rpm -qa", rows.left)))
    }
    const reasons = parseReasonList(reasonListing)
    if (Either.isLeft(reasons)) {
      return yield* _(Effect.fail(commandFailed("dnf repoquery", reasons.left)))
    }
    const inputs = rpmInputs(rows.right, reasons.right)
    yield* _(
      Effect.logDebug("rpm database read").pipe(
        Effect.annotateLogs({
          rows: rows.right.length,
          reasons: reasons.right.size,
          collected: inputs.length,
          user: inputs.filter((input) => input.tier === "upper").length
        })
      )
    )
    return inputs
  }
)
