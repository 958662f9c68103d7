import type { CommandExecutor } from "@effect/platform/CommandExecutor"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect, Match } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs, parseCliRequest, usage, versionLine } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { configFileName, resolveConfig } from "../core/config.js"
import { renderDetails, resolveCandidate } from "../core/details.js"
import { renderDot } from "../core/dot.js"
import type { AppError } from "../core/errors.js"
import { exitCodeFor, renderAppError } from "../core/errors.js"
import type { PackageInput } from "../core/package.js"
import type { Analysis } from "../core/pipeline.js"
import { analyzeRegistry } from "../core/pipeline.js"
import { registryFromInputs } from "../core/registry.js"
import { renderBarGraph, renderJsonReport } from "../core/report.js"
import { collectApt } from "../shell/apt.js"
import { loadConfigFile } from "../shell/config-file.js"
import { collectDnf } from "../shell/dnf.js"
import { collectFlatpak } from "../shell/flatpak.js"
import { loggerLayer } from "../shell/logger.js"
import { collectSnapshot } from "../shell/snapshot.js"

// CHANGE: orchestrate collection, analysis and rendering for one CLI run
// FORMAT THEOREM: ∀argv: run(argv) = collect → closures → policy → attribution → render
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem | Path | CommandExecutor>
// INVARIANT: output is rendered once, after the whole analysis succeeded
// COMPLEXITY: O(V · (V + E))

export interface ProgramResult {
  readonly output: string
  readonly analysis: Analysis
  readonly config: ResolvedConfig
}

export type ProgramEnv = FileSystemService | PathService | CommandExecutor

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  Either.isLeft(either) ? Effect.fail(either.left) : Effect.succeed(either.right)

const withNewline = (text: string): string => text.endsWith("\n") ? text : `${text}\n`

const collect = (cli: CliArgs): Effect.Effect<ReadonlyArray<PackageInput>, AppError, ProgramEnv> =>
  Match.value(cli.collector).pipe(
    Match.when("snapshot", () => collectSnapshot(cli.input ?? "")),
    Match.when("apt", () => collectApt),
    Match.when("dnf", () => collectDnf),
    Match.when("flatpak", () => collectFlatpak),
    Match.exhaustive
  )

const render = (cli: CliArgs, config: ResolvedConfig, analysis: Analysis): Either.Either<string, AppError> =>
  Match.value(cli.output).pipe(
    Match.when("dot", () => Either.right(renderDot(analysis.registry, { cutOff: config.cutOff }))),
    Match.when("bar", () =>
      Either.right(
        renderBarGraph(analysis.registry, {
          barWidth: config.barWidth,
          legend: cli.collector === "flatpak" ? "applications" : "packages"
        }).join("\n")
      )),
    Match.when("details", () =>
      Either.map(
        resolveCandidate(analysis.registry, cli.packageQuery ?? ""),
        (identifier) => renderDetails(analysis.registry, identifier).join("\n")
      )),
    Match.when("json", () => Either.right(renderJsonReport(analysis.registry))),
    Match.exhaustive
  )

/**
 * Collect, analyse and render according to parsed arguments.
 *
 * @param cli - Parsed CLI arguments.
 * @returns Rendered output with the analysis it came from.
 *
 * @pure false
 * @effect FileSystem, Path, CommandExecutor
 * @invariant output ends with a newline
 * @complexity O(V · (V + E))
 */
export const runProgram = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath ?? configFileName, cli.configPath !== undefined))
    const config = resolveConfig(cli, fileConfig)
    yield* _(Effect.logDebug("configuration resolved").pipe(Effect.annotateLogs({ ...config })))
    const inputs = yield* _(collect(cli).pipe(Effect.withLogSpan("collect")))
    yield* _(Effect.logDebug("collection finished").pipe(Effect.withLogSpan("collect")))
    const registry = yield* _(fromEither(registryFromInputs(inputs)))
    const analysis = yield* _(fromEither(analyzeRegistry(registry, config.policy)))
    yield* _(
      Effect.logDebug("reclassified").pipe(
        Effect.annotateLogs({
          policy: analysis.reclassification.policy,
          identifiers: analysis.reclassification.identifiers.join(",")
        })
      )
    )
    yield* _(
      Effect.logDebug("conservation").pipe(
        Effect.annotateLogs({
          connectedInstalledBytes: analysis.conservation.connectedInstalledBytes,
          upperAttributedBytes: analysis.conservation.upperAttributedBytes,
          disconnected: analysis.conservation.disconnected.length
        })
      )
    )
    const output = yield* _(fromEither(render(cli, config, analysis)))
    return { output: withNewline(output), analysis, config }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult; writing the output is left to the caller.
 *
 * @pure false
 * @effect FileSystem, Path, CommandExecutor
 * @invariant the first failure aborts the run without output
 * @complexity O(V · (V + E))
 */
export const runCli = (argv: ReadonlyArray<string>): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.flatMap(fromEither(parseCliArgs(argv)), runProgram)

export interface CliOutcome {
  readonly stdout: string
  readonly exitCode: number
}

const reportFailure = (error: AppError): Effect.Effect<CliOutcome> =>
  Effect.gen(function*(_) {
    yield* _(Effect.logError(renderAppError(error)))
    if (error._tag === "CliError" && error.message !== usage) {
      yield* _(Effect.logInfo(usage))
    }
    return { stdout: "", exitCode: exitCodeFor(error) }
  })

/**
 * Parse argv, then run under a logger whose level comes from the parsed `--debug`.
 *
 * @param argv - process.argv array.
 * @returns What to print on stdout and the exit code; failures are logged, never raised.
 *
 * @pure false
 * @effect FileSystem, Path, CommandExecutor, stderr logging
 * @invariant exitCode = 0 ↔ stdout carries the rendered output or the version line
 * @complexity O(V · (V + E))
 */
export const runCliRequest = (argv: ReadonlyArray<string>): Effect.Effect<CliOutcome, never, ProgramEnv> =>
  Either.match(parseCliRequest(argv), {
    onLeft: (error) => reportFailure(error).pipe(Effect.provide(loggerLayer(false))),
    onRight: (request) =>
      Match.value(request).pipe(
        Match.tag("Version", () => Effect.succeed<CliOutcome>({ stdout: `${versionLine}\n`, exitCode: 0 })),
        Match.tag("Run", ({ args }) =>
          runProgram(args).pipe(
            Effect.map((result): CliOutcome => ({ stdout: result.output, exitCode: 0 })),
            Effect.catchAll(reportFailure),
            Effect.provide(loggerLayer(args.debug))
          )),
        Match.exhaustive
      )
  })
