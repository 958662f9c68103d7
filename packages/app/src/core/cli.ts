import { Match } from "effect"
import * as Either from "effect/Either"

import type { ReclassificationPolicy } from "./reclassify.js"

// CHANGE: parse collector, output and flags for the footprint CLI
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.collector ∈ Collectors ∧ args.output ∈ Outputs
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and surplus positionals are rejected
// COMPLEXITY: O(n) where n = argv length

export type Collector = "snapshot" | "apt" | "dnf" | "flatpak"

export type OutputKind = "dot" | "bar" | "details" | "json"

export interface CliArgs {
  readonly collector: Collector
  readonly output: OutputKind
  readonly packageQuery: string | undefined
  readonly input: string | undefined
  readonly configPath: string | undefined
  readonly policy: ReclassificationPolicy | undefined
  readonly barWidth: number | undefined
  readonly cutOff: number | undefined
  readonly debug: boolean
}

export type CliRequest =
  | { readonly _tag: "Run"; readonly args: CliArgs }
  | { readonly _tag: "Version" }

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const programName = "dependency-footprint"

export const version = "0.1.0"

export const usage =
  `Usage: ${programName} <snapshot|apt|dnf|flatpak> <dot|bar|details|json> [package] [--input <path>] ` +
  "[--config <path>] [--policy <prune|promote|none>] [--bar-width <n>] [--cut-off <n>] [--debug] [--version]"

const isFlag = (value: string): boolean => value.startsWith("-")

const parseCollector = (value: string): Either.Either<Collector, CliError> =>
  Match.value(value).pipe(
    Match.when("snapshot", () => Either.right<Collector>("snapshot")),
    Match.when("apt", () => Either.right<Collector>("apt")),
    Match.when("dnf", () => Either.right<Collector>("dnf")),
    Match.when("flatpak", () => Either.right<Collector>("flatpak")),
    Match.orElse(() => Either.left(cliError(`Unknown collector: ${value}`)))
  )

const parseOutput = (value: string): Either.Either<OutputKind, CliError> =>
  Match.value(value).pipe(
    Match.when("dot", () => Either.right<OutputKind>("dot")),
    Match.when("bar", () => Either.right<OutputKind>("bar")),
    Match.when("details", () => Either.right<OutputKind>("details")),
    Match.when("json", () => Either.right<OutputKind>("json")),
    Match.orElse(() => Either.left(cliError(`Unknown output: ${value}`)))
  )

export const parsePolicy = (value: string): Either.Either<ReclassificationPolicy, CliError> =>
  Match.value(value).pipe(
    Match.when("prune", () => Either.right<ReclassificationPolicy>("prune")),
    Match.when("promote", () => Either.right<ReclassificationPolicy>("promote")),
    Match.when("none", () => Either.right<ReclassificationPolicy>("none")),
    Match.orElse(() => Either.left(cliError(`Unknown policy: ${value}`)))
  )

const parseMinimum = (flagName: string, minimum: number) => (value: string): Either.Either<number, CliError> => {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < minimum) {
    return Either.left(cliError(`--${flagName} expects an integer ≥ ${minimum}, got ${value}`))
  }
  return Either.right(parsed)
}

interface FlagState {
  readonly input: string | undefined
  readonly configPath: string | undefined
  readonly policy: ReclassificationPolicy | undefined
  readonly barWidth: number | undefined
  readonly cutOff: number | undefined
  readonly debug: boolean
  readonly version: boolean
}

const initialFlags: FlagState = {
  input: undefined,
  configPath: undefined,
  policy: undefined,
  barWidth: undefined,
  cutOff: undefined,
  debug: false,
  version: false
}

type FlagStep = Either.Either<{ readonly next: FlagState; readonly consumed: number }, CliError>

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const parseValueFlag = <A>(
  flagName: string,
  current: FlagState,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (value: string) => Either.Either<A, CliError>,
  update: (state: FlagState, value: A) => FlagState
): FlagStep =>
  readFlagValue(flagName, inlineValue, nextValue).pipe(
    Either.flatMap(decode),
    Either.map((value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    }))
  )

type FlagParser = (current: FlagState, inlineValue: string | undefined, nextValue: string | undefined) => FlagStep

const asIs = (value: string): Either.Either<string, CliError> => Either.right(value)

const flagParsers: Record<string, FlagParser> = {
  debug: (current) => Either.right({ next: { ...current, debug: true }, consumed: 1 }),
  version: (current) => Either.right({ next: { ...current, version: true }, consumed: 1 }),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, asIs, (state, input) => ({ ...state, input })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, asIs, (state, configPath) => ({
      ...state,
      configPath
    })),
  policy: (current, inlineValue, nextValue) =>
    parseValueFlag("policy", current, inlineValue, nextValue, parsePolicy, (state, policy) => ({ ...state, policy })),
  "bar-width": (current, inlineValue, nextValue) =>
    parseValueFlag("bar-width", current, inlineValue, nextValue, parseMinimum("bar-width", 3), (state, barWidth) => ({
      ...state,
      barWidth
    })),
  "cut-off": (current, inlineValue, nextValue) =>
    parseValueFlag("cut-off", current, inlineValue, nextValue, parseMinimum("cut-off", 1), (state, cutOff) => ({
      ...state,
      cutOff
    }))
}

const parseFlag = (raw: string, nextValue: string | undefined, current: FlagState): FlagStep => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const separator = raw.indexOf("=")
  const name = separator === -1 ? raw.slice(2) : raw.slice(2, separator)
  const inlineValue = separator === -1 ? undefined : raw.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface Split {
  readonly positionals: ReadonlyArray<string>
  readonly flags: FlagState
}

const splitArguments = (rawArgs: ReadonlyArray<string>): Either.Either<Split, CliError> => {
  const positionals: Array<string> = []
  let flags = initialFlags
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      positionals.push(current)
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], flags)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    flags = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right({ positionals, flags })
}

const toCliArgs = (split: Split): Either.Either<CliArgs, CliError> =>
  Either.gen(function*() {
    const { flags, positionals } = split
    const [rawCollector, rawOutput, packageQuery, ...surplus] = positionals
    if (rawCollector === undefined || rawOutput === undefined) {
      return yield* Either.left(cliError(usage))
    }
    const collector = yield* parseCollector(rawCollector)
    const output = yield* parseOutput(rawOutput)
    if (surplus.length > 0 || (packageQuery !== undefined && output !== "details")) {
      return yield* Either.left(cliError(`Unexpected positional argument: ${surplus[0] ?? packageQuery}`))
    }
    if (output === "details" && packageQuery === undefined) {
      return yield* Either.left(cliError("details requires a package argument"))
    }
    if (collector === "snapshot" && flags.input === undefined) {
      return yield* Either.left(cliError("snapshot requires --input <path>"))
    }
    return {
      collector,
      output,
      packageQuery,
      input: flags.input,
      configPath: flags.configPath,
      policy: flags.policy,
      barWidth: flags.barWidth,
      cutOff: flags.cutOff,
      debug: flags.debug
    }
  })

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant snapshot requires --input; details requires a package argument
 * @complexity O(n)
 */
export const parseCliArgs = (argv: ReadonlyArray<string>): Either.Either<CliArgs, CliError> =>
  Either.flatMap(splitArguments(argv.slice(2)), toCliArgs)

/**
 * Parse argv into either a version request or a run.
 *
 * `--version` wins over missing positionals once every flag parsed.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseCliRequest = (argv: ReadonlyArray<string>): Either.Either<CliRequest, CliError> =>
  Either.flatMap(splitArguments(argv.slice(2)), (split): Either.Either<CliRequest, CliError> =>
    split.flags.version
      ? Either.right({ _tag: "Version" })
      : Either.map(toCliArgs(split), (args) => ({ _tag: "Run", args })))

export const versionLine = `${programName} ${version}`
