import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { parseCliArgs, parseCliRequest, usage, versionLine } from "../../src/core/cli.js"
import { left, right } from "./fixtures.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "dependency-footprint", ...args]

const failure = (...args: ReadonlyArray<string>): string => left(parseCliArgs(argv(...args))).message

describe("parseCliArgs", () => {
  it.effect("parses positionals and flags with defaults left undefined", () =>
    Effect.sync(() => {
      expect(right(parseCliArgs(argv("snapshot", "bar", "--input", "packages.json")))).toEqual({
        collector: "snapshot",
        output: "bar",
        packageQuery: undefined,
        input: "packages.json",
        configPath: undefined,
        policy: undefined,
        barWidth: undefined,
        cutOff: undefined,
        debug: false
      })
    }))

  it.effect("accepts inline values and flags between positionals", () =>
    Effect.sync(() => {
      const parsed = right(
        parseCliArgs(argv("apt", "--policy=none", "details", "firefox", "--bar-width=20", "--cut-off", "3", "--debug"))
      )
      expect(parsed.collector).toBe("apt")
      expect(parsed.output).toBe("details")
      expect(parsed.packageQuery).toBe("firefox")
      expect(parsed.policy).toBe("none")
      expect(parsed.barWidth).toBe(20)
      expect(parsed.cutOff).toBe(3)
      expect(parsed.debug).toBe(true)
    }))

  it.effect("asks for usage when positionals are missing", () =>
    Effect.sync(() => {
      expect(failure()).toBe(usage)
      expect(failure("apt")).toBe(usage)
    }))

  it.effect("rejects unknown collectors, outputs and policies", () =>
    Effect.sync(() => {
      expect(failure("rpm", "bar")).toBe("Unknown collector: rpm")
      expect(failure("apt", "pie")).toBe("Unknown output: pie")
      expect(failure("apt", "bar", "--policy", "all")).toBe("Unknown policy: all")
    }))

  it.effect("checks positional arity against the output", () =>
    Effect.sync(() => {
      expect(failure("apt", "bar", "extra")).toBe("Unexpected positional argument: extra")
      expect(failure("apt", "details", "a", "b")).toBe("Unexpected positional argument: b")
      expect(failure("apt", "details")).toBe("details requires a package argument")
      expect(failure("snapshot", "json")).toBe("snapshot requires --input <path>")
    }))

  it.effect("validates flags and their values", () =>
    Effect.sync(() => {
      expect(failure("apt", "bar", "--verbose")).toBe("Unknown flag: --verbose")
      expect(failure("apt", "bar", "-v")).toBe("Unknown flag: -v")
      expect(failure("apt", "bar", "--policy")).toBe("Missing value for --policy")
      expect(failure("apt", "bar", "--input", "--debug")).toBe("Missing value for --input")
      expect(failure("apt", "bar", "--bar-width", "2")).toBe("--bar-width expects an integer ≥ 3, got 2")
      expect(failure("apt", "bar", "--cut-off=1.5")).toBe("--cut-off expects an integer ≥ 1, got 1.5")
    }))
})

describe("parseCliRequest", () => {
  it.effect("answers --version without positionals", () =>
    Effect.sync(() => {
      expect(right(parseCliRequest(argv("--version")))).toEqual({ _tag: "Version" })
      expect(right(parseCliRequest(argv("apt", "bar", "--version")))).toEqual({ _tag: "Version" })
      expect(versionLine).toBe("dependency-footprint 0.1.0")
    }))

  it.effect("carries the parsed debug switch into the run", () =>
    Effect.sync(() => {
      expect(right(parseCliRequest(argv("dnf", "bar", "--debug")))).toEqual({
        _tag: "Run",
        args: {
          collector: "dnf",
          output: "bar",
          packageQuery: undefined,
          input: undefined,
          configPath: undefined,
          policy: undefined,
          barWidth: undefined,
          cutOff: undefined,
          debug: true
        }
      })
    }))

  it.effect("still reports flag errors before a version request", () =>
    Effect.sync(() => {
      expect(left(parseCliRequest(argv("--version", "--nope"))).message).toBe("Unknown flag: --nope")
    }))
})
