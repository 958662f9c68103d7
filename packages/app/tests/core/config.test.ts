import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import type { CliArgs } from "../../src/core/cli.js"
import { defaultBarWidth, defaultCutOff, defaultPolicy, resolveConfig } from "../../src/core/config.js"

const baseCli: CliArgs = {
  collector: "apt",
  output: "bar",
  packageQuery: undefined,
  input: undefined,
  configPath: undefined,
  policy: undefined,
  barWidth: undefined,
  cutOff: undefined,
  debug: false
}

describe("resolveConfig", () => {
  it.effect("falls back to per-collector defaults", () =>
    Effect.sync(() => {
      expect(resolveConfig(baseCli, undefined)).toEqual({
        policy: "prune",
        barWidth: defaultBarWidth,
        cutOff: defaultCutOff
      })
      expect(defaultPolicy("flatpak")).toBe("none")
      expect(defaultPolicy("snapshot")).toBe("promote")
      expect(defaultPolicy("dnf")).toBe("promote")
    }))

  it.effect("prefers CLI values over file values over defaults", () =>
    Effect.sync(() => {
      const resolved = resolveConfig({ ...baseCli, barWidth: 30 }, { policy: "none", barWidth: 10, cutOff: 4 })
      expect(resolved).toEqual({ policy: "none", barWidth: 30, cutOff: 4 })
    }))
})
