import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { formatLogLine } from "../../src/shell/logger.js"

const date = new Date("2024-01-02T03:04:05.000Z")

describe("formatLogLine", () => {
  it.effect("prints spans, messages and annotations in order", () =>
    Effect.sync(() => {
      expect(
        formatLogLine({
          date,
          level: "Debug",
          spans: [{ label: "collect", elapsedMillis: 12 }],
          message: ["collection finished"],
          annotations: [["packages", 3], ["path", "/tmp/a b.json"]]
        })
      ).toBe("2024-01-02T03:04:05.000Z DEBUG [collect=12ms] collection finished packages=3 path=\"/tmp/a b.json\"")
    }))

  it.effect("skips an empty message and renders errors by their text", () =>
    Effect.sync(() => {
      expect(
        formatLogLine({
          date,
          level: "Error",
          spans: [],
          message: [],
          annotations: [["cause", new Error("boom")], ["policy", "prune"]]
        })
      ).toBe("2024-01-02T03:04:05.000Z ERROR cause=boom policy=prune")
    }))
})
