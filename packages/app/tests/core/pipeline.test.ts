import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { analyzeRegistry } from "../../src/core/pipeline.js"
import { buildRegistry, pkg, right } from "./fixtures.js"

const inputs = [
  pkg("U1", "upper", 100, { requires: ["L1"] }),
  pkg("L1", "lower", 300),
  pkg("L2", "lower", 50)
]

describe("analyzeRegistry", () => {
  it.effect("attributes after promoting orphans", () =>
    Effect.sync(() => {
      const analysis = right(analyzeRegistry(buildRegistry(inputs), "promote"))
      expect(analysis.reclassification).toEqual({ policy: "promote", identifiers: ["L2"] })
      expect(analysis.conservation.connectedInstalledBytes).toBe(450)
      expect(analysis.conservation.upperAttributedBytes).toBe(450)
      expect(analysis.conservation.disconnected).toEqual([])
      expect(right(analysis.registry.get("U1")).mandatoryPseudobytes).toBe(300)
    }))

  it.effect("reports orphans as disconnected under the none policy", () =>
    Effect.sync(() => {
      const analysis = right(analyzeRegistry(buildRegistry(inputs), "none"))
      expect(analysis.conservation.disconnected).toEqual(["L2"])
      expect(analysis.conservation.connectedInstalledBytes).toBe(400)
      expect(right(analysis.registry.get("L2")).claimantCount).toBe(0)
    }))

  it.effect("drops orphans from every total under the prune policy", () =>
    Effect.sync(() => {
      const analysis = right(analyzeRegistry(buildRegistry(inputs), "prune"))
      expect(analysis.registry.size()).toBe(2)
      expect(analysis.conservation.upperAttributedBytes).toBe(400)
    }))
})
