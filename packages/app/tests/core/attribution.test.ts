import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { computeAttribution, summarizeConservation } from "../../src/core/attribution.js"
import { computeClosures } from "../../src/core/closure.js"
import type { PackageInput } from "../../src/core/package.js"
import { totalAttributedBytes } from "../../src/core/package.js"
import type { PackageRegistry } from "../../src/core/registry.js"
import { buildRegistry, pkg, right } from "./fixtures.js"

const attributed = (inputs: ReadonlyArray<PackageInput>): PackageRegistry => {
  const registry = buildRegistry(inputs)
  right(computeClosures(registry))
  right(computeAttribution(registry))
  return registry
}

describe("computeAttribution", () => {
  it.effect("charges a single claimant the whole dependency", () =>
    Effect.sync(() => {
      const registry = attributed([pkg("U1", "upper", 100, { requires: ["L1"] }), pkg("L1", "lower", 300)])
      const u1 = right(registry.get("U1"))
      const l1 = right(registry.get("L1"))
      expect(u1.mandatoryPseudobytes).toBe(300)
      expect(u1.optionalPseudobytes).toBe(0)
      expect(u1.claimantCount).toBeUndefined()
      expect(totalAttributedBytes(u1)).toBe(400)
      expect(l1.claimantCount).toBe(1)
      expect(l1.mandatoryPseudobytes).toBe(0)
    }))

  it.effect("splits a shared dependency equally", () =>
    Effect.sync(() => {
      const registry = attributed([
        pkg("U1", "upper", 0, { requires: ["L"] }),
        pkg("U2", "upper", 0, { requires: ["L"] }),
        pkg("U3", "upper", 0, { requires: ["L"] }),
        pkg("L", "lower", 900)
      ])
      expect(right(registry.get("L")).claimantCount).toBe(3)
      for (const identifier of ["U1", "U2", "U3"]) {
        expect(right(registry.get(identifier)).mandatoryPseudobytes).toBe(300)
      }
    }))

  it.effect("keeps advised bytes in the optional share", () =>
    Effect.sync(() => {
      const registry = attributed([
        pkg("U", "upper", 10, { requires: ["A"], advises: ["B"] }),
        pkg("A", "lower", 100),
        pkg("B", "lower", 60)
      ])
      const u = right(registry.get("U"))
      expect(u.mandatoryPseudobytes).toBe(100)
      expect(u.optionalPseudobytes).toBe(60)
      expect(totalAttributedBytes(u)).toBe(170)
    }))

  it.effect("counts mandatory and optional claimants together", () =>
    Effect.sync(() => {
      const registry = attributed([
        pkg("U1", "upper", 0, { requires: ["L"] }),
        pkg("U2", "upper", 0, { advises: ["L"] }),
        pkg("L", "lower", 90)
      ])
      expect(right(registry.get("L")).claimantCount).toBe(2)
      expect(right(registry.get("U1")).mandatoryPseudobytes).toBe(45)
      expect(right(registry.get("U2")).optionalPseudobytes).toBe(45)
    }))

  it.effect("conserves bytes and reports disconnected packages", () =>
    Effect.sync(() => {
      const registry = attributed([
        pkg("U1", "upper", 7, { requires: ["L1", "L2"], advises: ["L3"] }),
        pkg("U2", "upper", 11, { requires: ["L2"] }),
        pkg("L1", "lower", 100, { requires: ["L3"] }),
        pkg("L2", "lower", 33),
        pkg("L3", "lower", 10),
        pkg("L4", "lower", 999)
      ])
      const summary = summarizeConservation(registry)
      expect(summary.disconnected).toEqual(["L4"])
      expect(summary.connectedInstalledBytes).toBe(161)
      expect(summary.upperAttributedBytes).toBeCloseTo(161, 6)
      expect(summary.connectedLowerBytes).toBe(143)
      expect(summary.upperPseudobytes).toBeCloseTo(143, 6)
    }))
})
