import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { computeClosures } from "../../src/core/closure.js"
import { buildRegistry, members, pkg, right } from "./fixtures.js"

const layered = () =>
  buildRegistry([
    pkg("U", "upper", 10, { requires: ["A"], advises: ["B"] }),
    pkg("A", "lower", 1, { requires: ["C"] }),
    pkg("B", "lower", 1, { requires: ["D"] }),
    pkg("C", "lower", 1, { advises: ["E"] }),
    pkg("D", "lower", 1),
    pkg("E", "lower", 1)
  ])

describe("computeClosures", () => {
  it.effect("separates mandatory closures from optional ones", () =>
    Effect.sync(() => {
      const registry = layered()
      right(computeClosures(registry))
      const u = right(registry.get("U"))
      expect(members(u.recursiveRequires)).toEqual(["A", "C"])
      expect(members(u.recursiveComplements)).toEqual(["B", "D", "E"])
      expect(members(right(registry.get("C")).recursiveComplements)).toEqual(["E"])
      expect(members(right(registry.get("B")).recursiveRequires)).toEqual(["D"])
    }))

  it.effect("builds reverse indexes consistent with the forward sets", () =>
    Effect.sync(() => {
      const registry = layered()
      right(computeClosures(registry))
      expect(members(right(registry.get("C")).recursiveWhatRequires)).toEqual(["A", "U"])
      expect(members(right(registry.get("E")).recursiveWhatComplements)).toEqual(["A", "C", "U"])
      expect(members(right(registry.get("U")).recursiveWhatRequires)).toEqual([])
      for (const record of registry.records()) {
        for (const dependency of record.recursiveRequires) {
          expect(right(registry.get(dependency)).recursiveWhatRequires.has(record.identifier)).toBe(true)
        }
      }
    }))

  it.effect("excludes the package itself from cyclic closures", () =>
    Effect.sync(() => {
      const registry = buildRegistry([
        pkg("A", "lower", 1, { requires: ["B"] }),
        pkg("B", "lower", 1, { requires: ["A"] })
      ])
      right(computeClosures(registry))
      expect(members(right(registry.get("A")).recursiveRequires)).toEqual(["B"])
      expect(members(right(registry.get("B")).recursiveRequires)).toEqual(["A"])
      expect(members(right(registry.get("A")).recursiveWhatRequires)).toEqual(["B"])
    }))

  it.effect("ignores edges to unknown identifiers", () =>
    Effect.sync(() => {
      const registry = buildRegistry([
        pkg("A", "upper", 1, { requires: ["ghost", "B"], advises: ["phantom"] }),
        pkg("B", "lower", 1)
      ])
      right(computeClosures(registry))
      const a = right(registry.get("A"))
      expect(members(a.recursiveRequires)).toEqual(["B"])
      expect(members(a.recursiveComplements)).toEqual([])
    }))

  it.effect("gives the same sets when run twice", () =>
    Effect.sync(() => {
      const registry = layered()
      right(computeClosures(registry))
      right(computeClosures(registry))
      expect(members(right(registry.get("E")).recursiveWhatComplements)).toEqual(["A", "C", "U"])
      expect(members(right(registry.get("C")).recursiveWhatRequires)).toEqual(["A", "U"])
    }))
})
