import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { bytesToHumanSi, humanToBytes } from "../../src/core/units.js"
import { left, right } from "./fixtures.js"

describe("humanToBytes", () => {
  it.effect("applies SI and IEC factors", () =>
    Effect.sync(() => {
      expect(right(humanToBytes("1.5 kB"))).toBe(1500)
      expect(right(humanToBytes("350 MiB"))).toBe(367_001_600)
      expect(right(humanToBytes("2.5 GB"))).toBe(2_500_000_000)
      expect(right(humanToBytes("0.5 kiB"))).toBe(512)
      expect(right(humanToBytes("12 bytes"))).toBe(12)
    }))

  it.effect("covers the zetta and yotta prefixes", () =>
    Effect.sync(() => {
      expect(right(humanToBytes("2 ZB"))).toBe(2 * 1000 ** 7)
      expect(right(humanToBytes("1 YB"))).toBe(1000 ** 8)
      expect(right(humanToBytes("1 ZiB"))).toBe(1024 ** 7)
      expect(right(humanToBytes("1 YiB"))).toBe(1024 ** 8)
    }))

  it.effect("accepts a non-breaking space between number and unit", () =>
    Effect.sync(() => {
      expect(right(humanToBytes("1.5\u00a0kB"))).toBe(1500)
    }))

  it.effect("rejects unknown units and malformed values", () =>
    Effect.sync(() => {
      expect(left(humanToBytes("12 parsecs"))).toBe("Unrecognized size: 12 parsecs")
      expect(Either.isLeft(humanToBytes(""))).toBe(true)
      expect(Either.isLeft(humanToBytes("1 kB extra"))).toBe(true)
      expect(Either.isLeft(humanToBytes("-1 kB"))).toBe(true)
    }))
})

describe("bytesToHumanSi", () => {
  it.effect("picks the prefix from the digit count", () =>
    Effect.sync(() => {
      expect(bytesToHumanSi(0)).toBe("0 B")
      expect(bytesToHumanSi(999)).toBe("999 B")
      expect(bytesToHumanSi(1_234_567)).toBe("1 MB")
      expect(bytesToHumanSi(999_999)).toBe("1000 kB")
    }))
})
