import * as Either from "effect/Either"

// CHANGE: convert between human-readable sizes and byte counts
// FORMAT THEOREM: humanToBytes("n u") = ⌊n · factor(u)⌋
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: SI prefixes use powers of 1000, IEC prefixes powers of 1024
// COMPLEXITY: O(1)/O(1)

const unitFactors: Readonly<Record<string, number>> = {
  B: 1,
  byte: 1,
  bytes: 1,
  kB: 1000,
  MB: 1000 ** 2,
  GB: 1000 ** 3,
  TB: 1000 ** 4,
  PB: 1000 ** 5,
  EB: 1000 ** 6,
  ZB: 1000 ** 7,
  YB: 1000 ** 8,
  kiB: 1024,
  KiB: 1024,
  MiB: 1024 ** 2,
  GiB: 1024 ** 3,
  TiB: 1024 ** 4,
  PiB: 1024 ** 5,
  EiB: 1024 ** 6,
  ZiB: 1024 ** 7,
  YiB: 1024 ** 8
}

const siPrefixes = ["", "k", "M", "G", "T", "P", "E", "Z", "Y", "R", "Q"]

/**
 * Parse sizes such as "1.2 GB" or "350 MiB".
 *
 * @pure true
 * @invariant result is a non-negative integer
 * @complexity O(1)
 */
export const humanToBytes = (value: string): Either.Either<number, string> => {
  const [number = "", unit = "", ...rest] = value.trim().split(/\s+/u)
  const factor = unitFactors[unit]
  const amount = Number.parseFloat(number)
  if (rest.length > 0 || factor === undefined || !Number.isFinite(amount) || amount < 0) {
    return Either.left(`Unrecognized size: ${value}`)
  }
  return Either.right(Math.trunc(amount * factor))
}

/**
 * Render a byte count with the metric prefix matching its digit count.
 *
 * @pure true
 * @invariant bytesToHumanSi(999) = "999 B"
 * @complexity O(1)
 */
export const bytesToHumanSi = (size: number): string => {
  const digits = String(Math.max(0, Math.trunc(size))).length
  const power = Math.min(Math.floor((digits - 1) / 3), siPrefixes.length - 1)
  const value = Math.round(size / 1000 ** power)
  return `${value} ${siPrefixes[power] ?? ""}B`
}
