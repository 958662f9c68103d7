// Min–max rescaling shared by the renderers.

export interface Range {
  readonly min: number
  readonly max: number
}

export const rangeOf = (values: ReadonlyArray<number>): Range | undefined =>
  values.reduce<Range | undefined>(
    (range, value) =>
      range === undefined
        ? { min: value, max: value }
        : { min: Math.min(range.min, value), max: Math.max(range.max, value) },
    undefined
  )

/**
 * Map `value` from `source` onto [a, b]; a degenerate source maps to the midpoint.
 */
export const rescale = (value: number, source: Range, a = 0, b = 1): number => {
  if (source.min === source.max) {
    return (a + b) / 2
  }
  return a + ((value - source.min) * (b - a)) / (source.max - source.min)
}

export const clamp = (value: number, minimum = 0, maximum = 1): number => Math.max(minimum, Math.min(maximum, value))
