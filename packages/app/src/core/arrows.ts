// CHANGE: draw dependency arrows between vertically listed nodes as box-drawing columns
// FORMAT THEOREM: ∀g: |render(g)| = |nodes| ∧ ∀line ∈ render(g): |line| = columnCount(g)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: an arrow only touches rows between its tail and its farthest head
// COMPLEXITY: O(c · n) per arrow where c = columns, n = nodes

export interface ArrowOptions {
  readonly allowCrossing?: boolean
  readonly compact?: boolean
}

export interface ArrowGraph {
  readonly arrow: (tail: string, heads: Iterable<string>, options?: ArrowOptions) => void
  readonly render: (leftToRight?: boolean) => ReadonlyArray<string>
}

const blank = " "

const mirrored: Readonly<Record<string, string>> = {
  "◄": "►",
  "╯": "╰",
  "╮": "╭",
  "┤": "├",
  "╾": "╼"
}

/**
 * Build an arrow graph over `nodes`; empty strings act as spacer rows.
 *
 * Columns grow to the right from the nodes. `render()` mirrors them so the
 * arrows sit left of the nodes, `render(true)` keeps them to the right.
 *
 * @pure false
 * @invariant heads that equal the tail or are not among the nodes are ignored
 * @complexity O(1)
 */
export const makeArrowGraph = (nodes: ReadonlyArray<string>): ArrowGraph => {
  const indices = new Map<string, number>()
  for (const [index, node] of nodes.entries()) {
    if (node.length > 0) {
      indices.set(node, index)
    }
  }
  const columns: Array<Array<string>> = []
  const column = (index: number): Array<string> => {
    while (columns.length <= index) {
      columns.push(nodes.map(() => blank))
    }
    return columns[index] ?? []
  }
  const cell = (columnIndex: number, row: number): string => column(columnIndex)[row] ?? blank
  const put = (columnIndex: number, row: number, character: string): void => {
    column(columnIndex)[row] = character
  }

  const arrow = (tail: string, heads: Iterable<string>, options: ArrowOptions = {}): void => {
    const tailIndex = indices.get(tail)
    if (tailIndex === undefined) {
      return
    }
    const headIndices = [...new Set(heads)].filter((head) => head !== tail).flatMap((head) => {
      const index = indices.get(head)
      return index === undefined ? [] : [index]
    })
    if (headIndices.length === 0) {
      return
    }
    const minimum = Math.min(tailIndex, ...headIndices)
    const maximum = Math.max(tailIndex, ...headIndices)
    const passable = options.allowCrossing === true ? [blank, "│"] : [blank]

    let columnIndex = 0
    for (let index = columns.length - 1; index >= 0; index -= 1) {
      if (!passable.includes(cell(index, tailIndex))) {
        columnIndex = index + 1
        break
      }
    }
    put(columnIndex, tailIndex, "╾")

    for (;;) {
      const area = [
        ...column(columnIndex + 1).slice(minimum, maximum + 1),
        ...column(columnIndex + 2).slice(minimum, maximum + 1)
      ]
      if (area.every((character) => character === blank)) {
        break
      }
      columnIndex += 1
      if (cell(columnIndex, tailIndex) !== "│") {
        put(columnIndex, tailIndex, "─")
      }
    }

    const points = options.compact === true
      ? headIndices.map((head) => cell(columnIndex, head))
      : column(columnIndex).slice(minimum, maximum + 1)
    if (!points.every((character) => passable.includes(character) || character === "─" || character === "╾")) {
      columnIndex += 1
      put(columnIndex, tailIndex, "─")
    }

    columnIndex += 1
    for (let row = minimum; row <= maximum; row += 1) {
      if (row === minimum) {
        put(columnIndex, row, "╮")
      } else if (row === maximum) {
        put(columnIndex, row, "╯")
      } else if (row === tailIndex || headIndices.includes(row)) {
        put(columnIndex, row, "┤")
      } else {
        put(columnIndex, row, "│")
      }
    }

    for (const head of headIndices) {
      for (let index = columnIndex - 1; index >= 0; index -= 1) {
        if (index === 0 || !passable.includes(cell(index - 1, head))) {
          put(index, head, "◄")
          break
        }
        if (cell(index, head) !== "│") {
          put(index, head, "─")
        }
      }
    }
  }

  const render = (leftToRight = false): ReadonlyArray<string> => {
    const ordered = leftToRight ? columns : columns.toReversed()
    return nodes.map((_, row) =>
      ordered.map((cells) => {
        const character = cells[row] ?? blank
        return leftToRight ? character : mirrored[character] ?? character
      }).join("")
    )
  }

  return { arrow, render }
}
