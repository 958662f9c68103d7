import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { makeArrowGraph } from "../../src/core/arrows.js"

describe("makeArrowGraph", () => {
  it.effect("joins a tail to several heads with one vertical line", () =>
    Effect.sync(() => {
      const graph = makeArrowGraph(["a", "b", "c"])
      graph.arrow("a", ["b", "c"])
      expect(graph.render(true)).toEqual(["╾╮ ", "◄┤ ", "◄╯ "])
      expect(graph.render()).toEqual([" ╭╼", " ├►", " ╰►"])
    }))

  it.effect("moves overlapping arrows to the next free columns", () =>
    Effect.sync(() => {
      const graph = makeArrowGraph(["a", "b", "c", "d"])
      graph.arrow("a", ["c"])
      graph.arrow("b", ["d"])
      expect(graph.render(true)).toEqual(["╾╮   ", " │╾╮ ", "◄╯ │ ", "◄──╯ "])
    }))

  it.effect("ignores spacer rows, unknown heads and self references", () =>
    Effect.sync(() => {
      const graph = makeArrowGraph(["a", "", "b"])
      graph.arrow("a", ["a", "missing"])
      graph.arrow("", ["b"])
      expect(graph.render()).toEqual(["", "", ""])
    }))
})
