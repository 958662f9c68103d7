import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { readHistoryLogs } from "../../src/shell/apt.js"
import { provideNodeContext, withTempDir } from "../app/test-helpers.js"

describe("readHistoryLogs", () => {
  it.effect("reads rotated logs beside the active one, oldest first", () =>
    provideNodeContext(
      withTempDir(({ fs, path, tempDir }) =>
        Effect.gen(function*(_) {
          const write = (name: string, text: string, modified: number) =>
            Effect.gen(function*(_) {
              const file = path.join(tempDir, name)
              yield* _(fs.writeFileString(file, text))
              yield* _(fs.utimes(file, modified, modified))
            })
          yield* _(write("history.log", "newest", 3_000))
          yield* _(write("history.log.1", "older", 2_000))
          yield* _(write("history.log.2", "oldest", 1_000))
          yield* _(write("term.log", "unrelated", 4_000))
          const logs = yield* _(readHistoryLogs(path.join(tempDir, "history.log")))
          expect(logs).toEqual(["oldest", "older", "newest"])
        })
      )
    ))

  it.effect("yields no logs when the log directory is absent", () =>
    provideNodeContext(
      withTempDir(({ path, tempDir }) =>
        Effect.gen(function*(_) {
          const logs = yield* _(readHistoryLogs(path.join(tempDir, "missing", "history.log")))
          expect(logs).toEqual([])
        })
      )
    ))
})
