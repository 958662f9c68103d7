#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { runCliRequest } from "./program.js"

// CHANGE: wire the CLI program into the Node runtime
// FORMAT THEOREM: runMain(program) terminates with exit code 0, 1 or 2
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: stdout receives the rendered output only; diagnostics go to stderr
// COMPLEXITY: O(1)

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload)
  })

const setExitCode = (code: number): Effect.Effect<void> =>
  Effect.sync(() => {
    process.exitCode = code
  })

const main = runCliRequest(process.argv).pipe(
  Effect.flatMap((outcome) => Effect.zipRight(writeStdout(outcome.stdout), setExitCode(outcome.exitCode)))
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
