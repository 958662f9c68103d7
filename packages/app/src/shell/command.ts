import * as Command from "@effect/platform/Command"
import type { CommandExecutor } from "@effect/platform/CommandExecutor"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as Stream from "effect/Stream"

import type { CommandFailed } from "../core/errors.js"
import { commandFailed } from "../core/errors.js"

// CHANGE: run a package-manager query and capture its standard output
// FORMAT THEOREM: ∀c: capture(c) = Right(out) → exitCode(c) = 0
// PURITY: SHELL
// EFFECT: Effect<string, CommandFailed, CommandExecutor>
// INVARIANT: stdout and stderr are drained concurrently with the exit code
// COMPLEXITY: O(n) where n = output size

const collectText = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(stream, Stream.decodeText(), Stream.runFold("", (text, chunk) => text + chunk))

const firstLine = (text: string): string => text.trim().split("\n")[0] ?? ""

/**
 * Run `executable` with `args` and return its stdout.
 *
 * A missing executable and a non-zero exit both fail with CommandFailed,
 * the latter carrying the first line of stderr.
 *
 * @pure false
 * @effect CommandExecutor
 * @invariant stdin is not connected
 * @complexity O(n)
 */
export const captureCommand = (
  executable: string,
  args: ReadonlyArray<string>
): Effect.Effect<string, CommandFailed, CommandExecutor> => {
  const display = [executable, ...args].join(" ")
  return Effect.scoped(
    Effect.gen(function*(_) {
      const child = yield* _(Command.start(Command.make(executable, ...args)))
      const [stdout, stderr, exitCode] = yield* _(
        Effect.all([collectText(child.stdout), collectText(child.stderr), child.exitCode], {
          concurrency: "unbounded"
        })
      )
      if (exitCode !== 0) {
        const reason = firstLine(stderr)
        return yield* _(
          Effect.fail(commandFailed(display, `exited with code ${exitCode}${reason.length > 0 ? `: ${reason}` : ""}`))
        )
      }
      return stdout
    })
  ).pipe(
    Effect.catchTag("SystemError", (error) =>
      Effect.fail(
        commandFailed(display, error.reason === "NotFound" ? `command not found: ${executable}` : error.message)
      )),
    Effect.catchTag("BadArgument", (error) => Effect.fail(commandFailed(display, error.message))),
    Effect.withLogSpan(executable)
  )
}
