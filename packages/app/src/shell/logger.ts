import * as Layer from "effect/Layer"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"

// CHANGE: route structured logs to stderr so stdout carries only rendered output
// FORMAT THEOREM: ∀entry: line(entry) = timestamp LEVEL [spans] message key=value...
// PURITY: SHELL
// EFFECT: Layer<never> replacing the default logger
// INVARIANT: nothing is written to stdout
// COMPLEXITY: O(a + s) per entry

export interface LogLine {
  readonly date: Date
  readonly level: string
  readonly spans: ReadonlyArray<{ readonly label: string; readonly elapsedMillis: number }>
  readonly message: unknown
  readonly annotations: ReadonlyArray<readonly [string, unknown]>
}

const renderValue = (value: unknown): string => {
  if (typeof value === "string") {
    return value
  }
  if (value instanceof Error) {
    return value.message
  }
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value)
  }
  return String(value)
}

const quoteIfNeeded = (value: string): string => /[\s"=]/u.test(value) ? JSON.stringify(value) : value

/**
 * Format one log entry.
 *
 * @pure true
 * @invariant the result never contains a trailing newline
 * @complexity O(a + s)
 */
export const formatLogLine = (line: LogLine): string => {
  const messages: ReadonlyArray<unknown> = Array.isArray(line.message) ? line.message : [line.message]
  const parts = [
    line.date.toISOString(),
    line.level.toUpperCase(),
    ...line.spans.map((span) => `[${span.label}=${span.elapsedMillis}ms]`),
    messages.map(renderValue).join(" "),
    ...line.annotations.map(([key, value]) => `${key}=${quoteIfNeeded(renderValue(value))}`)
  ]
  return parts.filter((part) => part.length > 0).join(" ")
}

export const stderrLogger = Logger.make(({ annotations, date, logLevel, message, spans }) => {
  const now = date.getTime()
  const text = formatLogLine({
    date,
    level: logLevel.label,
    spans: [...spans].map((span) => ({ label: span.label, elapsedMillis: now - span.startTime })),
    message,
    annotations: [...annotations]
  })
  process.stderr.write(`${text}\n`)
})

/**
 * Logger layer: stderr output, Info by default, Debug with `--debug`.
 *
 * @pure false
 * @effect replaces the default logger
 * @complexity O(1)
 */
export const loggerLayer = (debug: boolean): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, stderrLogger),
    Logger.minimumLogLevel(debug ? LogLevel.Debug : LogLevel.Info)
  )
