import * as Layer from "effect/Layer"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"

// CHANGE: route Effect logs to stderr
// WHY: stdout carries the printed document; log lines must not mix into it
// QUOTE(TZ): n/a
// REF: req-logging-1
// SOURCE: n/a
// FORMAT THEOREM: ∀l: written(l) → level(l) ≥ minimum
// PURITY: SHELL
// EFFECT: Layer<never>
// INVARIANT: one line per log call
// COMPLEXITY: O(1)

export const formatLogMessage = (message: unknown): string =>
  Array.isArray(message) ? message.map(String).join(" ") : String(message)

const stderrLogger = Logger.make(({ logLevel, message }) => {
  process.stderr.write(`[${logLevel.label.toLowerCase()}] ${formatLogMessage(message)}\n`)
})

export const loggerLayer = (verbose: boolean): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, stderrLogger),
    Logger.minimumLogLevel(verbose ? LogLevel.Debug : LogLevel.Info)
  )
