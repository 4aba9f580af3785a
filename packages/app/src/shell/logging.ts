import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"

import type { LogFields, Reporter, ReportEvent } from "../core/reporter.js"

// CHANGE: route reporter events through Effect's logger and pick the log format
// WHY: logs go to stderr so stdout carries only the report
// FORMAT THEOREM: ∀e,f: effectLogReporter.info(e,f) = Effect.logInfo(e) annotated with f
// PURITY: SHELL
// EFFECT: Layer<never>
// INVARIANT: debug events appear only with --verbose
// COMPLEXITY: O(1)/O(1)

export interface LoggingOptions {
  readonly json: boolean
  readonly verbose: boolean
}

const toStderr = (line: string): void => {
  process.stderr.write(line.endsWith("\n") ? line : `${line}\n`)
}

const fromLog = (log: (message: string) => Effect.Effect<void>): ReportEvent =>
(event: string, fields?: LogFields) =>
  fields === undefined ? log(event) : log(event).pipe(Effect.annotateLogs(fields))

export const effectLogReporter: Reporter = {
  debug: fromLog(Effect.logDebug),
  info: fromLog(Effect.logInfo),
  warning: fromLog(Effect.logWarning),
  error: fromLog(Effect.logError)
}

/**
 * Build the logger layer for one CLI run.
 *
 * @param options - Output format and verbosity.
 * @returns Layer replacing the default logger and setting the minimum level.
 *
 * @pure true
 * @complexity O(1)
 */
export const loggerLayer = (options: LoggingOptions): Layer.Layer<never> => {
  const format = options.json ? Logger.jsonLogger : Logger.logfmtLogger
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, Logger.map(format, toStderr)),
    Logger.minimumLogLevel(options.verbose ? LogLevel.Debug : LogLevel.Info)
  )
}
