import * as Effect from "effect/Effect"

// CHANGE: explicit reporter passed into the scanner and orchestrator
// WHY: scan and evaluation code stays testable without a global logger
// FORMAT THEOREM: ∀e: report(e) : Effect<void, never, never>
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: reporting never fails
// COMPLEXITY: O(1)/O(1)

export type LogFields = Readonly<Record<string, unknown>>

export type ReportEvent = (event: string, fields?: LogFields) => Effect.Effect<void>

export interface Reporter {
  readonly debug: ReportEvent
  readonly info: ReportEvent
  readonly warning: ReportEvent
  readonly error: ReportEvent
}

const ignore: ReportEvent = () => Effect.void

export const silentReporter: Reporter = {
  debug: ignore,
  info: ignore,
  warning: ignore,
  error: ignore
}
