import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the CLI tool
// WHY: provide typed failures for program flow and exit codes
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type NoSearchDirectories = {
  readonly _tag: "NoSearchDirectories"
  readonly candidates: ReadonlyArray<string>
}
export type ConfirmationRequired = { readonly _tag: "ConfirmationRequired" }
export type PromptError = { readonly _tag: "PromptError"; readonly message: string }

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | NoSearchDirectories
  | ConfirmationRequired
  | PromptError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const noSearchDirectories = (candidates: ReadonlyArray<string>): NoSearchDirectories => ({
  _tag: "NoSearchDirectories",
  candidates
})

export const confirmationRequired: ConfirmationRequired = { _tag: "ConfirmationRequired" }

export const promptError = (message: string): PromptError => ({
  _tag: "PromptError",
  message
})

/**
 * Render an AppError as a single line for stderr.
 *
 * @pure true
 * @complexity O(n)
 */
export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => `invalid arguments: ${value.message}`),
    Match.tag("ConfigError", (value) => `invalid config: ${value.message}`),
    Match.tag("FileError", (value) => value.message),
    Match.tag("NoSearchDirectories", (value) =>
      value.candidates.length === 0
        ? "no valid venv directories found"
        : `no valid venv directories found (checked: ${value.candidates.join(", ")})`),
    Match.tag(
      "ConfirmationRequired",
      () => "confirmation required in non-interactive mode; pass --yes to remove or --dry-run to only report"
    ),
    Match.tag("PromptError", (value) => `confirmation prompt failed: ${value.message}`),
    Match.exhaustive
  )
