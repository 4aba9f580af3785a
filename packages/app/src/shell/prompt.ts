import { Terminal } from "@effect/platform/Terminal"
import type { Terminal as TerminalService } from "@effect/platform/Terminal"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { promptError } from "../core/errors.js"

// CHANGE: interactive yes/no confirmation before deleting venvs
// WHY: nothing is removed without an explicit "y" from the user
// FORMAT THEOREM: confirm() = true ⟺ answer ∈ {"y","yes"} (case-insensitive)
// PURITY: SHELL
// EFFECT: Effect<boolean, AppError, Terminal>
// INVARIANT: Ctrl-C or Ctrl-D counts as "no"
// COMPLEXITY: O(1)

export const isAffirmative = (answer: string): boolean => {
  const normalized = answer.trim().toLowerCase()
  return normalized === "y" || normalized === "yes"
}

export const isInteractive: Effect.Effect<boolean> = Effect.sync(() => process.stdin.isTTY === true)

export const confirm = (question: string): Effect.Effect<boolean, AppError, TerminalService> =>
  Effect.gen(function*(_) {
    const terminal = yield* _(Terminal)
    yield* _(terminal.display(question).pipe(Effect.mapError((error) => promptError(error.message))))
    const answer = yield* _(
      terminal.readLine.pipe(
        Effect.catchTag("QuitException", () => Effect.succeed(""))
      )
    )
    return isAffirmative(answer)
  })
