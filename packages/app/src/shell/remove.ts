import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { RemovalResult } from "../core/types.js"

// CHANGE: best-effort recursive removal of one venv directory
// WHY: a failed deletion is reported per path and the run continues
// FORMAT THEOREM: ∀p: remove(p).removed = true → ¬exists(p)
// PURITY: SHELL
// EFFECT: Effect<RemovalResult, never, FileSystem>
// INVARIANT: never fails; the cause travels in the result
// COMPLEXITY: O(n) where n = entries under p

export const removeEnvironment = (
  target: string
): Effect.Effect<RemovalResult, never, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(fs.exists(target).pipe(Effect.orElseSucceed(() => false)))
    if (!exists) {
      const missing: RemovalResult = { path: target, removed: false, cause: "path does not exist" }
      return missing
    }
    return yield* _(
      fs.remove(target, { recursive: true }).pipe(
        Effect.match({
          onFailure: (error): RemovalResult => ({ path: target, removed: false, cause: error.message }),
          onSuccess: (): RemovalResult => ({ path: target, removed: true })
        })
      )
    )
  })
