#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { formatAppError } from "../core/errors.js"
import { loggerLayer } from "../shell/logging.js"
import { runCli } from "./program.js"

// CHANGE: wire the prune program into the Node runtime
// WHY: execute effects with platform services and map typed failures to an exit code
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult, or 1 on AppError
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: every AppError is logged once and sets a non-zero exit code
// COMPLEXITY: O(1)

const setExitCode = (code: number): Effect.Effect<void> =>
  Effect.sync(() => {
    process.exitCode = code
  })

const main = runCli(process.argv).pipe(
  Effect.flatMap((result) => result.exitCode === 0 ? Effect.void : setExitCode(result.exitCode)),
  Effect.catchAll((error) =>
    Effect.logError(formatAppError(error)).pipe(Effect.zipRight(setExitCode(1)))
  ),
  Effect.provide(loggerLayer({ json: false, verbose: false }))
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
