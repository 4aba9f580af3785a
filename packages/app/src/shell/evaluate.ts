import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"

import { judgeObservation } from "../core/evaluate.js"
import type { PlatformProfile } from "../core/platform-profile.js"
import type { Criteria, EnvironmentObservation, EnvironmentSnapshot, EvaluationRecord } from "../core/types.js"
import { dirSize, isActive } from "./probe.js"

// CHANGE: collect venv metadata and turn it into an evaluation record
// WHY: metadata failures must become error records instead of aborting the run
// FORMAT THEOREM: ∀p: observe(p) ∈ {Observed, Unreadable}
// PURITY: SHELL
// EFFECT: Effect<EvaluationRecord, never, FileSystem | Path>
// INVARIANT: the venv root is stat'ed before its subtree is walked and its times are restored after
// COMPLEXITY: O(n) where n = entries in the venv

type EvaluateEnv = FileSystemService | PathService

export interface ObserveSettings {
  readonly profile: PlatformProfile
  readonly now: number
}

export interface EvaluateSettings extends ObserveSettings {
  readonly criteria: Criteria
}

const requireTime = (value: Option.Option<Date>, label: string): Effect.Effect<Date, string> =>
  Option.match(value, {
    onNone: () => Effect.fail(`${label} time unavailable`),
    onSome: (time) => Effect.succeed(time)
  })

const collectSnapshot = (
  fs: FileSystemService,
  target: string,
  name: string,
  settings: ObserveSettings
): Effect.Effect<EnvironmentSnapshot, string, EvaluateEnv> =>
  Effect.gen(function*(_) {
    const info = yield* _(fs.stat(target).pipe(Effect.mapError((error) => error.message)))
    const lastAccessed = yield* _(requireTime(info.atime, "access"))
    const lastModified = yield* _(requireTime(info.mtime, "modification"))
    // birth time is best-effort; some filesystems report none or the epoch
    const created = Option.getOrElse(
      Option.filter(info.birthtime, (time) => time.getTime() > 0),
      () => lastModified
    )
    const sizeBytes = yield* _(dirSize(target))
    const active = yield* _(isActive(target, settings.profile, settings.now))
    // walking the tree bumps the root's atime on relatime mounts; put it back
    yield* _(fs.utimes(target, lastAccessed, lastModified).pipe(Effect.orElseSucceed(() => undefined)))
    return { path: target, name, lastAccessed, lastModified, created, sizeBytes, isActive: active }
  })

/**
 * Gather metadata for one candidate venv.
 *
 * @param target - Absolute venv path.
 * @param settings - Layout profile and reference time.
 * @returns Observed snapshot, or Unreadable with the failure message.
 *
 * @pure false
 * @effect FileSystem, Path
 * @invariant never fails; failures are carried in the Unreadable branch
 * @complexity O(n)
 */
export const observeEnvironment = (
  target: string,
  settings: ObserveSettings
): Effect.Effect<EnvironmentObservation, never, EvaluateEnv> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const name = path.basename(target)
    return yield* _(
      collectSnapshot(fs, target, name, settings).pipe(
        Effect.match({
          onFailure: (message): EnvironmentObservation => ({ _tag: "Unreadable", path: target, name, message }),
          onSuccess: (snapshot): EnvironmentObservation => ({ _tag: "Observed", snapshot })
        })
      )
    )
  })

export const evaluateEnvironment = (
  target: string,
  settings: EvaluateSettings
): Effect.Effect<EvaluationRecord, never, EvaluateEnv> =>
  observeEnvironment(target, settings).pipe(
    Effect.map((observation) => judgeObservation(observation, settings.criteria, settings.now))
  )
