import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"

import type { PlatformProfile } from "../core/platform-profile.js"
import { structureDirs, toolMarkers } from "../core/platform-profile.js"

// CHANGE: filesystem predicates over a single candidate directory
// WHY: detection, sizing, and activity checks must never raise
// FORMAT THEOREM: ∀p: isManagedVenv(p) : Effect<boolean, never>, dirSize(p) : Effect<number ≥ 0, never>
// PURITY: SHELL
// EFFECT: Effect<A, never, FileSystem | Path>
// INVARIANT: every IO failure collapses to false / 0 inside the probe
// COMPLEXITY: O(1) detection, O(n) size where n = entries in the subtree

type ProbeEnv = FileSystemService | PathService

export type VenvEvidence = "tool-config" | "interpreter-with-marker" | "interpreter-fallback"

const HOUR_MS = 60 * 60 * 1000
const DAY_MS = 24 * HOUR_MS

const ACTIVATION_WINDOW_MS = 24 * HOUR_MS
const INSTALLER_WINDOW_MS = 7 * DAY_MS
const PROJECT_MARKER_WINDOW_MS = 30 * DAY_MS

const hasType = (
  fs: FileSystemService,
  target: string,
  type: "File" | "Directory"
): Effect.Effect<boolean> =>
  fs.stat(target).pipe(
    Effect.map((info) => info.type === type),
    Effect.orElseSucceed(() => false)
  )

const isSymbolicLink = (fs: FileSystemService, target: string): Effect.Effect<boolean> =>
  fs.readLink(target).pipe(
    Effect.as(true),
    Effect.orElseSucceed(() => false)
  )

const countStructureDirs = (
  fs: FileSystemService,
  path: PathService,
  target: string,
  profile: PlatformProfile
): Effect.Effect<number> =>
  Effect.reduce(structureDirs(profile), 0, (found, name) =>
    hasType(fs, path.join(target, name), "Directory").pipe(
      Effect.map((exists) => exists ? found + 1 : found)
    ))

const configNamesTool = (fs: FileSystemService, configPath: string): Effect.Effect<boolean> =>
  fs.readFileString(configPath).pipe(
    Effect.map((contents) => contents.toLowerCase().includes(toolMarkers.configMarker)),
    Effect.orElseSucceed(() => false)
  )

/**
 * Explain why a directory counts as a uv-managed venv.
 *
 * @param target - Directory to inspect.
 * @param profile - Platform layout names.
 * @returns The first matching rule, or None when it is not a venv.
 *
 * @pure false
 * @effect FileSystem, Path
 * @invariant fewer than two of bin/lib/include → None
 * @complexity O(1)
 */
export const detectVenvEvidence = (
  target: string,
  profile: PlatformProfile
): Effect.Effect<Option.Option<VenvEvidence>, never, ProbeEnv> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    if (!(yield* _(hasType(fs, target, "Directory")))) {
      return Option.none()
    }
    const found = yield* _(countStructureDirs(fs, path, target, profile))
    if (found < 2) {
      return Option.none()
    }
    const configPath = path.join(target, toolMarkers.venvConfigFile)
    const hasConfig = yield* _(hasType(fs, configPath, "File"))
    if (hasConfig && (yield* _(configNamesTool(fs, configPath)))) {
      return Option.some<VenvEvidence>("tool-config")
    }
    const hasInterpreter = yield* _(hasType(fs, path.join(target, profile.scriptsDir, profile.interpreter), "File"))
    if (!hasInterpreter) {
      return Option.none()
    }
    const hasMarker = yield* _(hasType(fs, path.join(target, toolMarkers.markerFile), "File"))
    // permissive: interpreter plus two structure dirs is enough, even without a uv marker
    return Option.some<VenvEvidence>(hasMarker || hasConfig ? "interpreter-with-marker" : "interpreter-fallback")
  })

export const isManagedVenv = (
  target: string,
  profile: PlatformProfile
): Effect.Effect<boolean, never, ProbeEnv> =>
  detectVenvEvidence(target, profile).pipe(Effect.map(Option.isSome))

const entrySize = (
  fs: FileSystemService,
  path: PathService,
  entry: string
): Effect.Effect<number> =>
  Effect.gen(function*(_) {
    if (yield* _(isSymbolicLink(fs, entry))) {
      return 0
    }
    const info = yield* _(Effect.option(fs.stat(entry)))
    if (Option.isNone(info)) {
      return 0
    }
    if (info.value.type === "File") {
      return Number(info.value.size)
    }
    if (info.value.type === "Directory") {
      return yield* _(walkSize(fs, path, entry))
    }
    return 0
  })

const walkSize = (
  fs: FileSystemService,
  path: PathService,
  directory: string
): Effect.Effect<number> =>
  Effect.gen(function*(_) {
    const entries = yield* _(fs.readDirectory(directory).pipe(Effect.orElseSucceed((): ReadonlyArray<string> => [])))
    let total = 0
    for (const name of entries) {
      total += yield* _(entrySize(fs, path, path.join(directory, name)))
    }
    return total
  })

/**
 * Sum the sizes of all regular files below a directory.
 *
 * @param target - Root of the subtree.
 * @returns Byte total; unreadable entries count as zero.
 *
 * @pure false
 * @effect FileSystem, Path
 * @invariant symbolic links are neither followed nor counted
 * @complexity O(n) where n = entries in the subtree
 */
export const dirSize = (target: string): Effect.Effect<number, never, ProbeEnv> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    return yield* _(walkSize(fs, path, target))
  })

const touchedWithin = (
  fs: FileSystemService,
  target: string,
  read: "atime" | "mtime",
  windowMs: number,
  now: number
): Effect.Effect<boolean> =>
  fs.stat(target).pipe(
    Effect.map((info) =>
      Option.match(info[read], {
        onNone: () => false,
        onSome: (time) => now - time.getTime() < windowMs
      })
    ),
    Effect.orElseSucceed(() => false)
  )

const anyTouchedWithin = (
  fs: FileSystemService,
  targets: ReadonlyArray<string>,
  read: "atime" | "mtime",
  windowMs: number,
  now: number
): Effect.Effect<boolean> => Effect.exists(targets, (target) => touchedWithin(fs, target, read, windowMs, now))

/**
 * Heuristically decide whether a venv is in use.
 *
 * @param target - Venv root.
 * @param profile - Platform layout names.
 * @param now - Reference time in epoch milliseconds.
 * @returns true when any activity heuristic fires.
 *
 * @pure false
 * @effect FileSystem, Path
 * @invariant heuristics run in order: activation scripts, installers, project markers
 * @complexity O(1)
 */
export const isActive = (
  target: string,
  profile: PlatformProfile,
  now: number
): Effect.Effect<boolean, never, ProbeEnv> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const inScripts = (names: ReadonlyArray<string>) => names.map((name) => path.join(target, profile.scriptsDir, name))

    if (yield* _(anyTouchedWithin(fs, inScripts(profile.activationScripts), "atime", ACTIVATION_WINDOW_MS, now))) {
      return true
    }
    if (yield* _(anyTouchedWithin(fs, inScripts(profile.installerBinaries), "atime", INSTALLER_WINDOW_MS, now))) {
      return true
    }
    const markers = toolMarkers.projectMarkers.map((name) => path.join(target, name))
    return yield* _(anyTouchedWithin(fs, markers, "mtime", PROJECT_MARKER_WINDOW_MS, now))
  })
