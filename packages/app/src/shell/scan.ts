import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { defaultExcludeDirs } from "../core/config.js"
import type { PlatformProfile } from "../core/platform-profile.js"
import { toolMarkers } from "../core/platform-profile.js"
import type { Reporter } from "../core/reporter.js"
import { detectVenvEvidence } from "./probe.js"

// CHANGE: depth-limited directory walk collecting uv-managed venvs
// WHY: venvs live anywhere below project folders, but scans must stay bounded
// FORMAT THEOREM: ∀v ∈ find(b, d): depth(v, b) ≤ d ∧ isManagedVenv(v)
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, never, FileSystem | Path>
// INVARIANT: the scan never descends into a detected venv
// COMPLEXITY: O(n) where n = directories visited

type ScanEnv = FileSystemService | PathService

export interface ScanSettings {
  readonly baseDir: string
  readonly maxDepth: number
  readonly excludeDirs?: ReadonlyArray<string> | undefined
  readonly profile: PlatformProfile
  readonly reporter: Reporter
}

interface WalkContext {
  readonly fs: FileSystemService
  readonly path: PathService
  readonly exclude: ReadonlySet<string>
  readonly profile: PlatformProfile
  readonly reporter: Reporter
}

const isDirectory = (fs: FileSystemService, target: string): Effect.Effect<boolean> =>
  fs.stat(target).pipe(
    Effect.map((info) => info.type === "Directory"),
    Effect.orElseSucceed(() => false)
  )

const pathExists = (fs: FileSystemService, target: string): Effect.Effect<boolean> =>
  fs.exists(target).pipe(Effect.orElseSucceed(() => false))

const matchVenv = (
  context: WalkContext,
  target: string
): Effect.Effect<boolean, never, ScanEnv> =>
  detectVenvEvidence(target, context.profile).pipe(
    Effect.tap((evidence) =>
      Option.isSome(evidence)
        ? context.reporter.debug("found_venv", { path: target, evidence: evidence.value })
        : Effect.void
    ),
    Effect.map(Option.isSome)
  )

const listChildren = (
  context: WalkContext,
  directory: string
): Effect.Effect<Either.Either<ReadonlyArray<string>, string>> =>
  context.fs.readDirectory(directory).pipe(
    Effect.map((names) => names.toSorted()),
    Effect.either,
    Effect.map(Either.mapLeft((error) => error.message))
  )

const scanToolCache = (
  context: WalkContext,
  baseDir: string
): Effect.Effect<ReadonlyArray<string>, never, ScanEnv> =>
  Effect.gen(function*(_) {
    const cacheDir = context.path.join(baseDir, ...toolMarkers.cacheDir)
    if (!(yield* _(isDirectory(context.fs, cacheDir)))) {
      return []
    }
    yield* _(context.reporter.debug("found_uv_venvs_dir", { path: cacheDir }))
    const children = yield* _(listChildren(context, cacheDir))
    if (Either.isLeft(children)) {
      yield* _(context.reporter.warning("error_scanning_directory", { dir: cacheDir, error: children.left }))
      return []
    }
    return yield* _(
      Effect.filter(
        children.right.map((name) => context.path.join(cacheDir, name)),
        (candidate) => matchVenv(context, candidate)
      )
    )
  })

const walk = (
  context: WalkContext,
  baseDir: string,
  maxDepth: number
): Effect.Effect<ReadonlyArray<string>, never, ScanEnv> =>
  Effect.gen(function*(_) {
    if (!(yield* _(pathExists(context.fs, baseDir)))) {
      yield* _(context.reporter.warning("directory_not_found", { path: baseDir }))
      return []
    }
    if (maxDepth <= 0) {
      yield* _(context.reporter.debug("max_depth_reached", { path: baseDir }))
      return []
    }
    if (yield* _(matchVenv(context, baseDir))) {
      return [baseDir]
    }

    const found: Array<string> = [...(yield* _(scanToolCache(context, baseDir)))]
    const children = yield* _(listChildren(context, baseDir))
    if (Either.isLeft(children)) {
      yield* _(context.reporter.warning("error_scanning_directory", { dir: baseDir, error: children.left }))
      return found
    }
    for (const name of children.right) {
      if (context.exclude.has(name)) {
        continue
      }
      const child = context.path.join(baseDir, name)
      if (!(yield* _(isDirectory(context.fs, child)))) {
        continue
      }
      if (yield* _(matchVenv(context, child))) {
        found.push(child)
      } else {
        found.push(...(yield* _(walk(context, child, maxDepth - 1))))
      }
    }
    return found
  })

/**
 * Find uv-managed venvs below a directory.
 *
 * @param settings - Root, depth budget, excluded names, layout profile, reporter.
 * @returns Absolute venv paths, de-duplicated, in discovery order.
 *
 * @pure false
 * @effect FileSystem, Path
 * @invariant maxDepth = 1 only inspects the root and its direct children
 * @complexity O(n) where n = directories visited
 */
export const findEnvironments = (
  settings: ScanSettings
): Effect.Effect<ReadonlyArray<string>, never, ScanEnv> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const context: WalkContext = {
      fs,
      path,
      exclude: new Set(settings.excludeDirs ?? defaultExcludeDirs),
      profile: settings.profile,
      reporter: settings.reporter
    }
    const found = yield* _(walk(context, path.resolve(settings.baseDir), settings.maxDepth))
    return [...new Set(found)]
  })
