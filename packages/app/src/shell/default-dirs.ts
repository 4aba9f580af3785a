import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Effect from "effect/Effect"
import { homedir } from "node:os"

import { defaultSearchRoots } from "../core/default-dirs.js"
import type { Reporter } from "../core/reporter.js"

// CHANGE: resolve default search roots against the live filesystem
// WHY: only roots that exist are worth scanning
// FORMAT THEOREM: ∀d ∈ result: exists(d)
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, never, FileSystem | Path>
// INVARIANT: uv-owned dirs come before project dirs
// COMPLEXITY: O(1)

const existsAs = (
  fs: FileSystemService,
  target: string,
  requireDirectory: boolean
): Effect.Effect<boolean> =>
  fs.stat(target).pipe(
    Effect.map((info) => !requireDirectory || info.type === "Directory"),
    Effect.orElseSucceed(() => false)
  )

export const getDefaultDirs = (
  reporter: Reporter
): Effect.Effect<ReadonlyArray<string>, never, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const env = yield* _(Effect.sync(() => ({
      home: homedir(),
      platform: process.platform,
      localAppData: process.env["LOCALAPPDATA"]
    })))
    const roots = defaultSearchRoots({ ...env, join: (...segments) => path.join(...segments) })
    if (!roots.supportedPlatform) {
      yield* _(reporter.warning("unsupported_platform", { platform: env.platform }))
    }
    const toolDirs = yield* _(Effect.filter(roots.toolDirs, (dir) => existsAs(fs, dir, false)))
    const projectDirs = yield* _(Effect.filter(roots.projectDirs, (dir) => existsAs(fs, dir, true)))
    return [...toolDirs, ...projectDirs]
  })
