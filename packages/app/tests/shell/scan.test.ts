import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { posixProfile } from "../../src/core/platform-profile.js"
import { silentReporter } from "../../src/core/reporter.js"
import type { ScanSettings } from "../../src/shell/scan.js"
import { findEnvironments } from "../../src/shell/scan.js"
import { makeRecordingReporter, makeVenv, provideNodeContext, withTempDir } from "../app/test-helpers.js"

const settings = (baseDir: string, maxDepth: number, extra: Partial<ScanSettings> = {}): ScanSettings => ({
  baseDir,
  maxDepth,
  profile: posixProfile,
  reporter: silentReporter,
  ...extra
})

describe("findEnvironments", () => {
  it.effect("finds sibling venvs in name order", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const { path, tempDir } = context
        const beta = yield* _(makeVenv(context, path.join(tempDir, "beta")))
        const alpha = yield* _(makeVenv(context, path.join(tempDir, "alpha")))
        yield* _(context.fs.makeDirectory(path.join(tempDir, "docs")))
        expect(yield* _(findEnvironments(settings(tempDir, 10)))).toEqual([alpha, beta])
      })
    ).pipe(provideNodeContext))

  it.effect("honours the depth budget", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const { path, tempDir } = context
        const deep = yield* _(makeVenv(context, path.join(tempDir, "a", "b", "c", ".venv")))
        expect(yield* _(findEnvironments(settings(tempDir, 1)))).toEqual([])
        expect(yield* _(findEnvironments(settings(tempDir, 3)))).toEqual([])
        expect(yield* _(findEnvironments(settings(tempDir, 4)))).toEqual([deep])
      })
    ).pipe(provideNodeContext))

  it.effect("returns the base directory when it is a venv", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const venv = yield* _(makeVenv(context, context.path.join(context.tempDir, "env")))
        yield* _(makeVenv(context, context.path.join(venv, "lib", "nested")))
        expect(yield* _(findEnvironments(settings(venv, 10)))).toEqual([venv])
      })
    ).pipe(provideNodeContext))

  it.effect("skips excluded directory names", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const { path, tempDir } = context
        const hidden = yield* _(makeVenv(context, path.join(tempDir, "node_modules", "env")))
        expect(yield* _(findEnvironments(settings(tempDir, 10)))).toEqual([])
        expect(yield* _(findEnvironments(settings(tempDir, 10, { excludeDirs: [] })))).toEqual([hidden])
      })
    ).pipe(provideNodeContext))

  it.effect("reports the uv venv cache once", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const { path, tempDir } = context
        const cached = yield* _(makeVenv(context, path.join(tempDir, ".uv", "venvs", "tool-env")))
        const { events, reporter } = makeRecordingReporter()
        expect(yield* _(findEnvironments(settings(tempDir, 10, { reporter })))).toEqual([cached])
        expect(events.filter((event) => event.event === "found_uv_venvs_dir")).toEqual([
          { level: "debug", event: "found_uv_venvs_dir", fields: { path: path.join(tempDir, ".uv", "venvs") } }
        ])
      })
    ).pipe(provideNodeContext))

  it.effect("warns about a missing base directory", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const missing = path.join(tempDir, "missing")
        const { events, reporter } = makeRecordingReporter()
        expect(yield* _(findEnvironments(settings(missing, 10, { reporter })))).toEqual([])
        expect(events).toEqual([{ level: "warning", event: "directory_not_found", fields: { path: missing } }])
      })
    ).pipe(provideNodeContext))
})
