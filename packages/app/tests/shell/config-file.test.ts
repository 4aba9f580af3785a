import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { loadConfigFile } from "../../src/shell/config-file.js"
import { provideNodeContext, withTempDir } from "../app/test-helpers.js"

describe("loadConfigFile", () => {
  it.effect("decodes a valid config", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const configPath = path.join(tempDir, ".venv-prune.json")
        yield* _(fs.writeFileString(
          configPath,
          JSON.stringify({ venvDirs: ["/srv/venvs"], exclude: ["*/keep/*"], minAgeDays: 60, sortBy: "size" })
        ))
        const config = yield* _(loadConfigFile(configPath, true))
        expect(config).toEqual({ venvDirs: ["/srv/venvs"], exclude: ["*/keep/*"], minAgeDays: 60, sortBy: "size" })
      })
    ).pipe(provideNodeContext))

  it.effect("ignores a missing default config", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        expect(yield* _(loadConfigFile(path.join(tempDir, ".venv-prune.json"), false))).toBeUndefined()
        expect(yield* _(loadConfigFile(undefined, false))).toBeUndefined()
      })
    ).pipe(provideNodeContext))

  it.effect("fails on a missing explicit config", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const configPath = path.join(tempDir, "custom.json")
        const error = yield* _(Effect.flip(loadConfigFile(configPath, true)))
        expect(error).toEqual({ _tag: "FileError", message: `Config file not found: ${configPath}` })
      })
    ).pipe(provideNodeContext))

  it.effect("rejects out-of-range and mistyped values", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const configPath = path.join(tempDir, ".venv-prune.json")
        yield* _(fs.writeFileString(configPath, JSON.stringify({ maxDepth: 0 })))
        expect((yield* _(Effect.flip(loadConfigFile(configPath, false))))._tag).toBe("ConfigError")
        yield* _(fs.writeFileString(configPath, JSON.stringify({ sortBy: "colour" })))
        expect((yield* _(Effect.flip(loadConfigFile(configPath, false))))._tag).toBe("ConfigError")
        yield* _(fs.writeFileString(configPath, "{ not json"))
        expect((yield* _(Effect.flip(loadConfigFile(configPath, false))))._tag).toBe("ConfigError")
      })
    ).pipe(provideNodeContext))
})
