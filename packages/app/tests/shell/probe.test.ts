import { describe, expect, it } from "@effect/vitest"
import { Effect, Option } from "effect"

import { posixProfile } from "../../src/core/platform-profile.js"
import { detectVenvEvidence, dirSize, isActive, isManagedVenv } from "../../src/shell/probe.js"
import { makeVenv, provideNodeContext, setAge, withTempDir } from "../app/test-helpers.js"

const evidenceOf = (target: string) => detectVenvEvidence(target, posixProfile).pipe(Effect.map(Option.getOrUndefined))

describe("detectVenvEvidence", () => {
  it.effect("accepts a layout whose config names uv", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const venv = yield* _(makeVenv(context, context.path.join(context.tempDir, "env"), { interpreter: false }))
        expect(yield* _(evidenceOf(venv))).toBe("tool-config")
      })
    ).pipe(provideNodeContext))

  it.effect("accepts an interpreter next to a foreign config", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const venv = yield* _(makeVenv(context, context.path.join(context.tempDir, "env"), {
          config: "home = /usr/bin\n"
        }))
        expect(yield* _(evidenceOf(venv))).toBe("interpreter-with-marker")
      })
    ).pipe(provideNodeContext))

  it.effect("accepts an interpreter with the marker file", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const venv = yield* _(makeVenv(context, context.path.join(context.tempDir, "env"), { config: "" }))
        yield* _(context.fs.writeFileString(context.path.join(venv, ".uv-proj"), ""))
        expect(yield* _(evidenceOf(venv))).toBe("interpreter-with-marker")
      })
    ).pipe(provideNodeContext))

  it.effect("falls back to the interpreter alone", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const venv = yield* _(makeVenv(context, context.path.join(context.tempDir, "env"), {
          config: "",
          dirs: ["bin", "lib"]
        }))
        expect(yield* _(evidenceOf(venv))).toBe("interpreter-fallback")
      })
    ).pipe(provideNodeContext))

  it.effect("rejects foreign config without an interpreter", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const venv = yield* _(makeVenv(context, context.path.join(context.tempDir, "env"), {
          config: "home = /usr/bin\n",
          interpreter: false
        }))
        expect(yield* _(evidenceOf(venv))).toBeUndefined()
      })
    ).pipe(provideNodeContext))
})

describe("isManagedVenv", () => {
  it.effect("needs two of bin, lib, include", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const venv = yield* _(makeVenv(context, context.path.join(context.tempDir, "env"), { dirs: ["bin"] }))
        expect(yield* _(isManagedVenv(venv, posixProfile))).toBe(false)
      })
    ).pipe(provideNodeContext))

  it.effect("is false for missing paths and plain files", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const file = context.path.join(context.tempDir, "notes.txt")
        yield* _(context.fs.writeFileString(file, "x"))
        expect(yield* _(isManagedVenv(file, posixProfile))).toBe(false)
        expect(yield* _(isManagedVenv(context.path.join(context.tempDir, "missing"), posixProfile))).toBe(false)
      })
    ).pipe(provideNodeContext))
})

describe("dirSize", () => {
  it.effect("sums regular files in nested directories", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const nested = path.join(tempDir, "lib", "site-packages")
        yield* _(fs.makeDirectory(nested, { recursive: true }))
        yield* _(fs.writeFile(path.join(tempDir, "a.bin"), new Uint8Array(1024)))
        yield* _(fs.writeFile(path.join(tempDir, "lib", "b.bin"), new Uint8Array(2048)))
        yield* _(fs.writeFile(path.join(nested, "c.bin"), new Uint8Array(4096)))
        expect(yield* _(dirSize(tempDir))).toBe(7168)
      })
    ).pipe(provideNodeContext))

  it.effect("does not count symbolic links", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const target = path.join(tempDir, "real.bin")
        yield* _(fs.writeFile(target, new Uint8Array(1024)))
        yield* _(fs.symlink(target, path.join(tempDir, "link.bin")))
        expect(yield* _(dirSize(tempDir))).toBe(1024)
      })
    ).pipe(provideNodeContext))

  it.effect("is zero for a missing directory", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        expect(yield* _(dirSize(path.join(tempDir, "missing")))).toBe(0)
      })
    ).pipe(provideNodeContext))
})

describe("isActive", () => {
  it.effect("is false when nothing was touched recently", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const now = Date.now()
        const venv = yield* _(makeVenv(context, context.path.join(context.tempDir, "env")))
        const activate = context.path.join(venv, "bin", "activate")
        yield* _(context.fs.writeFileString(activate, ""))
        yield* _(setAge(context, activate, 3, now))
        expect(yield* _(isActive(venv, posixProfile, now))).toBe(false)
      })
    ).pipe(provideNodeContext))

  it.effect("fires on a recently used activation script", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const now = Date.now()
        const venv = yield* _(makeVenv(context, context.path.join(context.tempDir, "env")))
        const activate = context.path.join(venv, "bin", "activate.fish")
        yield* _(context.fs.writeFileString(activate, ""))
        yield* _(setAge(context, activate, 0.5, now))
        expect(yield* _(isActive(venv, posixProfile, now))).toBe(true)
      })
    ).pipe(provideNodeContext))

  it.effect("fires on an installer used within a week", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const now = Date.now()
        const venv = yield* _(makeVenv(context, context.path.join(context.tempDir, "env")))
        const pip = context.path.join(venv, "bin", "pip")
        yield* _(context.fs.writeFileString(pip, ""))
        yield* _(setAge(context, pip, 2, now))
        expect(yield* _(isActive(venv, posixProfile, now))).toBe(true)
        yield* _(setAge(context, pip, 8, now))
        expect(yield* _(isActive(venv, posixProfile, now))).toBe(false)
      })
    ).pipe(provideNodeContext))

  it.effect("fires on a project marker modified within a month", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const now = Date.now()
        const venv = yield* _(makeVenv(context, context.path.join(context.tempDir, "env")))
        const marker = context.path.join(venv, ".idea")
        yield* _(context.fs.makeDirectory(marker))
        yield* _(setAge(context, marker, 10, now))
        expect(yield* _(isActive(venv, posixProfile, now))).toBe(true)
        yield* _(setAge(context, marker, 40, now))
        expect(yield* _(isActive(venv, posixProfile, now))).toBe(false)
      })
    ).pipe(provideNodeContext))
})
