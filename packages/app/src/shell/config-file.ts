import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"
import { sortKeys } from "../core/types.js"

// CHANGE: decode .venv-prune.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: a missing default config yields undefined; a missing explicit one fails
// COMPLEXITY: O(n)

export const DEFAULT_CONFIG_PATH = "./.venv-prune.json"

const Count = S.Number.pipe(S.int(), S.nonNegative())
const PositiveCount = S.Number.pipe(S.int(), S.positive())

const RawConfigSchema = S.partial(
  S.Struct({
    venvDirs: S.Array(S.String),
    exclude: S.Array(S.String),
    excludeDirs: S.Array(S.String),
    maxDepth: PositiveCount,
    minAgeDays: Count,
    minSizeMb: PositiveCount,
    unusedOnly: S.Boolean,
    sortBy: S.Literal(...sortKeys),
    limit: Count,
    targetCount: PositiveCount
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.venvDirs === undefined ? {} : { venvDirs: config.venvDirs }),
      ...(config.exclude === undefined ? {} : { exclude: config.exclude }),
      ...(config.excludeDirs === undefined ? {} : { excludeDirs: config.excludeDirs }),
      ...(config.maxDepth === undefined ? {} : { maxDepth: config.maxDepth }),
      ...(config.minAgeDays === undefined ? {} : { minAgeDays: config.minAgeDays }),
      ...(config.minSizeMb === undefined ? {} : { minSizeMb: config.minSizeMb }),
      ...(config.unusedOnly === undefined ? {} : { unusedOnly: config.unusedOnly }),
      ...(config.sortBy === undefined ? {} : { sortBy: config.sortBy }),
      ...(config.limit === undefined ? {} : { limit: config.limit }),
      ...(config.targetCount === undefined ? {} : { targetCount: config.targetCount })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string | undefined,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (path === undefined) {
      return
    }
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    return yield* _(decodeConfig(contents))
  })
