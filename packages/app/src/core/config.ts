import type { CliArgs } from "./cli.js"
import type { CriteriaInput } from "./criteria.js"
import type { SortKey } from "./types.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: --no-recursive always wins over any max depth
// COMPLEXITY: O(n)/O(1)

export interface FileConfig {
  readonly venvDirs?: ReadonlyArray<string>
  readonly exclude?: ReadonlyArray<string>
  readonly excludeDirs?: ReadonlyArray<string>
  readonly maxDepth?: number
  readonly minAgeDays?: number
  readonly minSizeMb?: number
  readonly unusedOnly?: boolean
  readonly sortBy?: SortKey
  readonly limit?: number
  readonly targetCount?: number
}

export interface ResolvedConfig {
  readonly venvDirs: ReadonlyArray<string> | undefined
  readonly exclude: ReadonlyArray<string>
  readonly excludeDirs: ReadonlyArray<string>
  readonly maxDepth: number
  readonly criteria: CriteriaInput
  readonly sortBy: SortKey
  readonly limit: number | undefined
  readonly targetCount: number | undefined
}

export const DEFAULT_MAX_DEPTH = 10

export const defaultExcludeDirs: ReadonlyArray<string> = [
  ".git",
  "node_modules",
  "__pycache__",
  ".pytest_cache",
  ".vscode",
  ".idea"
]

const unique = (values: ReadonlyArray<string>): ReadonlyArray<string> => [...new Set(values)]

const resolveVenvDirs = (cli: CliArgs, fileConfig: FileConfig | undefined): ReadonlyArray<string> | undefined =>
  cli.venvDir === undefined ? fileConfig?.venvDirs : [cli.venvDir]

const resolveMaxDepth = (cli: CliArgs, fileConfig: FileConfig | undefined): number =>
  cli.noRecursive ? 1 : cli.maxDepth ?? fileConfig?.maxDepth ?? DEFAULT_MAX_DEPTH

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .venv-prune.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @invariant exclude patterns from file and CLI are merged, not replaced
 * @complexity O(n)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  venvDirs: resolveVenvDirs(cli, fileConfig),
  exclude: unique([...(fileConfig?.exclude ?? []), ...cli.exclude]),
  excludeDirs: cli.excludeDirs ?? fileConfig?.excludeDirs ?? defaultExcludeDirs,
  maxDepth: resolveMaxDepth(cli, fileConfig),
  criteria: {
    minAgeDays: cli.minAgeDays ?? fileConfig?.minAgeDays,
    minSizeMb: cli.minSizeMb ?? fileConfig?.minSizeMb,
    unusedOnly: cli.unusedOnly ?? fileConfig?.unusedOnly
  },
  sortBy: cli.sortBy ?? fileConfig?.sortBy ?? "age",
  limit: cli.limit ?? fileConfig?.limit,
  targetCount: cli.targetCount ?? fileConfig?.targetCount
})
