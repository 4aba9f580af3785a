import * as Either from "effect/Either"

import type { SortKey } from "./types.js"
import { sortKeys } from "./types.js"

// CHANGE: implement deterministic CLI parsing for venv-prune
// WHY: keep CLI decoding pure and testable at the boundary
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → every flag in argv is known
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected
// COMPLEXITY: O(n) where n = argv length

export interface CliArgs {
  readonly venvDir: string | undefined
  readonly exclude: ReadonlyArray<string>
  readonly excludeDirs: ReadonlyArray<string> | undefined
  readonly maxDepth: number | undefined
  readonly noRecursive: boolean
  readonly minAgeDays: number | undefined
  readonly minSizeMb: number | undefined
  readonly unusedOnly: boolean | undefined
  readonly sortBy: SortKey | undefined
  readonly limit: number | undefined
  readonly targetCount: number | undefined
  readonly yes: boolean
  readonly dryRun: boolean
  readonly json: boolean
  readonly silent: boolean
  readonly verbose: boolean
  readonly help: boolean
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const usage = [
  "Usage: venv-prune [options]",
  "",
  "Find uv-managed virtual environments and remove the unused ones (dry run unless confirmed).",
  "",
  "Options:",
  "  --venv-dir <dir>        directory to scan (defaults to standard uv locations)",
  "  --exclude <glob>        skip venv paths matching this pattern (repeatable)",
  "  --max-depth <n>         maximum recursion depth (default: 10)",
  "  --no-recursive          only look at direct children of each directory",
  "  --exclude-dir <name>    directory names never descended into (repeatable)",
  "  --min-age-days <n>      minimum days since last access (default: 30)",
  "  --min-size-mb <n>       minimum size in MB",
  "  --unused-only [bool]    keep venvs that look active (default: true)",
  `  --sort-by <key>         one of ${sortKeys.join(", ")} (default: age)`,
  "  --limit <n>             remove at most n venvs",
  "  --target-count <n>      derive the age threshold to remove about n venvs",
  "  --yes                   remove without prompting",
  "  --dry-run               report only, never prompt or remove",
  "  --json                  JSON report and JSON logs",
  "  --silent                do not print the report",
  "  --verbose, -v           debug logging",
  "  --config <file>         config file (default: ./.venv-prune.json)",
  "  --help, -h              show this message"
].join("\n")

const isFlag = (value: string): boolean => value.startsWith("-")

const splitList = (value: string): ReadonlyArray<string> =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseCount = (
  flagName: string,
  value: string,
  minimum: number
): Either.Either<number, CliError> => {
  const parsed = /^\d+$/u.test(value) ? Number(value) : Number.NaN
  if (!Number.isSafeInteger(parsed) || parsed < minimum) {
    return Either.left(cliError(`--${flagName} expects an integer ≥ ${minimum}, got: ${value}`))
  }
  return Either.right(parsed)
}

const isSortKey = (value: string): value is SortKey => sortKeys.some((key) => key === value)

const parseSortKey = (value: string): Either.Either<SortKey, CliError> =>
  isSortKey(value)
    ? Either.right(value)
    : Either.left(cliError(`--sort-by expects one of ${sortKeys.join(", ")}, got: ${value}`))

const defaultArgs: CliArgs = {
  venvDir: undefined,
  exclude: [],
  excludeDirs: undefined,
  maxDepth: undefined,
  noRecursive: false,
  minAgeDays: undefined,
  minSizeMb: undefined,
  unusedOnly: undefined,
  sortBy: undefined,
  limit: undefined,
  targetCount: undefined,
  yes: false,
  dryRun: false,
  json: false,
  silent: false,
  verbose: false,
  help: false,
  configPath: undefined,
  configPathExplicit: false
}

interface ParsedFlag {
  readonly next: CliArgs
  readonly consumed: number
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: CliArgs): Either.Either<ParsedFlag, CliError> => Either.right({ next, consumed: 1 })

const parseValueFlag = <A>(
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (value: string) => Either.Either<A, CliError>,
  update: (args: CliArgs, value: A) => CliArgs
): Either.Either<ParsedFlag, CliError> =>
  readFlagValue(flagName, inlineValue, nextValue).pipe(
    Either.flatMap(decode),
    Either.map((value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    }))
  )

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Either.Either<ParsedFlag, CliError> => {
  const useNext = inlineValue === undefined && nextValue !== undefined && !isFlag(nextValue)
  const nextValueResolved = inlineValue ?? (useNext ? nextValue : "true")
  return Either.map(parseBoolean(nextValueResolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

const asString = (value: string): Either.Either<string, CliError> => Either.right(value)

const count = (flagName: string, minimum: number) => (value: string): Either.Either<number, CliError> =>
  parseCount(flagName, value, minimum)

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  yes: (current) => setParsedFlag({ ...current, yes: true }),
  "dry-run": (current) => setParsedFlag({ ...current, dryRun: true }),
  json: (current) => setParsedFlag({ ...current, json: true }),
  silent: (current) => setParsedFlag({ ...current, silent: true }),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }),
  help: (current) => setParsedFlag({ ...current, help: true }),
  "no-recursive": (current) => setParsedFlag({ ...current, noRecursive: true }),
  "unused-only": (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      unusedOnly: value
    })),
  "venv-dir": (current, inlineValue, nextValue) =>
    parseValueFlag("venv-dir", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      venvDir: value
    })),
  exclude: (current, inlineValue, nextValue) =>
    parseValueFlag("exclude", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      exclude: [...args.exclude, ...splitList(value)]
    })),
  "exclude-dir": (current, inlineValue, nextValue) =>
    parseValueFlag("exclude-dir", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      excludeDirs: [...(args.excludeDirs ?? []), ...splitList(value)]
    })),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag("max-depth", current, inlineValue, nextValue, count("max-depth", 1), (args, value) => ({
      ...args,
      maxDepth: value
    })),
  "min-age-days": (current, inlineValue, nextValue) =>
    parseValueFlag("min-age-days", current, inlineValue, nextValue, count("min-age-days", 0), (args, value) => ({
      ...args,
      minAgeDays: value
    })),
  "min-size-mb": (current, inlineValue, nextValue) =>
    parseValueFlag("min-size-mb", current, inlineValue, nextValue, count("min-size-mb", 1), (args, value) => ({
      ...args,
      minSizeMb: value
    })),
  "sort-by": (current, inlineValue, nextValue) =>
    parseValueFlag("sort-by", current, inlineValue, nextValue, parseSortKey, (args, value) => ({
      ...args,
      sortBy: value
    })),
  limit: (current, inlineValue, nextValue) =>
    parseValueFlag("limit", current, inlineValue, nextValue, count("limit", 0), (args, value) => ({
      ...args,
      limit: value
    })),
  "target-count": (current, inlineValue, nextValue) =>
    parseValueFlag("target-count", current, inlineValue, nextValue, count("target-count", 1), (args, value) => ({
      ...args,
      targetCount: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      configPath: value,
      configPathExplicit: true
    }))
}

const shortFlags: Record<string, string> = {
  "-v": "--verbose",
  "-h": "--help"
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  const expanded = shortFlags[raw] ?? raw
  if (!expanded.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = expanded.slice(2).split("=", 2)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant flags left unset stay undefined so config files can fill them
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  let args = defaultArgs
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}
