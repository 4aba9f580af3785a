import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import type { Path as PathService } from "@effect/platform/Path"
import type { Terminal as TerminalService } from "@effect/platform/Terminal"
import * as Clock from "effect/Clock"
import * as Effect from "effect/Effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs, usage } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import { autoAdjustCriteria, buildCriteria } from "../core/criteria.js"
import { type AppError, confirmationRequired, noSearchDirectories } from "../core/errors.js"
import { judgeObservation } from "../core/evaluate.js"
import { formatDays, formatSize } from "../core/format.js"
import { filterPaths } from "../core/glob.js"
import type { PlatformProfile } from "../core/platform-profile.js"
import { profileForPlatform } from "../core/platform-profile.js"
import { pruneCandidates, sortRecords } from "../core/prune.js"
import type { Reporter } from "../core/reporter.js"
import type { Report } from "../core/report.js"
import { renderHumanReport, renderJsonReport } from "../core/report.js"
import { summarizeRecords } from "../core/summary.js"
import type { Criteria, EnvironmentObservation, EvaluatedRecord, EvaluationRecord, RemovalResult } from "../core/types.js"
import { loadConfigFile, DEFAULT_CONFIG_PATH } from "../shell/config-file.js"
import { getDefaultDirs } from "../shell/default-dirs.js"
import { observeEnvironment } from "../shell/evaluate.js"
import { effectLogReporter, loggerLayer } from "../shell/logging.js"
import { confirm, isInteractive } from "../shell/prompt.js"
import { removeEnvironment } from "../shell/remove.js"
import { findEnvironments } from "../shell/scan.js"

// CHANGE: orchestrate scan → evaluate → plan → confirm → remove
// WHY: single entrypoint with typed errors and a dry run unless confirmed
// FORMAT THEOREM: ∀run: removals ⊆ plan ∧ (removals ≠ ∅ → confirmed)
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem | Path | Terminal>
// INVARIANT: report emitted at most once; nothing is removed without --yes or a "y" answer
// COMPLEXITY: O(n) where n = directories visited + files in candidate venvs

export interface ProgramResult {
  readonly report: Report | undefined
  readonly removals: ReadonlyArray<RemovalResult>
  readonly exitCode: number
}

type ProgramEnv = FileSystemService | PathService | TerminalService

const CONFIRM_QUESTION = "\nContinue and remove these venvs? [y/N]: "

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitReport = (report: Report, json: boolean, silent: boolean): Effect.Effect<void> => {
  if (silent) {
    return Effect.void
  }
  const payload = json ? renderJsonReport(report) : renderHumanReport(report)
  return writeStdout(payload)
}

const resolveSearchDirs = (
  config: ResolvedConfig,
  reporter: Reporter
): Effect.Effect<ReadonlyArray<string>, AppError, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const candidates = config.venvDirs ?? (yield* _(getDefaultDirs(reporter)))
    const existing = yield* _(
      Effect.filter(candidates, (dir) => fs.exists(dir).pipe(Effect.orElseSucceed(() => false)))
    )
    if (existing.length === 0) {
      yield* _(reporter.error("no_valid_venv_dirs_found", { checked: candidates }))
      return yield* _(Effect.fail(noSearchDirectories(candidates)))
    }
    return existing
  })

const scanDirectories = (
  dirs: ReadonlyArray<string>,
  config: ResolvedConfig,
  profile: PlatformProfile,
  reporter: Reporter
): Effect.Effect<ReadonlyArray<string>, never, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const found: Array<string> = []
    for (const dir of dirs) {
      yield* _(reporter.info("scanning", { dir, maxDepth: config.maxDepth }))
      const venvs = yield* _(findEnvironments({
        baseDir: dir,
        maxDepth: config.maxDepth,
        excludeDirs: config.excludeDirs,
        profile,
        reporter
      }))
      yield* _(reporter.info("found_venvs", { dir, count: venvs.length }))
      found.push(...venvs)
    }
    return [...new Set(found)]
  })

const judgeAll = (
  observations: ReadonlyArray<EnvironmentObservation>,
  criteria: Criteria,
  now: number
): ReadonlyArray<EvaluationRecord> => observations.map((observation) => judgeObservation(observation, criteria, now))

const chooseCriteria = (
  observations: ReadonlyArray<EnvironmentObservation>,
  config: ResolvedConfig,
  now: number,
  reporter: Reporter
): Effect.Effect<Criteria> =>
  Effect.gen(function*(_) {
    const base = buildCriteria(config.criteria)
    if (config.targetCount === undefined) {
      return base
    }
    const adjusted = autoAdjustCriteria(judgeAll(observations, base, now), config.targetCount)
    yield* _(reporter.info("criteria_auto_adjusted", {
      targetCount: config.targetCount,
      minAgeDays: adjusted.minAgeDays
    }))
    return adjusted
  })

const confirmRemoval = (
  cli: CliArgs,
  reporter: Reporter
): Effect.Effect<boolean, AppError, TerminalService> =>
  Effect.gen(function*(_) {
    if (cli.yes) {
      return true
    }
    if (!(yield* _(isInteractive))) {
      yield* _(reporter.error("confirmation_required_in_non_interactive_mode"))
      return yield* _(Effect.fail(confirmationRequired))
    }
    const accepted = yield* _(confirm(CONFIRM_QUESTION))
    if (!accepted) {
      yield* _(reporter.info("operation_aborted"))
    }
    return accepted
  })

const removePlanned = (
  plan: ReadonlyArray<EvaluatedRecord>,
  reporter: Reporter
): Effect.Effect<ReadonlyArray<RemovalResult>, never, FileSystemService> =>
  Effect.forEach(
    plan,
    (record) =>
      removeEnvironment(record.path).pipe(
        Effect.tap((result) =>
          result.removed
            ? reporter.info("venv_removed", { path: record.path, size: formatSize(record.sizeBytes) })
            : reporter.error("failed_to_remove_venv", { path: record.path, error: result.cause })
        )
      ),
    { concurrency: 1 }
  )

const execute = (
  cli: CliArgs,
  reporter: Reporter
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const configPath = cli.configPath ?? DEFAULT_CONFIG_PATH
    const fileConfig = yield* _(loadConfigFile(configPath, cli.configPathExplicit))
    const config = resolveConfig(cli, fileConfig)
    const profile = yield* _(Effect.sync(() => profileForPlatform(process.platform)))

    const dirs = yield* _(resolveSearchDirs(config, reporter))
    const discovered = yield* _(scanDirectories(dirs, config, profile, reporter))
    if (discovered.length === 0) {
      yield* _(reporter.info("no_venvs_found"))
    }
    const candidates = filterPaths(discovered, config.exclude)
    if (config.exclude.length > 0) {
      yield* _(reporter.info("after_exclusions", { count: candidates.length }))
    }

    const now = yield* _(Clock.currentTimeMillis)
    const observations = yield* _(
      Effect.forEach(candidates, (candidate) => observeEnvironment(candidate, { profile, now }), { concurrency: 1 })
    )
    const criteria = yield* _(chooseCriteria(observations, config, now, reporter))
    yield* _(reporter.info("using_criteria", { ...criteria }))

    const records = sortRecords(judgeAll(observations, criteria, now), config.sortBy)
    const summary = summarizeRecords(records)
    yield* _(reporter.info("summary", {
      total: summary.total,
      toRemove: summary.toRemove,
      toKeep: summary.toKeep,
      errors: summary.errors,
      totalSizeToRemove: formatSize(summary.totalBytesToRemove)
    }))
    const plan = pruneCandidates(records, config.limit)
    if (config.limit !== undefined && plan.length < summary.toRemove) {
      yield* _(reporter.info("limiting_removal", { original: summary.toRemove, limit: config.limit }))
    }
    const report: Report = { criteria, records, plan, summary }
    yield* _(emitReport(report, cli.json, cli.silent))
    yield* _(Effect.forEach(plan, (record) =>
      reporter.info("venv_to_remove", {
        path: record.path,
        ageDays: formatDays(record.ageDays),
        size: formatSize(record.sizeBytes),
        reason: record.reason
      }), { discard: true }))

    if (plan.length === 0) {
      yield* _(reporter.info("no_venvs_to_remove", { totalFound: records.length }))
      return { report, removals: [], exitCode: 0 }
    }
    if (cli.dryRun) {
      yield* _(reporter.info("dry_run_complete", { venvsToRemove: plan.length }))
      return { report, removals: [], exitCode: 0 }
    }
    if (!(yield* _(confirmRemoval(cli, reporter)))) {
      return { report, removals: [], exitCode: 0 }
    }

    const removals = yield* _(removePlanned(plan, reporter))
    const freed = plan
      .filter((record) => removals.some((result) => result.removed && result.path === record.path))
      .reduce((sum, record) => sum + record.sizeBytes, 0)
    yield* _(reporter.info("operation_complete", {
      venvsRemoved: removals.filter((result) => result.removed).length,
      totalSizeFreed: formatSize(freed)
    }))
    return { report, removals, exitCode: 0 }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with report, removal results, and exit code.
 *
 * @pure false
 * @effect FileSystem, Path, Terminal, Clock, Logger
 * @invariant dry run unless --yes or an interactive "y"
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    if (cli.help) {
      yield* _(writeStdout(usage))
      return { report: undefined, removals: [], exitCode: 0 }
    }
    return yield* _(
      execute(cli, effectLogReporter).pipe(
        Effect.provide(loggerLayer({ json: cli.json, verbose: cli.verbose }))
      )
    )
  })
