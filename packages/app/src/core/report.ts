import { formatDays, formatSize, formatTimestamp } from "./format.js"
import type { Criteria, EvaluatedRecord, EvaluationRecord, SummaryStatistics } from "./types.js"

// CHANGE: build the removal report and render output formats
// WHY: keep reporting pure and deterministic across dry runs and confirmed runs
// FORMAT THEOREM: ∀r: render(r) lists every record exactly once
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: plan order equals the order removals are attempted
// COMPLEXITY: O(n)

export interface Report {
  readonly criteria: Criteria
  readonly records: ReadonlyArray<EvaluationRecord>
  readonly plan: ReadonlyArray<EvaluatedRecord>
  readonly summary: SummaryStatistics
}

const formatCriteria = (criteria: Criteria): string =>
  [
    `minAgeDays=${criteria.minAgeDays}`,
    `minSizeMb=${criteria.minSizeMb ?? "(none)"}`,
    `unusedOnly=${criteria.unusedOnly}`
  ].join(", ")

const formatList = (title: string, values: ReadonlyArray<string>): ReadonlyArray<string> => {
  if (values.length === 0) {
    return [`${title}: (none)`]
  }
  return [title + ":", ...values.map((value) => `  - ${value}`)]
}

const formatPlanned = (record: EvaluatedRecord): string =>
  `${record.path} (${formatDays(record.ageDays)} days, ${formatSize(record.sizeBytes)}): ${record.reason}`

const formatEdge = (label: string, record: EvaluatedRecord | undefined): ReadonlyArray<string> =>
  record === undefined ? [] : [`${label}: ${record.name} (created ${formatTimestamp(record.created)})`]

/**
 * Render a human-readable report.
 *
 * @param report - Report data.
 * @returns Multi-line string for stdout.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderHumanReport = (report: Report): string => {
  const { summary } = report
  const planBytes = report.plan.reduce((sum, record) => sum + record.sizeBytes, 0)
  const kept = report.records.filter((record) => record.status === "keep")
  const failed = report.records.filter((record) => record.status === "error")
  return [
    `Criteria: ${formatCriteria(report.criteria)}`,
    `Venvs: total=${summary.total}, remove=${summary.toRemove}, keep=${summary.toKeep}, errors=${summary.errors}`,
    ...formatList(
      `Planned removals (${report.plan.length}, ${formatSize(planBytes)})`,
      report.plan.map(formatPlanned)
    ),
    ...formatList("Kept", kept.map((record) => `${record.path}: ${record.reason}`)),
    ...formatList("Errors", failed.map((record) => `${record.path}: ${record.reason}`)),
    ...formatEdge("Oldest removal", summary.oldest),
    ...formatEdge("Newest removal", summary.newest)
  ].join("\n")
}

const recordToJson = (record: EvaluationRecord) =>
  record.status === "error"
    ? { path: record.path, name: record.name, status: record.status, reason: record.reason }
    : {
      path: record.path,
      name: record.name,
      status: record.status,
      reason: record.reason,
      lastAccessed: record.lastAccessed.toISOString(),
      lastModified: record.lastModified.toISOString(),
      created: record.created.toISOString(),
      sizeBytes: record.sizeBytes,
      ageDays: Math.round(record.ageDays * 10) / 10,
      isActive: record.isActive
    }

/**
 * Render report as JSON text.
 *
 * @pure true
 * @invariant timestamps are ISO-8601, ages rounded to one decimal
 * @complexity O(n)
 */
export const renderJsonReport = (report: Report): string =>
  JSON.stringify(
    {
      criteria: report.criteria,
      summary: {
        total: report.summary.total,
        toRemove: report.summary.toRemove,
        toKeep: report.summary.toKeep,
        errors: report.summary.errors,
        totalBytesToRemove: report.summary.totalBytesToRemove,
        oldest: report.summary.oldest?.path ?? null,
        newest: report.summary.newest?.path ?? null
      },
      plan: report.plan.map((record) => record.path),
      records: report.records.map(recordToJson)
    },
    null,
    2
  )
