import type { EvaluatedRecord, EvaluationRecord, SummaryStatistics } from "./types.js"

// CHANGE: derive summary statistics over evaluated records
// WHY: report and log the shape of a run before anything is deleted
// FORMAT THEOREM: total = toRemove + toKeep + errors
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: oldest/newest are drawn from the remove set by creation time
// COMPLEXITY: O(n)

const isRemoval = (record: EvaluationRecord): record is EvaluatedRecord => record.status === "remove"

const pickBy = (
  records: ReadonlyArray<EvaluatedRecord>,
  better: (candidate: number, current: number) => boolean
): EvaluatedRecord | undefined => {
  let chosen: EvaluatedRecord | undefined
  for (const record of records) {
    if (chosen === undefined || better(record.created.getTime(), chosen.created.getTime())) {
      chosen = record
    }
  }
  return chosen
}

/**
 * Summarize a list of evaluation records.
 *
 * @param records - Records of one run.
 * @returns Counts per status, bytes to free, and the oldest/newest removal.
 *
 * @pure true
 * @invariant ties on creation time keep the first record
 * @complexity O(n)
 */
export const summarizeRecords = (records: ReadonlyArray<EvaluationRecord>): SummaryStatistics => {
  const toRemove = records.filter(isRemoval)
  return {
    total: records.length,
    toRemove: toRemove.length,
    toKeep: records.filter((record) => record.status === "keep").length,
    errors: records.filter((record) => record.status === "error").length,
    totalBytesToRemove: toRemove.reduce((sum, record) => sum + record.sizeBytes, 0),
    oldest: pickBy(toRemove, (candidate, current) => candidate < current),
    newest: pickBy(toRemove, (candidate, current) => candidate > current)
  }
}
