import { Match } from "effect"

import type { EvaluatedRecord, EvaluationRecord, SortKey } from "./types.js"

// CHANGE: order evaluation records and cut the removal set down to a limit
// WHY: removal plans must be deterministic for fixed inputs
// FORMAT THEOREM: ∀rs,l: pruneCandidates(rs,l) ⊆ {r ∈ rs | r.status = remove} ∧ |result| ≤ l
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: sorting is stable; equal keys keep their input order
// COMPLEXITY: O(n log n)

type KeyValue = number | string

const timeOf = (date: Date | undefined): number => date === undefined ? 0 : date.getTime()

const keyOf = (key: SortKey) => (record: EvaluationRecord): KeyValue => {
  const evaluated = record.status === "error" ? undefined : record
  return Match.value(key).pipe(
    Match.when("age", () => evaluated?.ageDays ?? 0),
    Match.when("size", () => evaluated?.sizeBytes ?? 0),
    Match.when("name", () => record.name),
    Match.when("accessed", () => timeOf(evaluated?.lastAccessed)),
    Match.when("modified", () => timeOf(evaluated?.lastModified)),
    Match.when("created", () => timeOf(evaluated?.created)),
    Match.exhaustive
  )
}

const compareValues = (left: KeyValue, right: KeyValue): number => {
  if (left < right) {
    return -1
  }
  if (left > right) {
    return 1
  }
  return 0
}

/**
 * Sort records by the chosen key.
 *
 * @param records - Evaluation records.
 * @param key - Sort key; every key sorts descending except name.
 * @returns New sorted array; input is untouched.
 *
 * @pure true
 * @invariant error records read 0 for numeric and time keys
 * @complexity O(n log n)
 */
export const sortRecords = (
  records: ReadonlyArray<EvaluationRecord>,
  key: SortKey
): ReadonlyArray<EvaluationRecord> => {
  const read = keyOf(key)
  const direction = key === "name" ? 1 : -1
  return records.toSorted((left, right) => direction * compareValues(read(left), read(right)))
}

/**
 * Keep only remove-status records, truncated to `limit`.
 *
 * @param records - Records in their final display order.
 * @param limit - Maximum number of removals; undefined means no limit.
 * @returns Remove-status records in input order.
 *
 * @pure true
 * @complexity O(n)
 */
export const pruneCandidates = (
  records: ReadonlyArray<EvaluationRecord>,
  limit?: number
): ReadonlyArray<EvaluatedRecord> => {
  const toRemove = records.filter((record): record is EvaluatedRecord => record.status === "remove")
  return limit === undefined || toRemove.length <= limit ? toRemove : toRemove.slice(0, limit)
}
