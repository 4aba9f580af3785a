import type { Criteria, EvaluationRecord } from "./types.js"

// CHANGE: build removal criteria and back-solve an age threshold for a target count
// WHY: "remove about N venvs" needs a threshold derived from the observed ages
// FORMAT THEOREM: ∀rs,n: autoAdjust(rs,n).minAgeDays ≥ FLOOR_AGE_DAYS
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: minSizeMb is present only when explicitly provided
// COMPLEXITY: O(1) build / O(n log n) adjust

export const DEFAULT_MIN_AGE_DAYS = 30
export const FLOOR_AGE_DAYS = 7

export interface CriteriaInput {
  readonly minAgeDays?: number | undefined
  readonly minSizeMb?: number | undefined
  readonly unusedOnly?: boolean | undefined
}

const floorCriteria: Criteria = { minAgeDays: FLOOR_AGE_DAYS, unusedOnly: true }

/**
 * Build criteria from raw user input.
 *
 * @param input - Values collected from flags and the config file.
 * @returns Criteria with defaults applied.
 *
 * @pure true
 * @invariant absent minSizeMb means no size filter (not zero)
 * @complexity O(1)
 */
export const buildCriteria = (input: CriteriaInput): Criteria => ({
  minAgeDays: input.minAgeDays ?? DEFAULT_MIN_AGE_DAYS,
  unusedOnly: input.unusedOnly ?? true,
  ...(input.minSizeMb === undefined ? {} : { minSizeMb: input.minSizeMb })
})

const ageOf = (record: EvaluationRecord): number | undefined =>
  record.status === "error" ? undefined : record.ageDays

/**
 * Derive an age threshold that marks roughly `targetCount` records for removal.
 *
 * The threshold is the age of the `targetCount`-th oldest record, so a
 * `≥` filter over distinct ages selects exactly that many. Size and
 * activity criteria are not considered.
 *
 * @param records - Evaluated records carrying ageDays.
 * @param targetCount - Desired number of removals.
 * @returns Criteria with the derived age threshold and unusedOnly set.
 *
 * @pure true
 * @invariant result.minAgeDays ≥ 7 and result.unusedOnly = true
 * @complexity O(n log n)
 */
export const autoAdjustCriteria = (
  records: ReadonlyArray<EvaluationRecord>,
  targetCount: number
): Criteria => {
  if (records.length === 0 || targetCount <= 0 || targetCount >= records.length) {
    return floorCriteria
  }
  const byAge = records.toSorted((left, right) => (ageOf(right) ?? 0) - (ageOf(left) ?? 0))
  const index = Math.min(targetCount - 1, byAge.length - 1)
  const pivot = byAge[index]
  const threshold = pivot === undefined ? FLOOR_AGE_DAYS : ageOf(pivot) ?? FLOOR_AGE_DAYS
  return {
    minAgeDays: Math.max(FLOOR_AGE_DAYS, Math.floor(threshold)),
    unusedOnly: true
  }
}
