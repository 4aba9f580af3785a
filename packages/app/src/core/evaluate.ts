import { Match } from "effect"

import { formatDays, formatMegabytes, MIB } from "./format.js"
import type { Criteria, EnvironmentObservation, EnvironmentSnapshot, EvaluatedRecord, EvaluationRecord } from "./types.js"

// CHANGE: decide keep/remove for an observed environment
// WHY: removal requires every configured criterion to pass; one failing check keeps the venv
// FORMAT THEOREM: status = remove ⟺ age ≥ minAge ∧ (minSize = ∅ ∨ size ≥ minSize·MiB) ∧ ¬(unusedOnly ∧ active)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: keep reasons list every unmet criterion in a fixed order
// COMPLEXITY: O(1)/O(1)

const MS_PER_DAY = 24 * 60 * 60 * 1000

const LARGE_VENV_BYTES = 100 * MIB

export const ageInDays = (lastAccessed: Date, now: number): number => (now - lastAccessed.getTime()) / MS_PER_DAY

const unmetCriteria = (
  snapshot: EnvironmentSnapshot,
  ageDays: number,
  criteria: Criteria
): ReadonlyArray<string> => {
  const reasons: Array<string> = []
  if (ageDays < criteria.minAgeDays) {
    reasons.push(`age below threshold (${formatDays(ageDays)} < ${criteria.minAgeDays} days)`)
  }
  if (criteria.minSizeMb !== undefined && snapshot.sizeBytes < criteria.minSizeMb * MIB) {
    reasons.push(`size below threshold (${formatMegabytes(snapshot.sizeBytes)} < ${criteria.minSizeMb} MB)`)
  }
  if (criteria.unusedOnly && snapshot.isActive) {
    reasons.push("venv appears to be active")
  }
  return reasons
}

const removalReason = (snapshot: EnvironmentSnapshot, ageDays: number): string => {
  const base = `unused for ${formatDays(ageDays)} days`
  return snapshot.sizeBytes > LARGE_VENV_BYTES
    ? `${base}, size: ${formatMegabytes(snapshot.sizeBytes)} MB`
    : base
}

/**
 * Judge a metadata snapshot against the criteria.
 *
 * @param snapshot - Metadata collected from the filesystem.
 * @param criteria - Active thresholds.
 * @param now - Reference time in epoch milliseconds.
 * @returns Record with status keep or remove.
 *
 * @pure true
 * @invariant reason for keep is the "; "-joined list of unmet criteria
 * @complexity O(1)
 */
export const judgeSnapshot = (
  snapshot: EnvironmentSnapshot,
  criteria: Criteria,
  now: number
): EvaluatedRecord => {
  const ageDays = ageInDays(snapshot.lastAccessed, now)
  const reasons = unmetCriteria(snapshot, ageDays, criteria)
  if (reasons.length > 0) {
    return { ...snapshot, ageDays, status: "keep", reason: reasons.join("; ") }
  }
  return { ...snapshot, ageDays, status: "remove", reason: removalReason(snapshot, ageDays) }
}

/**
 * Turn an observation into an evaluation record.
 *
 * @pure true
 * @invariant Unreadable observations always yield status error
 * @complexity O(1)
 */
export const judgeObservation = (
  observation: EnvironmentObservation,
  criteria: Criteria,
  now: number
): EvaluationRecord =>
  Match.value(observation).pipe(
    Match.tag("Observed", ({ snapshot }) => judgeSnapshot(snapshot, criteria, now)),
    Match.tag("Unreadable", ({ message, name, path }): EvaluationRecord => ({
      status: "error",
      path,
      name,
      reason: `evaluation error: ${message}`
    })),
    Match.exhaustive
  )
