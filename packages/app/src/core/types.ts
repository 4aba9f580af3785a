// CHANGE: define core domain types for criteria, observations, and evaluation records
// WHY: keep IO-free data structures shared by the evaluator, rules engine, and reports
// FORMAT THEOREM: ∀r ∈ EvaluationRecord: r.status ∈ {"keep","remove","error"}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: metadata fields exist exactly when status ≠ "error"
// COMPLEXITY: O(1)/O(1)

export interface Criteria {
  readonly minAgeDays: number
  readonly minSizeMb?: number
  readonly unusedOnly: boolean
}

export const sortKeys = ["age", "size", "name", "accessed", "modified", "created"] as const

export type SortKey = typeof sortKeys[number]

export interface EnvironmentSnapshot {
  readonly path: string
  readonly name: string
  readonly lastAccessed: Date
  readonly lastModified: Date
  readonly created: Date
  readonly sizeBytes: number
  readonly isActive: boolean
}

export type EnvironmentObservation =
  | { readonly _tag: "Observed"; readonly snapshot: EnvironmentSnapshot }
  | { readonly _tag: "Unreadable"; readonly path: string; readonly name: string; readonly message: string }

export interface EvaluatedRecord extends EnvironmentSnapshot {
  readonly status: "keep" | "remove"
  readonly ageDays: number
  readonly reason: string
}

export interface FailedRecord {
  readonly status: "error"
  readonly path: string
  readonly name: string
  readonly reason: string
}

export type EvaluationRecord = EvaluatedRecord | FailedRecord

export type RecordStatus = EvaluationRecord["status"]

export interface SummaryStatistics {
  readonly total: number
  readonly toRemove: number
  readonly toKeep: number
  readonly errors: number
  readonly totalBytesToRemove: number
  readonly oldest: EvaluatedRecord | undefined
  readonly newest: EvaluatedRecord | undefined
}

export type RemovalResult =
  | { readonly path: string; readonly removed: true }
  | { readonly path: string; readonly removed: false; readonly cause: string }
