import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { pruneCandidates, sortRecords } from "../../src/core/prune.js"
import { summarizeRecords } from "../../src/core/summary.js"
import type { EvaluatedRecord, EvaluationRecord } from "../../src/core/types.js"

const record = (
  name: string,
  status: "keep" | "remove",
  ageDays: number,
  sizeBytes: number,
  createdIso: string
): EvaluatedRecord => {
  const created = new Date(createdIso)
  return {
    path: `/venvs/${name}`,
    name,
    lastAccessed: created,
    lastModified: created,
    created,
    sizeBytes,
    isActive: false,
    status,
    ageDays,
    reason: status === "remove" ? "unused" : "recent"
  }
}

const failed: EvaluationRecord = { status: "error", path: "/venvs/broken", name: "broken", reason: "evaluation error" }

const beta = record("beta", "remove", 40, 300, "2024-02-01T00:00:00Z")
const alpha = record("alpha", "keep", 12, 900, "2024-03-01T00:00:00Z")
const gamma = record("gamma", "remove", 75, 100, "2023-12-01T00:00:00Z")
const delta = record("delta", "remove", 40, 50, "2024-01-15T00:00:00Z")

const names = (records: ReadonlyArray<EvaluationRecord>) => records.map((item) => item.name)

describe("sortRecords", () => {
  it.effect("sorts by age, oldest first, error records last", () =>
    Effect.sync(() => {
      expect(names(sortRecords([failed, beta, alpha, gamma], "age"))).toEqual(["gamma", "beta", "alpha", "broken"])
    }))

  it.effect("sorts names ascending", () =>
    Effect.sync(() => {
      expect(names(sortRecords([gamma, beta, failed, alpha], "name"))).toEqual(["alpha", "beta", "broken", "gamma"])
    }))

  it.effect("sorts by size descending", () =>
    Effect.sync(() => {
      expect(names(sortRecords([beta, gamma, alpha], "size"))).toEqual(["alpha", "beta", "gamma"])
    }))

  it.effect("sorts timestamps newest first", () =>
    Effect.sync(() => {
      expect(names(sortRecords([gamma, alpha, beta], "created"))).toEqual(["alpha", "beta", "gamma"])
    }))

  it.effect("keeps input order for equal keys", () =>
    Effect.sync(() => {
      expect(names(sortRecords([delta, beta], "age"))).toEqual(["delta", "beta"])
      expect(names(sortRecords([beta, delta], "age"))).toEqual(["beta", "delta"])
    }))

  it.effect("does not mutate its input", () =>
    Effect.sync(() => {
      const input = [alpha, gamma]
      sortRecords(input, "age")
      expect(names(input)).toEqual(["alpha", "gamma"])
    }))
})

describe("pruneCandidates", () => {
  it.effect("keeps only removals, in order", () =>
    Effect.sync(() => {
      expect(names(pruneCandidates([gamma, alpha, failed, beta]))).toEqual(["gamma", "beta"])
    }))

  it.effect("truncates to the limit", () =>
    Effect.sync(() => {
      expect(names(pruneCandidates([gamma, beta, delta], 2))).toEqual(["gamma", "beta"])
      expect(pruneCandidates([gamma, beta], 0)).toEqual([])
      expect(names(pruneCandidates([gamma], 5))).toEqual(["gamma"])
    }))
})

describe("summarizeRecords", () => {
  it.effect("counts statuses and bytes to free", () =>
    Effect.sync(() => {
      const summary = summarizeRecords([gamma, alpha, failed, beta, delta])
      expect(summary.total).toBe(5)
      expect(summary.toRemove).toBe(3)
      expect(summary.toKeep).toBe(1)
      expect(summary.errors).toBe(1)
      expect(summary.totalBytesToRemove).toBe(450)
      expect(summary.oldest?.name).toBe("gamma")
      expect(summary.newest?.name).toBe("beta")
    }))

  it.effect("has no oldest or newest without removals", () =>
    Effect.sync(() => {
      const summary = summarizeRecords([alpha, failed])
      expect(summary.oldest).toBeUndefined()
      expect(summary.newest).toBeUndefined()
      expect(summary.totalBytesToRemove).toBe(0)
    }))
})
