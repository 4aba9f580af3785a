import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { autoAdjustCriteria, buildCriteria } from "../../src/core/criteria.js"
import type { EvaluatedRecord, EvaluationRecord } from "../../src/core/types.js"

const created = new Date("2024-01-01T00:00:00Z")

const aged = (ageDays: number): EvaluatedRecord => ({
  path: `/venvs/env-${ageDays}`,
  name: `env-${ageDays}`,
  lastAccessed: created,
  lastModified: created,
  created,
  sizeBytes: 0,
  isActive: false,
  status: "keep",
  ageDays,
  reason: "age below threshold"
})

const spread = [5, 10, 15, 20, 30, 60, 90].map(aged)

describe("buildCriteria", () => {
  it.effect("applies defaults and leaves the size filter off", () =>
    Effect.sync(() => {
      expect(buildCriteria({})).toEqual({ minAgeDays: 30, unusedOnly: true })
    }))

  it.effect("keeps explicit values, including unusedOnly = false", () =>
    Effect.sync(() => {
      expect(buildCriteria({ minAgeDays: 0, minSizeMb: 50, unusedOnly: false })).toEqual({
        minAgeDays: 0,
        minSizeMb: 50,
        unusedOnly: false
      })
    }))
})

describe("autoAdjustCriteria", () => {
  it.effect("uses the age of the n-th oldest venv as threshold", () =>
    Effect.sync(() => {
      expect(autoAdjustCriteria(spread, 3)).toEqual({ minAgeDays: 30, unusedOnly: true })
      expect(autoAdjustCriteria(spread, 6)).toEqual({ minAgeDays: 10, unusedOnly: true })
    }))

  it.effect("does not depend on input order", () =>
    Effect.sync(() => {
      expect(autoAdjustCriteria(spread.toReversed(), 3).minAgeDays).toBe(30)
    }))

  it.effect("floors fractional ages", () =>
    Effect.sync(() => {
      expect(autoAdjustCriteria([aged(40.7), aged(35.2), aged(20)], 2).minAgeDays).toBe(35)
    }))

  it.effect("never goes below seven days", () =>
    Effect.sync(() => {
      expect(autoAdjustCriteria([aged(3), aged(4), aged(5), aged(6)], 2).minAgeDays).toBe(7)
    }))

  it.effect("falls back to the floor for degenerate targets", () =>
    Effect.sync(() => {
      const floor = { minAgeDays: 7, unusedOnly: true }
      expect(autoAdjustCriteria([], 3)).toEqual(floor)
      expect(autoAdjustCriteria(spread, 0)).toEqual(floor)
      expect(autoAdjustCriteria(spread, 7)).toEqual(floor)
      expect(autoAdjustCriteria(spread, 10)).toEqual(floor)
    }))

  it.effect("ranks error records as age zero", () =>
    Effect.sync(() => {
      const failed: EvaluationRecord = { status: "error", path: "/venvs/bad", name: "bad", reason: "denied" }
      expect(autoAdjustCriteria([failed, aged(50), aged(20)], 2).minAgeDays).toBe(20)
    }))
})
