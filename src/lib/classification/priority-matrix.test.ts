import { describe, it, expect } from "vitest"
import { priorityFromImpactUrgency } from "./priority-matrix.js"
import type { Impact, Priority, Urgency } from "./types.js"

describe("priorityFromImpactUrgency", () => {
  it.each<[Impact, Urgency, Priority]>([
    ["High", "High", "P1"],
    ["High", "Medium", "P2"],
    ["Medium", "High", "P2"],
    ["High", "Low", "P3"],
    ["Medium", "Medium", "P3"],
    ["Low", "High", "P3"],
    ["Medium", "Low", "P4"],
    ["Low", "Medium", "P4"],
    ["Low", "Low", "P4"],
  ])("maps %s impact and %s urgency to %s", (impact, urgency, priority) => {
    expect(priorityFromImpactUrgency(impact, urgency)).toBe(priority)
  })
})
