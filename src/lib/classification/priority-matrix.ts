import type { Impact, Priority, Urgency } from "./types.js"

/**
 * Priority from impact and urgency:
 *
 * | Impact \ Urgency | High | Medium | Low |
 * |------------------|------|--------|-----|
 * | High             | P1   | P2     | P3  |
 * | Medium           | P2   | P3     | P4  |
 * | Low              | P3   | P4     | P4  |
 */
const PRIORITY_MATRIX: Record<Impact, Record<Urgency, Priority>> = {
  High: { High: "P1", Medium: "P2", Low: "P3" },
  Medium: { High: "P2", Medium: "P3", Low: "P4" },
  Low: { High: "P3", Medium: "P4", Low: "P4" },
}

export function priorityFromImpactUrgency(impact: Impact, urgency: Urgency): Priority {
  return PRIORITY_MATRIX[impact][urgency]
}
