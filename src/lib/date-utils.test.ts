import { describe, it, expect } from "vitest"
import { formatDuration, formatFileTimestamp } from "./date-utils.js"

describe("formatFileTimestamp", () => {
  it("formats as YYYYMMDD_HHMMSS in UTC", () => {
    expect(formatFileTimestamp(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe("20240102_030405")
  })
})

describe("formatDuration", () => {
  it("uses seconds, minutes and hours as the duration grows", () => {
    expect(formatDuration(59.9)).toBe("59s")
    expect(formatDuration(61)).toBe("1m 1s")
    expect(formatDuration(3661)).toBe("1h 1m")
  })

  it("clamps negative durations to zero", () => {
    expect(formatDuration(-5)).toBe("0s")
  })
})
