import { describe, it, expect } from "vitest"
import {
  ProcessingState,
  formatProgressMessage,
  formatSummary,
  type ProgressStats,
} from "./processing-state.js"

describe("ProcessingState", () => {
  it("starts with zero counters and the cursor before the first row", () => {
    const state = ProcessingState.fresh(1000)

    expect(state.processedCount).toBe(0)
    expect(state.errorCount).toBe(0)
    expect(state.successCount).toBe(0)
    expect(state.lastProcessedIndex).toBe(-1)
    expect(state.startTime).toBe(1000)
  })

  it("counts successes and failures", () => {
    const state = ProcessingState.fresh()
    state.recordSuccess(0)
    state.recordFailure(1)
    state.recordSuccess(2)

    expect(state.processedCount).toBe(3)
    expect(state.errorCount).toBe(1)
    expect(state.successCount).toBe(2)
    expect(state.processedCount).toBe(state.errorCount + state.successCount)
  })

  it("never moves the cursor backwards", () => {
    const state = ProcessingState.fresh()
    state.recordSuccess(5)
    state.recordFailure(3)

    expect(state.lastProcessedIndex).toBe(5)
  })

  it("restores counters from a checkpoint", () => {
    const state = ProcessingState.fromCheckpoint({
      lastIndex: 49,
      processedCount: 50,
      errorCount: 2,
      startTime: 42,
    })

    expect(state.lastProcessedIndex).toBe(49)
    expect(state.processedCount).toBe(50)
    expect(state.errorCount).toBe(2)
    expect(state.startTime).toBe(42)
  })

  describe("progressStats", () => {
    it("derives rate, ETA and success rate", () => {
      const state = ProcessingState.fresh(0)
      state.recordSuccess(0)
      state.recordSuccess(1)
      state.recordSuccess(2)
      state.recordFailure(3)

      expect(state.progressStats(10, 2000)).toEqual({
        processedCount: 4,
        errorCount: 1,
        successCount: 3,
        elapsedSeconds: 2,
        rate: 2,
        etaSeconds: 3,
        successRatePct: 75,
        currentIndex: 4,
        totalRows: 10,
      })
    })

    it("reports zero rate and ETA when no time has elapsed", () => {
      const state = ProcessingState.fresh(5000)
      state.recordSuccess(0)

      const stats = state.progressStats(10, 5000)

      expect(stats.rate).toBe(0)
      expect(stats.etaSeconds).toBe(0)
    })

    it("reports a zero success rate before anything is processed", () => {
      const stats = ProcessingState.fresh(0).progressStats(10, 1000)

      expect(stats.successRatePct).toBe(0)
      expect(stats.currentIndex).toBe(0)
      expect(stats.rate).toBe(0)
    })
  })
})

describe("formatProgressMessage", () => {
  it("formats every figure with two decimals", () => {
    const stats: ProgressStats = {
      processedCount: 50,
      errorCount: 1,
      successCount: 49,
      elapsedSeconds: 20,
      rate: 2.5,
      etaSeconds: 60,
      successRatePct: 98,
      currentIndex: 50,
      totalRows: 200,
    }

    expect(formatProgressMessage(stats)).toBe(
      "Progress: 50/200 tickets | Rate: 2.50 tickets/sec | Est. remaining time: 1.00 minutes | Success rate: 98.00%"
    )
  })
})

describe("formatSummary", () => {
  it("lists totals, timing and success rate", () => {
    const stats: ProgressStats = {
      processedCount: 10,
      errorCount: 1,
      successCount: 9,
      elapsedSeconds: 90,
      rate: 0.1111,
      etaSeconds: 0,
      successRatePct: 90,
      currentIndex: 10,
      totalRows: 10,
    }

    expect(formatSummary(stats).split("\n")).toEqual([
      "Processing completed:",
      "  Total tickets processed: 10",
      "  Successful: 9",
      "  Errors: 1",
      "  Total time: 1.50 minutes",
      "  Average rate: 0.11 tickets/sec",
      "  Success rate: 90.00%",
    ])
  })
})
