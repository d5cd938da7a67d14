import { describe, it, expect, vi } from "vitest"
import { CLIStatusBar, visibleLength, type CLIStatusBarOutput } from "./cli-status-bar.js"
import type { ProgressStats } from "./processing-state.js"

function fakeOutput(isTTY: boolean) {
  const writes: string[] = []
  const output: CLIStatusBarOutput = {
    isTTY,
    rows: 20,
    columns: 40,
    write: (chunk: string) => {
      writes.push(chunk)
      return true
    },
    on: vi.fn(),
    off: vi.fn(),
  }
  return { output, writes }
}

const STATS: ProgressStats = {
  processedCount: 5,
  errorCount: 1,
  successCount: 4,
  elapsedSeconds: 65,
  rate: 0.5,
  etaSeconds: 10,
  successRatePct: 80,
  currentIndex: 5,
  totalRows: 10,
}

function strip(line: string): string {
  return line.replace(/\x1b\[[0-9;]*[A-Za-z]/g, "")
}

describe("visibleLength", () => {
  it("ignores ANSI escape sequences", () => {
    expect(visibleLength("\x1b[36m[\x1b[97m5/10\x1b[0m")).toBe(5)
  })
})

describe("CLIStatusBar", () => {
  it("writes nothing when the output is not a TTY", () => {
    const { output, writes } = fakeOutput(false)
    const bar = new CLIStatusBar({ totalItems: 10, itemLabel: "tickets" }, true, output)

    bar.start()
    bar.update(STATS)
    bar.stop()

    expect(bar.enabled).toBe(false)
    expect(writes).toEqual([])
  })

  it("writes nothing when disabled explicitly", () => {
    const { output, writes } = fakeOutput(true)
    const bar = new CLIStatusBar({ totalItems: 10, itemLabel: "tickets" }, false, output)

    bar.start()
    bar.update(STATS)

    expect(writes).toEqual([])
  })

  it("formats progress, rate, errors and ETA across the terminal width", () => {
    const { output } = fakeOutput(true)
    const bar = new CLIStatusBar({ totalItems: 10, itemLabel: "tickets" }, true, output)
    bar.start()
    bar.update(STATS)

    const [elapsedLine, statusLine] = bar.formatLines().map(strip)

    expect(elapsedLine).toBe("Elapsed: 1m 5s  rate: 0.50/s  errors: 1 ETA: ~10s")
    expect(statusLine).toBe(`[5/10 tickets]${" ".repeat(23)}50%`)
  })

  it("restores the terminal and stops listening for resizes", () => {
    const { output, writes } = fakeOutput(true)
    const bar = new CLIStatusBar({ totalItems: 10, itemLabel: "tickets" }, true, output)
    bar.start()
    const writesBeforeStop = writes.length

    bar.stop()
    bar.stop()

    expect(output.on).toHaveBeenCalledWith("resize", expect.any(Function))
    expect(output.off).toHaveBeenCalledTimes(1)
    expect(writes).toHaveLength(writesBeforeStop + 1)
    expect(writes[writes.length - 1].startsWith("\x1b[r")).toBe(true)
  })
})
