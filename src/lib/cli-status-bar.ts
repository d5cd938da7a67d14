/**
 * Terminal status bar for classification runs.
 *
 * Reserves the bottom lines of the terminal with an ANSI scroll region so log
 * output scrolls above a fixed panel showing progress, rate, ETA and error
 * counts. Does nothing when stdout is not a TTY.
 *
 * Usage:
 * ```typescript
 * const statusBar = new CLIStatusBar({ totalItems: table.rows.length, itemLabel: "tickets" })
 * statusBar.start()
 * statusBar.update(state.progressStats(table.rows.length))
 * statusBar.stop()
 * ```
 */

import { formatDuration } from "./date-utils.js"
import type { ProgressStats } from "./processing-state.js"

// ANSI escape codes for cursor/screen control
const ESC = "\x1b["
const SAVE_CURSOR = `${ESC}s`
const RESTORE_CURSOR = `${ESC}u`
const CLEAR_LINE = `${ESC}K`
const RESET_SCROLL_REGION = `${ESC}r`

const RESET = `${ESC}0m`
const DIM = `${ESC}2m`
const FG_CYAN = `${ESC}36m`
const FG_WHITE = `${ESC}37m`
const BG_BLACK = `${ESC}40m`
const FG_BRIGHT_WHITE = `${ESC}97m`
const FG_BRIGHT_CYAN = `${ESC}96m`
const FG_BRIGHT_GREEN = `${ESC}92m`
const FG_BRIGHT_YELLOW = `${ESC}93m`
const FG_BRIGHT_RED = `${ESC}91m`

/** separator + elapsed/ETA + progress */
const STATUS_HEIGHT = 3

export interface CLIStatusBarConfig {
  totalItems: number
  /** Label for items (e.g. 'tickets') */
  itemLabel: string
  /** Optional mode label shown after the count (e.g. 'resumed') */
  mode?: string
}

export interface CLIStatusBarOutput {
  isTTY?: boolean
  rows?: number
  columns?: number
  write(chunk: string): boolean
  on(event: "resize", listener: () => void): unknown
  off(event: "resize", listener: () => void): unknown
}

/**
 * Calculate visible length of a string (excluding ANSI codes).
 */
export function visibleLength(str: string): number {
  return str.replace(/\x1b\[[0-9;]*[A-Za-z]/g, "").length
}

function percentageColor(percentage: number): string {
  if (percentage >= 75) return FG_BRIGHT_GREEN
  if (percentage >= 50) return FG_BRIGHT_CYAN
  if (percentage >= 25) return FG_BRIGHT_YELLOW
  return FG_WHITE
}

export class CLIStatusBar {
  private config: CLIStatusBarConfig
  private output: CLIStatusBarOutput
  private stats: ProgressStats | null = null
  private isRunning = false
  private isEnabled: boolean
  private rows = 24
  private cols = 80
  private resizeHandler: (() => void) | null = null

  constructor(
    config: CLIStatusBarConfig,
    enabled = true,
    output: CLIStatusBarOutput = process.stdout
  ) {
    this.config = config
    this.output = output
    this.isEnabled = enabled && output.isTTY === true
  }

  get enabled(): boolean {
    return this.isEnabled
  }

  start(): void {
    this.isRunning = true
    if (!this.isEnabled) return

    this.rows = this.output.rows || 24
    this.cols = this.output.columns || 80
    this.setupScrollRegion(true)
    this.resizeHandler = () => {
      if (!this.isRunning) return
      this.rows = this.output.rows || 24
      this.cols = this.output.columns || 80
      this.setupScrollRegion()
      this.render()
    }
    this.output.on("resize", this.resizeHandler)
    this.render()
  }

  update(stats: ProgressStats): void {
    this.stats = stats
    this.render()
  }

  /**
   * Restore the terminal. Safe to call more than once.
   */
  stop(): void {
    const wasRunning = this.isRunning
    this.isRunning = false
    if (!this.isEnabled || !wasRunning) return

    if (this.resizeHandler) {
      this.output.off("resize", this.resizeHandler)
      this.resizeHandler = null
    }

    let output = RESET_SCROLL_REGION
    for (let row = this.rows - STATUS_HEIGHT + 1; row <= this.rows; row++) {
      output += `${ESC}${row};1H${CLEAR_LINE}`
    }
    output += `${ESC}${this.rows};1H`
    this.output.write(output)
  }

  /**
   * The two status lines for the current stats, without cursor positioning.
   */
  formatLines(): [string, string] {
    return [this.formatElapsedLine(), this.formatStatusLine()]
  }

  private setupScrollRegion(clearScreen = false): void {
    const scrollBottom = this.rows - STATUS_HEIGHT
    if (clearScreen) {
      this.output.write(`${ESC}2J${ESC}1;1H`)
    }
    this.output.write(`${ESC}1;${scrollBottom}r${ESC}1;1H`)
  }

  private formatElapsedLine(): string {
    const stats = this.stats
    const elapsed = `${FG_WHITE}Elapsed: ${formatDuration(stats?.elapsedSeconds ?? 0)}${RESET}`

    const middle: string[] = []
    if (stats) {
      middle.push(`${FG_BRIGHT_CYAN}rate: ${stats.rate.toFixed(2)}/s${RESET}`)
      if (stats.errorCount > 0) {
        middle.push(`${FG_BRIGHT_RED}errors: ${stats.errorCount.toLocaleString()}${RESET}`)
      }
    }

    let eta = ""
    if (stats && stats.processedCount > 0 && stats.etaSeconds > 0) {
      eta = `${FG_BRIGHT_GREEN}ETA: ~${formatDuration(stats.etaSeconds)}${RESET}`
    }

    const left = [elapsed, ...middle].join("  ")
    return this.spread(left, eta)
  }

  private formatStatusLine(): string {
    const current = this.stats?.currentIndex ?? 0
    const total = this.config.totalItems
    const modeLabel = this.config.mode ? ` ${this.config.mode}` : ""
    const progressText = `${current}/${total}${modeLabel} ${this.config.itemLabel}`
    const left = `${FG_CYAN}[${FG_BRIGHT_WHITE}${progressText}${FG_CYAN}]${RESET}`

    const percentage = total > 0 ? (current / total) * 100 : 0
    const right = `${percentageColor(percentage)}${percentage.toFixed(0)}%${RESET}`
    return this.spread(left, right)
  }

  private spread(left: string, right: string): string {
    const padding = " ".repeat(Math.max(1, this.cols - visibleLength(left) - visibleLength(right)))
    return `${BG_BLACK}${left}${padding}${right}${RESET}`
  }

  private render(): void {
    if (!this.isEnabled || !this.isRunning) return

    const [elapsedLine, statusLine] = this.formatLines()
    const separator = `${DIM}${"─".repeat(this.cols)}${RESET}`

    this.output.write(
      SAVE_CURSOR +
        `${ESC}${this.rows - 2};1H${CLEAR_LINE}${separator}` +
        `${ESC}${this.rows - 1};1H${CLEAR_LINE}${elapsedLine}` +
        `${ESC}${this.rows};1H${CLEAR_LINE}${statusLine}` +
        RESTORE_CURSOR
    )
  }
}
