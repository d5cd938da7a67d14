/**
 * Run-scoped progress counters and the derived statistics shown to operators.
 *
 * All mutation goes through recordSuccess/recordFailure. They are synchronous,
 * so concurrent tasks on the event loop can never interleave inside an update.
 */

import type { Checkpoint } from "./checkpoint-store.js"

export interface ProgressStats {
  processedCount: number
  errorCount: number
  successCount: number
  elapsedSeconds: number
  /** Tickets per second */
  rate: number
  etaSeconds: number
  /** 0-100 */
  successRatePct: number
  /** Next index to be processed (cursor + 1) */
  currentIndex: number
  totalRows: number
}

export class ProcessingState {
  private _processedCount: number
  private _errorCount: number
  private _lastProcessedIndex: number
  readonly startTime: number

  private constructor(
    processedCount: number,
    errorCount: number,
    lastProcessedIndex: number,
    startTime: number
  ) {
    this._processedCount = processedCount
    this._errorCount = errorCount
    this._lastProcessedIndex = lastProcessedIndex
    this.startTime = startTime
  }

  /** Fresh state: nothing processed, cursor before the first row */
  static fresh(now: number = Date.now()): ProcessingState {
    return new ProcessingState(0, 0, -1, now)
  }

  /** Rebuild the state captured by a checkpoint */
  static fromCheckpoint(
    checkpoint: Pick<Checkpoint, "lastIndex" | "processedCount" | "errorCount" | "startTime">
  ): ProcessingState {
    return new ProcessingState(
      checkpoint.processedCount,
      checkpoint.errorCount,
      checkpoint.lastIndex,
      checkpoint.startTime
    )
  }

  get processedCount(): number {
    return this._processedCount
  }

  get errorCount(): number {
    return this._errorCount
  }

  get successCount(): number {
    return this._processedCount - this._errorCount
  }

  /** Highest index whose attempt has finished; -1 before any work */
  get lastProcessedIndex(): number {
    return this._lastProcessedIndex
  }

  recordSuccess(index: number): void {
    this._processedCount += 1
    this.advanceCursor(index)
  }

  /** A failed row still counts as processed and still advances the cursor */
  recordFailure(index: number): void {
    this._errorCount += 1
    this._processedCount += 1
    this.advanceCursor(index)
  }

  private advanceCursor(index: number): void {
    this._lastProcessedIndex = Math.max(this._lastProcessedIndex, index)
  }

  progressStats(totalRows: number, now: number = Date.now()): ProgressStats {
    const elapsedSeconds = (now - this.startTime) / 1000
    const rate = elapsedSeconds > 0 ? this._processedCount / elapsedSeconds : 0
    const etaSeconds = rate > 0 ? (totalRows - this._lastProcessedIndex - 1) / rate : 0
    const successRatePct =
      this._processedCount > 0 ? (this.successCount / this._processedCount) * 100 : 0

    return {
      processedCount: this._processedCount,
      errorCount: this._errorCount,
      successCount: this.successCount,
      elapsedSeconds,
      rate,
      etaSeconds,
      successRatePct,
      currentIndex: this._lastProcessedIndex + 1,
      totalRows,
    }
  }
}

/**
 * One-line progress message logged after each checkpoint.
 */
export function formatProgressMessage(stats: ProgressStats): string {
  return (
    `Progress: ${stats.currentIndex}/${stats.totalRows} tickets | ` +
    `Rate: ${stats.rate.toFixed(2)} tickets/sec | ` +
    `Est. remaining time: ${(stats.etaSeconds / 60).toFixed(2)} minutes | ` +
    `Success rate: ${stats.successRatePct.toFixed(2)}%`
  )
}

/**
 * Multi-line summary printed when a run completes.
 */
export function formatSummary(stats: ProgressStats): string {
  return [
    "Processing completed:",
    `  Total tickets processed: ${stats.processedCount}`,
    `  Successful: ${stats.successCount}`,
    `  Errors: ${stats.errorCount}`,
    `  Total time: ${(stats.elapsedSeconds / 60).toFixed(2)} minutes`,
    `  Average rate: ${stats.rate.toFixed(2)} tickets/sec`,
    `  Success rate: ${stats.successRatePct.toFixed(2)}%`,
  ].join("\n")
}
