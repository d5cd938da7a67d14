/**
 * Batch Scheduler
 *
 * Drives a ticket table through the classifier in waves:
 * - each wave is the next contiguous slice of `parallelBatchSize` rows
 * - at most `parallelRequests` classifications are in flight (p-limit)
 * - the whole wave settles before the next one starts
 * - a checkpoint is saved once `checkpointInterval` more tickets have completed
 * - the finished table is written to the sink
 *
 * Per-row failures never escape a task. Aborting the signal stops the run
 * after the current wave without writing a checkpoint or any output.
 */

import pLimit from "p-limit"
import type { CheckpointWriter } from "./checkpoint-store.js"
import type { TicketClassifier } from "./classification/types.js"
import { OutputWriteError, getErrorMessage } from "./errors.js"
import { createModuleLogger } from "./logger.js"
import {
  formatProgressMessage,
  formatSummary,
  type ProcessingState,
  type ProgressStats,
} from "./processing-state.js"
import {
  getTicket,
  isCompleteResult,
  writeClassification,
  type TableSink,
  type TicketTable,
} from "./ticket-table.js"

export type SchedulerPhase =
  | "init"
  | "running"
  | "draining"
  | "finalizing"
  | "done"
  | "fatal"
  | "interrupted"

export interface BatchSchedulerConfig {
  /** Concurrency ceiling for classifier calls */
  parallelRequests: number
  /** Rows per wave */
  parallelBatchSize: number
  /** Completed tickets between checkpoints */
  checkpointInterval: number
}

export interface BatchSchedulerDeps {
  classifier: TicketClassifier
  checkpoints: CheckpointWriter
  sink: TableSink
  config: BatchSchedulerConfig
  /** Called after every row and every wave */
  onProgress?: (stats: ProgressStats) => void
}

export interface BatchRunOptions {
  table: TicketTable
  state: ProcessingState
  signal?: AbortSignal
}

export interface BatchRunResult {
  exitReason: "completed" | "interrupted"
  stats: ProgressStats
  checkpointsSaved: number
  /** Sink description, or null when nothing was written */
  outputDestination: string | null
}

export class BatchScheduler {
  private readonly classifier: TicketClassifier
  private readonly checkpoints: CheckpointWriter
  private readonly sink: TableSink
  private readonly config: BatchSchedulerConfig
  private readonly onProgress?: (stats: ProgressStats) => void
  private log = createModuleLogger("batch-scheduler")
  private _phase: SchedulerPhase = "init"

  constructor(deps: BatchSchedulerDeps) {
    this.classifier = deps.classifier
    this.checkpoints = deps.checkpoints
    this.sink = deps.sink
    this.config = deps.config
    this.onProgress = deps.onProgress
  }

  get phase(): SchedulerPhase {
    return this._phase
  }

  /**
   * Process every row after `state.lastProcessedIndex`, then write the table.
   *
   * @throws OutputWriteError if the sink rejects the finished table
   */
  async run({ table, state, signal }: BatchRunOptions): Promise<BatchRunResult> {
    const totalRows = table.rows.length
    const { parallelRequests, parallelBatchSize, checkpointInterval } = this.config
    const limit = pLimit(parallelRequests)

    let checkpointMarker = state.processedCount
    let checkpointsSaved = 0

    this.log.info(
      {
        totalRows,
        startIndex: state.lastProcessedIndex + 1,
        parallelRequests,
        parallelBatchSize,
        checkpointInterval,
      },
      "Starting batch run"
    )
    this._phase = "running"

    try {
      while (state.lastProcessedIndex + 1 < totalRows) {
        if (signal?.aborted) break

        const start = state.lastProcessedIndex + 1
        const end = Math.min(start + parallelBatchSize, totalRows)
        if (end >= totalRows) this._phase = "draining"

        const wave: Promise<void>[] = []
        for (let index = start; index < end; index++) {
          wave.push(limit(() => this.processRow(table, state, index, signal)))
        }
        await Promise.all(wave)

        if (signal?.aborted) break
        this.emitProgress(state, totalRows)

        if (state.processedCount - checkpointMarker >= checkpointInterval) {
          try {
            await this.checkpoints.save(state, table)
            checkpointMarker = state.processedCount
            checkpointsSaved++
            this.log.info(formatProgressMessage(state.progressStats(totalRows)))
          } catch (error) {
            this.log.error(
              { error: getErrorMessage(error), lastIndex: state.lastProcessedIndex },
              "Checkpoint save failed; continuing"
            )
          }
        }
      }

      if (signal?.aborted) {
        this._phase = "interrupted"
        const stats = state.progressStats(totalRows)
        this.log.warn(
          { processedCount: stats.processedCount, checkpointsSaved },
          "Run interrupted; no output written"
        )
        return { exitReason: "interrupted", stats, checkpointsSaved, outputDestination: null }
      }

      this._phase = "finalizing"
      try {
        await this.sink.write(table)
      } catch (error) {
        throw new OutputWriteError(this.sink.description, { cause: error })
      }
      this.log.info({ destination: this.sink.description }, "Results written")

      const stats = state.progressStats(totalRows)
      this.log.info(formatSummary(stats))
      this._phase = "done"
      return {
        exitReason: "completed",
        stats,
        checkpointsSaved,
        outputDestination: this.sink.description,
      }
    } catch (error) {
      this._phase = "fatal"
      throw error
    }
  }

  private async processRow(
    table: TicketTable,
    state: ProcessingState,
    index: number,
    signal: AbortSignal | undefined
  ): Promise<void> {
    // Queued behind the limiter when the run was cancelled
    if (signal?.aborted) return

    try {
      const { title, summary } = getTicket(table, index)
      const result = await this.classifier.classify(title, summary, { signal })
      writeClassification(table, index, result)
      if (isCompleteResult(result)) {
        state.recordSuccess(index)
      } else {
        this.log.warn({ index, title, result }, "Incomplete classification; row left empty")
        state.recordFailure(index)
      }
    } catch (error) {
      if (signal?.aborted) {
        this.log.debug({ index }, "Classification cancelled")
        return
      }
      this.log.error({ index, error: getErrorMessage(error) }, "Ticket classification failed")
      writeClassification(table, index, null)
      state.recordFailure(index)
    }

    this.emitProgress(state, table.rows.length)
  }

  private emitProgress(state: ProcessingState, totalRows: number): void {
    this.onProgress?.(state.progressStats(totalRows))
  }
}
