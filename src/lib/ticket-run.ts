/**
 * Run orchestration around the batch scheduler: prerequisite checks, the
 * resume-or-fresh init step, the `save` snapshot and the `cleanup` helpers.
 */

import fs from "fs"
import path from "path"
import { BatchScheduler, type BatchRunResult } from "./batch-scheduler.js"
import { CheckpointStore, type LoadedCheckpoint } from "./checkpoint-store.js"
import { OpenAITicketClassifier } from "./classification/openai-classifier.js"
import { ServiceCatalog } from "./classification/service-catalog.js"
import type { TicketClassifier } from "./classification/types.js"
import type { ClassifierConfig } from "./config.js"
import { CsvTableFile } from "./csv-table.js"
import { formatFileTimestamp } from "./date-utils.js"
import { OutputWriteError, PrerequisiteError } from "./errors.js"
import { createModuleLogger } from "./logger.js"
import { ProcessingState, type ProgressStats } from "./processing-state.js"
import { ensureOutputColumns, type TableSource, type TicketTable } from "./ticket-table.js"

const log = createModuleLogger("ticket-run")

export interface CheckpointReader {
  loadLatest(): Promise<LoadedCheckpoint | null>
}

/**
 * Verify that everything a processing run needs is in place.
 *
 * @throws PrerequisiteError naming every missing item
 */
export function checkPrerequisites(
  config: Pick<ClassifierConfig, "inputFile" | "serviceCatalogFile" | "openaiApiKey">,
  { requireApiKey = true }: { requireApiKey?: boolean } = {}
): void {
  const problems: string[] = []
  if (!fs.existsSync(config.inputFile)) {
    problems.push(`Input file not found: ${config.inputFile}`)
  }
  if (!fs.existsSync(config.serviceCatalogFile)) {
    problems.push(`Service categories file not found: ${config.serviceCatalogFile}`)
  }
  if (requireApiKey && !config.openaiApiKey) {
    problems.push("OPENAI_API_KEY is not set")
  }
  if (problems.length > 0) {
    throw new PrerequisiteError(problems.join("; "))
  }
}

export interface InitializeRunOptions {
  checkpoints: CheckpointReader
  source: TableSource
  /** Ignore existing checkpoints and start from the first row */
  fresh?: boolean
  now?: number
}

export interface InitializedRun {
  table: TicketTable
  state: ProcessingState
  /** Checkpoint the run resumes from, or null for a fresh run */
  resumedFrom: string | null
}

/**
 * Resume from the newest checkpoint unless `fresh`, otherwise load the input
 * table with fresh counters. Either way the output columns exist afterwards.
 *
 * @throws CheckpointLoadError if the newest checkpoint is unusable
 * @throws TableReadError if the input table cannot be read
 */
export async function initializeRun({
  checkpoints,
  source,
  fresh = false,
  now = Date.now(),
}: InitializeRunOptions): Promise<InitializedRun> {
  if (!fresh) {
    const checkpoint = await checkpoints.loadLatest()
    if (checkpoint) {
      log.info(
        { filePath: checkpoint.filePath, resumeIndex: checkpoint.lastIndex + 1 },
        "Resuming from checkpoint"
      )
      return {
        table: ensureOutputColumns(checkpoint.table),
        state: ProcessingState.fromCheckpoint(checkpoint),
        resumedFrom: checkpoint.filePath,
      }
    }
    log.info("No checkpoint found, starting fresh")
  } else {
    log.info("Fresh run requested, ignoring checkpoints")
  }

  const table = ensureOutputColumns(await source.read())
  log.info({ source: source.description, rows: table.rows.length }, "Loaded input table")
  return { table, state: ProcessingState.fresh(now), resumedFrom: null }
}

export interface ProcessTicketsOptions {
  fresh?: boolean
  signal?: AbortSignal
  onStart?: (run: InitializedRun) => void
  onProgress?: (stats: ProgressStats) => void
  /** Replaces the OpenAI classifier; the API key is then not required */
  classifier?: TicketClassifier
}

/**
 * The `process` command: check prerequisites, init, then run the scheduler.
 */
export async function processTickets(
  config: ClassifierConfig,
  options: ProcessTicketsOptions = {}
): Promise<BatchRunResult> {
  checkPrerequisites(config, { requireApiKey: !options.classifier })

  const classifier =
    options.classifier ??
    new OpenAITicketClassifier({
      catalog: ServiceCatalog.load(config.serviceCatalogFile),
      model: config.modelVersion,
      maxRetries: config.maxRetries,
      apiKey: config.openaiApiKey ?? undefined,
      timeoutMs: config.requestTimeoutMs,
    })

  const checkpoints = new CheckpointStore(config.checkpointDir, {
    keepLast: config.checkpointKeepLast,
  })
  const run = await initializeRun({
    checkpoints,
    source: new CsvTableFile(config.inputFile),
    fresh: options.fresh,
  })
  options.onStart?.(run)

  const scheduler = new BatchScheduler({
    classifier,
    checkpoints,
    sink: new CsvTableFile(config.outputFile),
    config: {
      parallelRequests: config.parallelRequests,
      parallelBatchSize: config.parallelBatchSize,
      checkpointInterval: config.checkpointInterval,
    },
    onProgress: options.onProgress,
  })
  return scheduler.run({ table: run.table, state: run.state, signal: options.signal })
}

export type SaveResultsOutcome =
  | { saved: true; outputPath: string; source: "checkpoint" | "input" }
  | { saved: false; reason: string }

export interface SaveResultsOptions {
  checkpoints: CheckpointReader
  source: TableSource
  outputDir: string
  now?: Date
}

/**
 * Snapshot the current results to `<outputDir>/results_<YYYYMMDD_HHMMSS>.csv`:
 * the newest checkpoint's table, else the untouched input table.
 * Writes nothing when neither exists.
 *
 * @throws CheckpointLoadError if the newest checkpoint is unusable
 * @throws OutputWriteError if the snapshot cannot be written
 */
export async function saveCurrentResults({
  checkpoints,
  source,
  outputDir,
  now = new Date(),
}: SaveResultsOptions): Promise<SaveResultsOutcome> {
  let table: TicketTable
  let origin: "checkpoint" | "input"

  const checkpoint = await checkpoints.loadLatest()
  if (checkpoint) {
    table = checkpoint.table
    origin = "checkpoint"
  } else if (source.exists()) {
    table = ensureOutputColumns(await source.read())
    origin = "input"
  } else {
    log.error({ input: source.description }, "No checkpoint found and input file does not exist")
    return { saved: false, reason: "No checkpoint or input file found" }
  }

  const outputPath = path.join(outputDir, `results_${formatFileTimestamp(now)}.csv`)
  try {
    await new CsvTableFile(outputPath).write(table)
  } catch (error) {
    throw new OutputWriteError(outputPath, { cause: error })
  }

  log.info({ outputPath, source: origin }, "Results saved")
  return { saved: true, outputPath, source: origin }
}

/**
 * List `*.log` files directly inside `logDir`, leaving out `exclude` (the log
 * file the current process writes to).
 */
export function findLogFiles(logDir: string, exclude: string | null = null): string[] {
  if (!fs.existsSync(logDir)) return []
  const excluded = exclude === null ? null : path.resolve(exclude)
  return fs
    .readdirSync(logDir)
    .filter((name) => name.endsWith(".log"))
    .sort()
    .map((name) => path.join(logDir, name))
    .filter((file) => path.resolve(file) !== excluded)
}

/**
 * Delete the given files.
 *
 * @returns Number of files deleted
 */
export function deleteFiles(files: string[]): number {
  for (const file of files) {
    fs.rmSync(file, { force: true })
  }
  return files.length
}
